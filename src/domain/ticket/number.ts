import { isValidTicketNumber } from '../../shared/validation';

export const TICKET_PREFIX = 'TKT';
const SEQUENCE_DIGITS = 5;

export function formatTicketNumber(year: number, sequence: number): string {
  return `${TICKET_PREFIX}-${year}-${String(sequence).padStart(SEQUENCE_DIGITS, '0')}`;
}

export function parseTicketNumber(ticketNumber: string): { year: number; sequence: number } | null {
  if (!isValidTicketNumber(ticketNumber)) return null;
  const [, year, sequence] = ticketNumber.split('-');
  return { year: Number(year), sequence: Number(sequence) };
}

/** Source of the next per-year sequence value. Must be atomic across processes. */
export type SequenceSource = (year: number) => Promise<number>;

/**
 * Allocates `TKT-<yyyy>-<seq>` numbers. Uniqueness and ordering come from the
 * sequence source; the generator only picks the year and formats.
 */
export class TicketNumberGenerator {
  constructor(
    private readonly nextSequence: SequenceSource,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async next(): Promise<string> {
    const year = this.clock().getUTCFullYear();
    const sequence = await this.nextSequence(year);
    return formatTicketNumber(year, sequence);
  }
}
