import { describe, it, expect } from 'vitest';
import { formatTicketNumber, parseTicketNumber, TicketNumberGenerator } from '../src/domain/ticket/number';

describe('formatTicketNumber', () => {
  it('pads the sequence to five digits', () => {
    expect(formatTicketNumber(2024, 7)).toBe('TKT-2024-00007');
  });

  it('grows past five digits', () => {
    expect(formatTicketNumber(2024, 123456)).toBe('TKT-2024-123456');
  });
});

describe('parseTicketNumber', () => {
  it('reads year and sequence', () => {
    expect(parseTicketNumber('TKT-2025-00042')).toEqual({ year: 2025, sequence: 42 });
  });

  it('rejects other shapes', () => {
    expect(parseTicketNumber('TKT-25-42')).toBeNull();
    expect(parseTicketNumber('tkt-2025-00042')).toBeNull();
  });
});

describe('TicketNumberGenerator', () => {
  it('issues 1000 strictly increasing numbers', async () => {
    let counter = 0;
    const generator = new TicketNumberGenerator(
      async () => ++counter,
      () => new Date('2024-03-01T00:00:00.000Z')
    );

    const issued: string[] = [];
    for (let i = 0; i < 1000; i++) {
      issued.push(await generator.next());
    }

    const sequences = issued.map((n) => parseTicketNumber(n)?.sequence ?? -1);
    for (let i = 1; i < sequences.length; i++) {
      expect(sequences[i]).toBeGreaterThan(sequences[i - 1] ?? Infinity);
    }
    expect(new Set(issued).size).toBe(1000);
    expect(issued[0]).toBe('TKT-2024-00001');
    expect(issued[999]).toBe('TKT-2024-01000');
  });

  it('uses the UTC year', async () => {
    const generator = new TicketNumberGenerator(
      async (year) => (year === 2025 ? 1 : 99),
      () => new Date('2025-01-01T00:30:00.000Z')
    );
    expect(await generator.next()).toBe('TKT-2025-00001');
  });
});
