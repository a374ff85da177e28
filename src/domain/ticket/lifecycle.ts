import { ReviewerInfo, Ticket, TicketStatus } from '../../shared/types';
import { BadRequestError, InvalidTicketTransitionError } from '../../shared/errors';

const RANK: Record<TicketStatus, number> = {
  new: 0,
  under_review: 1,
  decided: 2,
  completed: 3,
  cancelled: 3,
  rejected: 3,
};

export const TERMINAL_STATUSES: readonly TicketStatus[] = ['completed', 'cancelled', 'rejected'];

export function isTerminal(status: TicketStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Ticket status moves forward only:
 *
 *   new → under_review → decided → completed
 *
 * Review may be skipped (an auto-routed ticket goes new → decided), the
 * decision may not. Any non-terminal ticket can be cancelled; a ticket not
 * yet decided can be rejected.
 */
export function canTransition(from: TicketStatus, to: TicketStatus): boolean {
  if (isTerminal(from)) return false;

  switch (to) {
    case 'cancelled':
      return true;
    case 'rejected':
      return from === 'new' || from === 'under_review';
    case 'new':
      return false;
    case 'completed':
      return from === 'decided';
    default:
      return RANK[to] > RANK[from];
  }
}

/**
 * Apply a reviewer status change to a ticket, returning the updated copy.
 * Throws when the move is not allowed by the lifecycle.
 */
export function applyStatusChange(
  ticket: Ticket,
  to: TicketStatus,
  info: ReviewerInfo,
  now: Date = new Date()
): Ticket {
  if (!canTransition(ticket.status, to)) {
    throw new InvalidTicketTransitionError(ticket.ticketNumber, ticket.status, to);
  }

  const compensationType = info.compensationType ?? ticket.compensationType;
  if (to === 'decided' && !compensationType) {
    throw new BadRequestError('A decided ticket needs a compensation type');
  }

  return {
    ...ticket,
    status: to,
    compensationType: to === 'rejected' ? null : compensationType,
    reviewer: info.reviewer,
    reviewerNotes: info.notes ?? ticket.reviewerNotes,
    decidedAt: to === 'decided' || to === 'rejected' ? now : ticket.decidedAt,
    completedAt: to === 'completed' ? now : ticket.completedAt,
    updatedAt: now,
  };
}
