import {
  CompleteComplaint,
  ComplaintDraft,
  ConversationSession,
  ConversationState,
  Language,
  RoutingDecision,
  RoutingOutcome,
} from '../../shared/types';
import { TicketRouter } from '../ticket/router';
import { Intent } from './intents';
import { MessageKey, Reply } from './catalogue';

// ============================================================================
// Types
// ============================================================================

export type Effect =
  | { type: 'create_ticket'; complaint: CompleteComplaint; decision: RoutingDecision }
  | { type: 'lookup_status'; ticketNumber?: string };

export type TransitionIssue = 'invalid_input' | 'incomplete_draft';

export interface Transition {
  state: ConversationState;
  draft: ComplaintDraft;
  language: Language;
  /**
   * Reply to send. For `lookup_status` this is the fallback used when no
   * ticket is found; for `create_ticket` the caller adds `ticketNumber`.
   */
  reply: Reply;
  effects: Effect[];
  issue?: TransitionIssue;
}

export type PhotoCaptionPolicy = 'ignore' | 'append';

export interface MachineOptions {
  router: TicketRouter;
  photoCaptionPolicy?: PhotoCaptionPolicy;
}

export function emptyDraft(): ComplaintDraft {
  return { photos: [] };
}

function reply(template: MessageKey, params: Reply['params'] = {}): Reply {
  return { template, params };
}

function summary(draft: ComplaintDraft): Reply {
  return reply('confirm_summary', {
    product: draft.product ?? '-',
    issue: draft.issue ?? '-',
    photoCount: draft.photos.length,
  });
}

// Prompt re-sent when input does not fit the current state
const REPROMPT: Record<ConversationState, MessageKey> = {
  idle: 'welcome',
  completed: 'welcome',
  awaiting_menu_choice: 'menu_invalid',
  awaiting_product: 'ask_product',
  awaiting_issue: 'ask_issue',
  awaiting_photo: 'ask_photo',
  awaiting_confirmation: 'confirm_prompt',
};

const CREATED_REPLY: Record<RoutingOutcome, MessageKey> = {
  refund: 'ticket_created_refund',
  replacement: 'ticket_created_replacement',
  manual_review: 'ticket_created_manual_review',
};

// ============================================================================
// Machine
// ============================================================================

/**
 * Complaint intake dialogue.
 *
 *   idle → awaiting_menu_choice → awaiting_product → awaiting_issue
 *        → awaiting_photo → awaiting_confirmation → (ticket) → idle
 *
 * `transition` is pure: it never touches storage or the network. Side effects
 * are returned as data for the caller to perform.
 */
export class ConversationMachine {
  private readonly router: TicketRouter;
  private readonly photoCaptionPolicy: PhotoCaptionPolicy;

  constructor(options: MachineOptions) {
    this.router = options.router;
    this.photoCaptionPolicy = options.photoCaptionPolicy ?? 'ignore';
  }

  transition(session: ConversationSession, intent: Intent): Transition {
    const { state, draft, language } = session;

    if (intent.kind === 'cancel') {
      return { state: 'idle', draft: emptyDraft(), language, reply: reply('cancelled'), effects: [] };
    }

    if (state === 'idle' || state === 'completed') {
      return {
        state: 'awaiting_menu_choice',
        draft: emptyDraft(),
        language: intent.kind === 'language_switch' ? intent.language : language,
        reply: reply('welcome'),
        effects: [],
      };
    }

    if (intent.kind === 'language_switch') {
      return { state, draft, language: intent.language, reply: this.promptFor(state, draft), effects: [] };
    }

    switch (state) {
      case 'awaiting_menu_choice':
        return this.onMenu(session, intent);
      case 'awaiting_product':
        if (intent.kind === 'free_text') {
          return this.advance(session, 'awaiting_issue', { ...draft, product: intent.content }, reply('ask_issue'));
        }
        break;
      case 'awaiting_issue':
        if (intent.kind === 'free_text') {
          return this.advance(session, 'awaiting_photo', { ...draft, issue: intent.content }, reply('ask_photo'));
        }
        break;
      case 'awaiting_photo':
        return this.onPhoto(session, intent);
      case 'awaiting_confirmation':
        return this.onConfirmation(session, intent);
    }

    return this.reprompt(session);
  }

  // ==========================================================================
  // State Handlers
  // ==========================================================================

  private onMenu(session: ConversationSession, intent: Intent): Transition {
    const { language } = session;

    if (intent.kind === 'menu_select') {
      switch (intent.option) {
        case 1:
          return this.advance(session, 'awaiting_product', emptyDraft(), reply('ask_product'));
        case 2:
          return {
            state: 'idle',
            draft: emptyDraft(),
            language,
            reply: reply('no_tickets'),
            effects: [{ type: 'lookup_status' }],
          };
        case 3:
          return this.advance(session, 'awaiting_menu_choice', session.draft, reply('help'));
      }
    }

    if (intent.kind === 'ticket_reference') {
      return {
        state: 'idle',
        draft: emptyDraft(),
        language,
        reply: reply('ticket_not_found', { ticketNumber: intent.ticketNumber }),
        effects: [{ type: 'lookup_status', ticketNumber: intent.ticketNumber }],
      };
    }

    if (intent.kind === 'greeting') {
      return this.advance(session, 'awaiting_menu_choice', session.draft, reply('welcome'));
    }

    return this.reprompt(session);
  }

  private onPhoto(session: ConversationSession, intent: Intent): Transition {
    const { draft } = session;

    if (intent.kind === 'skip') {
      const next = { ...draft, photos: [] };
      return this.advance(session, 'awaiting_confirmation', next, summary(next));
    }

    if (intent.kind === 'photo') {
      const next: ComplaintDraft = { ...draft, photos: intent.media };
      if (this.photoCaptionPolicy === 'append' && intent.caption) {
        next.issue = draft.issue ? `${draft.issue}\n${intent.caption}` : intent.caption;
      }
      return this.advance(session, 'awaiting_confirmation', next, summary(next));
    }

    return this.reprompt(session);
  }

  private onConfirmation(session: ConversationSession, intent: Intent): Transition {
    const { draft, language } = session;

    if (intent.kind !== 'confirm') {
      return this.reprompt(session);
    }

    if (intent.answer === 'no') {
      return this.advance(session, 'awaiting_product', emptyDraft(), reply('restart'));
    }

    // A draft can only be incomplete here if the session was edited out of band
    if (!draft.product) {
      return { ...this.advance(session, 'awaiting_product', draft, reply('ask_product')), issue: 'incomplete_draft' };
    }
    if (!draft.issue) {
      return { ...this.advance(session, 'awaiting_issue', draft, reply('ask_issue')), issue: 'incomplete_draft' };
    }

    const complaint: CompleteComplaint = { product: draft.product, issue: draft.issue, photos: draft.photos };
    const decision = this.router.route(complaint);

    return {
      state: 'idle',
      draft: emptyDraft(),
      language,
      reply: reply(CREATED_REPLY[decision.outcome]),
      effects: [{ type: 'create_ticket', complaint, decision }],
    };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private advance(
    session: ConversationSession,
    state: ConversationState,
    draft: ComplaintDraft,
    next: Reply
  ): Transition {
    return { state, draft, language: session.language, reply: next, effects: [] };
  }

  private reprompt(session: ConversationSession): Transition {
    const next = reply(REPROMPT[session.state]);
    return { ...this.advance(session, session.state, session.draft, next), issue: 'invalid_input' };
  }

  /** Current state's prompt, as first shown. */
  private promptFor(state: ConversationState, draft: ComplaintDraft): Reply {
    switch (state) {
      case 'awaiting_menu_choice':
        return reply('welcome');
      case 'awaiting_confirmation':
        return summary(draft);
      default:
        return reply(REPROMPT[state]);
    }
  }
}
