import { describe, it, expect } from 'vitest';
import { ConversationMachine, emptyDraft } from '../src/domain/conversation/machine';
import { classify, Intent } from '../src/domain/conversation/intents';
import { TicketRouter } from '../src/domain/ticket/router';
import { ConversationSession, ConversationState, ComplaintDraft, MediaRef } from '../src/shared/types';
import { FIXED_NOW } from './fakes';

const machine = new ConversationMachine({ router: new TicketRouter() });
const photo: MediaRef = { id: 'media-1', type: 'image' };

function session(state: ConversationState, draft: ComplaintDraft = emptyDraft()): ConversationSession {
  return {
    phone: '+201001234567',
    state,
    language: 'en',
    draft,
    createdAt: FIXED_NOW,
    updatedAt: FIXED_NOW,
  };
}

const confirmYes: Intent = { kind: 'confirm', answer: 'yes' };

describe('ConversationMachine', () => {
  it('opens the menu from idle on any message', () => {
    const result = machine.transition(session('idle'), classify('idle', '1'));

    expect(result.state).toBe('awaiting_menu_choice');
    expect(result.reply).toEqual({ template: 'welcome', params: {} });
    expect(result.effects).toEqual([]);
  });

  it('restarts from completed', () => {
    const result = machine.transition(session('completed'), { kind: 'greeting' });
    expect(result.state).toBe('awaiting_menu_choice');
  });

  it('switches language while opening the menu', () => {
    const result = machine.transition(session('idle'), { kind: 'language_switch', language: 'ar' });
    expect(result.language).toBe('ar');
    expect(result.state).toBe('awaiting_menu_choice');
  });

  it('starts a complaint on option 1', () => {
    const result = machine.transition(session('awaiting_menu_choice'), { kind: 'menu_select', option: 1 });
    expect(result.state).toBe('awaiting_product');
    expect(result.reply.template).toBe('ask_product');
  });

  it('looks up the latest ticket on option 2', () => {
    const result = machine.transition(session('awaiting_menu_choice'), { kind: 'menu_select', option: 2 });
    expect(result.state).toBe('idle');
    expect(result.reply.template).toBe('no_tickets');
    expect(result.effects).toEqual([{ type: 'lookup_status' }]);
  });

  it('shows help on option 3 and stays on the menu', () => {
    const result = machine.transition(session('awaiting_menu_choice'), { kind: 'menu_select', option: 3 });
    expect(result.state).toBe('awaiting_menu_choice');
    expect(result.reply.template).toBe('help');
  });

  it('looks up a referenced ticket', () => {
    const result = machine.transition(session('awaiting_menu_choice'), {
      kind: 'ticket_reference',
      ticketNumber: 'TKT-2024-00003',
    });
    expect(result.state).toBe('idle');
    expect(result.reply).toEqual({ template: 'ticket_not_found', params: { ticketNumber: 'TKT-2024-00003' } });
    expect(result.effects).toEqual([{ type: 'lookup_status', ticketNumber: 'TKT-2024-00003' }]);
  });

  it('re-prompts and keeps the state for input outside the table', () => {
    const cases: Array<[ConversationState, Intent, string]> = [
      ['awaiting_menu_choice', { kind: 'menu_select', option: 7 }, 'menu_invalid'],
      ['awaiting_menu_choice', { kind: 'invalid' }, 'menu_invalid'],
      ['awaiting_product', { kind: 'invalid' }, 'ask_product'],
      ['awaiting_issue', { kind: 'skip' }, 'ask_issue'],
      ['awaiting_photo', { kind: 'free_text', content: 'hmm' }, 'ask_photo'],
      ['awaiting_confirmation', { kind: 'invalid' }, 'confirm_prompt'],
    ];

    for (const [state, intent, template] of cases) {
      const draft: ComplaintDraft = { product: 'Paint', photos: [] };
      const result = machine.transition(session(state, draft), intent);
      expect(result.state).toBe(state);
      expect(result.draft).toEqual(draft);
      expect(result.reply.template).toBe(template);
      expect(result.issue).toBe('invalid_input');
      expect(result.effects).toEqual([]);
    }
  });

  it('collects product, issue and photo into the draft', () => {
    const afterProduct = machine.transition(session('awaiting_product'), { kind: 'free_text', content: 'White paint' });
    expect(afterProduct.state).toBe('awaiting_issue');
    expect(afterProduct.draft).toEqual({ product: 'White paint', photos: [] });

    const afterIssue = machine.transition(session('awaiting_issue', afterProduct.draft), {
      kind: 'free_text',
      content: 'too thick',
    });
    expect(afterIssue.state).toBe('awaiting_photo');
    expect(afterIssue.reply.template).toBe('ask_photo');

    const afterPhoto = machine.transition(session('awaiting_photo', afterIssue.draft), {
      kind: 'photo',
      media: [photo],
    });
    expect(afterPhoto.state).toBe('awaiting_confirmation');
    expect(afterPhoto.draft.photos).toEqual([photo]);
    expect(afterPhoto.reply).toEqual({
      template: 'confirm_summary',
      params: { product: 'White paint', issue: 'too thick', photoCount: 1 },
    });
  });

  it('ignores photo captions by default', () => {
    const draft: ComplaintDraft = { product: 'Paint', issue: 'too thick', photos: [] };
    const result = machine.transition(session('awaiting_photo', draft), {
      kind: 'photo',
      media: [photo],
      caption: 'see here',
    });
    expect(result.draft.issue).toBe('too thick');
  });

  it('appends photo captions to the issue when configured', () => {
    const appending = new ConversationMachine({ router: new TicketRouter(), photoCaptionPolicy: 'append' });
    const draft: ComplaintDraft = { product: 'Paint', issue: 'too thick', photos: [] };
    const result = appending.transition(session('awaiting_photo', draft), {
      kind: 'photo',
      media: [photo],
      caption: 'see here',
    });
    expect(result.draft.issue).toBe('too thick\nsee here');
  });

  it('skips photos', () => {
    const draft: ComplaintDraft = { product: 'Paint', issue: 'too thick', photos: [] };
    const result = machine.transition(session('awaiting_photo', draft), { kind: 'skip' });
    expect(result.state).toBe('awaiting_confirmation');
    expect(result.reply.params).toEqual({ product: 'Paint', issue: 'too thick', photoCount: 0 });
  });

  it('routes a confirmed defect with a photo to a refund', () => {
    const draft: ComplaintDraft = { product: 'White paint', issue: 'paint is too thick', photos: [photo] };
    const result = machine.transition(session('awaiting_confirmation', draft), confirmYes);

    expect(result.state).toBe('idle');
    expect(result.draft).toEqual(emptyDraft());
    expect(result.reply.template).toBe('ticket_created_refund');
    expect(result.effects).toHaveLength(1);

    const [effect] = result.effects;
    expect(effect?.type).toBe('create_ticket');
    if (effect?.type === 'create_ticket') {
      expect(effect.complaint).toEqual({ product: 'White paint', issue: 'paint is too thick', photos: [photo] });
      expect(effect.decision.outcome).toBe('refund');
      expect(effect.decision.initialStatus).toBe('decided');
    }
  });

  it('routes a confirmed defect without a photo to manual review', () => {
    const draft: ComplaintDraft = { product: 'White paint', issue: 'paint is too thick', photos: [] };
    const result = machine.transition(session('awaiting_confirmation', draft), confirmYes);

    expect(result.reply.template).toBe('ticket_created_manual_review');
    const [effect] = result.effects;
    if (effect?.type !== 'create_ticket') {
      throw new Error('expected a create_ticket effect');
    }
    expect(effect.decision.outcome).toBe('manual_review');
    expect(effect.decision.initialStatus).toBe('under_review');
  });

  it('restarts the draft when the summary is declined', () => {
    const draft: ComplaintDraft = { product: 'Paint', issue: 'too thick', photos: [photo] };
    const result = machine.transition(session('awaiting_confirmation', draft), { kind: 'confirm', answer: 'no' });
    expect(result.state).toBe('awaiting_product');
    expect(result.draft).toEqual(emptyDraft());
    expect(result.reply.template).toBe('restart');
  });

  it('asks for a missing field instead of creating a ticket', () => {
    const result = machine.transition(session('awaiting_confirmation', { product: 'Paint', photos: [] }), confirmYes);
    expect(result.state).toBe('awaiting_issue');
    expect(result.issue).toBe('incomplete_draft');
    expect(result.effects).toEqual([]);
  });

  it('discards the draft on cancel from any state', () => {
    const states: ConversationState[] = [
      'awaiting_menu_choice',
      'awaiting_product',
      'awaiting_issue',
      'awaiting_photo',
      'awaiting_confirmation',
    ];

    for (const state of states) {
      const result = machine.transition(
        session(state, { product: 'Paint', issue: 'too thick', photos: [photo] }),
        { kind: 'cancel' }
      );
      expect(result.state).toBe('idle');
      expect(result.draft).toEqual(emptyDraft());
      expect(result.reply.template).toBe('cancelled');
      expect(result.effects).toEqual([]);
    }
  });

  it('switches language mid-flow and repeats the current prompt', () => {
    const draft: ComplaintDraft = { product: 'Paint', photos: [] };
    const result = machine.transition(session('awaiting_issue', draft), { kind: 'language_switch', language: 'ar' });
    expect(result.state).toBe('awaiting_issue');
    expect(result.language).toBe('ar');
    expect(result.draft).toEqual(draft);
    expect(result.reply.template).toBe('ask_issue');
    expect(result.issue).toBeUndefined();
  });

  it('repeats the summary after a language switch at confirmation', () => {
    const draft: ComplaintDraft = { product: 'Paint', issue: 'lumpy', photos: [] };
    const result = machine.transition(session('awaiting_confirmation', draft), {
      kind: 'language_switch',
      language: 'ar',
    });
    expect(result.reply).toEqual({
      template: 'confirm_summary',
      params: { product: 'Paint', issue: 'lumpy', photoCount: 0 },
    });
  });
});
