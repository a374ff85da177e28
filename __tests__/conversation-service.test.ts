import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { ConversationService } from '../src/domain/conversation/service';
import { ConversationMachine } from '../src/domain/conversation/machine';
import { getMessageCatalogue } from '../src/domain/conversation/catalogue';
import { TicketRouter } from '../src/domain/ticket/router';
import { ComplaintDraft, ConversationSession, ConversationState, Language, MediaRef } from '../src/shared/types';
import { InvalidPhoneError } from '../src/shared/errors';
import {
  FIXED_NOW,
  InMemoryCustomerStore,
  InMemoryMessageLog,
  InMemorySessionStore,
  InMemoryTicketStore,
  RecordingDispatcher,
} from './fakes';

const PHONE = '+201001234567';
const OTHER_PHONE = '+201009876543';
const catalogue = getMessageCatalogue();
const photo: MediaRef = { id: 'media-1', type: 'image', mimeType: 'image/jpeg' };

describe('ConversationService', () => {
  let sessions: InMemorySessionStore;
  let tickets: InMemoryTicketStore;
  let dispatcher: RecordingDispatcher;
  let now: Date;
  let service: ConversationService;

  function createService(defaultLanguage: Language = 'en'): ConversationService {
    return new ConversationService({
      sessions,
      tickets,
      dispatcher,
      machine: new ConversationMachine({ router: new TicketRouter() }),
      defaultLanguage,
      idleTimeoutMs: 30 * 60 * 1000,
      clock: () => now,
      logger: pino({ level: 'silent' }),
    });
  }

  function seedSession(state: ConversationState, draft: ComplaintDraft, updatedAt: Date, language: Language = 'en') {
    const session: ConversationSession = { phone: PHONE, state, language, draft, createdAt: updatedAt, updatedAt };
    sessions.sessions.set(PHONE, session);
  }

  async function send(text: string, attachments: MediaRef[] = [], phone = PHONE) {
    return service.processMessage(phone, text, attachments);
  }

  beforeEach(() => {
    sessions = new InMemorySessionStore();
    tickets = new InMemoryTicketStore();
    dispatcher = new RecordingDispatcher();
    now = FIXED_NOW;
    service = createService();
  });

  it('runs a complaint from greeting to ticket and back to idle', async () => {
    const steps = ['hello', '1', 'paint', 'too thick', 'skip'];
    const states: ConversationState[] = [];
    for (const text of steps) {
      states.push((await send(text)).state);
    }
    expect(states).toEqual([
      'awaiting_menu_choice',
      'awaiting_product',
      'awaiting_issue',
      'awaiting_photo',
      'awaiting_confirmation',
    ]);

    const final = await send('yes');

    expect(final.state).toBe('idle');
    expect(final.ticket?.ticketNumber).toBe('TKT-2024-00001');
    expect(final.reply).toEqual({
      text: catalogue.render('ticket_created_manual_review', 'en', { ticketNumber: 'TKT-2024-00001' }),
      language: 'en',
    });

    expect(tickets.tickets).toHaveLength(1);
    expect(tickets.tickets[0]).toMatchObject({
      phone: PHONE,
      product: 'paint',
      issue: 'too thick',
      status: 'under_review',
      routingOutcome: 'manual_review',
      language: 'en',
    });

    const session = await sessions.load(PHONE);
    expect(session?.state).toBe('idle');
    expect(session?.draft).toEqual({ photos: [] });
    expect(dispatcher.sent).toHaveLength(6);
  });

  it('decides a defect with a photo immediately', async () => {
    for (const text of ['hi', '1', 'White paint']) {
      await send(text);
    }
    await send('paint is too thick');
    const summary = await send('', [photo]);
    expect(summary.reply.text).toBe(
      catalogue.render('confirm_summary', 'en', { product: 'White paint', issue: 'paint is too thick', photoCount: 1 })
    );

    const final = await send('yes');
    expect(final.ticket).toMatchObject({ status: 'decided', compensationType: 'refund', photos: [photo] });
    expect(final.reply.text).toBe(
      catalogue.render('ticket_created_refund', 'en', { ticketNumber: 'TKT-2024-00001' })
    );
  });

  it('discards the draft on cancel', async () => {
    for (const text of ['hi', '1', 'paint']) {
      await send(text);
    }

    const result = await send('cancel');

    expect(result.state).toBe('idle');
    expect(result.reply.text).toBe("Operation cancelled. ✋\n\nIf you need help, I'm here!");
    expect((await sessions.load(PHONE))?.draft).toEqual({ photos: [] });
    expect(tickets.tickets).toHaveLength(0);
  });

  it('leaves the state unchanged on unexpected input', async () => {
    await send('hi');
    const result = await send('banana');

    expect(result.state).toBe('awaiting_menu_choice');
    expect(result.issue).toBe('invalid_input');
    expect(result.reply.text).toBe(catalogue.render('menu_invalid', 'en'));
  });

  it('detects the language of a new conversation', async () => {
    const result = await send('مرحبا');
    expect(result.reply).toEqual({ text: catalogue.render('welcome', 'ar'), language: 'ar' });
  });

  it('falls back to the default language when the text has no letters', async () => {
    service = createService('ar');
    const result = await send('1');
    expect(result.reply.language).toBe('ar');
  });

  it('restarts an abandoned conversation in its language', async () => {
    seedSession('awaiting_issue', { product: 'paint', photos: [] }, new Date(FIXED_NOW.getTime() - 31 * 60 * 1000), 'ar');

    const result = await send('hello');

    expect(result.state).toBe('awaiting_menu_choice');
    expect(result.reply).toEqual({ text: catalogue.render('welcome', 'ar'), language: 'ar' });
    expect((await sessions.load(PHONE))?.draft).toEqual({ photos: [] });
  });

  it('resumes a recent conversation', async () => {
    seedSession('awaiting_issue', { product: 'paint', photos: [] }, new Date(FIXED_NOW.getTime() - 10 * 60 * 1000));

    const result = await send('too thick');

    expect(result.state).toBe('awaiting_photo');
    expect((await sessions.load(PHONE))?.draft).toEqual({ product: 'paint', issue: 'too thick', photos: [] });
  });

  it('keeps the new state when delivery fails', async () => {
    dispatcher.failing = true;

    const result = await send('hi');

    expect(result.delivered).toBe(false);
    expect((await sessions.load(PHONE))?.state).toBe('awaiting_menu_choice');
  });

  it('does not dispatch when asked not to', async () => {
    const result = await service.processMessage(PHONE, 'hi', [], { dispatch: false });
    expect(result.delivered).toBe(false);
    expect(dispatcher.sent).toHaveLength(0);
  });

  it('creates one ticket per confirming message', async () => {
    const draft: ComplaintDraft = { product: 'paint', issue: 'too thick', photos: [] };

    seedSession('awaiting_confirmation', draft, FIXED_NOW);
    const first = await service.processMessage(PHONE, 'yes', [], { messageId: 'wamid.test-1' });

    seedSession('awaiting_confirmation', draft, FIXED_NOW);
    const retry = await service.processMessage(PHONE, 'yes', [], { messageId: 'wamid.test-1' });

    expect(retry.ticket?.ticketNumber).toBe(first.ticket?.ticketNumber);
    expect(tickets.tickets).toHaveLength(1);
  });

  it('shows the status of the latest own ticket', async () => {
    const created = await tickets.createTicket(
      { product: 'White paint', issue: 'lumpy', photos: [] },
      new TicketRouter().route({ product: 'White paint', issue: 'lumpy', photos: [] }),
      { phone: PHONE, language: 'en' }
    );

    await send('hi');
    const result = await send('2');

    expect(result.state).toBe('idle');
    expect(result.ticket?.ticketNumber).toBe(created.ticketNumber);
    expect(result.reply.text).toBe(
      catalogue.render('ticket_status', 'en', {
        ticketNumber: 'TKT-2024-00001',
        createdDate: '2024-05-10',
        status: '🔍 Under Review',
        product: 'White paint',
        extraInfo: '',
      })
    );
  });

  it('reports no tickets when the customer has none', async () => {
    await send('hi');
    const result = await send('2');
    expect(result.reply.text).toBe(catalogue.render('no_tickets', 'en'));
  });

  it("hides another customer's ticket", async () => {
    await tickets.createTicket(
      { product: 'White paint', issue: 'lumpy', photos: [] },
      new TicketRouter().route({ product: 'White paint', issue: 'lumpy', photos: [] }),
      { phone: OTHER_PHONE, language: 'en' }
    );

    await send('hi');
    const result = await send('TKT-2024-00001');

    expect(result.ticket).toBeUndefined();
    expect(result.reply.text).toBe(catalogue.render('ticket_not_found', 'en', { ticketNumber: 'TKT-2024-00001' }));
  });

  it('rejects an invalid phone', async () => {
    await expect(service.handleMessage('12345', 'hi')).rejects.toThrow(InvalidPhoneError);
  });

  it('returns the outbound message from handleMessage', async () => {
    const reply = await service.handleMessage(PHONE, 'hello');
    expect(reply).toEqual({ text: catalogue.render('welcome', 'en'), language: 'en' });
    expect(dispatcher.sent).toEqual([{ phone: PHONE, message: reply }]);
  });

  describe('transcript and customer records', () => {
    let messages: InMemoryMessageLog;
    let customers: InMemoryCustomerStore;

    beforeEach(() => {
      messages = new InMemoryMessageLog();
      customers = new InMemoryCustomerStore();
      service = new ConversationService({
        sessions,
        tickets,
        dispatcher,
        messages,
        customers,
        machine: new ConversationMachine({ router: new TicketRouter() }),
        defaultLanguage: 'en',
        clock: () => now,
        logger: pino({ level: 'silent' }),
      });
    });

    it('records the inbound message and the reply', async () => {
      await service.processMessage(PHONE, 'hello', [], { messageId: 'wamid.h-1', contactName: 'Test Customer' });

      expect(messages.messages).toEqual([
        {
          id: 1,
          phone: PHONE,
          direction: 'inbound',
          body: 'hello',
          messageId: 'wamid.h-1',
          attachments: [],
          delivered: null,
          createdAt: FIXED_NOW,
        },
        {
          id: 2,
          phone: PHONE,
          direction: 'outbound',
          body: catalogue.render('welcome', 'en'),
          messageId: null,
          attachments: [],
          delivered: true,
          createdAt: FIXED_NOW,
        },
      ]);
    });

    it('stores a retried message once', async () => {
      await service.processMessage(PHONE, 'hello', [], { messageId: 'wamid.h-1' });
      await service.processMessage(PHONE, 'hello', [], { messageId: 'wamid.h-1' });

      const inbound = messages.messages.filter((m) => m.direction === 'inbound');
      expect(inbound).toHaveLength(1);
    });

    it('marks replies that were not sent or failed', async () => {
      await service.processMessage(PHONE, 'hello', [], { dispatch: false });
      dispatcher.failing = true;
      await service.processMessage(PHONE, '1');

      const outbound = messages.messages.filter((m) => m.direction === 'outbound');
      expect(outbound.map((m) => m.delivered)).toEqual([null, false]);
    });

    it('keeps the contact name when later messages carry none', async () => {
      await service.processMessage(PHONE, 'hello', [], { contactName: 'Test Customer' });
      now = new Date(FIXED_NOW.getTime() + 60 * 1000);
      await service.processMessage(PHONE, 'arabic');

      expect(await customers.findByPhone(PHONE)).toEqual({
        phone: PHONE,
        contactName: 'Test Customer',
        language: 'ar',
        createdAt: FIXED_NOW,
        updatedAt: now,
      });
    });
  });
});
