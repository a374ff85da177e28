import { Pool } from 'pg';
import { Config } from './config';
import { WhatsAppClient } from './adapters/whatsapp/client';
import { ConversationMachine } from './domain/conversation/machine';
import { ConversationService } from './domain/conversation/service';
import { PgSessionStore, SessionStore } from './domain/conversation/session-store';
import { MessageLog, PgMessageLog } from './domain/conversation/message-log';
import { CustomerStore, PgCustomerStore } from './domain/customer/store';
import { getMessageCatalogue } from './domain/conversation/catalogue';
import { NotificationDispatcher, WhatsAppDispatcher } from './domain/notification/dispatcher';
import { ReviewService } from './domain/ticket/review';
import { loadRoutingRules, TicketRouter } from './domain/ticket/router';
import { PgTicketStore, TicketStore } from './domain/ticket/store';

export interface Services {
  sessions: SessionStore;
  tickets: TicketStore;
  messages: MessageLog;
  customers: CustomerStore;
  dispatcher: NotificationDispatcher;
  whatsapp: WhatsAppClient;
  conversations: ConversationService;
  reviews: ReviewService;
}

/**
 * Production wiring shared by the API and the worker. Loading the catalogue
 * and routing rules here makes a bad file fail at startup, not on the first
 * message.
 */
export function createServices(db: Pool, config: Config): Services {
  const catalogue = getMessageCatalogue();
  const router = new TicketRouter(loadRoutingRules(config.routingRulesPath));

  const sessions = new PgSessionStore(db);
  const tickets = new PgTicketStore(db);
  const messages = new PgMessageLog(db);
  const customers = new PgCustomerStore(db);
  const whatsapp = new WhatsAppClient({
    apiUrl: config.whatsappApiUrl,
    phoneNumberId: config.whatsappPhoneNumberId,
    accessToken: config.whatsappAccessToken,
  });
  const dispatcher = new WhatsAppDispatcher(whatsapp);

  const conversations = new ConversationService({
    sessions,
    tickets,
    dispatcher,
    messages,
    customers,
    catalogue,
    machine: new ConversationMachine({ router, photoCaptionPolicy: config.photoCaptionPolicy }),
    defaultLanguage: config.defaultLanguage,
    idleTimeoutMs: config.sessionIdleTimeoutMinutes * 60 * 1000,
  });

  const reviews = new ReviewService(tickets, dispatcher, { catalogue, messages });

  return { sessions, tickets, messages, customers, dispatcher, whatsapp, conversations, reviews };
}
