import { z } from 'zod';
import messageData from './messages.json';
import { CompensationType, Language, TicketStatus } from '../../shared/types';
import { ConfigurationError } from '../../shared/errors';

export const MESSAGE_KEYS = [
  'welcome',
  'menu_invalid',
  'ask_product',
  'ask_issue',
  'ask_photo',
  'confirm_summary',
  'confirm_prompt',
  'ticket_created_manual_review',
  'ticket_created_refund',
  'ticket_created_replacement',
  'restart',
  'cancelled',
  'help',
  'ticket_status',
  'no_tickets',
  'ticket_not_found',
  'decision_refund',
  'decision_replacement',
  'decision_rejected',
  'ticket_completed',
  'ticket_cancelled',
  'reminder_pending_review',
] as const;

export type MessageKey = (typeof MESSAGE_KEYS)[number];

export type MessageParams = Record<string, string | number>;

/** A reply before rendering: catalogue key plus placeholder values. */
export interface Reply {
  template: MessageKey;
  params: MessageParams;
}

// ============================================================================
// Schema
// ============================================================================

const localized = <T extends z.ZodTypeAny>(inner: T) => z.object({ ar: inner, en: inner });

const statusLabels = z.object({
  new: z.string().min(1),
  under_review: z.string().min(1),
  decided: z.string().min(1),
  completed: z.string().min(1),
  cancelled: z.string().min(1),
  rejected: z.string().min(1),
});

const catalogueSchema = z.object({
  templates: z.record(z.string(), localized(z.string().min(1))),
  labels: z.object({
    status: localized(statusLabels),
    compensation: localized(z.object({ refund: z.string().min(1), replacement: z.string().min(1) })),
  }),
});

type CatalogueLabels = z.infer<typeof catalogueSchema>['labels'];
type LocalizedText = Record<Language, string>;

const PLACEHOLDER = /\{(\w+)\}/g;

export function placeholdersOf(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (match[1]) names.add(match[1]);
  }
  return [...names].sort();
}

function fill(template: string, params: MessageParams): string {
  return template.replace(PLACEHOLDER, (_, name: string) => {
    const value = params[name];
    return value === undefined ? '-' : String(value);
  });
}

// ============================================================================
// Catalogue
// ============================================================================

/**
 * Bilingual reply templates. Construction fails with ConfigurationError when a
 * key is missing, unknown, or its Arabic and English variants disagree on
 * placeholders.
 */
export class MessageCatalogue {
  private readonly templates = new Map<MessageKey, LocalizedText>();
  private readonly labels: CatalogueLabels;

  constructor(raw: unknown) {
    const parsed = catalogueSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid message catalogue: ${parsed.error.message}`);
    }

    const known = new Set<string>(MESSAGE_KEYS);
    const unknown = Object.keys(parsed.data.templates).filter((key) => !known.has(key));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown message keys: ${unknown.join(', ')}`);
    }

    for (const key of MESSAGE_KEYS) {
      const entry = parsed.data.templates[key];
      if (!entry) {
        throw new ConfigurationError(`Missing message key: ${key}`);
      }

      const arabic = placeholdersOf(entry.ar).join(',');
      const english = placeholdersOf(entry.en).join(',');
      if (arabic !== english) {
        throw new ConfigurationError(
          `Placeholder mismatch in ${key}: ar has [${arabic}], en has [${english}]`
        );
      }

      this.templates.set(key, entry);
    }

    this.labels = parsed.data.labels;
  }

  render(key: MessageKey, language: Language, params: MessageParams = {}): string {
    const entry = this.templates.get(key);
    if (!entry) {
      throw new ConfigurationError(`Missing message key: ${key}`);
    }
    return fill(entry[language], params);
  }

  renderReply(reply: Reply, language: Language): string {
    return this.render(reply.template, language, reply.params);
  }

  statusLabel(status: TicketStatus, language: Language): string {
    return this.labels.status[language][status];
  }

  compensationLabel(type: CompensationType | null, language: Language): string {
    return type ? this.labels.compensation[language][type] : '';
  }
}

let defaultCatalogue: MessageCatalogue | null = null;

export function getMessageCatalogue(): MessageCatalogue {
  if (!defaultCatalogue) {
    defaultCatalogue = new MessageCatalogue(messageData);
  }
  return defaultCatalogue;
}
