/**
 * Intent classification for inbound WhatsApp messages.
 *
 * Classification is a fixed decision table over (state, normalized text,
 * attachments). Constrained states (menu, photo, confirmation) only accept
 * their own keywords; free-text states accept anything non-empty.
 */

import { z } from 'zod';
import keywordData from './keywords.json';
import { ConversationState, Language, MediaRef } from '../../shared/types';
import { normalizeForMatching } from '../../shared/language';
import { extractTicketNumber, sanitizeInput } from '../../shared/validation';
import { ConfigurationError } from '../../shared/errors';

export type Intent =
  | { kind: 'greeting' }
  | { kind: 'menu_select'; option: number }
  | { kind: 'ticket_reference'; ticketNumber: string }
  | { kind: 'free_text'; content: string }
  | { kind: 'skip' }
  | { kind: 'photo'; media: MediaRef[]; caption?: string }
  | { kind: 'confirm'; answer: 'yes' | 'no' }
  | { kind: 'cancel' }
  | { kind: 'language_switch'; language: Language }
  | { kind: 'invalid' };

export type IntentKind = Intent['kind'];

// ============================================================================
// Keyword Table
// ============================================================================

const phraseList = z.array(z.string().min(1)).min(1);

const keywordSchema = z.object({
  greeting: phraseList,
  cancel: phraseList,
  languageSwitch: z.object({ ar: phraseList, en: phraseList }),
  menuOptions: z.record(z.string().regex(/^\d$/), phraseList),
  skip: phraseList,
  confirmYes: phraseList,
  confirmNo: phraseList,
});

export interface KeywordTable {
  greeting: string[];
  cancel: string[];
  languageSwitch: Record<Language, string[]>;
  menuOptions: Array<{ option: number; phrases: string[] }>;
  skip: string[];
  confirmYes: string[];
  confirmNo: string[];
}

/**
 * Validate a keyword table and normalize every phrase the same way inbound
 * messages are normalized, so spelling variants compare equal.
 */
export function loadKeywordTable(raw: unknown): KeywordTable {
  const parsed = keywordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid intent keyword table: ${parsed.error.message}`);
  }

  const normalizeAll = (phrases: string[]) => phrases.map(normalizeForMatching);
  const data = parsed.data;

  return {
    greeting: normalizeAll(data.greeting),
    cancel: normalizeAll(data.cancel),
    languageSwitch: {
      ar: normalizeAll(data.languageSwitch.ar),
      en: normalizeAll(data.languageSwitch.en),
    },
    menuOptions: Object.entries(data.menuOptions)
      .map(([option, phrases]) => ({ option: Number(option), phrases: normalizeAll(phrases) }))
      .sort((a, b) => a.option - b.option),
    skip: normalizeAll(data.skip),
    confirmYes: normalizeAll(data.confirmYes),
    confirmNo: normalizeAll(data.confirmNo),
  };
}

const DEFAULT_KEYWORDS = loadKeywordTable(keywordData);

// ============================================================================
// Matching
// ============================================================================

function matchesExactly(text: string, phrases: string[]): boolean {
  return phrases.includes(text);
}

/** Whole message, or the message opens with the phrase ("yes please"). */
function matchesLeadingPhrase(text: string, phrases: string[]): boolean {
  return phrases.some((phrase) => text === phrase || text.startsWith(phrase + ' '));
}

function classifyMenuChoice(text: string, rawText: string, keywords: KeywordTable): Intent {
  if (/^\d$/.test(text)) {
    return { kind: 'menu_select', option: Number(text) };
  }

  // "track TKT-2024-00007" names a ticket, not just the tracking option
  const ticketNumber = extractTicketNumber(rawText);
  if (ticketNumber) {
    return { kind: 'ticket_reference', ticketNumber };
  }

  for (const { option, phrases } of keywords.menuOptions) {
    if (matchesLeadingPhrase(text, phrases)) {
      return { kind: 'menu_select', option };
    }
  }

  if (matchesLeadingPhrase(text, keywords.greeting)) {
    return { kind: 'greeting' };
  }

  return { kind: 'invalid' };
}

function classifyConfirmation(text: string, keywords: KeywordTable): Intent {
  if (matchesExactly(text, keywords.confirmYes)) return { kind: 'confirm', answer: 'yes' };
  if (matchesExactly(text, keywords.confirmNo)) return { kind: 'confirm', answer: 'no' };
  if (matchesLeadingPhrase(text, keywords.confirmYes)) return { kind: 'confirm', answer: 'yes' };
  if (matchesLeadingPhrase(text, keywords.confirmNo)) return { kind: 'confirm', answer: 'no' };
  return { kind: 'invalid' };
}

// ============================================================================
// Classifier
// ============================================================================

/**
 * Map an inbound message to an intent relative to the current state.
 * Never throws: unmatched input in a constrained state is `invalid`, in a
 * free-text state it is `free_text` with the trimmed original text.
 */
export function classify(
  state: ConversationState,
  rawMessage: string,
  attachments: MediaRef[] = [],
  keywords: KeywordTable = DEFAULT_KEYWORDS
): Intent {
  const content = sanitizeInput(rawMessage);
  const text = normalizeForMatching(content);

  // Recognized everywhere, but only as the whole message so that an issue
  // description like "stopped drying" is never read as "stop".
  if (text && matchesExactly(text, keywords.cancel)) {
    return { kind: 'cancel' };
  }
  if (text && matchesExactly(text, keywords.languageSwitch.ar)) {
    return { kind: 'language_switch', language: 'ar' };
  }
  if (text && matchesExactly(text, keywords.languageSwitch.en)) {
    return { kind: 'language_switch', language: 'en' };
  }

  switch (state) {
    case 'idle':
    case 'completed':
      if (text && matchesLeadingPhrase(text, keywords.greeting)) {
        return { kind: 'greeting' };
      }
      // A bare "1" here is not a menu choice: no menu has been shown yet
      return { kind: 'free_text', content };

    case 'awaiting_menu_choice':
      return classifyMenuChoice(text, content, keywords);

    case 'awaiting_product':
    case 'awaiting_issue':
      return content ? { kind: 'free_text', content } : { kind: 'invalid' };

    case 'awaiting_photo': {
      const images = attachments.filter((a) => a.type === 'image');
      if (images.length > 0) {
        const caption = content || images.find((i) => i.caption)?.caption;
        return caption ? { kind: 'photo', media: images, caption } : { kind: 'photo', media: images };
      }
      if (text && matchesLeadingPhrase(text, keywords.skip)) {
        return { kind: 'skip' };
      }
      return { kind: 'invalid' };
    }

    case 'awaiting_confirmation':
      return classifyConfirmation(text, keywords);
  }
}
