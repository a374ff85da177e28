import { Language } from './types';

const ARABIC_LETTER = /[\u0621-\u064A\u0671-\u06D3\u06FA-\u06FF]/g;
const LATIN_LETTER = /[a-zA-Z]/g;

// Harakat, superscript alef and tatweel carry no meaning for keyword matching
const ARABIC_MARKS = /[\u064B-\u065F\u0670\u0640]/g;

const ARABIC_INDIC_ZERO = 0x0660;
const EXTENDED_ARABIC_INDIC_ZERO = 0x06f0;

/**
 * Detect the script of a message.
 * More Arabic letters than Latin → 'ar', more Latin → 'en'.
 * Returns null when the message has no letters at all (e.g. "1" or an emoji).
 */
export function detectLanguage(message: string): Language | null {
  const arabic = message.match(ARABIC_LETTER)?.length || 0;
  const latin = message.match(LATIN_LETTER)?.length || 0;

  if (arabic === 0 && latin === 0) {
    return null;
  }

  return arabic > latin ? 'ar' : 'en';
}

/**
 * Fold Arabic-Indic digits (٠-٩ and ۰-۹) to ASCII.
 */
export function foldDigits(text: string): string {
  return text.replace(/[\u0660-\u0669\u06F0-\u06F9]/g, (ch) => {
    const code = ch.charCodeAt(0);
    const base = code >= EXTENDED_ARABIC_INDIC_ZERO ? EXTENDED_ARABIC_INDIC_ZERO : ARABIC_INDIC_ZERO;
    return String(code - base);
  });
}

/**
 * Normalize a message for keyword comparison:
 * case-fold Latin, drop Arabic diacritics, unify alef/yeh/teh-marbuta variants,
 * fold digits, turn punctuation into spaces and collapse whitespace.
 */
export function normalizeForMatching(message: string): string {
  return foldDigits(message)
    .toLowerCase()
    .replace(ARABIC_MARKS, '')
    .replace(/[\u0622\u0623\u0625]/g, '\u0627')
    .replace(/\u0649/g, '\u064A')
    .replace(/\u0629/g, '\u0647')
    .replace(/[.,!?\u061F\u060C\u061B:;"'()]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}
