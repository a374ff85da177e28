import { readFileSync } from 'fs';
import { z } from 'zod';
import defaultRules from './routing-rules.json';
import { CompleteComplaint, RoutingDecision } from '../../shared/types';
import { normalizeForMatching } from '../../shared/language';
import { ConfigurationError } from '../../shared/errors';

// ============================================================================
// Rule Set
// ============================================================================

export type CategoryKind = 'defect' | 'wrong_item' | 'other';

export interface KeywordCategory {
  name: string;
  kind: CategoryKind;
  keywords: string[];
}

const ruleSetSchema = z.object({
  categories: z
    .array(
      z.object({
        name: z.string().min(1),
        kind: z.enum(['defect', 'wrong_item', 'other']),
        keywords: z.array(z.string().min(1)).min(1),
      })
    )
    .min(1),
});

/**
 * Parse and validate a routing rule set. Keywords are normalized the same way
 * as issue text so that matching is insensitive to case and Arabic spelling
 * variants.
 */
export function parseRoutingRules(raw: unknown): KeywordCategory[] {
  const parsed = ruleSetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid routing rules: ${parsed.error.message}`);
  }

  return parsed.data.categories.map((category) => ({
    name: category.name,
    kind: category.kind,
    keywords: category.keywords.map(normalizeForMatching).filter(Boolean),
  }));
}

/**
 * Load the bundled rule set, or the file at `filePath` when given
 * (ROUTING_RULES_PATH).
 */
export function loadRoutingRules(filePath?: string): KeywordCategory[] {
  if (!filePath) {
    return parseRoutingRules(defaultRules);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read routing rules from ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseRoutingRules(raw);
}

// ============================================================================
// Router
// ============================================================================

interface KeywordMatch {
  category: KeywordCategory;
  keyword: string;
}

/**
 * Decides how a confirmed complaint is handled. First matching rule wins:
 *
 *   1. defect keyword + at least one photo → refund, decided
 *   2. defect keyword, no photo            → manual review
 *   3. wrong-item keyword                  → replacement, decided
 *   4. anything else                       → manual review
 */
export class TicketRouter {
  private readonly categories: KeywordCategory[];

  constructor(categories: KeywordCategory[] = loadRoutingRules()) {
    this.categories = categories;
  }

  route(complaint: CompleteComplaint): RoutingDecision {
    const text = normalizeForMatching(complaint.issue);
    const hasPhoto = complaint.photos.length > 0;

    const defect = this.findMatch(text, 'defect');
    if (defect) {
      if (hasPhoto) {
        return {
          outcome: 'refund',
          rule: 'defect_with_photo',
          initialStatus: 'decided',
          compensationType: 'refund',
          issueCategory: defect.category.name,
          matchedKeyword: defect.keyword,
        };
      }
      return {
        outcome: 'manual_review',
        rule: 'defect_without_photo',
        initialStatus: 'under_review',
        compensationType: null,
        issueCategory: defect.category.name,
        matchedKeyword: defect.keyword,
      };
    }

    const wrongItem = this.findMatch(text, 'wrong_item');
    if (wrongItem) {
      return {
        outcome: 'replacement',
        rule: 'wrong_item',
        initialStatus: 'decided',
        compensationType: 'replacement',
        issueCategory: wrongItem.category.name,
        matchedKeyword: wrongItem.keyword,
      };
    }

    // Informational categories only label the ticket
    const other = this.findMatch(text, 'other');
    return {
      outcome: 'manual_review',
      rule: 'default',
      initialStatus: 'under_review',
      compensationType: null,
      issueCategory: other ? other.category.name : 'other',
      ...(other ? { matchedKeyword: other.keyword } : {}),
    };
  }

  private findMatch(text: string, kind: CategoryKind): KeywordMatch | null {
    for (const category of this.categories) {
      if (category.kind !== kind) continue;
      const keyword = category.keywords.find((k) => text.includes(k));
      if (keyword) {
        return { category, keyword };
      }
    }
    return null;
  }
}
