// packages/core/src/catalog/pattern-catalog.ts - Category → lexical detection rules

import { ISSUE_CATEGORIES } from '../types/scan.js';
import type { IssueCategory, Severity } from '../types/scan.js';

export interface PatternEntry {
  /** RegExp source, without delimiters or flags */
  readonly source: string;
  readonly caseInsensitive: boolean;
}

export interface CategoryRule {
  readonly severity: Severity;
  readonly suggestion: string;
  readonly patterns: readonly PatternEntry[];
}

/** Categories absent from a table are never reported. */
export type PatternTable = { readonly [C in IssueCategory]?: CategoryRule };

export interface PatternMatch {
  readonly offset: number;
  readonly matchedText: string;
}

interface CompiledRule {
  readonly severity: Severity;
  readonly suggestion: string;
  readonly regexes: readonly RegExp[];
}

/**
 * Immutable lookup from issue category to its detection patterns.
 * Regexes are compiled once; `match` never mutates shared state.
 */
export class PatternCatalog {
  private readonly rules = new Map<IssueCategory, CompiledRule>();

  constructor(table: PatternTable) {
    for (const category of ISSUE_CATEGORIES) {
      const rule = table[category];
      if (!rule) continue;
      this.rules.set(category, {
        severity: rule.severity,
        suggestion: rule.suggestion,
        regexes: rule.patterns.map(
          (p) => new RegExp(p.source, p.caseInsensitive ? 'gi' : 'g'),
        ),
      });
    }
  }

  categories(): IssueCategory[] {
    return [...this.rules.keys()];
  }

  /**
   * All non-overlapping matches of each pattern in the category,
   * pattern order first, then textual order.
   */
  match(category: IssueCategory, text: string): PatternMatch[] {
    const rule = this.rules.get(category);
    if (!rule) return [];

    const matches: PatternMatch[] = [];
    for (const regex of rule.regexes) {
      for (const m of text.matchAll(regex)) {
        matches.push({ offset: m.index ?? 0, matchedText: m[0] });
      }
    }
    return matches;
  }

  severityOf(category: IssueCategory): Severity {
    return this.rules.get(category)?.severity ?? 'low';
  }

  suggestionOf(category: IssueCategory): string {
    return this.rules.get(category)?.suggestion ?? '';
  }
}
