// packages/core/src/planner/replacements.ts - Category-specific replacement text and confidence

import type { Confidence } from '../types/plan.js';
import type { Issue, IssueCategory } from '../types/scan.js';
import { assertNever } from '../utils/assert.js';
import type { MacroFamily, PlanTables } from './tables.js';

/** Static policy: how far an automatic edit of each category can be trusted. */
export function confidenceFor(category: IssueCategory): Confidence {
  switch (category) {
    case 'architecture_check':
      return 'high';
    case 'instruction_intrinsic':
      return 'medium';
    case 'inline_assembly':
    case 'platform_specific_api':
      return 'low';
    default:
      return assertNever(category, 'issue category');
  }
}

export function replacementFor(issue: Issue, tables: PlanTables): string {
  const text = issue.matchedText;
  switch (issue.category) {
    case 'instruction_intrinsic':
      return replaceIntrinsic(text, tables.intrinsicMappings);
    case 'architecture_check':
      return rewriteArchitectureCheck(text, tables.macroFamilies);
    case 'inline_assembly':
      return `/* TODO: Replace inline assembly with portable C code or ARM NEON */\n// Original: ${text}`;
    case 'platform_specific_api':
      return `/* TODO: Add ARM-compatible implementation for ${text} */`;
    default:
      return assertNever(issue.category, 'issue category');
  }
}

/**
 * Exact name first, then the longest known name contained in the text.
 * Substitution is textual; the result is not checked for validity.
 */
export function replaceIntrinsic(text: string, mappings: ReadonlyMap<string, string>): string {
  const exact = mappings.get(text);
  if (exact !== undefined) return exact;

  let best: string | undefined;
  for (const name of mappings.keys()) {
    if (text.includes(name) && (best === undefined || name.length > best.length)) {
      best = name;
    }
  }
  if (best === undefined) {
    return `/* TODO: Replace ${text} with ARM NEON equivalent */`;
  }
  const target = mappings.get(best) ?? best;
  return text.split(best).join(target);
}

/**
 * `#ifdef <macro>` → `#if defined(...) || defined(<target>)`. A macro from no
 * known family keeps its directive and gains a review comment.
 */
export function rewriteArchitectureCheck(text: string, families: readonly MacroFamily[]): string {
  const macro = /^#ifdef\s+(\S+)/.exec(text)?.[1];
  const family = macro ? families.find((f) => f.members.includes(macro)) : undefined;
  if (!macro || !family) {
    return `${text} /* TODO: Review ${macro ?? text} for ARM compatibility */`;
  }

  const macros = family.emitted.includes(macro) ? [...family.emitted] : [...family.emitted, macro];
  macros.push(family.targetMacro);
  return `#if ${macros.map((m) => `defined(${m})`).join(' || ')}`;
}
