// packages/core/src/scanner/file-scanner.ts - Per-file issue detection

import type { PatternCatalog } from '../catalog/pattern-catalog.js';
import type { Issue } from '../types/scan.js';
import { BINARY_SNIFF_BYTES } from '../utils/constants.js';

export type FileScanResult =
  | { status: 'scanned'; issues: Issue[] }
  | { status: 'skipped'; reason: string };

/**
 * Applies a PatternCatalog to one file's content. Issues come out in
 * discovery order (category order, then pattern, then text position).
 */
export class FileScanner {
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(private readonly catalog: PatternCatalog) {}

  scan(path: string, content: string | Uint8Array): FileScanResult {
    let text: string;
    if (typeof content === 'string') {
      text = content;
    } else {
      const sniff = content.subarray(0, BINARY_SNIFF_BYTES);
      if (sniff.includes(0)) {
        return { status: 'skipped', reason: 'binary file' };
      }
      try {
        text = this.decoder.decode(content);
      } catch {
        return { status: 'skipped', reason: 'not valid UTF-8' };
      }
    }

    const lineStarts = indexLineStarts(text);
    const issues: Issue[] = [];
    for (const category of this.catalog.categories()) {
      const severity = this.catalog.severityOf(category);
      const suggestion = this.catalog.suggestionOf(category);
      for (const match of this.catalog.match(category, text)) {
        issues.push({
          file: path,
          line: lineAt(lineStarts, match.offset),
          category,
          matchedText: match.matchedText,
          severity,
          suggestion,
        });
      }
    }
    return { status: 'scanned', issues };
  }
}

function indexLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = text.indexOf('\n'); i !== -1; i = text.indexOf('\n', i + 1)) {
    starts.push(i + 1);
  }
  return starts;
}

/** 1 + number of newlines before `offset` */
function lineAt(lineStarts: number[], offset: number): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if ((lineStarts[mid] ?? 0) <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo + 1;
}
