// packages/core/src/catalog/index.ts -- barrel re-export

export { PatternCatalog } from './pattern-catalog.js';
export type { PatternEntry, CategoryRule, PatternTable, PatternMatch } from './pattern-catalog.js';
export { DEFAULT_PATTERN_TABLE } from './default-table.js';
