// packages/core/src/utils/constants.ts - Shared magic number constants

/** Binary detection buffer size */
export const BINARY_SNIFF_BYTES = 512;

/** Effort estimation policy: issue ceiling for a "low" estimate */
export const LOW_EFFORT_MAX_ISSUES = 10;

/** Effort estimation policy: issue ceiling for a "medium" estimate */
export const MEDIUM_EFFORT_MAX_ISSUES = 50;

/** Effort estimation policy: share of high-confidence changes needed for "low" */
export const LOW_EFFORT_HIGH_CONFIDENCE_RATIO = 0.7;

/** Default target architecture for plans */
export const DEFAULT_TARGET_ARCHITECTURE = 'arm64';

/** Max matched-text width in table output */
export const MATCHED_TEXT_DISPLAY_CHARS = 30;

/** Max file path width in table output */
export const FILE_PATH_DISPLAY_CHARS = 40;

/** Default number of plans listed by `armport plans` */
export const DEFAULT_PLAN_LIST_LIMIT = 20;
