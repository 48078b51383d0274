// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG, CURRENT_CONFIG_VERSION } from './defaults.js';
export { projectConfigSchema, validateConfig } from './schema.js';
export type { ProjectConfigInput } from './schema.js';
export { loadConfig, writeConfig, deepMerge, CONFIG_FILENAME, DATA_DIRNAME } from './loader.js';
export type { ConfigOverrides } from './loader.js';
export { createIgnoreFilter, shouldIgnore, IGNORE_FILE_NAME } from './ignore.js';
