// packages/core/src/scanner/index.ts -- barrel re-export

export { FileScanner } from './file-scanner.js';
export type { FileScanResult } from './file-scanner.js';
export { ProjectScanner } from './project-scanner.js';
export type { ProjectScannerOptions } from './project-scanner.js';
export { detectBuildSystem } from './build-systems.js';
export {
  extractDependencies,
  parsePackageJson,
  parseRequirementsTxt,
  parseCargoToml,
  parseGoMod,
} from './dependencies.js';
export { buildRecommendations } from './recommendations.js';
