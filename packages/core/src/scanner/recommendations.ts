// packages/core/src/scanner/recommendations.ts - Advisory hints from scan totals

import type { BuildSystemRecord, DependencyRecord, Issue } from '../types/scan.js';

export function buildRecommendations(
  issues: readonly Issue[],
  buildSystems: readonly BuildSystemRecord[],
  dependencies: readonly DependencyRecord[],
): string[] {
  const recommendations: string[] = [];

  if (issues.length === 0) {
    recommendations.push('No obvious x86-specific code detected');
  } else {
    recommendations.push(`Found ${issues.length} potential compatibility issues`);
    const highSeverity = issues.filter((i) => i.severity === 'high').length;
    if (highSeverity > 0) {
      recommendations.push(`${highSeverity} high-severity issues require immediate attention`);
    }
  }

  const systems = new Set(buildSystems.map((b) => b.system));
  if (systems.has('cmake')) {
    recommendations.push('CMake detected - review CMakeLists.txt for architecture-specific settings');
  }
  if (systems.has('make')) {
    recommendations.push('Makefile detected - review for architecture-specific compiler flags');
  }

  if (dependencies.length > 0) {
    recommendations.push(`${dependencies.length} dependencies found - verify ARM compatibility`);
  }

  return recommendations;
}
