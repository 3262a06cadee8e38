// One-shot detection for CLI commands

import type { DriftReport } from '../../models/drift.js';
import type { DriftwatchContext } from './context.js';

/**
 * Checks one project-relative file and records the observation as its
 * new baseline
 */
export async function detectFile(ctx: DriftwatchContext, filePath: string): Promise<DriftReport> {
  const specification = await ctx.specifications.getSpecification(filePath);
  const signatures = await ctx.extractor.extract(filePath);
  const report = ctx.detector.check(filePath, signatures, specification, ctx.baselines.get(filePath));
  if (specification) {
    ctx.baselines.observe(filePath, signatures, specification);
  }
  return report;
}
