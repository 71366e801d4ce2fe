// ============================================================================
// Plan Diversity - 修正外部给出的分节计划，避免连续三节用同一版式
// ============================================================================

import { createLogger } from '../../services/infra/logger';
import type { LayoutCapability, LayoutUseTag } from '../../../shared/types/layout';

const logger = createLogger('PlanDiversity');

export interface PlannedSection {
  layoutIndex: number;
  contentType: LayoutUseTag;
}

/**
 * Walks the plan in order; each entry that would be the third in a row on
 * the same layout moves to the first other layout (by index) whose bestFor
 * lists the entry's content type. Entries with no such layout stay put.
 * Returns a new array; the input is not modified.
 */
export function enforcePlanDiversity<T extends PlannedSection>(
  plan: readonly T[],
  layouts: readonly LayoutCapability[],
): T[] {
  const result = plan.map((entry) => ({ ...entry }));
  const ordered = [...layouts].sort((a, b) => a.index - b.index);

  for (let i = 2; i < result.length; i++) {
    const current = result[i];
    if (result[i - 2].layoutIndex !== current.layoutIndex || result[i - 1].layoutIndex !== current.layoutIndex) {
      continue;
    }

    const alternative = ordered.find(
      (layout) => layout.index !== current.layoutIndex && layout.bestFor.includes(current.contentType),
    );
    if (alternative) {
      logger.info(`Section ${i}: layout ${current.layoutIndex} → ${alternative.index} for diversity`);
      result[i] = { ...current, layoutIndex: alternative.index };
    }
  }

  return result;
}
