// ============================================================================
// Layout Scorer - (内容类型, 版式) 匹配分 0-100
// ============================================================================

import { iconEntriesOf } from './contentPayload';
import type { BulletItem, ContentPayload } from '../../../shared/types/content';
import type { ContentType, LayoutCapability } from '../../../shared/types/layout';

/** 没有密度推荐时的要点目标数 */
export const DEFAULT_BULLET_TARGET = 10;

/** 非列表内容的行数估计 */
const NON_LIST_LINE_ESTIMATE = 5;
const CHARS_PER_BULLET_LINE = 50;

// ----------------------------------------------------------------------------
// Requirements read from the payload
// ----------------------------------------------------------------------------

export function estimateBulletLines(items: readonly BulletItem[]): number {
  let lines = 0;
  for (const item of items) {
    if (typeof item === 'string') {
      lines += Math.max(1, Math.floor(item.length / CHARS_PER_BULLET_LINE));
    } else {
      lines += estimateBulletLines(item);
    }
  }
  return lines;
}

function estimatePayloadLines(payload: ContentPayload): number {
  switch (payload.kind) {
    case 'bullets':
      return estimateBulletLines(payload.bullets);
    case 'comparison':
    case 'kpi_list':
      // 每个标题块按 2 行计，再加其要点
      return payload.items.reduce((sum, item) => sum + 2 + estimateBulletLines(item.bullets), 0);
    case 'icon_list':
      return estimateBulletLines(payload.icons);
    case 'chart':
    case 'table':
      return NON_LIST_LINE_ESTIMATE;
  }
}

/** 需要的条目数：KPI 个数 / 栏数的依据 */
function entryCount(payload: ContentPayload): number {
  switch (payload.kind) {
    case 'bullets':
      return payload.bullets.length;
    case 'comparison':
    case 'kpi_list':
      return payload.items.length;
    case 'icon_list':
      return payload.icons.length;
    case 'chart':
    case 'table':
      return 0;
  }
}

// ----------------------------------------------------------------------------
// Per content type
// ----------------------------------------------------------------------------

function scoreChart(layout: LayoutCapability): number {
  let score = 0;
  const { chart } = layout.contentCapacity;
  if (chart.suitable) {
    score += 30;
    if (chart.availableArea > 50) score += 10;
  }

  const sections = layout.semanticSections;
  if (sections.length === 1 && sections[0].contentAreas.length === 1 && sections[0].contentAreas[0].isLarge) {
    score += 20;
  }
  return score;
}

function scoreTable(layout: LayoutCapability, payload: ContentPayload): number {
  const neededCols = payload.kind === 'table' ? payload.table.headers.length : 0;
  const neededRows = payload.kind === 'table' ? payload.table.rows.length : 0;
  const { maxCols, maxRows } = layout.contentCapacity.table;

  if (maxCols >= neededCols && maxRows >= neededRows) {
    // 列数余量不超过 2 视为贴合
    return maxCols <= neededCols + 2 ? 50 : 40;
  }
  return 10;
}

function scoreKpi(layout: LayoutCapability, payload: ContentPayload): number {
  const needed = entryCount(payload);

  if (layout.kpiGrid) {
    const available = layout.contentCapacity.kpis.count;
    if (available >= needed) {
      return available === needed ? 60 : 50;
    }
    return 0;
  }

  const smallBoxes = layout.contentPlaceholders.filter((p) => p.isSmall).length;
  return smallBoxes >= needed ? 30 : 0;
}

function scorePictogram(layout: LayoutCapability, payload: ContentPayload): number {
  let score = 0;
  const needed = iconEntriesOf(payload).length;
  const { pictograms } = layout.contentCapacity;

  if (pictograms.suitable && pictograms.estimatedCount >= needed) {
    score += 40;
    if (Math.abs(pictograms.estimatedCount - needed) <= 1) score += 10;
  }

  if (layout.contentPlaceholders.some((p) => p.isMedium && p.isWide)) {
    score += 10;
  }
  return score;
}

function scoreComparison(layout: LayoutCapability, payload: ContentPayload): number {
  let score = 0;
  const neededCols = payload.kind === 'comparison' || payload.kind === 'kpi_list' ? payload.items.length : 2;
  const sections = layout.semanticSections.length;

  if (sections === neededCols) score += 50;
  else if (Math.abs(sections - neededCols) === 1) score += 30;

  if (neededCols === 2 && 'left_column' in layout.spatialGroups) score += 10;
  return score;
}

function scoreBullets(layout: LayoutCapability, payload: ContentPayload): number {
  let score = 0;
  const estimated = estimatePayloadLines(payload);
  const target = layout.contentDensityRecommendation.bulletsRecommended || DEFAULT_BULLET_TARGET;
  const capacity = layout.contentCapacity.bullets.maxLines;

  if (Math.abs(estimated - target) <= 2) {
    score += 50;
  } else if (capacity >= estimated) {
    score += 40;
    if (capacity <= estimated + 5) score += 10;
  } else {
    score += 20;
  }

  if (layout.executiveSuitability >= 70) score += 10;
  return score;
}

const CONTENT_SCORERS: Record<ContentType, (layout: LayoutCapability, payload: ContentPayload) => number> = {
  chart: scoreChart,
  table: scoreTable,
  kpi_dashboard: scoreKpi,
  pictogram: scorePictogram,
  comparison: scoreComparison,
  bullets: scoreBullets,
};

/**
 * Score how well a layout suits one slide's content, clamped to [0, 100]
 */
export function scoreLayout(layout: LayoutCapability, contentType: ContentType, payload: ContentPayload): number {
  let score = 0;

  if (layout.bestFor.includes(contentType)) score += 40;
  score += CONTENT_SCORERS[contentType](layout, payload);

  if (layout.visualBalance > 70) score += 5;
  if (layout.fillDifficulty === 'easy') score += 3;

  return Math.min(100, Math.max(0, score));
}
