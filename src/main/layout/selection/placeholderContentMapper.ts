// ============================================================================
// Placeholder Content Mapper - 选定版式 + 内容 → {占位符序号: 内容规格}
// ============================================================================

import { createLogger } from '../../services/infra/logger';
import { ErrorCode, MatchingError, logError } from '../../errors';
import { largestByArea } from '../analysis/geometry';
import { flattenBullets, iconEntriesOf, parseIconEntry } from './contentPayload';
import type {
  ContentPayload,
  FlatBullet,
  HeadedBullets,
  PlaceholderContentSpec,
  PlaceholderMapping,
} from '../../../shared/types/content';
import type { ContentType, LayoutCapability, PlaceholderInfo } from '../../../shared/types/layout';

const logger = createLogger('PlaceholderContentMapper');

/**
 * The single fallback target of every degraded mapping
 */
export function largestContentPlaceholder(layout: LayoutCapability): PlaceholderInfo | undefined {
  return largestByArea(layout.contentPlaceholders);
}

/** 任意载荷压平成要点列表：标题为第 0 级，其要点从第 1 级开始 */
export function payloadAsBullets(payload: ContentPayload): FlatBullet[] {
  switch (payload.kind) {
    case 'bullets':
      return flattenBullets(payload.bullets);
    case 'comparison':
    case 'kpi_list':
      return payload.items.flatMap((item) => [
        { text: item.heading, level: 0 },
        ...flattenBullets(item.bullets, 1),
      ]);
    case 'icon_list':
      return payload.icons.map((text) => ({ text, level: 0 }));
    case 'chart':
    case 'table':
      return [];
  }
}

function headedItemsOf(payload: ContentPayload): HeadedBullets[] {
  return payload.kind === 'comparison' || payload.kind === 'kpi_list' ? payload.items : [];
}

function mapped(assignments: Record<number, PlaceholderContentSpec>): PlaceholderMapping {
  return { assignments, degraded: false };
}

/**
 * Put the whole payload into the largest content placeholder and mark the
 * mapping degraded. A layout with no content placeholder maps nothing.
 */
function degrade(layout: LayoutCapability, payload: ContentPayload, reason: string): PlaceholderMapping {
  logError(
    new MatchingError(`Layout ${layout.index}: ${reason}`, {
      code: ErrorCode.MAPPING_DEGRADED,
      layoutIndex: layout.index,
    }),
    logger,
  );

  const largest = largestContentPlaceholder(layout);
  if (!largest) {
    return { assignments: {}, degraded: true, reason };
  }

  return {
    assignments: { [largest.index]: wholePayloadSpec(payload) },
    degraded: true,
    reason,
  };
}

function wholePayloadSpec(payload: ContentPayload): PlaceholderContentSpec {
  if (payload.kind === 'chart') return { type: 'chart', data: payload.chart };
  if (payload.kind === 'table') return { type: 'table', data: payload.table };
  return { type: 'bullets', items: payloadAsBullets(payload) };
}

// ----------------------------------------------------------------------------
// Per content type
// ----------------------------------------------------------------------------

function mapToLargest(layout: LayoutCapability, payload: ContentPayload): PlaceholderMapping {
  const largest = largestContentPlaceholder(layout);
  if (!largest) {
    return degrade(layout, payload, 'no content placeholder for the slide body');
  }
  return mapped({ [largest.index]: wholePayloadSpec(payload) });
}

function mapToSections(layout: LayoutCapability, items: readonly HeadedBullets[]): PlaceholderMapping {
  const assignments: Record<number, PlaceholderContentSpec> = {};
  const sections = layout.semanticSections;

  items.slice(0, sections.length).forEach((item, i) => {
    const section = sections[i];
    assignments[section.subtitle.index] = { type: 'subtitle', text: item.heading };
    const target = section.contentAreas[0];
    if (target) {
      assignments[target.index] = { type: 'bullets', items: flattenBullets(item.bullets) };
    }
  });

  return mapped(assignments);
}

function mapComparison(layout: LayoutCapability, payload: ContentPayload): PlaceholderMapping {
  const items = headedItemsOf(payload);
  if (layout.semanticSections.length < 2 || items.length === 0) {
    return degrade(layout, payload, `comparison needs at least 2 sections, layout has ${layout.semanticSections.length}`);
  }
  return mapToSections(layout, items);
}

function iconTargets(layout: LayoutCapability): readonly PlaceholderInfo[] {
  if (layout.kpiGrid) return layout.kpiGrid.boxes;
  return [...layout.contentPlaceholders].sort((a, b) => a.left - b.left);
}

function mapPictogram(layout: LayoutCapability, payload: ContentPayload): PlaceholderMapping {
  const icons = iconEntriesOf(payload);
  const targets = iconTargets(layout);
  if (icons.length === 0 || targets.length === 0) {
    return degrade(layout, payload, 'no icon entries or no placeholder to hold them');
  }

  const assignments: Record<number, PlaceholderContentSpec> = {};
  const count = Math.min(icons.length, targets.length);
  for (let i = 0; i < count; i++) {
    assignments[targets[i].index] = { type: 'icon', ...parseIconEntry(icons[i]) };
  }
  return mapped(assignments);
}

function mapKpis(layout: LayoutCapability, payload: ContentPayload): PlaceholderMapping {
  const items = headedItemsOf(payload);

  if (layout.kpiGrid && items.length > 0) {
    const boxes = layout.kpiGrid.boxes;
    const assignments: Record<number, PlaceholderContentSpec> = {};
    items.slice(0, boxes.length).forEach((item, i) => {
      assignments[boxes[i].index] = { type: 'kpi', heading: item.heading, items: flattenBullets(item.bullets) };
    });
    return mapped(assignments);
  }

  if (layout.semanticSections.length >= 2 && items.length > 0) {
    return mapToSections(layout, items);
  }

  return degrade(layout, payload, 'KPI list needs a KPI grid or at least 2 sections');
}

const MAPPERS: Record<ContentType, (layout: LayoutCapability, payload: ContentPayload) => PlaceholderMapping> = {
  chart: mapToLargest,
  table: mapToLargest,
  comparison: mapComparison,
  kpi_dashboard: mapKpis,
  pictogram: mapPictogram,
  bullets: mapToLargest,
};

/**
 * Map one slide's content onto the placeholders of its chosen layout
 */
export function mapContentToPlaceholders(
  layout: LayoutCapability,
  contentType: ContentType,
  payload: ContentPayload,
): PlaceholderMapping {
  if (layout.contentPlaceholders.length === 0) {
    return degrade(layout, payload, 'layout has no content placeholder');
  }
  return MAPPERS[contentType](layout, payload);
}
