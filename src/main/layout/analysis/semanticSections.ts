// ============================================================================
// Semantic Sections - 副标题 + 其正下方的内容区
// ============================================================================

import {
  COLUMN_TOP_TOLERANCE,
  SECTION_MAX_HORIZONTAL_OFFSET,
  SECTION_MAX_VERTICAL_GAP,
} from '../constants';
import { totalArea } from './geometry';
import type {
  LayoutUseTag,
  PlaceholderInfo,
  SectionPattern,
  SemanticSection,
} from '../../../shared/types/layout';

function belongsBelow(subtitle: PlaceholderInfo, content: PlaceholderInfo): boolean {
  const verticalGap = content.top - subtitle.top;
  if (!(verticalGap > 0 && verticalGap < SECTION_MAX_VERTICAL_GAP)) return false;
  return Math.abs(content.left - subtitle.left) <= SECTION_MAX_HORIZONTAL_OFFSET;
}

export function detectSectionPattern(areas: readonly PlaceholderInfo[]): SectionPattern {
  if (areas.length === 1) return 'single';

  if (areas.filter((a) => a.isSmall).length >= 3) return 'grid';

  if (areas.length >= 2) {
    const [first, second] = [...areas].sort((a, b) => a.left - b.left);
    if (Math.abs(first.top - second.top) < COLUMN_TOP_TOLERANCE) return 'columns';
  }

  return 'mixed';
}

export function sectionBestFor(areas: readonly PlaceholderInfo[], pattern: SectionPattern): LayoutUseTag[] {
  switch (pattern) {
    case 'single':
      if (areas[0].isLarge) return ['chart', 'table', 'bullets'];
      if (areas[0].isMedium) return ['bullets', 'pictogram'];
      return [];
    case 'grid':
      return ['kpi_dashboard', 'icon_grid'];
    case 'columns':
      return ['comparison', 'bullets'];
    case 'mixed':
      return [];
  }
}

/**
 * Pair subtitles with the content placeholders directly beneath them.
 * Subtitles are visited in order and each content placeholder joins at most
 * one section; subtitles with nothing beneath them form no section.
 */
export function groupSemanticSections(
  subtitles: readonly PlaceholderInfo[],
  content: readonly PlaceholderInfo[],
): SemanticSection[] {
  const claimed = new Set<PlaceholderInfo>();
  const sections: SemanticSection[] = [];

  for (const subtitle of subtitles) {
    const contentAreas = content.filter((c) => !claimed.has(c) && belongsBelow(subtitle, c));
    if (contentAreas.length === 0) continue;

    contentAreas.forEach((c) => claimed.add(c));
    const pattern = detectSectionPattern(contentAreas);

    sections.push({
      id: `section_${subtitle.index}`,
      subtitle,
      contentAreas,
      pattern,
      bestFor: sectionBestFor(contentAreas, pattern),
      totalCapacity: totalArea(contentAreas),
    });
  }

  return sections;
}
