// ============================================================================
// Layout Descriptors - layoutType / bestFor / layoutStory / layoutCategory
// ============================================================================

import type {
  KPIGrid,
  LayoutCategory,
  LayoutType,
  LayoutUseTag,
  PlaceholderInfo,
  SemanticSection,
  SpatialGroups,
} from '../../../shared/types/layout';

export interface DescriptorInput {
  name: string;
  hasTitle: boolean;
  hasChart: boolean;
  hasTable: boolean;
  hasPicture: boolean;
  content: readonly PlaceholderInfo[];
  text: readonly PlaceholderInfo[];
  spatialGroups: SpatialGroups;
  sections: readonly SemanticSection[];
  kpiGrid: KPIGrid | null;
}

export function inferLayoutType(input: DescriptorInput): LayoutType {
  if (input.kpiGrid) return 'kpi_dashboard';
  if (input.hasChart) return 'chart_layout';
  if (input.hasTable) return 'table_layout';
  if (input.hasPicture) return 'image_layout';

  const sections = input.sections.length;
  if (sections >= 3) return 'multi_section';
  if (sections === 2) return 'double_section';
  if (sections === 1) return 'single_section';

  switch (input.text.length) {
    case 0:
      return 'title_only';
    case 1:
      return 'single_column';
    case 2:
      return 'double_column';
    case 3:
      return 'triple_column';
    default:
      return 'multi_column';
  }
}

function hasColumnPair(groups: SpatialGroups): boolean {
  return 'left_column' in groups && 'right_column' in groups;
}

/**
 * De-duplicated in first-seen order; ['bullets'] when nothing else applies.
 */
export function determineBestFor(input: DescriptorInput): LayoutUseTag[] {
  const tags: LayoutUseTag[] = [];

  if (input.kpiGrid) tags.push('kpi_dashboard', 'metrics', 'scorecard');
  if (input.hasChart) tags.push('chart');
  if (input.hasTable) tags.push('table');

  for (const section of input.sections) {
    tags.push(...section.bestFor);
  }

  const groupCount = Object.keys(input.spatialGroups).length;
  if (hasColumnPair(input.spatialGroups)) tags.push('comparison', 'before_after');
  if (groupCount === 3) tags.push('three_points', 'process_steps');
  if (groupCount >= 4 && !input.kpiGrid) tags.push('icon_grid');
  if (input.content.some((p) => p.isMedium)) tags.push('pictogram');

  if (tags.length === 0) return ['bullets'];
  return [...new Set(tags)];
}

export function describeLayoutStory(input: DescriptorInput): string {
  if (input.kpiGrid) {
    return `KPI Dashboard (${input.kpiGrid.rows}x${input.kpiGrid.cols} metrics)`;
  }
  if (input.sections.length >= 3) {
    return `${input.sections.length} topic sections`;
  }

  const names = Object.keys(input.spatialGroups);
  if (input.hasChart) return 'Chart with supporting text';
  if (input.hasTable) return 'Data table presentation';
  if (hasColumnPair(input.spatialGroups)) return 'Two column comparison';
  if (names.length === 3 && names.every((n) => n.includes('column'))) return 'Three column layout';
  if (names.length >= 1 && names.every((n) => n.startsWith('row_'))) {
    return `Vertical stack (${names.length} sections)`;
  }
  if (names.length === 1) return 'Single content area';
  return `Multi-area layout (${names.length} areas)`;
}

export function determineLayoutCategory(input: DescriptorInput): LayoutCategory {
  const { content, hasTitle } = input;

  if (content.length === 0) {
    if (!hasTitle) return 'blank';
    const name = input.name.toLowerCase();
    return name.includes('title') && !name.includes('only') ? 'cover' : 'section_divider';
  }

  if (input.kpiGrid) return 'kpicards';
  if (content.filter((p) => p.isSmall).length >= 4) return 'kpicards';

  if (content.some((p) => p.isLarge)) return 'large_content';
  if (content.length === 1 && content[0].area > 10) return 'large_content';

  return 'small_content';
}
