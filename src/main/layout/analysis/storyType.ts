// ============================================================================
// Story Type - 版式适合讲述的叙事类型（有序规则表，首条命中）
// ============================================================================

import {
  BALANCED_AREA_DIFFERENCE,
  FEATURE_GRID_MIN_PLACEHOLDERS,
  VERY_LARGE_AREA,
  VISUALIZATION_MIN_ASPECT,
} from '../constants';
import { largestByArea, totalArea } from './geometry';
import type {
  KPIGrid,
  PlaceholderInfo,
  SemanticSection,
  StoryType,
} from '../../../shared/types/layout';

export interface StoryTypeInput {
  sections: readonly SemanticSection[];
  content: readonly PlaceholderInfo[];
  kpiGrid: KPIGrid | null;
}

export interface StoryTypeRule {
  name: string;
  /** 返回 undefined 表示不命中 */
  evaluate: (input: StoryTypeInput) => StoryType | undefined;
}

/**
 * Content areas of the single section, if the layout has exactly one.
 * A layout with no subtitle sections but exactly one content placeholder
 * counts as one implicit section.
 */
function singleSectionAreas(input: StoryTypeInput): readonly PlaceholderInfo[] | undefined {
  if (input.sections.length === 1) return input.sections[0].contentAreas;
  if (input.sections.length === 0 && input.content.length === 1) return input.content;
  return undefined;
}

export const STORY_TYPE_RULES: readonly StoryTypeRule[] = [
  {
    name: 'kpi-grid',
    evaluate: ({ kpiGrid }) => (kpiGrid ? 'metrics_dashboard' : undefined),
  },
  {
    name: 'single-section',
    evaluate: (input) => {
      const areas = singleSectionAreas(input);
      if (!areas) return undefined;
      const largest = largestByArea(areas);
      if (largest && largest.area > VERY_LARGE_AREA) {
        return largest.aspectRatio > VISUALIZATION_MIN_ASPECT ? 'data_visualization' : 'detailed_analysis';
      }
      return 'focused_message';
    },
  },
  {
    name: 'two-sections',
    evaluate: ({ sections }) => {
      if (sections.length !== 2) return undefined;
      const difference = Math.abs(totalArea(sections[0].contentAreas) - totalArea(sections[1].contentAreas));
      return difference < BALANCED_AREA_DIFFERENCE ? 'balanced_comparison' : 'main_supporting';
    },
  },
  {
    name: 'three-sections',
    evaluate: ({ sections }) => (sections.length === 3 ? 'three_stage_narrative' : undefined),
  },
  {
    name: 'feature-grid',
    evaluate: ({ content }) =>
      content.length >= FEATURE_GRID_MIN_PLACEHOLDERS && content.every((p) => p.isSmall)
        ? 'feature_grid'
        : undefined,
  },
  {
    name: 'hierarchy',
    evaluate: ({ content }) => {
      const large = content.filter((p) => p.isLarge).length;
      const small = content.filter((p) => p.isSmall).length;
      return large >= 1 && small >= 2 ? 'hierarchical_story' : undefined;
    },
  },
];

export function inferStoryType(input: StoryTypeInput): StoryType {
  for (const rule of STORY_TYPE_RULES) {
    const storyType = rule.evaluate(input);
    if (storyType) return storyType;
  }
  return 'general_content';
}
