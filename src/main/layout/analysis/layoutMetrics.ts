// ============================================================================
// Layout Metrics - 复杂度 / 均衡度 / 填充难度 / 高管适配度 / 内容密度 / 容量
// ============================================================================

import {
  BULLET_LINE_HEIGHT,
  CHART_MIN_AREA,
  CHARS_PER_INCH,
  ICON_SLOT_WIDTH,
  TABLE_COLUMN_WIDTH,
  TABLE_MIN_COLS,
  TABLE_MIN_ROWS,
  TABLE_ROW_HEIGHT,
  TEXT_AREA_MIN_HEIGHT,
  TEXT_HEAVY_MIN_HEIGHT,
  WORD_DENSITY,
  WORDS_PER_SQUARE_INCH,
} from '../constants';
import { largestByArea, maxAreaDeviation } from './geometry';
import type {
  ContentCapacity,
  ContentDensityRecommendation,
  FillDifficulty,
  KPIGrid,
  PlaceholderInfo,
  SemanticSection,
  StoryType,
} from '../../../shared/types/layout';

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

// ----------------------------------------------------------------------------
// Scores (0-100)
// ----------------------------------------------------------------------------

export function complexityScore(sectionCount: number, content: readonly PlaceholderInfo[]): number {
  const small = content.filter((p) => p.isSmall).length;
  return clamp(15 * sectionCount + 8 * content.length + 5 * small, 0, 100);
}

export function visualBalance(content: readonly PlaceholderInfo[]): number {
  if (content.length === 0) return 0;
  const { mean, maxDeviation } = maxAreaDeviation(content);
  const spread = mean > 0 ? (maxDeviation / mean) * 100 : 100;
  return 100 - clamp(spread, 0, 100);
}

export function fillDifficulty(
  sectionCount: number,
  contentCount: number,
): { difficulty: FillDifficulty; verbosity: number } {
  if (sectionCount <= 2 && contentCount <= 3) return { difficulty: 'easy', verbosity: 7 };
  if (sectionCount <= 4 && contentCount <= 6) return { difficulty: 'medium', verbosity: 8 };
  return { difficulty: 'hard', verbosity: 9 };
}

const EXECUTIVE_STORY_TYPES: readonly StoryType[] = [
  'metrics_dashboard',
  'data_visualization',
  'balanced_comparison',
  'three_stage_narrative',
];

const FOCUSED_STORY_TYPES: readonly StoryType[] = ['focused_message', 'main_supporting'];

export function executiveSuitability(
  balance: number,
  complexity: number,
  sectionCount: number,
  storyType: StoryType,
): number {
  let score = 0.4 * balance;

  if (complexity >= 30 && complexity <= 60) score += 30;
  else if (complexity < 30) score += 20;
  else score += 10;

  if (EXECUTIVE_STORY_TYPES.includes(storyType)) score += 20;
  else if (FOCUSED_STORY_TYPES.includes(storyType)) score += 15;
  else score += 5;

  score += sectionCount >= 1 && sectionCount <= 3 ? 10 : 3;

  return clamp(score, 0, 100);
}

/** 任一内容区偏离均值都不到一个均值 */
function hasVisualBalance(content: readonly PlaceholderInfo[]): boolean {
  if (content.length < 2) return true;
  const { mean, maxDeviation } = maxAreaDeviation(content);
  return mean > 0 && maxDeviation / mean < 1.0;
}

export function executiveScore(
  sectionCount: number,
  content: readonly PlaceholderInfo[],
  subtitleCount: number,
): number {
  let score = 50;

  if (sectionCount >= 1 && sectionCount <= 3) score += 20;
  else if (sectionCount > 5) score -= 15;

  if (subtitleCount > 0) score += 15;

  if (content.filter((p) => p.height > TEXT_HEAVY_MIN_HEIGHT).length > 2) score -= 10;

  if (hasVisualBalance(content)) score += 15;

  return clamp(score, 0, 100);
}

// ----------------------------------------------------------------------------
// Content density
// ----------------------------------------------------------------------------

function wordDensityFor(storyType: StoryType): number {
  if (storyType === 'metrics_dashboard' || storyType === 'feature_grid') return WORD_DENSITY.sparse;
  if (storyType === 'detailed_analysis') return WORD_DENSITY.detailed;
  return WORD_DENSITY.executive;
}

export function recommendContentDensity(
  usableArea: number,
  sectionCount: number,
  storyType: StoryType,
): ContentDensityRecommendation {
  const density = wordDensityFor(storyType);
  const totalWordsTarget = Math.floor(usableArea * density);

  let bulletsRecommended: number;
  if (storyType === 'metrics_dashboard') {
    bulletsRecommended = 4 + sectionCount * 2;
  } else if (storyType === 'balanced_comparison' || storyType === 'three_stage_narrative') {
    bulletsRecommended = 6 + sectionCount * 3;
  } else {
    bulletsRecommended = 8 + sectionCount * 4;
  }

  const executiveStyle = density <= WORD_DENSITY.executive;
  return {
    totalWordsTarget,
    wordsPerSection: sectionCount > 0 ? Math.floor(totalWordsTarget / sectionCount) : totalWordsTarget,
    densityStyle: executiveStyle ? 'executive' : 'detailed',
    bulletsRecommended,
    verbosityLevel: executiveStyle ? 6 : 8,
    avoidOverflow: true,
  };
}

// ----------------------------------------------------------------------------
// Capacity
// ----------------------------------------------------------------------------

export function contentCapacity(
  content: readonly PlaceholderInfo[],
  sections: readonly SemanticSection[],
  kpiGrid: KPIGrid | null,
): ContentCapacity {
  const capacity: ContentCapacity = {
    bullets: { maxLines: 0, charsPerLine: 0, estimatedWords: 0 },
    table: { maxCols: 0, maxRows: 0 },
    chart: { suitable: false, minArea: CHART_MIN_AREA, availableArea: 0 },
    kpis: { count: kpiGrid ? kpiGrid.boxes.length : 0 },
    pictograms: { suitable: false, estimatedCount: 0 },
    sections: sections.length,
  };

  const textArea = largestByArea(content.filter((p) => p.height > TEXT_AREA_MIN_HEIGHT));
  if (textArea) {
    capacity.bullets = {
      maxLines: Math.floor(textArea.height / BULLET_LINE_HEIGHT),
      charsPerLine: Math.floor(textArea.width * CHARS_PER_INCH),
      estimatedWords: Math.floor(textArea.area * WORDS_PER_SQUARE_INCH),
    };
  }

  const largest = largestByArea(content);
  if (largest) {
    capacity.table = {
      maxCols: Math.max(TABLE_MIN_COLS, Math.floor(largest.width / TABLE_COLUMN_WIDTH)),
      maxRows: Math.max(TABLE_MIN_ROWS, Math.floor(largest.height / TABLE_ROW_HEIGHT)),
    };
  }

  const largeAreas = content.filter((p) => p.isLarge);
  if (largeAreas.length > 0) {
    capacity.chart.suitable = true;
    capacity.chart.availableArea = Math.max(...largeAreas.map((p) => p.area));
  }

  const wideMedium = content.find((p) => p.isMedium && p.isWide);
  if (wideMedium) {
    capacity.pictograms = {
      suitable: true,
      estimatedCount: Math.floor(wideMedium.width / ICON_SLOT_WIDTH),
    };
  }

  return capacity;
}
