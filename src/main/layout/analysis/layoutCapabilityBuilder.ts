// ============================================================================
// Layout Capability Builder - 单个版式 → 不可变 LayoutCapability
// ============================================================================

import { AnalysisError, ErrorCode } from '../../errors';
import { TEXT_BODY_TYPE_IDS } from '../constants';
import { extractPlaceholderGeometry, toPlaceholderInfo, totalArea } from './geometry';
import { classifyPlaceholderRole, isContentRole } from './roleClassifier';
import { groupBySpatialPosition, tagSubtitles } from './spatialGrouper';
import { detectKpiGrid } from './kpiGridDetector';
import { groupSemanticSections } from './semanticSections';
import { inferStoryType } from './storyType';
import {
  complexityScore,
  contentCapacity,
  executiveScore,
  executiveSuitability,
  fillDifficulty,
  recommendContentDensity,
  visualBalance,
} from './layoutMetrics';
import {
  describeLayoutStory,
  determineBestFor,
  determineLayoutCategory,
  inferLayoutType,
  type DescriptorInput,
} from './layoutDescriptors';
import type {
  GeometryUnit,
  LayoutCapability,
  PlaceholderInfo,
  RawLayoutGeometry,
} from '../../../shared/types/layout';

export function defaultLayoutName(index: number): string {
  return `Layout ${index}`;
}

/**
 * Freeze an object graph in place. Shared sub-objects are visited once.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function classify(raw: RawLayoutGeometry, unit: GeometryUnit): PlaceholderInfo[] {
  if (!Array.isArray(raw.placeholders)) {
    throw new AnalysisError(raw.index, 'Layout has no placeholder list', {
      code: ErrorCode.LAYOUT_PLACEHOLDERS_MISSING,
    });
  }

  const seen = new Set<number>();
  return raw.placeholders.map((shape) => {
    const geometry = extractPlaceholderGeometry(shape, unit, raw.index);
    // 映射结果以占位符序号为键
    if (seen.has(geometry.index)) {
      throw new AnalysisError(raw.index, `Placeholder index ${geometry.index} appears more than once`, {
        code: ErrorCode.LAYOUT_GEOMETRY_INVALID,
        placeholderIndex: geometry.index,
      });
    }
    seen.add(geometry.index);
    return toPlaceholderInfo(geometry, classifyPlaceholderRole(geometry));
  });
}

/**
 * Build the capability record for one layout.
 * Throws AnalysisError when the geometry is missing or malformed.
 */
export function buildLayoutCapability(raw: RawLayoutGeometry, unit: GeometryUnit = 'inch'): LayoutCapability {
  const classified = classify(raw, unit);
  const name = raw.name ?? defaultLayoutName(raw.index);

  // 1. 内容区空间分组，副标题挂到最近的分组
  const grouping = groupBySpatialPosition(classified.filter((p) => isContentRole(p.role)));
  const content = grouping.placeholders;
  const subtitles = tagSubtitles(
    classified.filter((p) => p.role === 'subtitle'),
    grouping.groups,
  );

  const allPlaceholders = rebuildAll(classified, content, subtitles);

  // 2. KPI 网格 + 语义分区
  const kpiGrid = detectKpiGrid(content);
  const sections = groupSemanticSections(subtitles, content);

  // 3. 叙事类型与指标
  const semanticStoryType = inferStoryType({ sections, content, kpiGrid });
  const text = content.filter((p) => TEXT_BODY_TYPE_IDS.includes(p.typeId));
  const titles = classified.filter((p) => p.role === 'title');
  const footers = classified.filter((p) => p.role === 'footer');

  const descriptorInput: DescriptorInput = {
    name,
    hasTitle: titles.length > 0,
    hasChart: classified.some((p) => p.role === 'chart'),
    hasTable: classified.some((p) => p.role === 'table'),
    hasPicture: classified.some((p) => p.role === 'image'),
    content,
    text,
    spatialGroups: grouping.groups,
    sections,
    kpiGrid,
  };

  const usableContentArea = totalArea(content);
  const complexity = complexityScore(sections.length, content);
  const balance = visualBalance(content);
  const { difficulty, verbosity } = fillDifficulty(sections.length, content.length);

  return deepFreeze<LayoutCapability>({
    index: raw.index,
    name,

    hasTitle: descriptorInput.hasTitle,
    hasSubtitle: subtitles.length > 0,
    hasChart: descriptorInput.hasChart,
    hasTable: descriptorInput.hasTable,
    hasPicture: descriptorInput.hasPicture,

    titlePlaceholders: titles,
    subtitlePlaceholders: subtitles,
    contentPlaceholders: content,
    textPlaceholders: text,
    footerPlaceholders: footers,
    allPlaceholders,

    spatialGroups: grouping.groups,
    semanticSections: sections,
    kpiGrid,

    layoutType: inferLayoutType(descriptorInput),
    layoutCategory: determineLayoutCategory(descriptorInput),
    layoutStory: describeLayoutStory(descriptorInput),
    bestFor: determineBestFor(descriptorInput),
    semanticStoryType,

    usableContentArea,
    contentCapacity: contentCapacity(content, sections, kpiGrid),

    complexityScore: complexity,
    visualBalance: balance,
    executiveSuitability: executiveSuitability(balance, complexity, sections.length, semanticStoryType),
    executiveScore: executiveScore(sections.length, content, subtitles.length),
    fillDifficulty: difficulty,
    recommendedVerbosity: verbosity,
    contentDensityRecommendation: recommendContentDensity(usableContentArea, sections.length, semanticStoryType),
  });
}

/**
 * allPlaceholders keeps input order but carries the grouped copies.
 */
function rebuildAll(
  classified: readonly PlaceholderInfo[],
  content: readonly PlaceholderInfo[],
  subtitles: readonly PlaceholderInfo[],
): PlaceholderInfo[] {
  const contentQueue = [...content];
  const subtitleQueue = [...subtitles];
  return classified.map((p) => {
    if (isContentRole(p.role)) return contentQueue.shift() ?? p;
    if (p.role === 'subtitle') return subtitleQueue.shift() ?? p;
    return p;
  });
}

/**
 * Minimal stand-in for a layout whose geometry could not be analyzed
 */
export function buildFallbackCapability(index: number, name?: string): LayoutCapability {
  return deepFreeze<LayoutCapability>({
    index,
    name: name ?? defaultLayoutName(index),

    hasTitle: false,
    hasSubtitle: false,
    hasChart: false,
    hasTable: false,
    hasPicture: false,

    titlePlaceholders: [],
    subtitlePlaceholders: [],
    contentPlaceholders: [],
    textPlaceholders: [],
    footerPlaceholders: [],
    allPlaceholders: [],

    spatialGroups: {},
    semanticSections: [],
    kpiGrid: null,

    layoutType: 'fallback',
    layoutCategory: 'blank',
    layoutStory: 'Unanalyzed layout',
    bestFor: ['bullets'],
    semanticStoryType: 'general_content',

    usableContentArea: 0,
    contentCapacity: contentCapacity([], [], null),

    complexityScore: 0,
    visualBalance: 0,
    executiveSuitability: executiveSuitability(0, 0, 0, 'general_content'),
    executiveScore: executiveScore(0, [], 0),
    fillDifficulty: 'easy',
    recommendedVerbosity: 7,
    contentDensityRecommendation: recommendContentDensity(0, 0, 'general_content'),
  });
}
