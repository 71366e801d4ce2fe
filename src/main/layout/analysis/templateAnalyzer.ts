// ============================================================================
// Template Analyzer - 模板所有版式 → 能力集
// ============================================================================

import { createLogger } from '../../services/infra/logger';
import { AnalysisError, ErrorCode, NoUsableLayoutError, logError } from '../../errors';
import { buildFallbackCapability, buildLayoutCapability, deepFreeze } from './layoutCapabilityBuilder';
import type {
  ContentCapacity,
  ContentDensityRecommendation,
  LayoutCapability,
  PlaceholderInfo,
  TemplateAnalysis,
  TemplateGeometry,
} from '../../../shared/types/layout';

const logger = createLogger('TemplateAnalyzer');

/**
 * Analyze every layout of a template.
 *
 * A layout with missing or malformed geometry is replaced by a fallback
 * capability and analysis continues. A layout whose index repeats an
 * earlier one is dropped. Throws NoUsableLayoutError when no layout ends up
 * with a content placeholder.
 */
export function analyzeTemplate(template: TemplateGeometry): TemplateAnalysis {
  const unit = template.unit ?? 'inch';
  const ordered = [...template.layouts].sort((a, b) => a.index - b.index);

  const layouts: LayoutCapability[] = [];
  const fallbackLayoutIndices: number[] = [];
  const seen = new Set<number>();

  for (const raw of ordered) {
    // 能力集按版式序号寻址，重复序号只保留第一个
    if (seen.has(raw.index)) {
      logError(
        new AnalysisError(raw.index, `Layout index ${raw.index} is used more than once; dropping "${raw.name ?? ''}"`, {
          code: ErrorCode.LAYOUT_INDEX_DUPLICATE,
        }),
        logger,
      );
      continue;
    }
    seen.add(raw.index);

    try {
      layouts.push(buildLayoutCapability(raw, unit));
    } catch (error) {
      if (!(error instanceof AnalysisError)) throw error;
      logError(error, logger);
      logger.warn(`Layout ${raw.index} replaced by fallback capability`);
      layouts.push(buildFallbackCapability(raw.index, raw.name));
      fallbackLayoutIndices.push(raw.index);
    }
  }

  if (!layouts.some(isUsableLayout)) {
    const error = new NoUsableLayoutError(template.id, layouts.length);
    logError(error, logger);
    throw error;
  }

  logger.info(
    `Analyzed template ${template.id}: ${layouts.length} layouts, ${fallbackLayoutIndices.length} fallback`,
  );

  return deepFreeze<TemplateAnalysis>({
    templateId: template.id,
    templateName: template.name ?? template.id,
    layouts,
    fallbackLayoutIndices,
  });
}

/** 至少有一个内容占位符才能承载幻灯片正文 */
export function isUsableLayout(layout: LayoutCapability): boolean {
  return layout.contentPlaceholders.length > 0;
}

// ============================================================================
// Export - 给内容生成方的纯数据记录
// ============================================================================

export interface ExportedPlaceholder {
  index: number;
  type: string;
  typeId: number;
  left: number;
  top: number;
  width: number;
  height: number;
  area: number;
  role: PlaceholderInfo['role'];
  positionGroup: string;
  aspectRatio: number;
  isSmall: boolean;
  isMedium: boolean;
  isLarge: boolean;
}

export interface ExportedSection {
  id: string;
  subtitleIndex: number;
  contentIndices: number[];
  pattern: string;
  bestFor: string[];
  totalCapacity: number;
}

export interface ExportedLayout {
  index: number;
  name: string;
  hasTitle: boolean;
  hasSubtitle: boolean;
  hasChart: boolean;
  hasTable: boolean;
  hasPicture: boolean;
  contentCount: number;
  subtitleCount: number;
  textCount: number;
  layoutType: string;
  layoutCategory: string;
  layoutStory: string;
  bestFor: string[];
  semanticStoryType: string;
  spatialGroups: Record<string, number[]>;
  semanticSections: ExportedSection[];
  kpiGrid: { rows: number; cols: number; boxIndices: number[]; totalArea: number; averageBoxArea: number } | null;
  usableContentArea: number;
  contentCapacity: ContentCapacity;
  complexityScore: number;
  visualBalance: number;
  executiveSuitability: number;
  executiveScore: number;
  fillDifficulty: string;
  recommendedVerbosity: number;
  contentDensityRecommendation: ContentDensityRecommendation;
  placeholders: ExportedPlaceholder[];
}

export interface ExportedTemplateAnalysis {
  templateId: string;
  templateName: string;
  totalLayouts: number;
  fallbackLayoutIndices: number[];
  layouts: Record<string, ExportedLayout>;
}

function exportPlaceholder(p: PlaceholderInfo): ExportedPlaceholder {
  return {
    index: p.index,
    type: p.typeName,
    typeId: p.typeId,
    left: p.left,
    top: p.top,
    width: p.width,
    height: p.height,
    area: p.area,
    role: p.role,
    positionGroup: p.positionGroup,
    aspectRatio: p.aspectRatio,
    isSmall: p.isSmall,
    isMedium: p.isMedium,
    isLarge: p.isLarge,
  };
}

const indicesOf = (placeholders: readonly PlaceholderInfo[]): number[] => placeholders.map((p) => p.index);

export function exportLayout(layout: LayoutCapability): ExportedLayout {
  return {
    index: layout.index,
    name: layout.name,
    hasTitle: layout.hasTitle,
    hasSubtitle: layout.hasSubtitle,
    hasChart: layout.hasChart,
    hasTable: layout.hasTable,
    hasPicture: layout.hasPicture,
    contentCount: layout.contentPlaceholders.length,
    subtitleCount: layout.subtitlePlaceholders.length,
    textCount: layout.textPlaceholders.length,
    layoutType: layout.layoutType,
    layoutCategory: layout.layoutCategory,
    layoutStory: layout.layoutStory,
    bestFor: [...layout.bestFor],
    semanticStoryType: layout.semanticStoryType,
    spatialGroups: Object.fromEntries(
      Object.entries(layout.spatialGroups).map(([name, members]) => [name, indicesOf(members)]),
    ),
    semanticSections: layout.semanticSections.map((s) => ({
      id: s.id,
      subtitleIndex: s.subtitle.index,
      contentIndices: indicesOf(s.contentAreas),
      pattern: s.pattern,
      bestFor: [...s.bestFor],
      totalCapacity: s.totalCapacity,
    })),
    kpiGrid: layout.kpiGrid
      ? {
          rows: layout.kpiGrid.rows,
          cols: layout.kpiGrid.cols,
          boxIndices: indicesOf(layout.kpiGrid.boxes),
          totalArea: layout.kpiGrid.totalArea,
          averageBoxArea: layout.kpiGrid.averageBoxArea,
        }
      : null,
    usableContentArea: layout.usableContentArea,
    contentCapacity: structuredClone(layout.contentCapacity),
    complexityScore: layout.complexityScore,
    visualBalance: layout.visualBalance,
    executiveSuitability: layout.executiveSuitability,
    executiveScore: layout.executiveScore,
    fillDifficulty: layout.fillDifficulty,
    recommendedVerbosity: layout.recommendedVerbosity,
    contentDensityRecommendation: { ...layout.contentDensityRecommendation },
    placeholders: layout.allPlaceholders.map(exportPlaceholder),
  };
}

/**
 * Plain nested record of the capability set, keyed by layout index
 */
export function exportTemplateAnalysis(analysis: TemplateAnalysis): ExportedTemplateAnalysis {
  return {
    templateId: analysis.templateId,
    templateName: analysis.templateName,
    totalLayouts: analysis.layouts.length,
    fallbackLayoutIndices: [...analysis.fallbackLayoutIndices],
    layouts: Object.fromEntries(analysis.layouts.map((l) => [String(l.index), exportLayout(l)])),
  };
}

/** 逐版式摘要，仅 debug 级别输出 */
export function logAnalysisSummary(analysis: TemplateAnalysis): void {
  logger.debug(`Template ${analysis.templateName}: ${analysis.layouts.length} layouts`);
  for (const layout of analysis.layouts) {
    logger.debug(
      `  Layout ${layout.index} "${layout.name}" ${layout.layoutType} / ${layout.semanticStoryType}` +
        ` | best for ${layout.bestFor.slice(0, 3).join(', ')}` +
        ` | ${layout.contentPlaceholders.length} content, ${layout.subtitlePlaceholders.length} subtitle` +
        ` | complexity ${layout.complexityScore.toFixed(0)}/100, balance ${layout.visualBalance.toFixed(0)}/100`,
    );
    if (layout.kpiGrid) {
      logger.debug(`    KPI grid ${layout.kpiGrid.rows}x${layout.kpiGrid.cols}`);
    }
  }
}
