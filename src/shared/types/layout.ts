// ============================================================================
// Layout Types - 模板版式分析共享类型
// ============================================================================

// ----------------------------------------------------------------------------
// Geometry
// ----------------------------------------------------------------------------

/** 模板读取方提供的长度单位 */
export type GeometryUnit = 'inch' | 'emu';

/**
 * Raw shape record as supplied by the template reader, before unit conversion
 */
export interface RawPlaceholderShape {
  index: number;
  typeId: number;
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface RawLayoutGeometry {
  index: number;
  name?: string;
  /** 缺失表示读取方无法给出该版式的占位符 */
  placeholders?: unknown[];
}

export interface TemplateGeometry {
  id: string;
  name?: string;
  unit?: GeometryUnit;
  layouts: RawLayoutGeometry[];
}

/** 统一换算为英寸后的占位符几何 */
export interface PlaceholderGeometry {
  index: number;
  typeId: number;
  left: number;
  top: number;
  width: number;
  height: number;
  area: number;
}

export type PlaceholderRole =
  | 'title'
  | 'subtitle'
  | 'content'
  | 'chart'
  | 'table'
  | 'image'
  | 'footer'
  /** 不参与分组、评分和映射 */
  | 'other';

export interface PlaceholderInfo extends PlaceholderGeometry {
  typeName: string;
  role: PlaceholderRole;
  aspectRatio: number;
  isSmall: boolean;
  isMedium: boolean;
  isLarge: boolean;
  isWide: boolean;
  isTall: boolean;
  /** 空间分组名，如 left_column / row_2 / left_column_subtitle */
  positionGroup: string;
}

// ----------------------------------------------------------------------------
// Grouping
// ----------------------------------------------------------------------------

export type SpatialGroups = Record<string, PlaceholderInfo[]>;

export type SectionPattern = 'single' | 'grid' | 'columns' | 'mixed';

export interface SemanticSection {
  id: string;
  subtitle: PlaceholderInfo;
  contentAreas: PlaceholderInfo[];
  pattern: SectionPattern;
  bestFor: LayoutUseTag[];
  totalCapacity: number;
}

export interface KPIGrid {
  /** 按网格顺序：逐行、行内从左到右 */
  boxes: PlaceholderInfo[];
  rows: number;
  cols: number;
  totalArea: number;
  averageBoxArea: number;
}

// ----------------------------------------------------------------------------
// Classification
// ----------------------------------------------------------------------------

export type ContentType =
  | 'chart'
  | 'table'
  | 'kpi_dashboard'
  | 'comparison'
  | 'pictogram'
  | 'bullets';

/** best-for 标签：内容类型之外还包括叙事提示 */
export type LayoutUseTag =
  | ContentType
  | 'metrics'
  | 'scorecard'
  | 'icon_grid'
  | 'before_after'
  | 'three_points'
  | 'process_steps';

export type StoryType =
  | 'metrics_dashboard'
  | 'data_visualization'
  | 'detailed_analysis'
  | 'focused_message'
  | 'balanced_comparison'
  | 'main_supporting'
  | 'three_stage_narrative'
  | 'feature_grid'
  | 'hierarchical_story'
  | 'general_content';

export type FillDifficulty = 'easy' | 'medium' | 'hard';

export type LayoutCategory =
  | 'blank'
  | 'cover'
  | 'section_divider'
  | 'kpicards'
  | 'small_content'
  | 'large_content';

export type LayoutType =
  | 'kpi_dashboard'
  | 'chart_layout'
  | 'table_layout'
  | 'image_layout'
  | 'multi_section'
  | 'double_section'
  | 'single_section'
  | 'title_only'
  | 'single_column'
  | 'double_column'
  | 'triple_column'
  | 'multi_column'
  | 'fallback';

export interface ContentCapacity {
  bullets: { maxLines: number; charsPerLine: number; estimatedWords: number };
  table: { maxCols: number; maxRows: number };
  chart: { suitable: boolean; minArea: number; availableArea: number };
  kpis: { count: number };
  pictograms: { suitable: boolean; estimatedCount: number };
  sections: number;
}

export interface ContentDensityRecommendation {
  totalWordsTarget: number;
  wordsPerSection: number;
  densityStyle: 'executive' | 'detailed';
  bulletsRecommended: number;
  verbosityLevel: number;
  avoidOverflow: boolean;
}

/**
 * 单个版式的能力描述。构建后深度冻结，只读共享。
 */
export interface LayoutCapability {
  index: number;
  name: string;

  hasTitle: boolean;
  hasSubtitle: boolean;
  hasChart: boolean;
  hasTable: boolean;
  hasPicture: boolean;

  titlePlaceholders: PlaceholderInfo[];
  subtitlePlaceholders: PlaceholderInfo[];
  contentPlaceholders: PlaceholderInfo[];
  textPlaceholders: PlaceholderInfo[];
  footerPlaceholders: PlaceholderInfo[];
  allPlaceholders: PlaceholderInfo[];

  spatialGroups: SpatialGroups;
  semanticSections: SemanticSection[];
  kpiGrid: KPIGrid | null;

  layoutType: LayoutType;
  layoutCategory: LayoutCategory;
  layoutStory: string;
  bestFor: LayoutUseTag[];
  semanticStoryType: StoryType;

  usableContentArea: number;
  contentCapacity: ContentCapacity;

  complexityScore: number;
  visualBalance: number;
  executiveSuitability: number;
  executiveScore: number;
  fillDifficulty: FillDifficulty;
  recommendedVerbosity: number;
  contentDensityRecommendation: ContentDensityRecommendation;
}

export interface TemplateAnalysis {
  templateId: string;
  templateName: string;
  /** 按版式序号升序 */
  layouts: LayoutCapability[];
  /** 分析失败、以兜底能力代替的版式序号 */
  fallbackLayoutIndices: number[];
}
