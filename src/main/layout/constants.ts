// ============================================================================
// 版式分析常量 - 几何阈值集中管理
// ============================================================================
// 这些阈值是固定常量，不随模板或引擎配置变化
// ============================================================================

/** 1 英寸 = 914400 EMU */
export const EMU_PER_INCH = 914400;

// ---- 占位符类型 ID ----

export const PLACEHOLDER_TYPE = {
  TITLE: 1,
  BODY: 2,
  CENTER_TITLE: 3,
  SUBTITLE: 4,
  DATE: 5,
  SLIDE_NUMBER: 6,
  FOOTER: 7,
  HEADER: 8,
  OBJECT: 9,
  CHART: 10,
  TABLE: 11,
  CLIP_ART: 12,
  ORG_CHART: 13,
  MEDIA: 14,
  PICTURE: 15,
  VERTICAL_BODY: 16,
  VERTICAL_OBJECT: 17,
  VERTICAL_TITLE: 18,
} as const;

export const PLACEHOLDER_TYPE_NAMES: Record<number, string> = Object.fromEntries(
  Object.entries(PLACEHOLDER_TYPE).map(([name, id]) => [id, name])
);

/** 需要按几何尺寸区分副标题/正文的通用类型 */
export const GENERIC_BODY_TYPE_IDS: readonly number[] = [
  PLACEHOLDER_TYPE.BODY,
  PLACEHOLDER_TYPE.OBJECT,
  PLACEHOLDER_TYPE.VERTICAL_BODY,
  PLACEHOLDER_TYPE.VERTICAL_OBJECT,
];

/** 纯文本正文类型（计入 textPlaceholders） */
export const TEXT_BODY_TYPE_IDS: readonly number[] = [
  PLACEHOLDER_TYPE.BODY,
  PLACEHOLDER_TYPE.VERTICAL_BODY,
];

// ---- 尺寸分档（平方英寸） ----

/** area < 3 为小框 */
export const SMALL_BOX_MAX_AREA = 3.0;

/** area >= 15 为大框，二者之间为中框 */
export const LARGE_BOX_MIN_AREA = 15.0;

/** 宽高比 > 2 为宽框 */
export const WIDE_ASPECT_RATIO = 2.0;

/** 宽高比 < 0.5 为窄高框 */
export const TALL_ASPECT_RATIO = 0.5;

// ---- 角色判定 ----

export const SUBTITLE_MAX_HEIGHT = 0.5;
export const SUBTITLE_MAX_AREA = 1.0;
export const BANNER_MIN_ASPECT_RATIO = 3.0;
export const BANNER_MAX_HEIGHT = 0.8;

// ---- 分组 ----

/** 内容框顶部须在副标题下方 (0, 1.0) 英寸内 */
export const SECTION_MAX_VERTICAL_GAP = 1.0;

/** 与副标题左边缘的最大水平偏差 */
export const SECTION_MAX_HORIZONTAL_OFFSET = 1.5;

/** 两框顶部差小于此值视为并列 */
export const COLUMN_TOP_TOLERANCE = 0.5;

/** KPI 网格行分桶精度：1/3 英寸 */
export const KPI_ROW_BUCKETS_PER_INCH = 3;

export const KPI_MIN_BOXES = 4;
export const KPI_MIN_ROWS = 2;
export const KPI_MIN_BOXES_PER_ROW = 2;

/** 面积最大偏差占均值的比例上限 */
export const KPI_MAX_AREA_DEVIATION = 0.3;

// ---- 叙事类型 ----

/** 单区块“超大内容区”面积阈值 */
export const VERY_LARGE_AREA = 40;

/** 数据可视化所需的最小宽高比 */
export const VISUALIZATION_MIN_ASPECT = 1.5;

/** 双区块面积差小于此值视为均衡 */
export const BALANCED_AREA_DIFFERENCE = 5;

export const FEATURE_GRID_MIN_PLACEHOLDERS = 6;

// ---- 容量估算 ----

export const BULLET_LINE_HEIGHT = 0.3;
export const CHARS_PER_INCH = 8;
export const WORDS_PER_SQUARE_INCH = 20;
export const TABLE_COLUMN_WIDTH = 1.5;
export const TABLE_ROW_HEIGHT = 0.4;
export const TABLE_MIN_COLS = 2;
export const TABLE_MIN_ROWS = 3;
export const CHART_MIN_AREA = 30;
export const ICON_SLOT_WIDTH = 1.5;

/** 高于此值才算可放要点的文本区 */
export const TEXT_AREA_MIN_HEIGHT = 1.0;

/** 大于此值的文本区视为“长文本” */
export const TEXT_HEAVY_MIN_HEIGHT = 3.0;

// ---- 文本密度（每平方英寸字数） ----

export const WORD_DENSITY = {
  sparse: 10,
  executive: 15,
  detailed: 20,
} as const;
