// ============================================================================
// Layout Fixtures - 测试用版式几何（英寸）
// ============================================================================

import { toPlaceholderInfo } from '../../../src/main/layout/analysis/geometry';
import { classifyPlaceholderRole } from '../../../src/main/layout/analysis/roleClassifier';
import { buildLayoutCapability } from '../../../src/main/layout/analysis/layoutCapabilityBuilder';
import type {
  LayoutCapability,
  PlaceholderInfo,
  RawLayoutGeometry,
  RawPlaceholderShape,
} from '../../../src/shared/types/layout';
import type { ContentPayload } from '../../../src/shared/types/content';

export function shape(
  index: number,
  typeId: number,
  left: number,
  top: number,
  width: number,
  height: number,
): RawPlaceholderShape {
  return { index, typeId, left, top, width, height };
}

/** 已分类的占位符，positionGroup 为空 */
export function placeholder(
  index: number,
  typeId: number,
  left: number,
  top: number,
  width: number,
  height: number,
): PlaceholderInfo {
  const geometry = { index, typeId, left, top, width, height, area: width * height };
  return toPlaceholderInfo(geometry, classifyPlaceholderRole(geometry));
}

const title = () => shape(0, 1, 0.5, 0.25, 12, 1);

// ----------------------------------------------------------------------------
// Raw layouts
// ----------------------------------------------------------------------------

/** 标题 + 一个 12x5 正文区 → data_visualization */
export function titleAndContent(index = 1): RawLayoutGeometry {
  return { index, name: 'Title and Content', placeholders: [title(), shape(1, 2, 0.5, 1.5, 12, 5)] };
}

/** 两个副标题 + 两个 5.5x4 正文区 → balanced_comparison */
export function twoContent(index = 2): RawLayoutGeometry {
  return {
    index,
    name: 'Two Content',
    placeholders: [
      title(),
      shape(1, 2, 0.5, 1.5, 5.5, 0.25),
      shape(2, 2, 7, 1.5, 5.5, 0.25),
      shape(3, 2, 0.5, 2, 5.5, 4),
      shape(4, 2, 7, 2, 5.5, 4),
    ],
  };
}

/** 2x3 的 KPI 卡片，故意乱序给出 */
export function kpiCards(index = 3): RawLayoutGeometry {
  return {
    index,
    name: 'KPI Cards',
    placeholders: [
      title(),
      shape(1, 2, 9, 4, 2, 1.25),
      shape(2, 2, 1, 2, 2, 1.25),
      shape(3, 2, 5, 4, 2, 1.25),
      shape(4, 2, 5, 2, 2, 1.25),
      shape(5, 2, 1, 4, 2, 1.25),
      shape(6, 2, 9, 2, 2, 1.25),
    ],
  };
}

/** 一个 4x2.5 的中等正文区 → focused_message */
export function focusedText(index = 4): RawLayoutGeometry {
  return { index, name: 'Focused Text', placeholders: [title(), shape(1, 2, 2, 2, 4, 2.5)] };
}

export function chartLayout(index = 5): RawLayoutGeometry {
  return { index, name: 'Chart', placeholders: [title(), shape(1, 10, 0.5, 1.5, 12, 5.5)] };
}

export function titleOnly(index = 0): RawLayoutGeometry {
  return { index, name: 'Title Only', placeholders: [title()] };
}

/** 三个副标题各带一个 4x4 正文区 → three_stage_narrative */
export function threeSections(index = 6): RawLayoutGeometry {
  return {
    index,
    name: 'Three Sections',
    placeholders: [
      title(),
      shape(1, 2, 0.5, 1.5, 4, 0.25),
      shape(2, 2, 4.75, 1.5, 4, 0.25),
      shape(3, 2, 9, 1.5, 4, 0.25),
      shape(4, 2, 0.5, 2, 4, 4),
      shape(5, 2, 4.75, 2, 4, 4),
      shape(6, 2, 9, 2, 4, 4),
    ],
  };
}

/** 一个大区 + 两个小框 → hierarchical_story */
export function hierarchy(index = 7): RawLayoutGeometry {
  return {
    index,
    name: 'Main and Notes',
    placeholders: [title(), shape(1, 2, 0.5, 1.5, 8, 5), shape(2, 2, 9, 1.5, 2, 1), shape(3, 2, 9, 3, 2, 1)],
  };
}

/** 一个 9x1.5 的宽条 → 适合图标 */
export function iconStrip(index = 8): RawLayoutGeometry {
  return { index, name: 'Icon Strip', placeholders: [title(), shape(1, 2, 0.5, 2, 9, 1.5)] };
}

export function build(raw: RawLayoutGeometry): LayoutCapability {
  return buildLayoutCapability(raw);
}

// ----------------------------------------------------------------------------
// Payloads
// ----------------------------------------------------------------------------

export function bulletPayload(count: number): ContentPayload {
  return { kind: 'bullets', bullets: Array.from({ length: count }, (_, i) => `Point ${i + 1}`) };
}

export function kpiPayload(count: number): ContentPayload {
  return {
    kind: 'kpi_list',
    items: Array.from({ length: count }, (_, i) => ({ heading: `KPI ${i + 1}`, bullets: [`${(i + 1) * 10}%`] })),
  };
}
