// ============================================================================
// Placeholder Geometry - 原始形状 → 英寸几何 + 尺寸特征
// ============================================================================

import { z } from 'zod';
import { AnalysisError, ErrorCode } from '../../errors';
import {
  EMU_PER_INCH,
  LARGE_BOX_MIN_AREA,
  PLACEHOLDER_TYPE_NAMES,
  SMALL_BOX_MAX_AREA,
  TALL_ASPECT_RATIO,
  WIDE_ASPECT_RATIO,
} from '../constants';
import type {
  GeometryUnit,
  PlaceholderGeometry,
  PlaceholderInfo,
  PlaceholderRole,
} from '../../../shared/types/layout';

const finite = z.number().finite();

export const RawPlaceholderShapeSchema = z.object({
  index: z.number().int().nonnegative(),
  typeId: z.number().int(),
  left: finite,
  top: finite,
  width: finite.nonnegative(),
  height: finite.nonnegative(),
});

/**
 * Validate one raw shape and convert it to inches.
 * Throws AnalysisError; the analyzer turns that into a fallback layout.
 */
export function extractPlaceholderGeometry(
  raw: unknown,
  unit: GeometryUnit,
  layoutIndex: number,
): PlaceholderGeometry {
  const parsed = RawPlaceholderShapeSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'shape'}: ${i.message}`);
    throw new AnalysisError(layoutIndex, `Malformed placeholder geometry (${issues.join('; ')})`, {
      code: ErrorCode.LAYOUT_GEOMETRY_INVALID,
      placeholderIndex: readIndex(raw),
    });
  }

  const scale = unit === 'emu' ? 1 / EMU_PER_INCH : 1;
  const { index, typeId } = parsed.data;
  const left = parsed.data.left * scale;
  const top = parsed.data.top * scale;
  const width = parsed.data.width * scale;
  const height = parsed.data.height * scale;

  return { index, typeId, left, top, width, height, area: width * height };
}

function readIndex(raw: unknown): number | undefined {
  if (typeof raw === 'object' && raw !== null && 'index' in raw) {
    const { index } = raw;
    return typeof index === 'number' ? index : undefined;
  }
  return undefined;
}

export function placeholderTypeName(typeId: number): string {
  return PLACEHOLDER_TYPE_NAMES[typeId] ?? `UNKNOWN_${typeId}`;
}

export function aspectRatioOf(width: number, height: number): number {
  return height > 0 ? width / height : 1.0;
}

export type SizeClass = 'small' | 'medium' | 'large';

/** 三档互斥且覆盖全部非负面积：[0,3) / [3,15) / [15,∞) */
export function sizeClassOf(area: number): SizeClass {
  if (area < SMALL_BOX_MAX_AREA) return 'small';
  if (area < LARGE_BOX_MIN_AREA) return 'medium';
  return 'large';
}

export function toPlaceholderInfo(
  geometry: PlaceholderGeometry,
  role: PlaceholderRole,
): PlaceholderInfo {
  const aspectRatio = aspectRatioOf(geometry.width, geometry.height);
  const size = sizeClassOf(geometry.area);

  return {
    ...geometry,
    typeName: placeholderTypeName(geometry.typeId),
    role,
    aspectRatio,
    isSmall: size === 'small',
    isMedium: size === 'medium',
    isLarge: size === 'large',
    isWide: aspectRatio > WIDE_ASPECT_RATIO,
    isTall: aspectRatio < TALL_ASPECT_RATIO,
    positionGroup: '',
  };
}

export function withPositionGroup(placeholder: PlaceholderInfo, group: string): PlaceholderInfo {
  return { ...placeholder, positionGroup: group };
}

// ----------------------------------------------------------------------------
// Shared measurements
// ----------------------------------------------------------------------------

export function totalArea(placeholders: readonly PlaceholderInfo[]): number {
  return placeholders.reduce((sum, p) => sum + p.area, 0);
}

/**
 * Largest placeholder by area; the earliest one wins a tie
 */
export function largestByArea(placeholders: readonly PlaceholderInfo[]): PlaceholderInfo | undefined {
  let largest: PlaceholderInfo | undefined;
  for (const p of placeholders) {
    if (!largest || p.area > largest.area) {
      largest = p;
    }
  }
  return largest;
}

/** 与均值的最大绝对偏差 */
export function maxAreaDeviation(placeholders: readonly PlaceholderInfo[]): { mean: number; maxDeviation: number } {
  if (placeholders.length === 0) return { mean: 0, maxDeviation: 0 };
  const mean = totalArea(placeholders) / placeholders.length;
  const maxDeviation = Math.max(...placeholders.map((p) => Math.abs(p.area - mean)));
  return { mean, maxDeviation };
}
