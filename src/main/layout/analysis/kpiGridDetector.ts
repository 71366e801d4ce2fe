// ============================================================================
// KPI Grid Detector - 小尺寸、面积相近的框组成的指标网格
// ============================================================================

import {
  KPI_MAX_AREA_DEVIATION,
  KPI_MIN_BOXES,
  KPI_MIN_BOXES_PER_ROW,
  KPI_MIN_ROWS,
  KPI_ROW_BUCKETS_PER_INCH,
} from '../constants';
import { maxAreaDeviation, totalArea } from './geometry';
import type { KPIGrid, PlaceholderInfo } from '../../../shared/types/layout';

const rowKey = (top: number): number =>
  Math.round(top * KPI_ROW_BUCKETS_PER_INCH) / KPI_ROW_BUCKETS_PER_INCH;

/**
 * Returns null unless the small boxes form at least two rows of at least
 * two boxes each with areas within 30% of the mean. Pure: repeated calls on
 * the same input give the same grid.
 */
export function detectKpiGrid(content: readonly PlaceholderInfo[]): KPIGrid | null {
  const smallBoxes = content.filter((p) => p.isSmall);
  if (smallBoxes.length < KPI_MIN_BOXES) {
    return null;
  }

  const rows = new Map<number, PlaceholderInfo[]>();
  for (const box of smallBoxes) {
    const key = rowKey(box.top);
    const row = rows.get(key);
    if (row) {
      row.push(box);
    } else {
      rows.set(key, [box]);
    }
  }

  if (rows.size < KPI_MIN_ROWS) return null;
  if ([...rows.values()].some((row) => row.length < KPI_MIN_BOXES_PER_ROW)) return null;

  const { mean, maxDeviation } = maxAreaDeviation(smallBoxes);
  if (maxDeviation > mean * KPI_MAX_AREA_DEVIATION) {
    return null;
  }

  const orderedRows = [...rows.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, row]) => [...row].sort((a, b) => a.left - b.left));

  const area = totalArea(smallBoxes);
  return {
    boxes: orderedRows.flat(),
    rows: orderedRows.length,
    cols: orderedRows[0].length,
    totalArea: area,
    averageBoxArea: area / smallBoxes.length,
  };
}
