// ============================================================================
// Spatial Grouper - 按共享坐标把内容占位符分成列/行/单元格
// ============================================================================

import { withPositionGroup } from './geometry';
import type { PlaceholderInfo, SpatialGroups } from '../../../shared/types/layout';

export interface SpatialGrouping {
  groups: SpatialGroups;
  /** 输入顺序，已写入 positionGroup */
  placeholders: PlaceholderInfo[];
}

const roundTenth = (value: number): number => Math.round(value * 10) / 10;

function distinctSorted(values: number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

/**
 * Assign each content placeholder a group name from the count of
 * distinct left edges (rounded to 0.1").
 */
export function groupBySpatialPosition(content: readonly PlaceholderInfo[]): SpatialGrouping {
  if (content.length === 0) {
    return { groups: {}, placeholders: [] };
  }

  const lefts = distinctSorted(content.map((p) => roundTenth(p.left)));
  const tops = distinctSorted(content.map((p) => roundTenth(p.top)));

  let labelOf: (p: PlaceholderInfo, position: number) => string;

  if (lefts.length === 1) {
    labelOf =
      tops.length === 1
        ? () => 'center'
        : (p) => `row_${tops.indexOf(roundTenth(p.top)) + 1}`;
  } else if (lefts.length === 2) {
    const mid = (lefts[0] + lefts[1]) / 2;
    labelOf = (p) => (p.left < mid ? 'left_column' : 'right_column');
  } else if (lefts.length === 3) {
    const names = ['left_column', 'center_column', 'right_column'];
    labelOf = (p) => names[lefts.indexOf(roundTenth(p.left))];
  } else {
    labelOf = (_p, position) => `cell_${position + 1}`;
  }

  const placeholders = content.map((p, i) => withPositionGroup(p, labelOf(p, i)));
  const rowCount = lefts.length === 1 && tops.length > 1 ? tops.length : 0;
  return { groups: collectGroups(placeholders, rowCount), placeholders };
}

/**
 * Rows are emitted in ascending-top order; other groups in first-seen order.
 */
function collectGroups(labelled: PlaceholderInfo[], rowCount: number): SpatialGroups {
  const groups: SpatialGroups = {};
  for (let r = 1; r <= rowCount; r++) {
    groups[`row_${r}`] = [];
  }
  for (const p of labelled) {
    (groups[p.positionGroup] ??= []).push(p);
  }
  return groups;
}

/**
 * Tag each subtitle with the group whose first member's top is nearest.
 * The earliest group wins a tie.
 */
export function tagSubtitles(
  subtitles: readonly PlaceholderInfo[],
  groups: SpatialGroups,
): PlaceholderInfo[] {
  return subtitles.map((subtitle) => {
    let closest: string | undefined;
    let minDistance = Number.POSITIVE_INFINITY;

    for (const [name, members] of Object.entries(groups)) {
      if (members.length === 0) continue;
      const distance = Math.abs(subtitle.top - members[0].top);
      if (distance < minDistance) {
        minDistance = distance;
        closest = name;
      }
    }

    return closest ? withPositionGroup(subtitle, `${closest}_subtitle`) : subtitle;
  });
}
