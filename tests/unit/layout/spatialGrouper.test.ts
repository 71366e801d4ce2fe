// ============================================================================
// Spatial Grouper Tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import { groupBySpatialPosition, tagSubtitles } from '../../../src/main/layout/analysis/spatialGrouper';
import { placeholder } from './fixtures';

const indices = (members: { index: number }[] | undefined) => (members ?? []).map((p) => p.index);

describe('groupBySpatialPosition', () => {
  it('should return nothing for no content', () => {
    expect(groupBySpatialPosition([])).toEqual({ groups: {}, placeholders: [] });
  });

  it('should put a lone placeholder in center', () => {
    const { groups, placeholders } = groupBySpatialPosition([placeholder(1, 2, 0.5, 1.5, 12, 5)]);

    expect(Object.keys(groups)).toEqual(['center']);
    expect(placeholders[0].positionGroup).toBe('center');
  });

  it('should stack a single column into rows ordered by top', () => {
    const { groups, placeholders } = groupBySpatialPosition([
      placeholder(1, 2, 1, 4, 6, 1),
      placeholder(2, 2, 1, 1.5, 6, 1),
      placeholder(3, 2, 1, 3, 6, 1),
    ]);

    expect(placeholders.map((p) => p.positionGroup)).toEqual(['row_3', 'row_1', 'row_2']);
    expect(Object.keys(groups)).toEqual(['row_1', 'row_2', 'row_3']);
    expect(indices(groups.row_1)).toEqual([2]);
  });

  it('should treat left edges within rounding as the same column', () => {
    const { groups } = groupBySpatialPosition([placeholder(1, 2, 0.52, 2, 6, 1), placeholder(2, 2, 0.48, 4, 6, 1)]);

    expect(Object.keys(groups)).toEqual(['row_1', 'row_2']);
  });

  it('should split two distinct lefts into columns at the midpoint', () => {
    const { groups } = groupBySpatialPosition([
      placeholder(1, 2, 7, 2, 5.5, 4),
      placeholder(2, 2, 0.5, 2, 5.5, 4),
      placeholder(3, 2, 0.5, 6.5, 5.5, 0.75),
    ]);

    expect(indices(groups.left_column)).toEqual([2, 3]);
    expect(indices(groups.right_column)).toEqual([1]);
  });

  it('should name three columns by left edge', () => {
    const { placeholders } = groupBySpatialPosition([
      placeholder(1, 2, 9, 2, 4, 4),
      placeholder(2, 2, 0.5, 2, 4, 4),
      placeholder(3, 2, 4.75, 2, 4, 4),
    ]);

    expect(placeholders.map((p) => p.positionGroup)).toEqual(['right_column', 'left_column', 'center_column']);
  });

  it('should fall back to cells for four or more lefts', () => {
    const { groups } = groupBySpatialPosition([
      placeholder(1, 2, 0.5, 2, 2, 2),
      placeholder(2, 2, 3.5, 2, 2, 2),
      placeholder(3, 2, 6.5, 2, 2, 2),
      placeholder(4, 2, 9.5, 2, 2, 2),
    ]);

    expect(Object.keys(groups)).toEqual(['cell_1', 'cell_2', 'cell_3', 'cell_4']);
  });

  it('should not modify the input placeholders', () => {
    const input = placeholder(1, 2, 0.5, 1.5, 12, 5);
    groupBySpatialPosition([input]);
    expect(input.positionGroup).toBe('');
  });
});

describe('tagSubtitles', () => {
  const { groups } = groupBySpatialPosition([placeholder(1, 2, 1, 2, 6, 1), placeholder(2, 2, 1, 4, 6, 1)]);

  it('should tag each subtitle with the nearest group', () => {
    const tagged = tagSubtitles([placeholder(5, 2, 1, 1.5, 6, 0.25), placeholder(6, 2, 1, 3.75, 6, 0.25)], groups);

    expect(tagged.map((p) => p.positionGroup)).toEqual(['row_1_subtitle', 'row_2_subtitle']);
  });

  it('should prefer the earlier group on a tie', () => {
    const [tagged] = tagSubtitles([placeholder(5, 2, 1, 3, 6, 0.25)], groups);
    expect(tagged.positionGroup).toBe('row_1_subtitle');
  });

  it('should leave subtitles untagged when there are no groups', () => {
    const [tagged] = tagSubtitles([placeholder(5, 2, 1, 3, 6, 0.25)], {});
    expect(tagged.positionGroup).toBe('');
  });
});
