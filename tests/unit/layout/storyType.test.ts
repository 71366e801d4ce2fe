// ============================================================================
// Story Type Tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import { STORY_TYPE_RULES, inferStoryType } from '../../../src/main/layout/analysis/storyType';
import { detectKpiGrid } from '../../../src/main/layout/analysis/kpiGridDetector';
import { groupSemanticSections } from '../../../src/main/layout/analysis/semanticSections';
import type { PlaceholderInfo } from '../../../src/shared/types/layout';
import { placeholder } from './fixtures';

function twoSections(leftArea: PlaceholderInfo, rightArea: PlaceholderInfo) {
  const subtitles = [placeholder(1, 2, 0.5, 1.5, 5, 0.25), placeholder(2, 2, 7, 1.5, 5, 0.25)];
  return { sections: groupSemanticSections(subtitles, [leftArea, rightArea]), content: [leftArea, rightArea] };
}

describe('inferStoryType', () => {
  // --------------------------------------------------------------------------
  // Single content area
  // --------------------------------------------------------------------------
  describe('single area', () => {
    it('should treat one wide area over 40 as data visualization', () => {
      const content = [placeholder(1, 2, 0.5, 1.5, 10, 5)];
      expect(inferStoryType({ sections: [], content, kpiGrid: null })).toBe('data_visualization');
    });

    it('should treat one squarer area over 40 as detailed analysis', () => {
      const content = [placeholder(1, 2, 0.5, 1, 7.5, 6)];
      expect(inferStoryType({ sections: [], content, kpiGrid: null })).toBe('detailed_analysis');
    });

    it('should treat a modest area as a focused message', () => {
      const content = [placeholder(1, 2, 2, 2, 4, 2.5)];
      expect(inferStoryType({ sections: [], content, kpiGrid: null })).toBe('focused_message');
    });

    it('should use the single section when there is a subtitle', () => {
      const area = placeholder(2, 2, 0.5, 2, 10, 5);
      const sections = groupSemanticSections([placeholder(1, 2, 0.5, 1.5, 10, 0.25)], [area]);
      expect(inferStoryType({ sections, content: [area], kpiGrid: null })).toBe('data_visualization');
    });
  });

  it('should prefer metrics dashboard when a KPI grid exists', () => {
    const content = [
      placeholder(1, 2, 1, 2, 2, 1),
      placeholder(2, 2, 4, 2, 2, 1),
      placeholder(3, 2, 7, 2, 2, 1),
      placeholder(4, 2, 1, 4, 2, 1),
      placeholder(5, 2, 4, 4, 2, 1),
    ];
    const kpiGrid = detectKpiGrid(content);

    expect(kpiGrid?.rows).toBe(2);
    expect(inferStoryType({ sections: [], content, kpiGrid })).toBe('metrics_dashboard');
  });

  // --------------------------------------------------------------------------
  // Two sections
  // --------------------------------------------------------------------------
  describe('two sections', () => {
    it('should call nearly equal sections a balanced comparison', () => {
      const input = twoSections(placeholder(3, 2, 0.5, 2, 4, 2.5), placeholder(4, 2, 7, 2, 4, 2.625));

      expect(input.sections).toHaveLength(2);
      expect(inferStoryType({ ...input, kpiGrid: null })).toBe('balanced_comparison');
    });

    it('should call unequal sections main plus supporting', () => {
      const input = twoSections(placeholder(3, 2, 0.5, 2, 2, 2.5), placeholder(4, 2, 7, 2, 5, 4));
      expect(inferStoryType({ ...input, kpiGrid: null })).toBe('main_supporting');
    });
  });

  it('should call three sections a three stage narrative', () => {
    const subtitles = [
      placeholder(1, 2, 0.5, 1.5, 4, 0.25),
      placeholder(2, 2, 4.75, 1.5, 4, 0.25),
      placeholder(3, 2, 9, 1.5, 4, 0.25),
    ];
    const content = [placeholder(4, 2, 0.5, 2, 4, 4), placeholder(5, 2, 4.75, 2, 4, 4), placeholder(6, 2, 9, 2, 4, 4)];
    const sections = groupSemanticSections(subtitles, content);

    expect(inferStoryType({ sections, content, kpiGrid: null })).toBe('three_stage_narrative');
  });

  it('should call six or more small boxes without a grid a feature grid', () => {
    const content = [0, 1, 2, 3, 4, 5].map((i) => placeholder(i + 1, 2, i * 2, i, 1, 1));
    expect(inferStoryType({ sections: [], content, kpiGrid: null })).toBe('feature_grid');
  });

  it('should call one large area with two small boxes a hierarchy', () => {
    const content = [placeholder(1, 2, 0.5, 1.5, 8, 5), placeholder(2, 2, 9, 1.5, 2, 1), placeholder(3, 2, 9, 3, 2, 1)];
    expect(inferStoryType({ sections: [], content, kpiGrid: null })).toBe('hierarchical_story');
  });

  it('should default to general content', () => {
    const content = [placeholder(1, 2, 0.5, 2, 4, 2), placeholder(2, 2, 7, 2, 4, 2)];
    expect(inferStoryType({ sections: [], content, kpiGrid: null })).toBe('general_content');
    expect(inferStoryType({ sections: [], content: [], kpiGrid: null })).toBe('general_content');
  });

  it('should evaluate the KPI rule first', () => {
    expect(STORY_TYPE_RULES[0].name).toBe('kpi-grid');
  });
});
