// ============================================================================
// Semantic Sections Tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import {
  detectSectionPattern,
  groupSemanticSections,
  sectionBestFor,
} from '../../../src/main/layout/analysis/semanticSections';
import { placeholder } from './fixtures';

describe('groupSemanticSections', () => {
  const subtitle = placeholder(1, 2, 0.5, 1.5, 5, 0.25);

  it('should attach content directly beneath a subtitle', () => {
    const below = placeholder(2, 2, 1, 2, 5, 4);
    const [section] = groupSemanticSections([subtitle], [below]);

    expect(section.id).toBe('section_1');
    expect(section.subtitle.index).toBe(1);
    expect(section.contentAreas.map((c) => c.index)).toEqual([2]);
    expect(section.pattern).toBe('single');
    expect(section.bestFor).toEqual(['chart', 'table', 'bullets']);
    expect(section.totalCapacity).toBe(20);
  });

  it('should require a vertical gap strictly between 0 and 1 inch', () => {
    const sameTop = placeholder(2, 2, 0.5, 1.5, 5, 4);
    const oneInchDown = placeholder(3, 2, 0.5, 2.5, 5, 4);
    const above = placeholder(4, 2, 0.5, 1, 5, 0.4);

    expect(groupSemanticSections([subtitle], [sameTop, oneInchDown, above])).toEqual([]);
  });

  it('should require the left edges to be within 1.5 inches', () => {
    const offset = placeholder(2, 2, 2, 2, 5, 4);
    const tooFar = placeholder(3, 2, 2.1, 2, 5, 4);

    const [section] = groupSemanticSections([subtitle], [offset, tooFar]);
    expect(section.contentAreas.map((c) => c.index)).toEqual([2]);
  });

  it('should give each content placeholder to the first matching subtitle only', () => {
    const second = placeholder(5, 2, 0.5, 1.75, 5, 0.2);
    const below = placeholder(2, 2, 0.5, 2, 5, 4);

    const sections = groupSemanticSections([subtitle, second], [below]);
    expect(sections.map((s) => s.id)).toEqual(['section_1']);
  });

  it('should skip subtitles with nothing beneath them', () => {
    const lonely = placeholder(9, 2, 8, 1.5, 4, 0.25);
    const below = placeholder(2, 2, 0.5, 2, 5, 4);

    const sections = groupSemanticSections([lonely, subtitle], [below]);
    expect(sections.map((s) => s.id)).toEqual(['section_1']);
  });
});

describe('detectSectionPattern', () => {
  it('should detect single, grid, columns and mixed', () => {
    expect(detectSectionPattern([placeholder(1, 2, 0, 2, 5, 4)])).toBe('single');

    expect(
      detectSectionPattern([placeholder(1, 2, 0, 2, 2, 1), placeholder(2, 2, 3, 2, 2, 1), placeholder(3, 2, 6, 2, 2, 1)]),
    ).toBe('grid');

    expect(detectSectionPattern([placeholder(1, 2, 4, 2.25, 3, 4), placeholder(2, 2, 0, 2, 3, 4)])).toBe('columns');

    expect(detectSectionPattern([placeholder(1, 2, 0, 2, 5, 4), placeholder(2, 2, 0.5, 4, 5, 4)])).toBe('mixed');
  });
});

describe('sectionBestFor', () => {
  it('should suggest content by pattern and size', () => {
    const large = placeholder(1, 2, 0, 2, 5, 4);
    const medium = placeholder(2, 2, 0, 2, 4, 2);
    const small = placeholder(3, 2, 0, 2, 2, 1);

    expect(sectionBestFor([large], 'single')).toEqual(['chart', 'table', 'bullets']);
    expect(sectionBestFor([medium], 'single')).toEqual(['bullets', 'pictogram']);
    expect(sectionBestFor([small], 'single')).toEqual([]);
    expect(sectionBestFor([small, small, small], 'grid')).toEqual(['kpi_dashboard', 'icon_grid']);
    expect(sectionBestFor([large, large], 'columns')).toEqual(['comparison', 'bullets']);
    expect(sectionBestFor([large, medium], 'mixed')).toEqual([]);
  });
});
