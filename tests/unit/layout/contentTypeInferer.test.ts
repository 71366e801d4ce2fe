// ============================================================================
// Content Type Inferer Tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import { inferContentType } from '../../../src/main/layout/selection/contentTypeInferer';
import { kpiPayload } from './fixtures';

describe('inferContentType', () => {
  it('should map chart and table payloads directly', () => {
    expect(
      inferContentType({
        kind: 'chart',
        chart: { chartType: 'line', categories: ['Jan'], series: [{ name: 'Visits', values: [120] }] },
      }),
    ).toBe('chart');
    expect(inferContentType({ kind: 'table', table: { headers: ['A'], rows: [] } })).toBe('table');
  });

  it('should treat four or more short headed items as KPIs', () => {
    expect(inferContentType(kpiPayload(4))).toBe('kpi_dashboard');
    expect(
      inferContentType({
        kind: 'comparison',
        items: [1, 2, 3, 4].map((i) => ({ heading: `Q${i}`, bullets: [] })),
      }),
    ).toBe('kpi_dashboard');
  });

  it('should treat other headed items as a comparison', () => {
    expect(inferContentType(kpiPayload(3))).toBe('comparison');
    expect(
      inferContentType({
        kind: 'comparison',
        items: [
          { heading: 'Before the migration', bullets: ['Manual'] },
          { heading: 'After', bullets: ['Automated'] },
        ],
      }),
    ).toBe('comparison');
  });

  it('should detect pictograms', () => {
    expect(inferContentType({ kind: 'icon_list', icons: ['[[bolt]] Fast'] })).toBe('pictogram');
    expect(inferContentType({ kind: 'bullets', bullets: ['[[bolt]] Fast', '[[lock]] Safe'] })).toBe('pictogram');
  });

  it('should fall back to bullets', () => {
    expect(inferContentType({ kind: 'bullets', bullets: ['[[bolt]] Fast', 'Plain'] })).toBe('bullets');
    expect(inferContentType({ kind: 'bullets', bullets: [] })).toBe('bullets');
  });
});
