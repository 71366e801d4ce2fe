// ============================================================================
// Presentation Planner Tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import { planPresentation } from '../../../src/main/layout/selection/presentationPlanner';
import { NoUsableLayoutError } from '../../../src/main/errors';
import { isRunId } from '../../../src/shared/utils/id';
import type { SlideContent } from '../../../src/shared/types/content';
import {
  build,
  bulletPayload,
  chartLayout,
  focusedText,
  kpiCards,
  titleAndContent,
  titleOnly,
  twoContent,
} from './fixtures';

describe('planPresentation', () => {
  it('should put a chart slide on the chart layout with its title', () => {
    const chart = { chartType: 'bar' as const, categories: ['2023', '2024'], series: [{ name: 'Sales', values: [4, 6] }] };
    const slides: SlideContent[] = [
      { heading: 'Slide 1: Sales growth', keyMessage: 'Sales up 50%', payload: { kind: 'chart', chart } },
    ];
    const layouts = [titleOnly(0), titleAndContent(1), twoContent(2), kpiCards(3), chartLayout(5)].map(build);

    const plan = planPresentation(layouts, slides, { runId: 'run-chart' });

    expect(plan.runId).toBe('run-chart');
    expect(plan.storyArc).toEqual(['focused_message']);
    expect(plan.slides).toEqual([
      {
        slideIndex: 0,
        heading: 'Sales growth',
        keyMessage: 'Sales up 50%',
        layoutIndex: 5,
        layoutName: 'Chart',
        contentType: 'chart',
        storyType: 'data_visualization',
        preferredStoryType: 'focused_message',
        score: 88,
        diversityAdjusted: false,
        mapping: {
          assignments: {
            0: { type: 'title', text: 'Sales growth' },
            1: { type: 'chart', data: chart },
          },
          degraded: false,
        },
      },
    ]);
  });

  it('should plan a run in order and report diversity violations', () => {
    const layouts = [build(titleAndContent(1)), build(focusedText(3))];
    const slides: SlideContent[] = ['Agenda', 'Findings', 'Details'].map((heading) => ({
      heading,
      payload: bulletPayload(8),
    }));

    const plan = planPresentation(layouts, slides, { runId: 'run-three' });

    expect(plan.slides.map((s) => s.layoutIndex)).toEqual([1, 1, 1]);
    expect(plan.slides.map((s) => s.heading)).toEqual(['Agenda', 'Findings', 'Details']);
    expect(plan.diversityViolations).toEqual([{ slideIndex: 2, layoutIndex: 1, storyType: 'data_visualization' }]);
    expect('keyMessage' in plan.slides[0]).toBe(false);
  });

  it('should map each slide onto the layout it was scored against', () => {
    const plan = planPresentation([build(titleAndContent(1)), build(kpiCards(1))], [
      { heading: 'Findings', payload: bulletPayload(2) },
    ]);

    expect(plan.slides[0]).toMatchObject({ layoutIndex: 1, layoutName: 'Title and Content', storyType: 'data_visualization' });
    expect(plan.slides[0].mapping).toEqual({
      assignments: {
        0: { type: 'title', text: 'Findings' },
        1: {
          type: 'bullets',
          items: [
            { text: 'Point 1', level: 0 },
            { text: 'Point 2', level: 0 },
          ],
        },
      },
      degraded: false,
    });
  });

  it('should leave the title out when the heading is empty', () => {
    const plan = planPresentation([build(titleAndContent(1))], [{ heading: 'Slide 4:', payload: bulletPayload(2) }]);

    expect(plan.slides[0].heading).toBe('');
    expect(Object.keys(plan.slides[0].mapping.assignments)).toEqual(['1']);
  });

  it('should generate a run id when none is given', () => {
    const plan = planPresentation([build(titleAndContent(1))], []);

    expect(isRunId(plan.runId)).toBe(true);
    expect(plan.slides).toEqual([]);
    expect(plan.storyArc).toEqual([]);
  });

  it('should throw when the template has no usable layout', () => {
    expect(() =>
      planPresentation([build(titleOnly(0))], [{ heading: 'x', payload: bulletPayload(1) }], { templateId: 'covers' }),
    ).toThrow('Template "covers" has no usable content layout (1 analyzed)');
    expect(() => planPresentation([], [])).toThrow(NoUsableLayoutError);
  });
});
