// ============================================================================
// Presentation Planner - 一次运行：逐页推断 → 选版式 → 映射占位符
// ============================================================================

import { createLogger } from '../../services/infra/logger';
import type { EngineConfig } from '../../config/engineConfig';
import { createSequenceState, ensureStoryArc, type DiversityViolation } from './sequenceState';
import { StoryArcPlanner } from './storyArcPlanner';
import { mapContentToPlaceholders } from './placeholderContentMapper';
import { removeSlideNumberFromHeading } from './contentPayload';
import type { PlaceholderMapping, SlideContent } from '../../../shared/types/content';
import type { ContentType, LayoutCapability, StoryType } from '../../../shared/types/layout';

const logger = createLogger('PresentationPlanner');

export interface SlidePlan {
  slideIndex: number;
  heading: string;
  keyMessage?: string;
  layoutIndex: number;
  layoutName: string;
  contentType: ContentType;
  storyType: StoryType;
  preferredStoryType: StoryType;
  score: number;
  diversityAdjusted: boolean;
  mapping: PlaceholderMapping;
}

export interface PresentationPlan {
  runId: string;
  storyArc: StoryType[];
  slides: SlidePlan[];
  diversityViolations: DiversityViolation[];
}

export interface PlanPresentationOptions {
  config?: EngineConfig;
  runId?: string;
  templateId?: string;
}

/**
 * Plan every slide of one run in a single ordered pass.
 * Throws NoUsableLayoutError when no layout can hold content.
 */
export function planPresentation(
  layouts: readonly LayoutCapability[],
  slides: readonly SlideContent[],
  options: PlanPresentationOptions = {},
): PresentationPlan {
  const planner = new StoryArcPlanner(layouts, { config: options.config, templateId: options.templateId });
  const state = createSequenceState(slides.length, options.runId);
  const storyArc = ensureStoryArc(state);

  logger.info(`Planning ${slides.length} slides over ${planner.layouts.length} usable layouts (run ${state.runId})`);

  const planned = slides.map((slide): SlidePlan => {
    const selection = planner.selectLayout(state, slide.payload);
    const { layout } = selection;

    const heading = removeSlideNumberFromHeading(slide.heading);
    const mapping = withTitle(mapContentToPlaceholders(layout, selection.contentType, slide.payload), layout, heading);

    return {
      slideIndex: selection.slideIndex,
      heading,
      ...(slide.keyMessage !== undefined ? { keyMessage: slide.keyMessage } : {}),
      layoutIndex: layout.index,
      layoutName: layout.name,
      contentType: selection.contentType,
      storyType: selection.storyType,
      preferredStoryType: selection.preferredStoryType,
      score: selection.planningScore,
      diversityAdjusted: selection.diversityAdjusted,
      mapping,
    };
  });

  const distinct = new Set(planned.map((s) => s.storyType)).size;
  logger.info(
    `Run ${state.runId}: ${planned.length} slides, ${distinct} story types, ` +
      `${state.diversityViolations.length} diversity violations`,
  );

  return {
    runId: state.runId,
    storyArc: [...storyArc],
    slides: planned,
    diversityViolations: [...state.diversityViolations],
  };
}

/** 标题写入第一个标题占位符 */
function withTitle(mapping: PlaceholderMapping, layout: LayoutCapability, heading: string): PlaceholderMapping {
  const title = layout.titlePlaceholders[0];
  if (!title || heading.length === 0) return mapping;
  return {
    ...mapping,
    assignments: { [title.index]: { type: 'title', text: heading }, ...mapping.assignments },
  };
}
