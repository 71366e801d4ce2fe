// ============================================================================
// Story Arc Planner - 按叙事弧线逐页选版式，并避免连续三页同一叙事类型
// ============================================================================

import { createLogger } from '../../services/infra/logger';
import { MatchingError, NoUsableLayoutError, logError } from '../../errors';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../../config/engineConfig';
import { shortRunId } from '../../../shared/utils/id';
import { isUsableLayout } from '../analysis/templateAnalyzer';
import { inferContentType } from './contentTypeInferer';
import { scoreLayout } from './layoutScorer';
import { isCompatibleStoryType } from './storyArc';
import {
  assertCanSelect,
  ensureStoryArc,
  preferredStoryType,
  recentLayouts,
  recentStoryTypes,
  recordSelection,
  type SequenceState,
} from './sequenceState';
import type { ContentPayload } from '../../../shared/types/content';
import type { ContentType, LayoutCapability, StoryType } from '../../../shared/types/layout';

const logger = createLogger('StoryArcPlanner');

export interface ScoredLayout {
  layout: LayoutCapability;
  /** LayoutScorer 的内容匹配分 (0-100) */
  contentScore: number;
  /** 内容分 + 叙事对齐 + 多样性调整 */
  planningScore: number;
}

export interface LayoutSelection {
  slideIndex: number;
  /** 被评分并选中的版式本身 */
  layout: LayoutCapability;
  layoutIndex: number;
  storyType: StoryType;
  preferredStoryType: StoryType;
  contentType: ContentType;
  contentScore: number;
  planningScore: number;
  /** 为避免连续三页同一叙事类型而改选 */
  diversityAdjusted: boolean;
  /** 最高规划分低于 minimumMeaningfulScore */
  belowThreshold: boolean;
}

export interface StoryArcPlannerOptions {
  config?: EngineConfig;
  /** 仅用于错误信息 */
  templateId?: string;
}

export class StoryArcPlanner {
  private readonly candidates: LayoutCapability[];
  private readonly config: EngineConfig;

  constructor(layouts: readonly LayoutCapability[], options: StoryArcPlannerOptions = {}) {
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.candidates = uniqueByIndex(layouts.filter(isUsableLayout)).sort((a, b) => a.index - b.index);

    if (this.candidates.length === 0) {
      throw new NoUsableLayoutError(options.templateId ?? '(unknown)', layouts.length);
    }
  }

  /**
   * Score every candidate layout for the state's next slide without
   * recording anything. Sorted best first; ties keep ascending layout index.
   */
  rankLayouts(state: SequenceState, payload: ContentPayload): ScoredLayout[] {
    ensureStoryArc(state);
    const contentType = inferContentType(payload);
    const preferred = preferredStoryType(state, state.selectionsMade);

    return this.candidates
      .map((layout) => {
        const contentScore = scoreLayout(layout, contentType, payload);
        return {
          layout,
          contentScore,
          planningScore: contentScore + this.storyAlignment(layout, preferred) + this.diversityAdjustment(state, layout),
        };
      })
      .sort((a, b) => b.planningScore - a.planningScore || a.layout.index - b.layout.index);
  }

  private storyAlignment(layout: LayoutCapability, preferred: StoryType): number {
    const { exactMatchBonus, compatibleBonus } = this.config.storyAlignment;
    if (layout.semanticStoryType === preferred) return exactMatchBonus;
    if (isCompatibleStoryType(layout.semanticStoryType, preferred)) return compatibleBonus;
    return 0;
  }

  private diversityAdjustment(state: SequenceState, layout: LayoutCapability): number {
    const { recentWindow, repeatThreshold, repeatPenalty, freshnessBonus } = this.config.diversity;
    let adjustment = 0;

    const lastTwo = recentLayouts(state, 2);
    if (lastTwo.length === 2 && !lastTwo.includes(layout.index)) {
      adjustment += freshnessBonus;
    }

    const recentUses = recentLayouts(state, recentWindow).filter((i) => i === layout.index).length;
    if (recentUses >= repeatThreshold) {
      adjustment -= repeatPenalty;
    }

    return adjustment;
  }

  /**
   * Choose the layout for the next slide of the run and record it.
   * Throws PlannerStateError once every slide of the run is selected.
   */
  selectLayout(state: SequenceState, payload: ContentPayload): LayoutSelection {
    assertCanSelect(state);
    const log = logger.child(shortRunId(state.runId));

    const slideIndex = state.selectionsMade;
    const contentType = inferContentType(payload);
    const preferred = preferredStoryType(state, slideIndex);
    const ranked = this.rankLayouts(state, payload);

    let chosen = ranked[0];
    const belowThreshold = chosen.planningScore < this.config.matching.minimumMeaningfulScore;
    if (belowThreshold) {
      logError(
        new MatchingError(
          `No layout reached score ${this.config.matching.minimumMeaningfulScore} for slide ${slideIndex + 1}; using layout ${chosen.layout.index}`,
          { slideIndex, layoutIndex: chosen.layout.index, score: chosen.planningScore },
        ),
        log,
      );
    }

    let diversityAdjusted = false;
    const lastStories = recentStoryTypes(state, 2);
    const wouldTriple =
      lastStories.length === 2 && lastStories.every((s) => s === chosen.layout.semanticStoryType);

    if (wouldTriple) {
      const alternative = this.findDiversityAlternative(state, ranked, chosen);
      if (alternative) {
        log.info(
          `Slide ${slideIndex + 1}: switching layout ${chosen.layout.index} → ${alternative.layout.index} ` +
            `to avoid a third consecutive "${chosen.layout.semanticStoryType}"`,
        );
        chosen = alternative;
        diversityAdjusted = true;
      } else {
        log.warn(
          `Slide ${slideIndex + 1}: no alternative within ${this.config.diversity.alternativeScoreMargin} points; ` +
            `"${chosen.layout.semanticStoryType}" repeats a third time`,
        );
        state.diversityViolations.push({
          slideIndex,
          layoutIndex: chosen.layout.index,
          storyType: chosen.layout.semanticStoryType,
        });
      }
    }

    recordSelection(state, chosen.layout.index, chosen.layout.semanticStoryType, this.config.diversity.historyWindow);

    log.debug(
      `Slide ${slideIndex + 1}/${state.totalSlides}: layout ${chosen.layout.index} (${chosen.layout.name}) ` +
        `score ${chosen.planningScore.toFixed(1)}, story ${chosen.layout.semanticStoryType}, preferred ${preferred}`,
    );

    return {
      slideIndex,
      layout: chosen.layout,
      layoutIndex: chosen.layout.index,
      storyType: chosen.layout.semanticStoryType,
      preferredStoryType: preferred,
      contentType,
      contentScore: chosen.contentScore,
      planningScore: chosen.planningScore,
      diversityAdjusted,
      belowThreshold,
    };
  }

  /**
   * Best layout with a different story type whose content score is within the
   * margin of the chosen one. Story types seen in the recent window rank lower.
   */
  private findDiversityAlternative(
    state: SequenceState,
    ranked: readonly ScoredLayout[],
    chosen: ScoredLayout,
  ): ScoredLayout | undefined {
    const { alternativeScoreMargin, recentStoryWindow, recentStoryPenalty } = this.config.diversity;
    const recent = recentStoryTypes(state, recentStoryWindow);
    const floor = chosen.contentScore - alternativeScoreMargin;

    let best: ScoredLayout | undefined;
    let bestAdjusted = Number.NEGATIVE_INFINITY;

    const byIndex = [...ranked].sort((a, b) => a.layout.index - b.layout.index);
    for (const candidate of byIndex) {
      if (candidate.layout.semanticStoryType === chosen.layout.semanticStoryType) continue;
      if (candidate.contentScore < floor) continue;

      const adjusted =
        candidate.contentScore - (recent.includes(candidate.layout.semanticStoryType) ? recentStoryPenalty : 0);
      if (adjusted > bestAdjusted) {
        best = candidate;
        bestAdjusted = adjusted;
      }
    }

    return best;
  }

  get layouts(): readonly LayoutCapability[] {
    return this.candidates;
  }
}

/** 同一序号只保留第一个版式 */
function uniqueByIndex(layouts: readonly LayoutCapability[]): LayoutCapability[] {
  const seen = new Set<number>();
  return layouts.filter((layout) => {
    if (seen.has(layout.index)) {
      logger.warn(`Ignoring layout "${layout.name}": index ${layout.index} is already taken`);
      return false;
    }
    seen.add(layout.index);
    return true;
  });
}
