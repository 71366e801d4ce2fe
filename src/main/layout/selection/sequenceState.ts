// ============================================================================
// Sequence State - 单次生成运行的选择历史
// ============================================================================
// unplanned → planned → selecting → done
// 由一次运行独占；不在运行之间复用
// ============================================================================

import { PlannerStateError } from '../../errors';
import { generateRunId } from '../../../shared/utils/id';
import { buildStoryArc } from './storyArc';
import type { StoryType } from '../../../shared/types/layout';

export type PlannerPhase = 'unplanned' | 'planned' | 'selecting' | 'done';

export interface DiversityViolation {
  slideIndex: number;
  layoutIndex: number;
  storyType: StoryType;
}

export interface SequenceState {
  readonly runId: string;
  readonly totalSlides: number;
  phase: PlannerPhase;
  plannedStoryArc: StoryType[];
  usedLayoutHistory: number[];
  usedStoryTypeHistory: StoryType[];
  selectionsMade: number;
  diversityViolations: DiversityViolation[];
}

export function createSequenceState(totalSlides: number, runId: string = generateRunId()): SequenceState {
  if (!Number.isInteger(totalSlides) || totalSlides < 0) {
    throw new PlannerStateError(runId, `Slide count must be a non-negative integer, got ${totalSlides}`);
  }
  return {
    runId,
    totalSlides,
    phase: totalSlides === 0 ? 'done' : 'unplanned',
    plannedStoryArc: [],
    usedLayoutHistory: [],
    usedStoryTypeHistory: [],
    selectionsMade: 0,
    diversityViolations: [],
  };
}

/**
 * Compute the story arc once; later calls return the same arc
 */
export function ensureStoryArc(state: SequenceState): StoryType[] {
  if (state.phase === 'unplanned') {
    state.plannedStoryArc = buildStoryArc(state.totalSlides);
    state.phase = 'planned';
  }
  return state.plannedStoryArc;
}

export function preferredStoryType(state: SequenceState, slideIndex: number): StoryType {
  const arc = state.plannedStoryArc;
  if (arc.length === 0) return 'general_content';
  return arc[Math.min(slideIndex, arc.length - 1)];
}

export function assertCanSelect(state: SequenceState): void {
  if (state.phase === 'done' || state.selectionsMade >= state.totalSlides) {
    throw new PlannerStateError(
      state.runId,
      `All ${state.totalSlides} slides of run ${state.runId} are already selected`,
    );
  }
}

function keepLast<T>(items: T[], limit: number): T[] {
  return items.length > limit ? items.slice(items.length - limit) : items;
}

/**
 * Append the final choice for the next slide and advance the phase
 */
export function recordSelection(
  state: SequenceState,
  layoutIndex: number,
  storyType: StoryType,
  historyWindow: number,
): void {
  assertCanSelect(state);

  state.usedLayoutHistory = keepLast([...state.usedLayoutHistory, layoutIndex], historyWindow);
  state.usedStoryTypeHistory = keepLast([...state.usedStoryTypeHistory, storyType], historyWindow);
  state.selectionsMade += 1;
  state.phase = state.selectionsMade >= state.totalSlides ? 'done' : 'selecting';
}

/** 最近 n 次选择（不足 n 次时返回全部） */
export function recentLayouts(state: SequenceState, n: number): number[] {
  return state.usedLayoutHistory.slice(-n);
}

export function recentStoryTypes(state: SequenceState, n: number): StoryType[] {
  return state.usedStoryTypeHistory.slice(-n);
}
