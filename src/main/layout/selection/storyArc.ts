// ============================================================================
// Story Arc - 开场 / 主体 / 收尾 的叙事类型序列
// ============================================================================

import type { StoryType } from '../../../shared/types/layout';

/** 主体部分循环使用的叙事类型 */
export const BODY_STORY_CYCLE: readonly StoryType[] = [
  'data_visualization',
  'balanced_comparison',
  'three_stage_narrative',
  'metrics_dashboard',
  'detailed_analysis',
  'hierarchical_story',
  'feature_grid',
];

export const STORY_COMPATIBILITY_GROUPS: readonly (readonly StoryType[])[] = [
  ['data_visualization', 'metrics_dashboard'],
  ['balanced_comparison', 'hierarchical_story'],
  ['three_stage_narrative', 'feature_grid'],
  ['focused_message', 'main_supporting'],
];

/**
 * Opening ⌈N/10⌉ slides of focused_message, ⌊0.7N⌋ body slides cycling
 * through BODY_STORY_CYCLE, then metrics_dashboard closers with the final
 * slide back on focused_message.
 */
export function buildStoryArc(totalSlides: number): StoryType[] {
  if (totalSlides <= 0) return [];

  const opening = Math.ceil(totalSlides / 10);
  const body = Math.floor((totalSlides * 7) / 10);
  const closing = totalSlides - opening - body;

  const arc: StoryType[] = [];
  for (let i = 0; i < opening; i++) arc.push('focused_message');
  for (let i = 0; i < body; i++) arc.push(BODY_STORY_CYCLE[i % BODY_STORY_CYCLE.length]);
  for (let i = 0; i < closing; i++) {
    arc.push(i === closing - 1 ? 'focused_message' : 'metrics_dashboard');
  }
  return arc;
}

/** 同一兼容组内的不同类型；相同类型不算“兼容” */
export function isCompatibleStoryType(layoutStory: StoryType, preferred: StoryType): boolean {
  if (layoutStory === preferred) return false;
  return STORY_COMPATIBILITY_GROUPS.some((group) => group.includes(layoutStory) && group.includes(preferred));
}
