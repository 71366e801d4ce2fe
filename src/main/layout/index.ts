// ============================================================================
// Layout Engine - 模板版式分析 + 逐页版式选择
// ============================================================================

export * from './constants';

// Analysis
export {
  extractPlaceholderGeometry,
  toPlaceholderInfo,
  sizeClassOf,
  aspectRatioOf,
  placeholderTypeName,
  type SizeClass,
} from './analysis/geometry';
export { classifyPlaceholderRole, isContentRole, ROLE_RULES, type RoleInput, type RoleRule } from './analysis/roleClassifier';
export { groupBySpatialPosition, tagSubtitles, type SpatialGrouping } from './analysis/spatialGrouper';
export { detectKpiGrid } from './analysis/kpiGridDetector';
export { groupSemanticSections, detectSectionPattern, sectionBestFor } from './analysis/semanticSections';
export { inferStoryType, STORY_TYPE_RULES, type StoryTypeInput, type StoryTypeRule } from './analysis/storyType';
export {
  buildLayoutCapability,
  buildFallbackCapability,
  deepFreeze,
} from './analysis/layoutCapabilityBuilder';
export {
  analyzeTemplate,
  exportTemplateAnalysis,
  exportLayout,
  logAnalysisSummary,
  isUsableLayout,
  type ExportedLayout,
  type ExportedPlaceholder,
  type ExportedSection,
  type ExportedTemplateAnalysis,
} from './analysis/templateAnalyzer';
export { CapabilityCache, type TemplateLoader } from './analysis/capabilityCache';

// Selection
export {
  decodeContentPayload,
  decodeSlideContent,
  flattenBullets,
  parseIconEntry,
  removeSlideNumberFromHeading,
  type IconEntry,
} from './selection/contentPayload';
export { inferContentType } from './selection/contentTypeInferer';
export { scoreLayout, estimateBulletLines, DEFAULT_BULLET_TARGET } from './selection/layoutScorer';
export { buildStoryArc, isCompatibleStoryType, BODY_STORY_CYCLE, STORY_COMPATIBILITY_GROUPS } from './selection/storyArc';
export {
  createSequenceState,
  ensureStoryArc,
  recordSelection,
  type SequenceState,
  type PlannerPhase,
  type DiversityViolation,
} from './selection/sequenceState';
export {
  StoryArcPlanner,
  type LayoutSelection,
  type ScoredLayout,
  type StoryArcPlannerOptions,
} from './selection/storyArcPlanner';
export {
  mapContentToPlaceholders,
  largestContentPlaceholder,
  payloadAsBullets,
} from './selection/placeholderContentMapper';
export { enforcePlanDiversity, type PlannedSection } from './selection/planDiversity';
export {
  planPresentation,
  type PresentationPlan,
  type SlidePlan,
  type PlanPresentationOptions,
} from './selection/presentationPlanner';
