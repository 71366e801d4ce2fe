// ============================================================================
// slide-layout-engine public API
// ============================================================================

export * from './main/layout';
export * from './main/errors';
export {
  EngineConfigSchema,
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  loadEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
} from './main/config/engineConfig';
export { createLogger, Logger, LogLevel } from './main/services/infra/logger';
export type * from './shared/types/layout';
export type {
  BulletItem,
  ChartData,
  TableData,
  HeadedBullets,
  ContentPayload,
  ContentPayloadKind,
  SlideContent,
  FlatBullet,
  PlaceholderContentSpec,
  PlaceholderMapping,
} from './shared/types/content';
export { ContentPayloadSchema } from './shared/types/content';
