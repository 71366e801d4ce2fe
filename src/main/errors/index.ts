// ============================================================================
// Errors Module - Unified error handling
// ============================================================================

// Error types
export {
  ErrorCode,
  ErrorSeverity,
  LayoutEngineError,
  AnalysisError,
  NoUsableLayoutError,
  MatchingError,
  PayloadDecodeError,
  PlannerStateError,
  ConfigError,
  type LayoutEngineErrorOptions,
  type SerializedError,
} from './types';

// Error handling utilities
export { normalizeError, logError, formatErrorForUser } from './handler';
