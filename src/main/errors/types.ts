// ============================================================================
// Error Types - Layout engine error hierarchy
// ============================================================================

/**
 * Error codes for categorization and handling
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // Configuration errors (2xxx)
  CONFIG_INVALID = 2000,
  CONFIG_PARSE = 2001,

  // Template analysis errors (3xxx)
  LAYOUT_GEOMETRY_INVALID = 3000,
  LAYOUT_PLACEHOLDERS_MISSING = 3001,
  NO_USABLE_LAYOUT = 3002,
  LAYOUT_INDEX_DUPLICATE = 3003,

  // Content errors (4xxx)
  PAYLOAD_INVALID = 4000,

  // Matching errors (5xxx)
  MATCH_BELOW_THRESHOLD = 5000,
  MAPPING_DEGRADED = 5001,

  // Planner errors (6xxx)
  PLANNER_STATE_INVALID = 6000,
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Informational - can be safely ignored */
  INFO = 'info',
  /** Warning - something unexpected but recoverable */
  WARNING = 'warning',
  /** Error - operation failed but system stable */
  ERROR = 'error',
  /** Critical - nothing useful can be produced */
  CRITICAL = 'critical',
}

export interface LayoutEngineErrorOptions {
  code?: ErrorCode;
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  recoverable?: boolean;
  cause?: Error;
}

/**
 * Base error class for all layout engine errors
 */
export class LayoutEngineError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly timestamp: number;
  public readonly context?: Record<string, unknown>;
  public readonly recoverable: boolean;

  constructor(message: string, options: LayoutEngineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'LayoutEngineError';
    this.code = options.code ?? ErrorCode.UNKNOWN;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;
    this.recoverable = options.recoverable ?? true;
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      recoverable: this.recoverable,
      stack: this.stack,
    };
  }
}

export interface SerializedError {
  name: string;
  message: string;
  code: ErrorCode;
  severity: ErrorSeverity;
  timestamp: number;
  context?: Record<string, unknown>;
  recoverable: boolean;
  stack?: string;
}

// ----------------------------------------------------------------------------
// Specific Error Classes
// ----------------------------------------------------------------------------

/**
 * A single layout could not be analyzed. The analyzer replaces it with a
 * fallback capability and keeps going.
 */
export class AnalysisError extends LayoutEngineError {
  constructor(
    layoutIndex: number,
    message: string,
    options: {
      code?: ErrorCode;
      placeholderIndex?: number;
      cause?: Error;
    } = {}
  ) {
    super(message, {
      code: options.code ?? ErrorCode.LAYOUT_GEOMETRY_INVALID,
      severity: ErrorSeverity.WARNING,
      context: { layoutIndex, placeholderIndex: options.placeholderIndex },
      recoverable: true,
      cause: options.cause,
    });
    this.name = 'AnalysisError';
  }
}

/**
 * The template has no layout that can hold slide content
 */
export class NoUsableLayoutError extends LayoutEngineError {
  constructor(templateId: string, layoutCount: number) {
    super(`Template "${templateId}" has no usable content layout (${layoutCount} analyzed)`, {
      code: ErrorCode.NO_USABLE_LAYOUT,
      severity: ErrorSeverity.CRITICAL,
      context: { templateId, layoutCount },
      recoverable: false,
    });
    this.name = 'NoUsableLayoutError';
  }
}

/**
 * Layout choice or placeholder mapping fell back to a degraded result.
 * Created for logging and reporting; never thrown out of the planner.
 */
export class MatchingError extends LayoutEngineError {
  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      slideIndex?: number;
      layoutIndex?: number;
      score?: number;
    } = {}
  ) {
    super(message, {
      code: options.code ?? ErrorCode.MATCH_BELOW_THRESHOLD,
      severity: ErrorSeverity.WARNING,
      context: {
        slideIndex: options.slideIndex,
        layoutIndex: options.layoutIndex,
        score: options.score,
      },
      recoverable: true,
    });
    this.name = 'MatchingError';
  }
}

/**
 * Slide content that matches no known payload shape
 */
export class PayloadDecodeError extends LayoutEngineError {
  public readonly issues: string[];

  constructor(message: string, options: { issues?: string[]; cause?: Error } = {}) {
    super(message, {
      code: ErrorCode.PAYLOAD_INVALID,
      context: { issues: options.issues },
      recoverable: false,
      cause: options.cause,
    });
    this.name = 'PayloadDecodeError';
    this.issues = options.issues ?? [];
  }
}

/**
 * A sequence state was used out of order (e.g. selecting after the last slide)
 */
export class PlannerStateError extends LayoutEngineError {
  constructor(runId: string, message: string) {
    super(message, {
      code: ErrorCode.PLANNER_STATE_INVALID,
      context: { runId },
      recoverable: false,
    });
    this.name = 'PlannerStateError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends LayoutEngineError {
  constructor(
    configPath: string,
    message: string,
    options: {
      code?: ErrorCode;
      cause?: Error;
    } = {}
  ) {
    super(message, {
      code: options.code ?? ErrorCode.CONFIG_INVALID,
      context: { configPath },
      recoverable: false,
      cause: options.cause,
    });
    this.name = 'ConfigError';
  }
}
