// ============================================================================
// CLI Types
// ============================================================================

/**
 * CLI 全局选项
 */
export interface CLIGlobalOptions {
  /** 日志级别，覆盖 LOG_LEVEL */
  logLevel?: string;
}

export interface AnalyzeCommandOptions {
  json?: boolean;
}

export interface PlanCommandOptions {
  config?: string;
  json?: boolean;
}
