// ============================================================================
// Vitest Global Setup
// ============================================================================

// 测试输出保持干净；需要看日志时用 LOG_LEVEL=debug npm test
process.env.LOG_LEVEL ??= 'silent';
