// ============================================================================
// 统一 ID 生成器
// ============================================================================

import { v4 as uuidv4, validate as uuidValidate } from 'uuid';

/**
 * 生成一次排版运行的 ID
 * 格式: "run-" + UUID v4
 */
export function generateRunId(): string {
  return `run-${uuidv4()}`;
}

/**
 * 验证是否为 generateRunId 生成的格式
 */
export function isRunId(id: string): boolean {
  return id.startsWith('run-') && uuidValidate(id.slice('run-'.length));
}

/** 日志里用的短前缀，例如 run-1a2b3c4d */
export function shortRunId(id: string): string {
  return id.slice(0, 'run-'.length + 8);
}
