// ============================================================================
// JSON Output - JSON 格式输出
// ============================================================================

import { normalizeError } from '../../main/errors';

/**
 * JSON 输出管理器：stdout 上只有一个 JSON 文档
 */
export class JSONOutput {
  result(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  error(error: unknown): void {
    const { name, message, code, severity, context } = normalizeError(error);
    console.log(JSON.stringify({ success: false, error: { name, message, code, severity, context } }, null, 2));
  }
}

export const jsonOutput = new JSONOutput();
