// ============================================================================
// Engine Configuration - 版式选择的可调参数
// ============================================================================
// 几何阈值不在此处：它们是固定常量，见 layout/constants.ts
// ============================================================================

import * as fs from 'fs/promises';
import { z } from 'zod';
import { ConfigError, ErrorCode } from '../errors';

// ----------------------------------------------------------------------------
// Schema
// ----------------------------------------------------------------------------

const score = z.number().finite();
const count = z.number().int().positive();

export const EngineConfigSchema = z.object({
  storyAlignment: z
    .object({
      /** 版式叙事类型与计划一致 */
      exactMatchBonus: score.default(30),
      /** 同一兼容组 */
      compatibleBonus: score.default(15),
    })
    .default({}),

  diversity: z
    .object({
      /** 统计重复使用的最近选择数 */
      recentWindow: count.default(5),
      repeatThreshold: count.default(2),
      repeatPenalty: score.nonnegative().default(20),
      /** 与前两次选择都不同 */
      freshnessBonus: score.nonnegative().default(10),
      /** 替代版式可以比原选择低多少分 */
      alternativeScoreMargin: score.nonnegative().default(12),
      recentStoryWindow: count.default(3),
      recentStoryPenalty: score.nonnegative().default(5),
      historyWindow: count.default(50),
    })
    .default({}),

  matching: z
    .object({
      /** 低于此分视为匹配失败（仍使用最高分版式） */
      minimumMeaningfulScore: score.min(0).max(200).default(40),
    })
    .default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});

// ----------------------------------------------------------------------------
// Resolution
// ----------------------------------------------------------------------------

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Apply overrides on top of the defaults
 */
export function resolveEngineConfig(overrides: unknown = {}, source = '(inline)'): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError(source, `Invalid engine config: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Read a JSON config file (CLI only; the engine itself does no I/O)
 */
export async function loadEngineConfig(configPath: string): Promise<EngineConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(configPath, `Cannot read engine config: ${configPath}`, {
      code: ErrorCode.CONFIG_PARSE,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(configPath, `Engine config is not valid JSON: ${configPath}`, {
      code: ErrorCode.CONFIG_PARSE,
      cause: error instanceof Error ? error : undefined,
    });
  }

  return resolveEngineConfig(json, configPath);
}
