#!/usr/bin/env node
// ============================================================================
// Layout Engine CLI - Entry Point
// ============================================================================

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { analyzeCommand } from './commands/analyze';
import { planCommand } from './commands/plan';
import type { CLIGlobalOptions } from './types';

const PackageJsonSchema = z.object({ version: z.string() });
const { version } = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8')),
);

const program = new Command();

program
  .name('layout-engine')
  .description('幻灯片模板版式分析与逐页版式选择')
  .version(version, '-v, --version', '显示版本号');

// Global options
program.option('--log-level <level>', '日志级别 (debug, info, warn, error, silent)');

// 日志级别在每次解析日志时读取，命令执行前设置即可
program.hook('preAction', (command) => {
  const { logLevel } = command.opts<CLIGlobalOptions>();
  // 终端输出为主，默认只打印 warn 以上
  process.env.LOG_LEVEL = logLevel ?? process.env.LOG_LEVEL ?? 'warn';
});

// Register commands
program.addCommand(analyzeCommand);
program.addCommand(planCommand);

// Parse and run
await program.parseAsync();
