// ============================================================================
// Analyze Command - 分析模板版式能力
// ============================================================================

import { Command } from 'commander';
import { terminalOutput, jsonOutput } from '../output';
import { readTemplateGeometry } from '../inputs';
import { formatErrorForUser } from '../../main/errors';
import { analyzeTemplate, exportTemplateAnalysis, logAnalysisSummary } from '../../main/layout/analysis/templateAnalyzer';
import type { AnalyzeCommandOptions } from '../types';

export const analyzeCommand = new Command('analyze')
  .description('分析模板中每个版式能承载的内容')
  .argument('<template>', '模板几何 JSON 文件')
  .option('--json', 'JSON 格式输出')
  .action(async (templatePath: string, options: AnalyzeCommandOptions) => {
    try {
      const geometry = await readTemplateGeometry(templatePath);
      const analysis = analyzeTemplate(geometry);
      logAnalysisSummary(analysis);

      if (options.json) {
        jsonOutput.result(exportTemplateAnalysis(analysis));
      } else {
        terminalOutput.templateAnalysis(analysis);
      }
    } catch (error) {
      if (options.json) {
        jsonOutput.error(error);
      } else {
        terminalOutput.error(formatErrorForUser(error));
      }
      process.exitCode = 1;
    }
  });
