// ============================================================================
// Plan Command - 为一组幻灯片选择版式并映射占位符
// ============================================================================

import { Command } from 'commander';
import { terminalOutput, jsonOutput } from '../output';
import { readSlides, readTemplateGeometry } from '../inputs';
import { formatErrorForUser } from '../../main/errors';
import { DEFAULT_ENGINE_CONFIG, loadEngineConfig } from '../../main/config/engineConfig';
import { CapabilityCache } from '../../main/layout/analysis/capabilityCache';
import { planPresentation } from '../../main/layout/selection/presentationPlanner';
import type { PlanCommandOptions } from '../types';

export const planCommand = new Command('plan')
  .description('按叙事弧线为每页幻灯片选择版式')
  .argument('<template>', '模板几何 JSON 文件')
  .argument('<slides>', '幻灯片内容 JSON 文件')
  .option('-c, --config <file>', '引擎配置 JSON 文件')
  .option('--json', 'JSON 格式输出')
  .action(async (templatePath: string, slidesPath: string, options: PlanCommandOptions) => {
    try {
      const config = options.config ? await loadEngineConfig(options.config) : DEFAULT_ENGINE_CONFIG;
      const geometry = await readTemplateGeometry(templatePath);
      const slides = await readSlides(slidesPath);

      const cache = new CapabilityCache();
      const analysis = await cache.getOrBuild(geometry.id, () => geometry);
      const plan = planPresentation(analysis.layouts, slides, { config, templateId: analysis.templateId });

      if (options.json) {
        jsonOutput.result(plan);
      } else {
        terminalOutput.presentationPlan(plan);
        if (plan.diversityViolations.length > 0) {
          terminalOutput.warn(
            `Story type repeated 3 times at slides ${plan.diversityViolations.map((v) => v.slideIndex + 1).join(', ')}`,
          );
        }
        terminalOutput.success(`Planned ${plan.slides.length} slides (${plan.runId})`);
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
