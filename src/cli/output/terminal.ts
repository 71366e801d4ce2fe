// ============================================================================
// Terminal Output - 终端输出格式化
// ============================================================================

import chalk from 'chalk';
import type { LayoutCapability, TemplateAnalysis } from '../../shared/types/layout';
import type { PresentationPlan, SlidePlan } from '../../main/layout/selection/presentationPlanner';
import type { PlaceholderContentSpec } from '../../shared/types/content';

/**
 * 终端输出管理器
 */
export class TerminalOutput {
  /**
   * 显示错误
   */
  error(message: string): void {
    console.error(chalk.red(`\n❌ 错误: ${message}\n`));
  }

  warn(message: string): void {
    console.log(chalk.yellow(`⚠️  ${message}`));
  }

  success(message: string): void {
    console.log(chalk.green(`\n✅ ${message}\n`));
  }

  // ========================================================================
  // analyze
  // ========================================================================

  templateAnalysis(analysis: TemplateAnalysis): void {
    console.log(chalk.cyan.bold(`\n📐 ${analysis.templateName} (${analysis.layouts.length} layouts)\n`));
    for (const layout of analysis.layouts) {
      this.layoutSummary(layout, analysis.fallbackLayoutIndices.includes(layout.index));
    }
    if (analysis.fallbackLayoutIndices.length > 0) {
      this.warn(`Fallback layouts: ${analysis.fallbackLayoutIndices.join(', ')}`);
    }
  }

  private layoutSummary(layout: LayoutCapability, isFallback: boolean): void {
    const header = `[${layout.index}] ${layout.name}`;
    console.log(isFallback ? chalk.yellow(`${header}  (fallback)`) : chalk.bold(header));
    console.log(chalk.dim(`    ${layout.layoutType} · ${layout.layoutCategory} · ${layout.semanticStoryType}`));
    console.log(`    ${layout.layoutStory}`);
    console.log(
      chalk.dim(
        `    content ${layout.contentPlaceholders.length}, subtitles ${layout.subtitlePlaceholders.length}, ` +
          `sections ${layout.semanticSections.length}` +
          (layout.kpiGrid ? `, KPI grid ${layout.kpiGrid.rows}x${layout.kpiGrid.cols}` : ''),
      ),
    );
    console.log(
      chalk.dim(
        `    complexity ${layout.complexityScore.toFixed(0)}, balance ${layout.visualBalance.toFixed(0)}, ` +
          `executive ${layout.executiveSuitability.toFixed(0)}, fill ${layout.fillDifficulty}`,
      ),
    );
    console.log(`    best for: ${chalk.green(layout.bestFor.join(', '))}\n`);
  }

  // ========================================================================
  // plan
  // ========================================================================

  presentationPlan(plan: PresentationPlan): void {
    console.log(chalk.cyan.bold(`\n🗂  ${plan.slides.length} slides (run ${plan.runId})\n`));
    for (const slide of plan.slides) {
      this.slidePlan(slide);
    }

    const distinct = new Set(plan.slides.map((s) => s.storyType)).size;
    console.log(chalk.dim(`─────────────────────────────────`));
    console.log(chalk.dim(`story types: ${distinct}, diversity violations: ${plan.diversityViolations.length}`));
    console.log(chalk.dim(`─────────────────────────────────\n`));
  }

  private slidePlan(slide: SlidePlan): void {
    const marks = [
      slide.diversityAdjusted ? chalk.magenta('↻ diversity') : '',
      slide.mapping.degraded ? chalk.yellow('⚠ degraded') : '',
    ]
      .filter(Boolean)
      .join(' ');

    console.log(
      `${chalk.bold(String(slide.slideIndex + 1).padStart(2))}. ${slide.heading || chalk.dim('(untitled)')}  ${marks}`,
    );
    console.log(
      chalk.dim(
        `    layout ${slide.layoutIndex} (${slide.layoutName}) · ${slide.contentType} · ` +
          `${slide.storyType} (wanted ${slide.preferredStoryType}) · score ${slide.score.toFixed(1)}`,
      ),
    );
    for (const [index, spec] of Object.entries(slide.mapping.assignments)) {
      console.log(chalk.dim(`      #${index} ← ${describeSpec(spec)}`));
    }
    if (slide.mapping.reason) {
      console.log(chalk.yellow(`      ${slide.mapping.reason}`));
    }
  }
}

function describeSpec(spec: PlaceholderContentSpec): string {
  switch (spec.type) {
    case 'title':
    case 'subtitle':
      return `${spec.type} "${spec.text}"`;
    case 'bullets':
      return `bullets (${spec.items.length})`;
    case 'chart':
      return `chart ${spec.data.chartType} (${spec.data.series.length} series)`;
    case 'table':
      return `table ${spec.data.headers.length}x${spec.data.rows.length}`;
    case 'icon':
      return `icon [${spec.icon}] ${spec.caption}`;
    case 'kpi':
      return `kpi "${spec.heading}"`;
  }
}

export const terminalOutput = new TerminalOutput();
