// ============================================================================
// Capability Cache - 按模板标识缓存分析结果，同一模板只允许一个在途构建
// ============================================================================

import { createLogger } from '../../services/infra/logger';
import { analyzeTemplate } from './templateAnalyzer';
import type { TemplateAnalysis, TemplateGeometry } from '../../../shared/types/layout';

const logger = createLogger('CapabilityCache');

export type TemplateLoader = () => TemplateGeometry | Promise<TemplateGeometry>;

export class CapabilityCache {
  private analyses: Map<string, TemplateAnalysis> = new Map();
  // 正在构建中的模板（防止并发重复分析）
  private building: Map<string, Promise<TemplateAnalysis>> = new Map();

  /**
   * Return the cached analysis for a template, building it on first use.
   * Concurrent callers for the same template share one build; a failed build
   * is not cached and the next call retries.
   */
  async getOrBuild(templateId: string, loader: TemplateLoader): Promise<TemplateAnalysis> {
    const cached = this.analyses.get(templateId);
    if (cached) {
      return cached;
    }

    const inFlight = this.building.get(templateId);
    if (inFlight) {
      logger.debug(`Template ${templateId} is already being analyzed, waiting...`);
      return inFlight;
    }

    const buildPromise = this.build(templateId, loader).finally(() => {
      this.building.delete(templateId);
    });
    this.building.set(templateId, buildPromise);
    return buildPromise;
  }

  private async build(templateId: string, loader: TemplateLoader): Promise<TemplateAnalysis> {
    logger.info(`Analyzing template ${templateId}`);
    const geometry = await loader();
    const analysis = analyzeTemplate({ ...geometry, id: templateId });
    this.analyses.set(templateId, analysis);
    return analysis;
  }

  get(templateId: string): TemplateAnalysis | undefined {
    return this.analyses.get(templateId);
  }

  has(templateId: string): boolean {
    return this.analyses.has(templateId);
  }

  isBuilding(templateId: string): boolean {
    return this.building.has(templateId);
  }

  invalidate(templateId: string): boolean {
    return this.analyses.delete(templateId);
  }

  clear(): void {
    this.analyses.clear();
  }

  get size(): number {
    return this.analyses.size;
  }
}
