// ============================================================================
// CLI Inputs - 读取已抽取的模板几何与幻灯片内容 JSON
// ============================================================================

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { LayoutEngineError, PayloadDecodeError } from '../main/errors';
import { decodeSlideContent } from '../main/layout/selection/contentPayload';
import type { TemplateGeometry } from '../shared/types/layout';
import type { SlideContent } from '../shared/types/content';

export const TemplateGeometrySchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().optional(),
  unit: z.enum(['inch', 'emu']).optional(),
  layouts: z
    .array(
      z.object({
        index: z.number().int().nonnegative(),
        name: z.string().optional(),
        // 单个占位符的校验交给分析器，坏数据只影响所在版式
        placeholders: z.array(z.unknown()).optional(),
      }),
    )
    .superRefine((layouts, ctx) => {
      const seen = new Set<number>();
      layouts.forEach((layout, i) => {
        if (seen.has(layout.index)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, 'index'],
            message: `Duplicate layout index ${layout.index}`,
          });
        }
        seen.add(layout.index);
      });
    }),
});

const SlideFileSchema = z.union([z.array(z.unknown()), z.object({ slides: z.array(z.unknown()) })]);

export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new LayoutEngineError(`Cannot read ${filePath}`, {
      cause: error instanceof Error ? error : undefined,
      recoverable: false,
    });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new LayoutEngineError(`${filePath} is not valid JSON`, {
      cause: error instanceof Error ? error : undefined,
      recoverable: false,
    });
  }
}

/**
 * Template id defaults to the file name without extension
 */
export async function readTemplateGeometry(filePath: string): Promise<TemplateGeometry> {
  const parsed = TemplateGeometrySchema.safeParse(await readJsonFile(filePath));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new PayloadDecodeError(`Invalid template geometry in ${filePath}: ${issues.join('; ')}`, { issues });
  }

  const { id, ...rest } = parsed.data;
  return { ...rest, id: id ?? path.basename(filePath, path.extname(filePath)) };
}

/**
 * Accepts a bare array of slides or { slides: [...] }
 */
export async function readSlides(filePath: string): Promise<SlideContent[]> {
  const parsed = SlideFileSchema.safeParse(await readJsonFile(filePath));
  if (!parsed.success) {
    throw new PayloadDecodeError(`${filePath} must hold an array of slides or { "slides": [...] }`);
  }

  const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.slides;
  return entries.map((entry, i) => {
    try {
      return decodeSlideContent(entry);
    } catch (error) {
      if (error instanceof PayloadDecodeError) {
        throw new PayloadDecodeError(`Slide ${i + 1}: ${error.message}`, {
          issues: error.issues,
          cause: error,
        });
      }
      throw error;
    }
  });
}
