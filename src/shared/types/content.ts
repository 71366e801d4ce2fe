// ============================================================================
// Content Types - 幻灯片内容载荷与占位符映射
// ============================================================================

import { z } from 'zod';

// ----------------------------------------------------------------------------
// Payload building blocks
// ----------------------------------------------------------------------------

/** 嵌套数组表示层级要点 */
export type BulletItem = string | BulletItem[];

export const BulletItemSchema: z.ZodType<BulletItem> = z.lazy(() =>
  z.union([z.string(), z.array(BulletItemSchema)])
);

export const ChartTypeSchema = z.enum(['bar', 'bar3D', 'doughnut', 'line', 'pie']);

export const ChartDataSchema = z.object({
  chartType: ChartTypeSchema.default('bar'),
  title: z.string().optional(),
  categories: z.array(z.string()),
  series: z
    .array(
      z.object({
        name: z.string(),
        values: z.array(z.number()),
      })
    )
    .min(1),
});

export type ChartData = z.infer<typeof ChartDataSchema>;

const CellSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

export const TableDataSchema = z.object({
  headers: z.array(z.string()).min(1),
  rows: z.array(z.array(CellSchema)),
});

export type TableData = z.infer<typeof TableDataSchema>;

export const HeadedBulletsSchema = z.object({
  heading: z.string(),
  bullets: z.array(BulletItemSchema).default([]),
});

export type HeadedBullets = z.infer<typeof HeadedBulletsSchema>;

// ----------------------------------------------------------------------------
// Content Payload
// ----------------------------------------------------------------------------

export const ContentPayloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('chart'), chart: ChartDataSchema }),
  z.object({ kind: z.literal('table'), table: TableDataSchema }),
  z.object({ kind: z.literal('bullets'), bullets: z.array(BulletItemSchema) }),
  z.object({ kind: z.literal('comparison'), items: z.array(HeadedBulletsSchema).min(1) }),
  z.object({ kind: z.literal('kpi_list'), items: z.array(HeadedBulletsSchema).min(1) }),
  /** 每项形如 "[[icon-name]] caption" */
  z.object({ kind: z.literal('icon_list'), icons: z.array(z.string()).min(1) }),
]);

export type ContentPayload = z.infer<typeof ContentPayloadSchema>;
export type ContentPayloadKind = ContentPayload['kind'];

/** 解码后的单页内容 */
export interface SlideContent {
  heading: string;
  payload: ContentPayload;
  keyMessage?: string;
}

export const TaggedSlideSchema = z.object({
  heading: z.string().default(''),
  keyMessage: z.string().optional(),
  payload: ContentPayloadSchema,
});

// ----------------------------------------------------------------------------
// Loose slide JSON (heading / bullet_points / chart / table / key_message)
// ----------------------------------------------------------------------------

export const LooseHeadedBulletsSchema = z.object({
  heading: z.string(),
  bullet_points: z.array(BulletItemSchema).default([]),
});

export const LooseSlideSchema = z.object({
  heading: z.string().default(''),
  bullet_points: z
    .union([
      z.array(z.union([BulletItemSchema, LooseHeadedBulletsSchema])),
      z.string().transform((text) => [text]),
    ])
    .optional(),
  chart: ChartDataSchema.nullish(),
  table: TableDataSchema.nullish(),
  key_message: z.string().nullish(),
});

export type LooseSlide = z.infer<typeof LooseSlideSchema>;

// ----------------------------------------------------------------------------
// Placeholder mapping
// ----------------------------------------------------------------------------

export interface FlatBullet {
  text: string;
  level: number;
}

export type PlaceholderContentSpec =
  | { type: 'title'; text: string }
  | { type: 'subtitle'; text: string }
  | { type: 'bullets'; items: FlatBullet[] }
  | { type: 'chart'; data: ChartData }
  | { type: 'table'; data: TableData }
  | { type: 'icon'; icon: string; caption: string }
  | { type: 'kpi'; heading: string; items: FlatBullet[] };

export interface PlaceholderMapping {
  assignments: Record<number, PlaceholderContentSpec>;
  /** 未找到合适类别的占位符，已退化为最大内容占位符 */
  degraded: boolean;
  reason?: string;
}
