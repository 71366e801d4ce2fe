// ============================================================================
// Content Payload Decoder - 边界处一次性解码幻灯片内容
// ============================================================================
// 两种输入形态：
//   1. 带 kind 标签的 { heading, keyMessage?, payload: { kind, ... } }
//   2. 宽松形态 { heading, bullet_points, chart, table, key_message }
// ============================================================================

import type { z } from 'zod';
import { PayloadDecodeError } from '../../errors';
import {
  ContentPayloadSchema,
  LooseSlideSchema,
  TaggedSlideSchema,
  type BulletItem,
  type ContentPayload,
  type FlatBullet,
  type HeadedBullets,
  type LooseSlide,
  type SlideContent,
} from '../../../shared/types/content';

/** 4 项及以上、标题都短于 20 字符的 {heading, bullets} 列表视为 KPI 列表 */
export const KPI_MIN_ITEMS = 4;
export const KPI_MAX_HEADING_LENGTH = 20;

const ICON_MARKER = /\[\[(.*?)\]\]\s*(.*)/;

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

export function decodeContentPayload(input: unknown): ContentPayload {
  const parsed = ContentPayloadSchema.safeParse(input);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new PayloadDecodeError(`Invalid content payload: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/**
 * Decode one slide from either the tagged or the loose JSON shape
 */
export function decodeSlideContent(input: unknown): SlideContent {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new PayloadDecodeError('Slide content must be an object');
  }

  if ('payload' in input) {
    const parsed = TaggedSlideSchema.safeParse(input);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error);
      throw new PayloadDecodeError(`Invalid slide content: ${issues.join('; ')}`, { issues });
    }
    const { heading, keyMessage, payload } = parsed.data;
    return keyMessage === undefined ? { heading, payload } : { heading, payload, keyMessage };
  }

  const parsed = LooseSlideSchema.safeParse(input);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new PayloadDecodeError(`Invalid slide content: ${issues.join('; ')}`, { issues });
  }
  return fromLooseSlide(parsed.data);
}

type LooseEntry = NonNullable<LooseSlide['bullet_points']>[number];

function isHeadedEntry(entry: LooseEntry): entry is { heading: string; bullet_points: BulletItem[] } {
  return typeof entry === 'object' && !Array.isArray(entry);
}

function fromLooseSlide(slide: LooseSlide): SlideContent {
  const base = slide.key_message ? { heading: slide.heading, keyMessage: slide.key_message } : { heading: slide.heading };

  if (slide.chart) {
    return { ...base, payload: { kind: 'chart', chart: slide.chart } };
  }
  if (slide.table) {
    return { ...base, payload: { kind: 'table', table: slide.table } };
  }

  const entries = slide.bullet_points ?? [];
  const headed = entries.filter(isHeadedEntry);

  if (entries.length > 0 && headed.length === entries.length) {
    const items: HeadedBullets[] = headed.map((e) => ({ heading: e.heading, bullets: e.bullet_points }));
    return {
      ...base,
      payload: isKpiHeadingList(items) ? { kind: 'kpi_list', items } : { kind: 'comparison', items },
    };
  }

  // 混合形态：标题对象展开为 "标题 + 下一级要点"
  const bullets: BulletItem[] = [];
  for (const entry of entries) {
    if (isHeadedEntry(entry)) {
      bullets.push(entry.heading);
      if (entry.bullet_points.length > 0) bullets.push(entry.bullet_points);
    } else {
      bullets.push(entry);
    }
  }
  return { ...base, payload: { kind: 'bullets', bullets } };
}

// ----------------------------------------------------------------------------
// Helpers shared by inference, scoring and mapping
// ----------------------------------------------------------------------------

export function isKpiHeadingList(items: readonly HeadedBullets[]): boolean {
  return items.length >= KPI_MIN_ITEMS && items.every((i) => i.heading.length < KPI_MAX_HEADING_LENGTH);
}

export function isIconMarked(entry: BulletItem): entry is string {
  return typeof entry === 'string' && entry.includes('[[');
}

export interface IconEntry {
  icon: string;
  caption: string;
}

/**
 * "[[rocket]] Faster launches" → { icon: 'rocket', caption: 'Faster launches' }.
 * An entry without a marker keeps its text as the caption.
 */
export function parseIconEntry(entry: string): IconEntry {
  const match = ICON_MARKER.exec(entry);
  if (!match) {
    return { icon: '', caption: entry.trim() };
  }
  return { icon: match[1].trim(), caption: match[2].trim() };
}

/** icon_list 或全部带图标标记的要点 */
export function iconEntriesOf(payload: ContentPayload): string[] {
  if (payload.kind === 'icon_list') return payload.icons;
  if (payload.kind === 'bullets') return payload.bullets.filter(isIconMarked);
  return [];
}

export function flattenBullets(items: readonly BulletItem[], level = 0): FlatBullet[] {
  const flat: FlatBullet[] = [];
  for (const item of items) {
    if (typeof item === 'string') {
      flat.push({ text: item, level });
    } else {
      flat.push(...flattenBullets(item, level + 1));
    }
  }
  return flat;
}

/** "Slide 3: Revenue" → "Revenue" */
export function removeSlideNumberFromHeading(heading: string): string {
  return heading.replace(/^slide[ ]+\d+:/i, '').trim();
}
