// ============================================================================
// Role Classifier - 占位符角色判定（有序规则表）
// ============================================================================

import {
  BANNER_MAX_HEIGHT,
  BANNER_MIN_ASPECT_RATIO,
  GENERIC_BODY_TYPE_IDS,
  PLACEHOLDER_TYPE,
  SUBTITLE_MAX_AREA,
  SUBTITLE_MAX_HEIGHT,
} from '../constants';
import { aspectRatioOf } from './geometry';
import type { PlaceholderRole } from '../../../shared/types/layout';

export interface RoleInput {
  typeId: number;
  width: number;
  height: number;
  area: number;
}

export interface RoleRule {
  name: string;
  matches: (input: RoleInput) => boolean;
  role: PlaceholderRole;
}

const TITLE_IDS: readonly number[] = [
  PLACEHOLDER_TYPE.TITLE,
  PLACEHOLDER_TYPE.CENTER_TITLE,
  PLACEHOLDER_TYPE.VERTICAL_TITLE,
];

const FOOTER_IDS: readonly number[] = [
  PLACEHOLDER_TYPE.DATE,
  PLACEHOLDER_TYPE.SLIDE_NUMBER,
  PLACEHOLDER_TYPE.FOOTER,
  PLACEHOLDER_TYPE.HEADER,
];

const isGenericBody = (input: RoleInput) => GENERIC_BODY_TYPE_IDS.includes(input.typeId);

/**
 * 自上而下求值，第一条命中的规则决定角色
 */
export const ROLE_RULES: readonly RoleRule[] = [
  { name: 'subtitle-type', matches: (i) => i.typeId === PLACEHOLDER_TYPE.SUBTITLE, role: 'subtitle' },
  { name: 'title-type', matches: (i) => TITLE_IDS.includes(i.typeId), role: 'title' },
  { name: 'footer-type', matches: (i) => FOOTER_IDS.includes(i.typeId), role: 'footer' },
  { name: 'chart-type', matches: (i) => i.typeId === PLACEHOLDER_TYPE.CHART, role: 'chart' },
  { name: 'table-type', matches: (i) => i.typeId === PLACEHOLDER_TYPE.TABLE, role: 'table' },
  { name: 'picture-type', matches: (i) => i.typeId === PLACEHOLDER_TYPE.PICTURE, role: 'image' },
  {
    name: 'body-short',
    matches: (i) => isGenericBody(i) && (i.height < SUBTITLE_MAX_HEIGHT || i.area < SUBTITLE_MAX_AREA),
    role: 'subtitle',
  },
  {
    name: 'body-banner',
    matches: (i) =>
      isGenericBody(i) &&
      aspectRatioOf(i.width, i.height) > BANNER_MIN_ASPECT_RATIO &&
      i.height < BANNER_MAX_HEIGHT,
    role: 'subtitle',
  },
  { name: 'body-content', matches: isGenericBody, role: 'content' },
  // 剪贴画、组织结构图、媒体及未知类型不承载正文
  { name: 'default', matches: () => true, role: 'other' },
];

export function classifyPlaceholderRole(input: RoleInput): PlaceholderRole {
  const rule = ROLE_RULES.find((r) => r.matches(input));
  return rule ? rule.role : 'other';
}

/** 内容区角色：参与分组、评分和内容映射 */
export function isContentRole(role: PlaceholderRole): boolean {
  return role === 'content' || role === 'chart' || role === 'table' || role === 'image';
}
