// ============================================================================
// Content Type Inferer - 载荷 → 内容类型标签
// ============================================================================

import { isIconMarked, isKpiHeadingList } from './contentPayload';
import type { ContentPayload } from '../../../shared/types/content';
import type { ContentType } from '../../../shared/types/layout';

export function inferContentType(payload: ContentPayload): ContentType {
  switch (payload.kind) {
    case 'chart':
      return 'chart';
    case 'table':
      return 'table';
    case 'icon_list':
      return 'pictogram';
    case 'comparison':
    case 'kpi_list':
      return isKpiHeadingList(payload.items) ? 'kpi_dashboard' : 'comparison';
    case 'bullets':
      if (payload.bullets.length > 0 && payload.bullets.every(isIconMarked)) {
        return 'pictogram';
      }
      return 'bullets';
  }
}
