/**
 * Resource Types
 * 各資源的搜尋條件與寫入欄位
 */

import type { FieldValue } from './envelope.js';

/**
 * 額外欄位（伺服器新增的欄位也能直接送出）
 */
export type ExtraFields = { [field: string]: FieldValue | undefined };

export type ResourceKind =
  | 'team'
  | 'member'
  | 'event'
  | 'assignment'
  | 'availability'
  | 'location'
  | 'opponent'
  | 'forumTopic'
  | 'forumPost'
  | 'broadcastEmail'
  | 'message';

export interface ResourceDescriptor {
  kind: ResourceKind;
  /** API 路徑（不含前後斜線） */
  path: string;
  /** 錯誤訊息與日誌用的名稱 */
  label: string;
}

// 搜尋條件

export type TeamFilters = { user_id?: number };
export type MemberFilters = { team_id?: number; user_id?: number };
export type EventFilters = { team_id?: number; started_after?: string; started_before?: string };
export type AssignmentFilters = { team_id?: number; event_id?: number; member_id?: number };
export type AvailabilityFilters = { event_id?: number; member_id?: number; team_id?: number };
export type LocationFilters = { team_id?: number };
export type OpponentFilters = { team_id?: number };
export type ForumTopicFilters = { team_id?: number };
export type ForumPostFilters = { team_id?: number; forum_topic_id?: number };
export type BroadcastEmailFilters = { team_id?: number };
export type MessageFilters = { team_id?: number; user_id?: number };

// 寫入欄位

export type MemberFields = {
  team_id: number;
  first_name: string;
  last_name: string;
  email?: string;
  phone?: string;
} & ExtraFields;

export type MemberUpdate = {
  first_name?: string;
  last_name?: string;
  email?: string;
  phone?: string;
} & ExtraFields;

export type EventFields = {
  team_id: number;
  name: string;
  /** ISO-8601，例如 2025-01-15T14:00:00Z */
  start_date: string;
  is_game?: boolean;
  location_id?: number;
  opponent_id?: number;
  notes?: string;
} & ExtraFields;

export type EventUpdate = {
  name?: string;
  start_date?: string;
  location_id?: number;
  opponent_id?: number;
  notes?: string;
} & ExtraFields;

export type AssignmentFields = {
  event_id: number;
  member_id: number;
  description: string;
} & ExtraFields;

export type AssignmentUpdate = {
  description?: string;
  member_id?: number;
} & ExtraFields;

export type LocationFields = {
  team_id: number;
  name: string;
  address?: string;
} & ExtraFields;

export type LocationUpdate = {
  name?: string;
  address?: string;
} & ExtraFields;

export const AVAILABILITY_STATUSES = ['yes', 'no', 'maybe', 'unknown'] as const;

export type AvailabilityStatus = (typeof AVAILABILITY_STATUSES)[number];

export type AvailabilityUpdate = {
  status: AvailabilityStatus;
} & ExtraFields;
