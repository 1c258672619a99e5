/**
 * Tool Rendering
 * 把解碼後的記錄轉成助理可讀的文字
 */

import { isTeamSnapError } from '../lib/errors.js';
import type { EntityRecord, FieldValue } from '../types/envelope.js';
import type { AvailabilityStatus } from '../types/resources.js';

const NOTES_PREVIEW_LENGTH = 60;

/**
 * 欄位值轉文字；缺少、null 或空字串時使用 fallback
 */
export function display(value: FieldValue | undefined, fallback = 'N/A'): string {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

function isPresent(value: FieldValue | undefined): boolean {
  return value !== undefined && value !== null && value !== '' && value !== false;
}

function memberName(data: EntityRecord['data']): string {
  const first = display(data.first_name, '');
  const last = display(data.last_name, '');
  const name = `${first} ${last}`.trim();
  return name || 'Unnamed Member';
}

function eventType(data: EntityRecord['data']): string {
  return data.is_game === true ? 'Game' : 'Practice/Event';
}

function preview(text: string): string {
  return text.length > NOTES_PREVIEW_LENGTH ? `${text.slice(0, NOTES_PREVIEW_LENGTH)}...` : text;
}

// 讀取工具

export function renderTeams(records: EntityRecord[]): string {
  if (records.length === 0) {
    return 'No teams found.';
  }

  const lines = [`Found ${records.length} team(s):`, ''];
  for (const { data } of records) {
    lines.push(
      `**${display(data.name, 'Unnamed Team')}** (ID: ${display(data.id)})`,
      `  - Sport: ${display(data.sport_name)}`,
      `  - Season: ${display(data.season_name)}`,
      `  - Division: ${display(data.division_name)}`,
      `  - Location: ${display(data.location_country)}`,
      ''
    );
  }
  return lines.join('\n');
}

export function renderTeam({ data }: EntityRecord): string {
  return [
    `**Team: ${display(data.name, 'Unnamed')}**`,
    '',
    `ID: ${display(data.id)}`,
    `Sport: ${display(data.sport_name)}`,
    `Season: ${display(data.season_name)}`,
    `Division: ${display(data.division_name)}`,
    `Location: ${display(data.location_country)}`,
    `Time Zone: ${display(data.time_zone)}`,
  ].join('\n');
}

export function renderEvents(teamId: number, records: EntityRecord[]): string {
  if (records.length === 0) {
    return `No events found for team ${teamId}.`;
  }

  const lines = [`Found ${records.length} event(s) for team ${teamId}:`, ''];
  for (const { data } of records) {
    lines.push(
      `**${display(data.name, 'Unnamed Event')}** (ID: ${display(data.id)})`,
      `  - Type: ${eventType(data)}`,
      `  - Start: ${display(data.start_date)}`,
      `  - Location: ${display(data.location_name, 'TBD')}`
    );
    if (isPresent(data.opponent_name)) {
      lines.push(`  - Opponent: ${display(data.opponent_name)}`);
    }
    if (isPresent(data.notes)) {
      lines.push(`  - Notes: ${preview(display(data.notes))}`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

export function renderEvent({ data }: EntityRecord): string {
  const lines = [
    `**Event: ${display(data.name, 'Unnamed')}**`,
    '',
    `ID: ${display(data.id)}`,
    `Type: ${eventType(data)}`,
    `Start: ${display(data.start_date)}`,
    `End: ${display(data.end_date)}`,
    `Location: ${display(data.location_name, 'TBD')}`,
  ];
  if (isPresent(data.opponent_name)) {
    lines.push(`Opponent: ${display(data.opponent_name)}`);
  }
  if (isPresent(data.notes)) {
    lines.push('', 'Notes:', display(data.notes));
  }
  return lines.join('\n');
}

export function renderMembers(teamId: number, records: EntityRecord[]): string {
  if (records.length === 0) {
    return `No members found for team ${teamId}.`;
  }

  const lines = [`Found ${records.length} member(s) in team ${teamId}:`, ''];
  for (const { data } of records) {
    lines.push(`**${memberName(data)}** (ID: ${display(data.id)})`);
    if (isPresent(data.email)) {
      lines.push(`  - Email: ${display(data.email)}`);
    }
    if (isPresent(data.phone)) {
      lines.push(`  - Phone: ${display(data.phone)}`);
    }
    lines.push(
      `  - Is Manager: ${data.is_manager === true ? 'yes' : 'no'}`,
      `  - Is Non Player: ${data.is_non_player === true ? 'yes' : 'no'}`,
      ''
    );
  }
  return lines.join('\n');
}

/**
 * status_code：1 = yes、0 = no、2 = maybe，其他（含 null）視為未回覆
 */
export function normalizeAvailability(value: FieldValue | undefined): AvailabilityStatus {
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : value;
  if (normalized === 1 || normalized === '1' || normalized === 'yes') return 'yes';
  if (normalized === 0 || normalized === '0' || normalized === 'no') return 'no';
  if (normalized === 2 || normalized === '2' || normalized === 'maybe') return 'maybe';
  return 'unknown';
}

const AVAILABILITY_SECTIONS: Array<{ status: AvailabilityStatus; heading: string }> = [
  { status: 'yes', heading: '✅ Available' },
  { status: 'no', heading: '❌ Not Available' },
  { status: 'maybe', heading: '❓ Maybe' },
  { status: 'unknown', heading: '⚪ No Response' },
];

export function renderAvailability(eventId: number, records: EntityRecord[]): string {
  if (records.length === 0) {
    return `No availability responses for event ${eventId}.`;
  }

  const byStatus: Record<AvailabilityStatus, string[]> = { yes: [], no: [], maybe: [], unknown: [] };
  for (const { data } of records) {
    byStatus[normalizeAvailability(data.status_code)].push(display(data.member_name, 'Unknown Member'));
  }

  const lines = [`Availability for event ${eventId}:`, ''];
  for (const { status, heading } of AVAILABILITY_SECTIONS) {
    const names = byStatus[status];
    lines.push(`${heading} (${names.length}):`, ...names.map((name) => `  - ${name}`), '');
  }
  return lines.join('\n').trimEnd();
}

export function renderAssignments(eventId: number, records: EntityRecord[]): string {
  if (records.length === 0) {
    return `No assignments found for event ${eventId}.`;
  }

  const lines = [`Found ${records.length} assignment(s) for event ${eventId}:`, ''];
  for (const { data } of records) {
    lines.push(
      `**${display(data.description, 'Unnamed Assignment')}** (ID: ${display(data.id)})`,
      `  - Assigned to: ${display(data.member_name)}`,
      ''
    );
  }
  return lines.join('\n');
}

export function renderLocations(teamId: number, records: EntityRecord[]): string {
  if (records.length === 0) {
    return `No locations found for team ${teamId}.`;
  }

  const lines = [`Found ${records.length} location(s) for team ${teamId}:`, ''];
  for (const { data } of records) {
    lines.push(`**${display(data.name, 'Unnamed Location')}** (ID: ${display(data.id)})`);
    if (isPresent(data.address)) {
      lines.push(`  - Address: ${display(data.address)}`);
    }
    if (isPresent(data.url)) {
      lines.push(`  - URL: ${display(data.url)}`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

export function renderOpponents(teamId: number, records: EntityRecord[]): string {
  if (records.length === 0) {
    return `No opponents found for team ${teamId}.`;
  }

  const lines = [`Found ${records.length} opponent(s) for team ${teamId}:`, ''];
  for (const { data } of records) {
    lines.push(`**${display(data.name, 'Unnamed Opponent')}** (ID: ${display(data.id)})`);
    if (isPresent(data.contacts_name)) {
      lines.push(`  - Contact: ${display(data.contacts_name)}`);
    }
    if (isPresent(data.notes)) {
      lines.push(`  - Notes: ${preview(display(data.notes))}`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

// 寫入工具

/**
 * 更新成功後列出送出的欄位
 */
export function renderUpdated(label: string, id: number, fields: Record<string, FieldValue | undefined>): string {
  const lines = [`✅ Successfully updated ${label} ${id}`, '', 'Updated fields:'];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    lines.push(`  - ${key}: ${display(value)}`);
  }
  return lines.join('\n');
}

/**
 * 錯誤訊息：一行訊息加上補救提示，不輸出堆疊
 */
export function renderError(error: unknown): string {
  if (isTeamSnapError(error)) {
    return `❌ ${error.message}\n\nHint: ${error.hint}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `❌ ${message}`;
}
