/**
 * Envelope Codec
 * Collection+JSON 解碼 - 把 items 攤平成 name → value 記錄，並取出導覽連結
 */

import { z } from 'zod';
import { MalformedEnvelopeError } from './errors.js';
import type {
  DecodedCollection,
  EntityRecord,
  EnvelopeLink,
  FieldValue,
  LinkMap,
  RecordData,
  WriteTemplate,
} from '../types/envelope.js';

const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(fieldValueSchema),
    z.record(fieldValueSchema),
  ])
);

const linkSchema = z.object({
  rel: z.string(),
  href: z.string(),
  prompt: z.string().optional(),
  deprecated: z.boolean().optional(),
});

const datumSchema = z.object({
  name: z.string().min(1),
  value: fieldValueSchema.optional(),
});

const itemSchema = z.object({
  href: z.string().optional(),
  data: z.array(datumSchema),
  links: z.array(linkSchema).optional(),
});

const envelopeSchema = z.object({
  collection: z.object({
    version: z.string().optional(),
    href: z.string().optional(),
    // 逐筆交給 decodeItem 驗證，錯誤訊息才能指出是第幾筆
    items: z.array(z.unknown()).optional(),
    links: z.array(linkSchema).optional(),
  }),
});

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'unknown shape';
  const at = issue.path.length > 0 ? issue.path.join('.') : 'root';
  return `${at}: ${issue.message}`;
}

function toLinkMap(links: EnvelopeLink[] | undefined): LinkMap {
  const entries: Array<[string, string]> = [];
  const seen = new Set<string>();
  for (const link of links ?? []) {
    // 同一個 rel 出現多次時以第一個為準
    if (seen.has(link.rel)) continue;
    seen.add(link.rel);
    entries.push([link.rel, link.href]);
  }
  return Object.fromEntries(entries);
}

/**
 * 判斷 payload 是否為 Collection+JSON 回應
 */
export function isEnvelope(payload: unknown): boolean {
  return typeof payload === 'object' && payload !== null && 'collection' in payload;
}

/**
 * 解碼單筆 item
 * @throws MalformedEnvelopeError data 不是 name/value 陣列，或欄位名稱重複
 */
export function decodeItem(item: unknown): EntityRecord {
  const parsed = itemSchema.safeParse(item);
  if (!parsed.success) {
    throw new MalformedEnvelopeError(
      `Envelope item is not a list of name/value pairs (${describeIssue(parsed.error)})`
    );
  }

  const entries: Array<[string, FieldValue]> = [];
  const names = new Set<string>();
  for (const datum of parsed.data.data) {
    if (names.has(datum.name)) {
      throw new MalformedEnvelopeError(`Envelope item repeats the field "${datum.name}"`);
    }
    names.add(datum.name);
    // 有名稱但沒有 value 的欄位視為 null，未出現的欄位則維持不存在
    entries.push([datum.name, datum.value === undefined ? null : datum.value]);
  }

  // fromEntries 會把 "__proto__" 當成一般欄位
  const data: RecordData = Object.fromEntries(entries);

  const record: EntityRecord = {
    data,
    links: toLinkMap(parsed.data.links),
  };
  if (parsed.data.href !== undefined) {
    record.href = parsed.data.href;
  }
  return record;
}

/**
 * 解碼整個回應；沒有 items 時回傳空陣列
 * @throws MalformedEnvelopeError 外層不是 { collection: {...} }
 */
export function decodeCollection(payload: unknown): DecodedCollection {
  const parsed = envelopeSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MalformedEnvelopeError(
      `Response is not a Collection+JSON envelope (${describeIssue(parsed.error)})`
    );
  }

  const { collection } = parsed.data;
  const records = (collection.items ?? []).map((item, index) => {
    try {
      return decodeItem(item);
    } catch (error) {
      if (error instanceof MalformedEnvelopeError) {
        throw new MalformedEnvelopeError(`items[${index}]: ${error.message}`);
      }
      throw error;
    }
  });

  return {
    version: collection.version,
    href: collection.href,
    records,
    links: toLinkMap(collection.links),
    deprecatedLinks: (collection.links ?? []).filter((link) => link.deprecated === true),
  };
}

function isLinkList(links: LinkMap | EnvelopeLink[]): links is EnvelopeLink[] {
  return Array.isArray(links);
}

/**
 * 依 rel 取得連結；不存在時回傳 undefined（分頁結束）
 */
export function extractLink(
  source: { links: LinkMap } | { links?: EnvelopeLink[] },
  rel: string
): string | undefined {
  const { links } = source;
  if (links === undefined) return undefined;
  if (isLinkList(links)) {
    return links.find((link) => link.rel === rel)?.href;
  }
  return Object.prototype.hasOwnProperty.call(links, rel) ? links[rel] : undefined;
}

/**
 * 把欄位編碼成寫入用的 template；值為 undefined 的欄位會被略過
 */
export function encodeTemplate(fields: Record<string, FieldValue | undefined>): WriteTemplate {
  const data: WriteTemplate['template']['data'] = [];
  for (const [name, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    data.push({ name, value });
  }
  return { template: { data } };
}

/**
 * 取得訊息文字：優先使用 collection.error.message
 */
export function errorMessageFromBody(body: unknown): string | undefined {
  const parsed = z
    .object({
      collection: z.object({
        error: z.object({ message: z.string().optional(), title: z.string().optional() }),
      }),
    })
    .safeParse(body);
  if (parsed.success) {
    return parsed.data.collection.error.message ?? parsed.data.collection.error.title;
  }
  if (typeof body === 'string' && body.length > 0) {
    return body.length > 200 ? `${body.slice(0, 200)}...` : body;
  }
  return undefined;
}
