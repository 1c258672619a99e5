/**
 * Envelope Types
 * TeamSnap v3 回應使用 Collection+JSON 格式，此處定義線上格式與解碼後的記錄
 */

/**
 * 欄位值（JSON 值）
 */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

/**
 * 單筆記錄的欄位，保留伺服器回傳順序
 */
export type RecordData = Record<string, FieldValue>;

/**
 * 導覽連結（rel → href）
 */
export type LinkMap = Record<string, string>;

export interface EnvelopeLink {
  rel: string;
  href: string;
  prompt?: string;
  /** TeamSnap 以此標記即將移除的端點 */
  deprecated?: boolean;
}

export interface EnvelopeDatum {
  name: string;
  value?: FieldValue;
}

export interface EnvelopeItem {
  href?: string;
  data: EnvelopeDatum[];
  links?: EnvelopeLink[];
}

export interface EnvelopeError {
  title?: string;
  message?: string;
  code?: string | number;
}

export interface EnvelopeCollection {
  version?: string;
  href?: string;
  items?: EnvelopeItem[];
  links?: EnvelopeLink[];
  error?: EnvelopeError;
}

export interface Envelope {
  collection: EnvelopeCollection;
}

/**
 * 解碼後的單筆記錄
 */
export interface EntityRecord {
  data: RecordData;
  links: LinkMap;
  href?: string;
}

/**
 * 解碼後的整個回應
 */
export interface DecodedCollection {
  version?: string;
  href?: string;
  records: EntityRecord[];
  links: LinkMap;
  deprecatedLinks: EnvelopeLink[];
}

/**
 * 建立/更新請求本文
 */
export interface WriteTemplate {
  template: {
    data: Array<{ name: string; value: FieldValue }>;
  };
}
