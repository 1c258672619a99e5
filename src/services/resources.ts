/**
 * Resources
 * 資源目錄 - 每種資源一組固定的操作（search / get / create / update / delete）
 */

import { MalformedEnvelopeError, ApiError } from '../lib/errors.js';
import type { HttpMethod, QueryParams } from './transport.js';
import type { DecodedCollection, EntityRecord, FieldValue } from '../types/envelope.js';
import type { ResourceDescriptor, ResourceKind } from '../types/resources.js';

export const RESOURCES = {
  team: { kind: 'team', path: 'teams', label: 'team' },
  member: { kind: 'member', path: 'members', label: 'member' },
  event: { kind: 'event', path: 'events', label: 'event' },
  assignment: { kind: 'assignment', path: 'assignments', label: 'assignment' },
  availability: { kind: 'availability', path: 'availabilities', label: 'availability' },
  location: { kind: 'location', path: 'locations', label: 'location' },
  opponent: { kind: 'opponent', path: 'opponents', label: 'opponent' },
  forumTopic: { kind: 'forumTopic', path: 'forum_topics', label: 'forum topic' },
  forumPost: { kind: 'forumPost', path: 'forum_posts', label: 'forum post' },
  broadcastEmail: { kind: 'broadcastEmail', path: 'broadcast_emails', label: 'broadcast email' },
  message: { kind: 'message', path: 'messages', label: 'message' },
} as const satisfies Record<ResourceKind, ResourceDescriptor>;

type FilterShape = Record<string, string | number | boolean | undefined>;
type FieldShape = Record<string, FieldValue | undefined>;

/**
 * 一頁搜尋結果；next() 依 `next` 連結延遲載入下一頁
 */
export class RecordPage implements Iterable<EntityRecord> {
  readonly records: EntityRecord[];
  readonly nextHref: string | undefined;
  private fetchNext: (href: string) => Promise<RecordPage>;

  constructor(
    records: EntityRecord[],
    nextHref: string | undefined,
    fetchNext: (href: string) => Promise<RecordPage>
  ) {
    this.records = records;
    this.nextHref = nextHref;
    this.fetchNext = fetchNext;
  }

  get length(): number {
    return this.records.length;
  }

  hasNext(): boolean {
    return this.nextHref !== undefined;
  }

  /**
   * 取得下一頁；沒有下一頁時回傳 null
   */
  async next(): Promise<RecordPage | null> {
    if (this.nextHref === undefined) {
      return null;
    }
    return this.fetchNext(this.nextHref);
  }

  [Symbol.iterator](): Iterator<EntityRecord> {
    return this.records[Symbol.iterator]();
  }
}

/**
 * 資源操作所需的 API 客戶端能力
 */
export interface ResourceHost {
  searchPage(path: string, query: QueryParams): Promise<RecordPage>;
  fetchCollection(path: string): Promise<DecodedCollection>;
  write(operation: string, method: HttpMethod, path: string, body?: FieldShape): Promise<DecodedCollection | null>;
}

export interface SearchAllOptions {
  /** 最多讀取頁數 (default: 50) */
  maxPages?: number;
}

/**
 * 唯讀資源：search / get
 */
export class ReadableResource<F extends FilterShape> {
  protected host: ResourceHost;
  readonly descriptor: ResourceDescriptor;

  constructor(host: ResourceHost, descriptor: ResourceDescriptor) {
    this.host = host;
    this.descriptor = descriptor;
  }

  search(filters?: F): Promise<RecordPage> {
    return this.host.searchPage(`/${this.descriptor.path}/search`, filters ?? {});
  }

  /**
   * 依序讀完所有頁面
   */
  async searchAll(filters?: F, options: SearchAllOptions = {}): Promise<EntityRecord[]> {
    const maxPages = options.maxPages ?? 50;
    const records: EntityRecord[] = [];

    let page: RecordPage | null = await this.search(filters);
    let pages = 0;
    while (page && pages < maxPages) {
      records.push(...page.records);
      pages++;
      page = pages < maxPages ? await page.next() : null;
    }
    return records;
  }

  /**
   * @throws ApiError 404 回應沒有任何 item
   */
  async get(id: number): Promise<EntityRecord> {
    const path = this.itemPath(id);
    const collection = await this.host.fetchCollection(path);
    const record = collection.records[0];
    if (!record) {
      throw new ApiError(404, `${this.descriptor.label} ${id} not found`);
    }
    return record;
  }

  protected itemPath(id: number): string {
    return `/${this.descriptor.path}/${id}`;
  }

  protected firstRecord(collection: DecodedCollection | null, operation: string): EntityRecord {
    const record = collection?.records[0];
    if (!record) {
      throw new MalformedEnvelopeError(`${operation} response did not echo the ${this.descriptor.label}`);
    }
    return record;
  }
}

/**
 * 只能更新的資源（availability）
 */
export class UpdatableResource<F extends FilterShape, U extends FieldShape> extends ReadableResource<F> {
  async update(id: number, fields: U): Promise<EntityRecord> {
    const operation = `update ${this.descriptor.label}`;
    const collection = await this.host.write(operation, 'PATCH', this.itemPath(id), fields);
    return this.firstRecord(collection, operation);
  }
}

/**
 * 完整 CRUD 資源
 */
export class WritableResource<
  F extends FilterShape,
  C extends FieldShape,
  U extends FieldShape,
> extends UpdatableResource<F, U> {
  async create(fields: C): Promise<EntityRecord> {
    const operation = `create ${this.descriptor.label}`;
    const collection = await this.host.write(operation, 'POST', `/${this.descriptor.path}`, fields);
    return this.firstRecord(collection, operation);
  }

  async delete(id: number): Promise<void> {
    await this.host.write(`delete ${this.descriptor.label}`, 'DELETE', this.itemPath(id));
  }
}
