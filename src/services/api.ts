/**
 * TeamSnap API Client
 * API 客戶端共用基底 - 認證、請求、解碼、分頁與版本監控
 */

import { ApiError, MalformedEnvelopeError } from '../lib/errors.js';
import {
  decodeCollection,
  encodeTemplate,
  errorMessageFromBody,
  extractLink,
  isEnvelope,
} from '../lib/envelope.js';
import { loggers } from '../lib/logger.js';
import type { StructuredLogger } from '../lib/logger.js';
import { DeprecationMonitor } from './deprecation-monitor.js';
import type { WarningListener } from './deprecation-monitor.js';
import { OfetchTransport } from './transport.js';
import type { HttpMethod, HttpResponse, HttpTransport, QueryParams } from './transport.js';
import {
  RESOURCES,
  ReadableResource,
  RecordPage,
  UpdatableResource,
  WritableResource,
} from './resources.js';
import type { ResourceHost } from './resources.js';
import type { TokenProvider } from '../types/auth.js';
import type {
  DecodedCollection,
  EntityRecord,
  EnvelopeLink,
  FieldValue,
} from '../types/envelope.js';
import type {
  AssignmentFields,
  AssignmentFilters,
  AssignmentUpdate,
  AvailabilityFilters,
  AvailabilityUpdate,
  BroadcastEmailFilters,
  EventFields,
  EventFilters,
  EventUpdate,
  ForumPostFilters,
  ForumTopicFilters,
  LocationFields,
  LocationFilters,
  LocationUpdate,
  MemberFields,
  MemberFilters,
  MemberUpdate,
  MessageFilters,
  OpponentFilters,
  TeamFilters,
} from '../types/resources.js';

export const API_ROOT = 'https://api.teamsnap.com/v3';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ApiClientOptions {
  tokens: TokenProvider;
  transport?: HttpTransport;
  logger?: StructuredLogger;
  apiRoot?: string;
  /** 每個請求的預設逾時（毫秒） */
  timeoutMs?: number;
  /** 是否監控版本變化與 deprecated 連結 (default: true) */
  monitorDeprecations?: boolean;
}

export interface RequestOptions {
  query?: QueryParams;
  /** 欄位會編碼成 Collection+JSON template */
  fields?: Record<string, FieldValue | undefined>;
  /** 原樣送出的 JSON 本文（與 fields 擇一） */
  body?: unknown;
  timeoutMs?: number;
  /** 不解碼，直接回傳 JSON */
  raw?: boolean;
}

export type RequestResult =
  | { kind: 'collection'; status: number; collection: DecodedCollection }
  | { kind: 'raw'; status: number; body: unknown };

interface SendOptions {
  query?: QueryParams;
  body?: unknown;
  timeoutMs?: number;
}

export abstract class BaseApiClient {
  readonly teams: ReadableResource<TeamFilters>;
  readonly members: WritableResource<MemberFilters, MemberFields, MemberUpdate>;
  readonly events: WritableResource<EventFilters, EventFields, EventUpdate>;
  readonly assignments: WritableResource<AssignmentFilters, AssignmentFields, AssignmentUpdate>;
  readonly availabilities: UpdatableResource<AvailabilityFilters, AvailabilityUpdate>;
  readonly locations: WritableResource<LocationFilters, LocationFields, LocationUpdate>;
  readonly opponents: ReadableResource<OpponentFilters>;
  readonly forumTopics: ReadableResource<ForumTopicFilters>;
  readonly forumPosts: ReadableResource<ForumPostFilters>;
  readonly broadcastEmails: ReadableResource<BroadcastEmailFilters>;
  readonly messages: ReadableResource<MessageFilters>;

  protected readonly tokens: TokenProvider;
  protected readonly logger: StructuredLogger;
  private readonly transport: HttpTransport;
  private readonly apiRoot: string;
  private readonly timeoutMs: number;
  private readonly monitor: DeprecationMonitor;
  private readonly monitorDeprecations: boolean;

  constructor(options: ApiClientOptions) {
    this.tokens = options.tokens;
    this.transport = options.transport ?? new OfetchTransport();
    this.logger = options.logger ?? loggers.api;
    this.apiRoot = (options.apiRoot ?? API_ROOT).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.monitor = new DeprecationMonitor(this.logger);
    this.monitorDeprecations = options.monitorDeprecations !== false;

    const host: ResourceHost = {
      searchPage: (path: string, query: QueryParams) => this.searchPage(path, query),
      fetchCollection: (path: string) => this.fetchCollection(path),
      write: (
        operation: string,
        method: HttpMethod,
        path: string,
        fields?: Record<string, FieldValue | undefined>
      ) => this.write(operation, method, path, fields),
    };

    this.teams = new ReadableResource(host, RESOURCES.team);
    this.members = new WritableResource(host, RESOURCES.member);
    this.events = new WritableResource(host, RESOURCES.event);
    this.assignments = new WritableResource(host, RESOURCES.assignment);
    this.availabilities = new UpdatableResource(host, RESOURCES.availability);
    this.locations = new WritableResource(host, RESOURCES.location);
    this.opponents = new ReadableResource(host, RESOURCES.opponent);
    this.forumTopics = new ReadableResource(host, RESOURCES.forumTopic);
    this.forumPosts = new ReadableResource(host, RESOURCES.forumPost);
    this.broadcastEmails = new ReadableResource(host, RESOURCES.broadcastEmail);
    this.messages = new ReadableResource(host, RESOURCES.message);
  }

  /**
   * 寫入前的檢查；助理端客戶端在此套用 Mode Gate
   */
  protected abstract beforeWrite(operation: string): void;

  /**
   * 註冊版本變化 / deprecated 連結的警告監聽器
   */
  onWarning(listener: WarningListener): () => void {
    return this.monitor.onWarning(listener);
  }

  /**
   * 取得 API 根目錄（可用的資源連結）
   */
  getRoot(): Promise<DecodedCollection> {
    return this.fetchCollection('/');
  }

  /**
   * 取得 API 版本（例如 "3.867.0"）；尚未看過任何回應時讀取根目錄
   */
  async getApiVersion(): Promise<string | undefined> {
    const known = this.monitor.getApiVersion();
    if (known) {
      return known;
    }
    const root = await this.getRoot();
    return root.version;
  }

  /**
   * 目前授權的使用者
   */
  async getMe(): Promise<EntityRecord> {
    return this.singleRecord(await this.fetchCollection('/me'), 'me');
  }

  async getUser(userId: number): Promise<EntityRecord> {
    return this.singleRecord(await this.fetchCollection(`/users/${userId}`), `user ${userId}`);
  }

  /**
   * 手動檢查某個端點的 deprecated 連結
   */
  async checkForDeprecations(path = '/'): Promise<EnvelopeLink[]> {
    const collection = await this.fetchCollection(path);
    return collection.deprecatedLinks;
  }

  /**
   * 沒有專用方法的端點使用此方法
   * 回應是 Collection+JSON 時解碼，否則（或 raw: true）原樣回傳
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<RequestResult> {
    if (method !== 'GET') {
      this.beforeWrite(`${method} ${path}`);
    }

    const body = options.fields !== undefined ? encodeTemplate(options.fields) : options.body;
    const response = await this.send(method, path, {
      query: options.query,
      body,
      timeoutMs: options.timeoutMs,
    });

    if (options.raw || !isEnvelope(response.body)) {
      return { kind: 'raw', status: response.status, body: response.body };
    }
    return {
      kind: 'collection',
      status: response.status,
      collection: this.decode(response.body, path),
    };
  }

  protected async searchPage(path: string, query: QueryParams): Promise<RecordPage> {
    const collection = await this.fetchCollection(path, query);
    return this.toPage(collection);
  }

  protected async fetchCollection(path: string, query?: QueryParams): Promise<DecodedCollection> {
    const response = await this.send('GET', path, { query });
    return this.decode(response.body, path);
  }

  /**
   * 寫入：先經過 beforeWrite，再發送請求
   * 回應沒有內容（例如 DELETE 204）時回傳 null
   */
  protected async write(
    operation: string,
    method: HttpMethod,
    path: string,
    fields?: Record<string, FieldValue | undefined>
  ): Promise<DecodedCollection | null> {
    this.beforeWrite(operation);

    const response = await this.send(method, path, {
      body: fields !== undefined ? encodeTemplate(fields) : undefined,
    });

    if (!isEnvelope(response.body)) {
      return null;
    }
    return this.decode(response.body, path);
  }

  private toPage(collection: DecodedCollection): RecordPage {
    return new RecordPage(collection.records, extractLink(collection, 'next'), async (href) => {
      const next = await this.fetchCollection(href);
      return this.toPage(next);
    });
  }

  private singleRecord(collection: DecodedCollection, label: string): EntityRecord {
    const record = collection.records[0];
    if (!record) {
      throw new ApiError(404, `${label} not found`);
    }
    return record;
  }

  private decode(body: unknown, source: string): DecodedCollection {
    const collection = decodeCollection(body);
    if (this.monitorDeprecations) {
      this.monitor.inspect(collection, source);
    }
    return collection;
  }

  /**
   * 相對路徑接在 API 根目錄後；分頁連結等絕對網址必須位於同一個根目錄下
   */
  private resolveUrl(pathOrHref: string): string {
    if (/^https?:\/\//i.test(pathOrHref)) {
      if (!pathOrHref.startsWith(`${this.apiRoot}/`) && pathOrHref !== this.apiRoot) {
        throw new MalformedEnvelopeError(`Link ${pathOrHref} points outside ${this.apiRoot}`);
      }
      return pathOrHref;
    }
    return `${this.apiRoot}/${pathOrHref.replace(/^\/+/, '')}`;
  }

  /**
   * 發送帶認證的 API 請求
   * 401 時 refresh 一次後重試；第二次 401 以 ApiError 拋出
   */
  private async send(method: HttpMethod, pathOrHref: string, options: SendOptions): Promise<HttpResponse> {
    const url = this.resolveUrl(pathOrHref);
    const requestId = this.logger.pushRequestId();
    const startTime = Date.now();

    this.logger.debug('API request started', { requestId, method, url, query: options.query });

    try {
      const token = await this.tokens.ensureValidToken();
      let response = await this.dispatch(method, url, token, options);

      if (response.status === 401) {
        this.logger.warn('Access token rejected, refreshing once', { requestId, method, url });
        const refreshed = await this.tokens.refresh();
        response = await this.dispatch(method, url, refreshed, options);
      }

      if (response.status < 200 || response.status >= 300) {
        const detail = errorMessageFromBody(response.body) ?? 'no details';
        throw new ApiError(
          response.status,
          `${method} ${pathOrHref} failed with ${response.status}: ${detail}`,
          response.body
        );
      }

      this.logger.info('API request completed', {
        requestId,
        method,
        url,
        duration: Date.now() - startTime,
        statusCode: response.status,
      });
      return response;
    } catch (error) {
      this.logger.error(
        'API request failed',
        error instanceof Error ? error : new Error(String(error)),
        {
          requestId,
          method,
          url,
          duration: Date.now() - startTime,
          statusCode: error instanceof ApiError ? error.statusCode : undefined,
        }
      );
      throw error;
    } finally {
      this.logger.popRequestId();
    }
  }

  private dispatch(
    method: HttpMethod,
    url: string,
    token: string,
    options: SendOptions
  ): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: 'application/json',
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    return this.transport.send({
      method,
      url,
      headers,
      query: options.query,
      body: options.body,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
    });
  }
}
