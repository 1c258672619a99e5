/**
 * Deprecation Monitor
 * 觀察 API 版本變化與 deprecated 連結 - 只記錄與通知，不中斷請求
 */

import type { StructuredLogger } from '../lib/logger.js';
import type { DecodedCollection } from '../types/envelope.js';

export type ApiWarning =
  | {
      kind: 'version-changed';
      previous: string;
      current: string;
    }
  | {
      kind: 'deprecated-link';
      rel: string;
      href: string;
      prompt?: string;
      source?: string;
    };

export type WarningListener = (warning: ApiWarning) => void;

export class DeprecationMonitor {
  private lastVersion: string | undefined;
  private listeners = new Set<WarningListener>();
  private logger: StructuredLogger;

  constructor(logger: StructuredLogger) {
    this.logger = logger;
  }

  /**
   * 註冊警告監聽器，回傳取消註冊函數
   */
  onWarning(listener: WarningListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getApiVersion(): string | undefined {
    return this.lastVersion;
  }

  /**
   * 檢查一個已解碼的回應
   */
  inspect(collection: DecodedCollection, source?: string): void {
    const version = collection.version;
    if (version) {
      if (this.lastVersion === undefined) {
        this.logger.info('TeamSnap API version detected', { version });
      } else if (version !== this.lastVersion) {
        this.logger.warn('TeamSnap API version changed', {
          previous: this.lastVersion,
          current: version,
        });
        this.emit({ kind: 'version-changed', previous: this.lastVersion, current: version });
      }
      this.lastVersion = version;
    }

    for (const link of collection.deprecatedLinks) {
      this.logger.warn('Deprecated endpoint advertised', {
        rel: link.rel,
        href: link.href,
        prompt: link.prompt,
        url: source,
      });
      this.emit({
        kind: 'deprecated-link',
        rel: link.rel,
        href: link.href,
        prompt: link.prompt,
        source,
      });
    }
  }

  private emit(warning: ApiWarning): void {
    for (const listener of this.listeners) {
      try {
        listener(warning);
      } catch (error) {
        // 監聽器錯誤不影響請求
        this.logger.error(
          'Warning listener failed',
          error instanceof Error ? error : new Error(String(error)),
          { kind: warning.kind }
        );
      }
    }
  }
}
