/**
 * Fetch Orchestrator
 *
 * Issues listing and object-detail requests as background tasks and turns
 * their results into completions. Completions are applied by the main loop
 * through `apply()`; the Listing Cache token check discards anything that
 * belongs to a superseded request.
 *
 * Navigation never cancels a list request: the transport call runs to the end
 * and its completion is simply dropped if the container moved on.
 */

import { toStorageError, type StorageError } from './errors.js';
import { ListingCache } from './listing-cache.js';
import type { StorageGateway } from './storage-gateway.js';
import type {
  ContainerKey,
  DetailState,
  ListPage,
  ObjectDetail,
  ObjectPath,
  ObjectVersion,
  RequestToken
} from './types.js';

export type FetchCompletion =
  | { type: 'listPage'; key: ContainerKey; token: RequestToken; page: ListPage }
  | { type: 'listFailed'; key: ContainerKey; token: RequestToken; error: StorageError }
  | { type: 'detailLoaded'; path: ObjectPath; token: RequestToken; detail: ObjectDetail }
  | { type: 'detailFailed'; path: ObjectPath; token: RequestToken; error: StorageError };

export interface FetchOrchestratorOptions {
  /** Pause before the single retry of a throttled request */
  throttleRetryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  log?: (message: string) => void;
}

const NOT_LOADED: DetailState = { status: 'notLoaded' };

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class FetchOrchestrator {
  private details = new Map<ObjectPath, DetailState>();
  private lastDetailToken: RequestToken = 0;
  private readonly throttleRetryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: (message: string) => void;

  constructor(
    private readonly gateway: StorageGateway,
    readonly cache: ListingCache,
    private readonly post: (completion: FetchCompletion) => void,
    options: FetchOrchestratorOptions = {}
  ) {
    this.throttleRetryDelayMs = options.throttleRetryDelayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.log ?? (() => {});
  }

  /**
   * Start loading `key` if nothing is cached for it yet.
   * Returns true when a request was issued.
   */
  ensureLoaded(key: ContainerKey): boolean {
    if (this.cache.get(key).status !== 'notLoaded') return false;
    this.reload(key);
    return true;
  }

  /**
   * Discard whatever is cached for `key` and fetch its first page again.
   */
  reload(key: ContainerKey): RequestToken {
    const token = this.cache.beginLoad(key);
    void this.runList(key, token, undefined);
    return token;
  }

  /**
   * Fetch the page after the loaded tail. No-op (false) when the listing is
   * complete, not loaded yet, or a page is already in flight.
   */
  loadMore(key: ContainerKey): boolean {
    const state = this.cache.get(key);
    if (state.status !== 'loaded') return false;
    const pageToken = state.nextPageToken;

    const token = this.cache.beginLoadMore(key);
    if (token === undefined) return false;

    void this.runList(key, token, pageToken);
    return true;
  }

  detail(path: ObjectPath): DetailState {
    return this.details.get(path) ?? NOT_LOADED;
  }

  ensureDetail(path: ObjectPath): boolean {
    if (this.detail(path).status !== 'notLoaded') return false;
    this.reloadDetail(path);
    return true;
  }

  reloadDetail(path: ObjectPath): RequestToken {
    this.lastDetailToken += 1;
    const token = this.lastDetailToken;
    this.details.set(path, { status: 'loading', token });
    void this.runDetail(path, token);
    return token;
  }

  invalidateDetail(path: ObjectPath): void {
    this.details.delete(path);
  }

  clear(): void {
    this.cache.clear();
    this.details.clear();
  }

  /**
   * Apply a completion to the cache or detail map.
   * Returns false when it was stale and discarded.
   */
  apply(completion: FetchCompletion): boolean {
    switch (completion.type) {
      case 'listPage': {
        const { key, token, page } = completion;
        return this.cache.appendPage(key, token, page.items, page.nextPageToken, page.hasMore);
      }
      case 'listFailed':
        return this.cache.markFailed(completion.key, completion.token, completion.error);
      case 'detailLoaded':
        if (!this.isCurrentDetail(completion.path, completion.token)) return false;
        this.details.set(completion.path, { status: 'loaded', detail: completion.detail });
        return true;
      case 'detailFailed':
        if (!this.isCurrentDetail(completion.path, completion.token)) return false;
        this.details.set(completion.path, { status: 'failed', error: completion.error });
        return true;
    }
  }

  private isCurrentDetail(path: ObjectPath, token: RequestToken): boolean {
    const state = this.details.get(path);
    return state?.status === 'loading' && state.token === token;
  }

  private async runList(key: ContainerKey, token: RequestToken, pageToken: string | undefined): Promise<void> {
    try {
      const page = await this.retryThrottled(`list ${key}`, () =>
        this.gateway.listChildren(key, pageToken)
      );
      this.post({ type: 'listPage', key, token, page });
    } catch (err) {
      this.post({ type: 'listFailed', key, token, error: toStorageError(err, `List ${key}`) });
    }
  }

  private async runDetail(path: ObjectPath, token: RequestToken): Promise<void> {
    try {
      const metadata = await this.retryThrottled(`head ${path}`, () => this.gateway.headObject(path));

      let versions: ObjectVersion[] | StorageError;
      try {
        versions = await this.retryThrottled(`versions ${path}`, () => this.gateway.listVersions(path));
      } catch (err) {
        versions = toStorageError(err, `List versions of ${path}`);
      }

      this.post({ type: 'detailLoaded', path, token, detail: { metadata, versions } });
    } catch (err) {
      this.post({ type: 'detailFailed', path, token, error: toStorageError(err, `Head ${path}`) });
    }
  }

  /**
   * Run `request`, retrying exactly once after a pause when it is throttled.
   */
  private async retryThrottled<T>(label: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (err) {
      const error = toStorageError(err);
      if (!error.retryable) throw error;
      this.log(`[fetch] ${label} throttled, retrying in ${this.throttleRetryDelayMs}ms`);
      await this.sleep(this.throttleRetryDelayMs);
      return await request();
    }
  }
}
