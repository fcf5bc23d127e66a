/**
 * Listing Cache
 *
 * Per-container page state. Every load is tagged with a request token; a
 * completion is applied only while its token is still the current one for
 * that container, so a superseded request can finish at any time without
 * touching the state of the request that replaced it.
 */

import type { StorageError } from './errors.js';
import type { ContainerKey, Entry, ListingState, RequestToken } from './types.js';

const NOT_LOADED: ListingState = { status: 'notLoaded' };

export class ListingCache {
  private states = new Map<ContainerKey, ListingState>();
  private lastToken: RequestToken = 0;

  get(key: ContainerKey): ListingState {
    return this.states.get(key) ?? NOT_LOADED;
  }

  has(key: ContainerKey): boolean {
    return this.states.has(key);
  }

  /**
   * Start (or restart) loading the first page. Any token issued earlier for
   * this container becomes stale.
   */
  beginLoad(key: ContainerKey): RequestToken {
    const token = this.issueToken();
    this.states.set(key, { status: 'loading', token });
    return token;
  }

  /**
   * Reserve a token for the next page of a loaded container.
   * Returns undefined when there is nothing more to load or a page is already
   * in flight, so pages of one container are never requested in parallel.
   */
  beginLoadMore(key: ContainerKey): RequestToken | undefined {
    const state = this.get(key);
    if (state.status !== 'loaded') return undefined;
    if (!state.hasMore || state.nextPageToken === undefined) return undefined;
    if (state.loadingMore !== undefined) return undefined;

    const token = this.issueToken();
    this.states.set(key, { ...state, loadingMore: token });
    return token;
  }

  /**
   * Apply a fetched page. Ignored (returns false) when `token` is stale.
   */
  appendPage(
    key: ContainerKey,
    token: RequestToken,
    items: Entry[],
    nextPageToken: string | undefined,
    hasMore: boolean
  ): boolean {
    const state = this.get(key);

    if (state.status === 'loading' && state.token === token) {
      this.states.set(key, { status: 'loaded', items: [...items], nextPageToken, hasMore });
      return true;
    }

    if (state.status === 'loaded' && state.loadingMore === token) {
      this.states.set(key, {
        status: 'loaded',
        items: [...state.items, ...items],
        nextPageToken,
        hasMore
      });
      return true;
    }

    return false;
  }

  /**
   * Record a failed load. Same staleness guard as `appendPage`.
   */
  markFailed(key: ContainerKey, token: RequestToken, error: StorageError): boolean {
    const state = this.get(key);

    if (state.status === 'loading' && state.token === token) {
      this.states.set(key, { status: 'failed', error, items: [] });
      return true;
    }

    if (state.status === 'loaded' && state.loadingMore === token) {
      this.states.set(key, { status: 'failed', error, items: state.items });
      return true;
    }

    return false;
  }

  isCurrent(key: ContainerKey, token: RequestToken): boolean {
    const state = this.get(key);
    if (state.status === 'loading') return state.token === token;
    if (state.status === 'loaded') return state.loadingMore === token;
    return false;
  }

  invalidate(key: ContainerKey): void {
    this.states.delete(key);
  }

  clear(): void {
    this.states.clear();
  }

  get size(): number {
    return this.states.size;
  }

  private issueToken(): RequestToken {
    this.lastToken += 1;
    return this.lastToken;
  }
}
