import { describe, it, expect, beforeEach } from 'vitest'
import { ListingCache } from './listing-cache'
import { StorageError } from './errors'
import type { Entry } from './types'

function obj(name: string, parent = 'bucket/'): Entry {
  return { kind: 'object', name, key: `${parent}${name}`, size: 1 }
}

function dir(name: string, parent = 'bucket/'): Entry {
  return { kind: 'container', name, key: `${parent}${name}/` }
}

describe('ListingCache', () => {
  let cache: ListingCache

  beforeEach(() => {
    cache = new ListingCache()
  })

  it('reports NotLoaded for unknown containers', () => {
    expect(cache.get('bucket/')).toEqual({ status: 'notLoaded' })
    expect(cache.has('bucket/')).toBe(false)
  })

  it('moves from Loading to Loaded on a current-token page', () => {
    const token = cache.beginLoad('bucket/')
    expect(cache.get('bucket/')).toEqual({ status: 'loading', token })

    const applied = cache.appendPage('bucket/', token, [dir('a'), obj('b.txt')], 'next-1', true)

    expect(applied).toBe(true)
    expect(cache.get('bucket/')).toEqual({
      status: 'loaded',
      items: [dir('a'), obj('b.txt')],
      nextPageToken: 'next-1',
      hasMore: true
    })
  })

  it('discards completions carrying a superseded token', () => {
    const first = cache.beginLoad('bucket/')
    const second = cache.beginLoad('bucket/')

    expect(cache.appendPage('bucket/', first, [obj('stale')], undefined, false)).toBe(false)
    expect(cache.get('bucket/')).toEqual({ status: 'loading', token: second })

    expect(cache.appendPage('bucket/', second, [obj('fresh')], undefined, false)).toBe(true)
    expect(cache.get('bucket/')).toEqual({
      status: 'loaded',
      items: [obj('fresh')],
      nextPageToken: undefined,
      hasMore: false
    })
  })

  it('applies out-of-order completions only for the current token', () => {
    const a1 = cache.beginLoad('a/')
    const b1 = cache.beginLoad('b/')
    const a2 = cache.beginLoad('a/')

    // b completes first, then the stale a1, then a2
    expect(cache.appendPage('b/', b1, [obj('x', 'b/')], undefined, false)).toBe(true)
    expect(cache.appendPage('a/', a1, [obj('old', 'a/')], undefined, false)).toBe(false)
    expect(cache.appendPage('a/', a2, [obj('new', 'a/')], undefined, false)).toBe(true)

    const a = cache.get('a/')
    expect(a.status === 'loaded' ? a.items.map((e) => e.name) : []).toEqual(['new'])
  })

  it('never reuses a token across containers', () => {
    const tokens = [cache.beginLoad('a/'), cache.beginLoad('b/'), cache.beginLoad('a/')]
    expect(new Set(tokens).size).toBe(3)
  })

  it('appends follow-up pages in arrival order without deduplication', () => {
    const token = cache.beginLoad('bucket/')
    cache.appendPage('bucket/', token, [obj('a'), obj('b')], 'p2', true)

    const more = cache.beginLoadMore('bucket/')
    expect(more).toBeDefined()
    if (more === undefined) return

    // a page already in flight blocks a second one
    expect(cache.beginLoadMore('bucket/')).toBeUndefined()

    cache.appendPage('bucket/', more, [obj('b'), obj('c')], undefined, false)

    const state = cache.get('bucket/')
    expect(state.status).toBe('loaded')
    if (state.status !== 'loaded') return
    expect(state.items.map((e) => e.name)).toEqual(['a', 'b', 'b', 'c'])
    expect(state.hasMore).toBe(false)
    expect(state.loadingMore).toBeUndefined()
  })

  it('refuses load-more when the listing is complete or not loaded', () => {
    expect(cache.beginLoadMore('bucket/')).toBeUndefined()

    const token = cache.beginLoad('bucket/')
    expect(cache.beginLoadMore('bucket/')).toBeUndefined()

    cache.appendPage('bucket/', token, [obj('a')], undefined, false)
    expect(cache.beginLoadMore('bucket/')).toBeUndefined()
  })

  it('yields identical items when the same page sequence is replayed', () => {
    const replay = (target: ListingCache) => {
      const t = target.beginLoad('bucket/')
      target.appendPage('bucket/', t, [obj('a'), dir('d')], 'p2', true)
      const m = target.beginLoadMore('bucket/')
      if (m !== undefined) target.appendPage('bucket/', m, [obj('z')], undefined, false)
      return target.get('bucket/')
    }

    expect(replay(new ListingCache())).toEqual(replay(new ListingCache()))
  })

  it('marks the first page as failed with no items', () => {
    const token = cache.beginLoad('bucket/')
    const error = new StorageError('AccessDenied', 'denied')

    expect(cache.markFailed('bucket/', token, error)).toBe(true)
    expect(cache.get('bucket/')).toEqual({ status: 'failed', error, items: [] })
  })

  it('keeps loaded items when a follow-up page fails', () => {
    const token = cache.beginLoad('bucket/')
    cache.appendPage('bucket/', token, [obj('a')], 'p2', true)
    const more = cache.beginLoadMore('bucket/')
    if (more === undefined) throw new Error('expected a load-more token')

    const error = new StorageError('Transient', 'timeout')
    expect(cache.markFailed('bucket/', more, error)).toBe(true)
    expect(cache.get('bucket/')).toEqual({ status: 'failed', error, items: [obj('a')] })
  })

  it('ignores failures with a stale token', () => {
    const stale = cache.beginLoad('bucket/')
    const current = cache.beginLoad('bucket/')

    expect(cache.markFailed('bucket/', stale, new StorageError('Transient', 'late'))).toBe(false)
    expect(cache.isCurrent('bucket/', current)).toBe(true)
    expect(cache.isCurrent('bucket/', stale)).toBe(false)
  })

  it('resets to NotLoaded on invalidate and clear', () => {
    const t1 = cache.beginLoad('a/')
    cache.appendPage('a/', t1, [], undefined, false)
    cache.beginLoad('b/')

    cache.invalidate('a/')
    expect(cache.get('a/')).toEqual({ status: 'notLoaded' })
    expect(cache.size).toBe(1)

    cache.clear()
    expect(cache.size).toBe(0)
    expect(cache.get('b/')).toEqual({ status: 'notLoaded' })
  })

  it('discards a completion that arrives after invalidation', () => {
    const token = cache.beginLoad('bucket/')
    cache.invalidate('bucket/')

    expect(cache.appendPage('bucket/', token, [obj('late')], undefined, false)).toBe(false)
    expect(cache.get('bucket/')).toEqual({ status: 'notLoaded' })
  })
})
