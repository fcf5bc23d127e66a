import { describe, it, expect } from 'vitest'
import { StorageError } from './errors'
import { INITIAL_STATE } from './input-machine'
import type { PipelineJob } from './pipeline'
import type { Entry, ListingState } from './types'
import { breadcrumb, buildFrame, visibleEntries, type ViewSnapshot } from './view-model'

const entries: Entry[] = [
  { kind: 'container', name: 'logs', key: 'data/logs/' },
  {
    kind: 'object',
    name: 'catalog.json',
    key: 'data/catalog.json',
    size: 1536,
    lastModified: new Date('2024-03-05T07:08:09Z'),
    etag: 'abc123'
  },
  { kind: 'object', name: 'old-log.txt', key: 'data/old-log.txt', size: 12 }
]

const loaded = (extra: Partial<Extract<ListingState, { status: 'loaded' }>> = {}): ListingState => ({
  status: 'loaded',
  items: entries,
  hasMore: false,
  ...extra
})

function snapshot(overrides: Partial<ViewSnapshot> = {}): ViewSnapshot {
  return {
    stack: ['data/'],
    listing: loaded(),
    cursor: 0,
    input: INITIAL_STATE,
    pane: { kind: 'none' },
    detail: { status: 'notLoaded' },
    jobs: [],
    region: 'us-east-1',
    ...overrides
  }
}

describe('visibleEntries', () => {
  it('keeps every entry without a filter', () => {
    expect(visibleEntries(loaded(), '').map((v) => v.entry.name)).toEqual(['logs', 'catalog.json', 'old-log.txt'])
  })

  it('matches substrings case-sensitively and records the match range', () => {
    expect(visibleEntries(loaded(), 'log')).toEqual([
      { entry: entries[0], match: [0, 3] },
      { entry: entries[1], match: [4, 7] },
      { entry: entries[2], match: [4, 7] }
    ])
    expect(visibleEntries(loaded(), '-log')).toEqual([{ entry: entries[2], match: [3, 7] }])
    expect(visibleEntries(loaded(), 'LOG')).toEqual([])
  })

  it('shows items kept by a failed follow-up page', () => {
    const failed: ListingState = { status: 'failed', error: new StorageError('Transient', 'boom'), items: entries.slice(0, 1) }
    expect(visibleEntries(failed, '')).toHaveLength(1)
    expect(visibleEntries({ status: 'loading', token: 1 }, '')).toEqual([])
  })
})

describe('breadcrumb', () => {
  it('splits the current container into segments', () => {
    expect(breadcrumb(['', 'data/', 'data/logs/'])).toEqual(['data', 'logs'])
    expect(breadcrumb([''])).toEqual([])
  })
})

describe('buildFrame', () => {
  it('renders rows with sizes and the selection', () => {
    const frame = buildFrame(snapshot({ cursor: 1 }))

    expect(frame.location).toBe('s3://data/')
    expect(frame.breadcrumb).toEqual(['data'])
    expect(frame.status).toEqual({ kind: 'ready' })
    expect(frame.cursor).toBe(1)
    expect(frame.rows).toEqual([
      { name: 'logs/', isContainer: true, size: '', modified: '', selected: false, match: undefined },
      {
        name: 'catalog.json',
        isContainer: false,
        size: '1.50 KB',
        modified: '2024-03-05 07:08:09',
        selected: true,
        match: undefined
      },
      { name: 'old-log.txt', isContainer: false, size: '12 B', modified: '', selected: false, match: undefined }
    ])
  })

  it('labels the account root', () => {
    expect(buildFrame(snapshot({ stack: [''] })).location).toBe('Buckets')
  })

  it('drops a cursor past the visible rows', () => {
    const frame = buildFrame(snapshot({ cursor: 2, input: { filter: 'catalog', mode: { kind: 'browse' } } }))
    expect(frame.rows).toHaveLength(1)
    expect(frame.cursor).toBeUndefined()
    expect(frame.filter).toEqual({ text: 'catalog', editing: false, matches: 1 })
  })

  it('reports loading, empty and failed listings', () => {
    expect(buildFrame(snapshot({ listing: { status: 'loading', token: 3 } })).status).toEqual({ kind: 'loading' })
    expect(buildFrame(snapshot({ listing: loaded({ items: [] }) })).status).toEqual({ kind: 'empty', message: 'No items' })

    const filtered = buildFrame(snapshot({ input: { filter: '', mode: { kind: 'filter', text: 'zzz' } } }))
    expect(filtered.status).toEqual({ kind: 'empty', message: 'No names contain "zzz"' })
    expect(filtered.filter).toEqual({ text: 'zzz', editing: true, matches: 0 })

    const failed = buildFrame(
      snapshot({ listing: { status: 'failed', error: new StorageError('AccessDenied', 'List data/: access denied'), items: [] } })
    )
    expect(failed.status).toEqual({
      kind: 'error',
      message: 'AccessDenied: List data/: access denied',
      hint: 'Check IAM permissions, bucket policies, and whether the profile matches the target.'
    })
  })

  it('adds a footer while more pages exist', () => {
    expect(buildFrame(snapshot()).footer).toBeUndefined()
    expect(buildFrame(snapshot({ listing: loaded({ hasMore: true, nextPageToken: 't' }) })).footer).toBe(
      'More items available, scroll down to load'
    )
    expect(
      buildFrame(snapshot({ listing: loaded({ hasMore: true, nextPageToken: 't', loadingMore: 4 }) })).footer
    ).toBe('Loading more…')
  })

  it('shows object metadata and versions in the detail pane', () => {
    const frame = buildFrame(
      snapshot({
        pane: { kind: 'detail', path: 'data/catalog.json', tab: 'versions', scroll: 0 },
        detail: {
          status: 'loaded',
          detail: {
            metadata: {
              name: 'catalog.json',
              path: 'data/catalog.json',
              size: 2048,
              etag: 'abc123',
              contentType: 'application/json',
              metadata: { owner: 'ops' }
            },
            versions: [
              { versionId: 'v2', size: 2048, lastModified: new Date('2024-01-02T00:00:00Z'), isLatest: true },
              { versionId: 'v1', size: 10, isLatest: false }
            ]
          }
        }
      })
    )

    expect(frame.pane).toEqual({
      kind: 'detail',
      title: 's3://data/catalog.json',
      tab: 'versions',
      scroll: 0,
      loading: false,
      fields: [
        { label: 'Name', value: 'catalog.json' },
        { label: 'Key', value: 'data/catalog.json' },
        { label: 'Size', value: '2.00 KB (2048 bytes)' },
        { label: 'Last Modified', value: '' },
        { label: 'ETag', value: 'abc123' },
        { label: 'Content-Type', value: 'application/json' },
        { label: 'Storage Class', value: 'STANDARD' },
        { label: 'x-amz-meta-owner', value: 'ops' }
      ],
      versions: ['* v2  2.00 KB  2024-01-02 00:00:00', '  v1  10 B  ']
    })
  })

  it('keeps metadata when only the version history failed', () => {
    const frame = buildFrame(
      snapshot({
        pane: { kind: 'detail', path: 'data/old-log.txt', tab: 'detail', scroll: 0 },
        detail: {
          status: 'loaded',
          detail: {
            metadata: { name: 'old-log.txt', path: 'data/old-log.txt', size: 12, metadata: {} },
            versions: new StorageError('AccessDenied', 'versions denied')
          }
        }
      })
    )
    expect(frame.pane?.kind).toBe('detail')
    if (frame.pane?.kind !== 'detail') return
    expect(frame.pane.fields).toHaveLength(7)
    expect(frame.pane.versions).toEqual([])
    expect(frame.pane.error?.message).toBe('AccessDenied: versions denied')
  })

  it('follows the preview job', () => {
    const pane = { kind: 'preview' as const, path: 'data/catalog.json', scroll: 2 }
    const job: PipelineJob = { id: 1, kind: 'preview', target: 'data/catalog.json', status: 'running', bytes: 2048 }

    expect(buildFrame(snapshot({ pane, jobs: [job] })).pane).toEqual({
      kind: 'preview',
      title: 's3://data/catalog.json',
      scroll: 2,
      status: 'loading',
      progress: '2.00 KB'
    })

    const preview = { kind: 'text' as const, format: 'json' as const, text: '{}', truncated: false }
    const done = buildFrame(snapshot({ pane, jobs: [{ ...job, status: 'done', preview }] }))
    expect(done.pane).toEqual({ kind: 'preview', title: 's3://data/catalog.json', scroll: 2, status: 'ready', content: preview })
  })

  it('lists running transfers only', () => {
    const frame = buildFrame(
      snapshot({
        jobs: [
          { id: 1, kind: 'preview', target: 'data/a', status: 'running', bytes: 1 },
          { id: 2, kind: 'download', target: 'data/catalog.json', status: 'running', bytes: 512, totalBytes: 2048 },
          { id: 3, kind: 'upload', target: 'data/up.bin', status: 'done', bytes: 5 }
        ]
      })
    )
    expect(frame.transfers).toEqual(['Downloading s3://data/catalog.json  512 B / 2.00 KB (25%)'])
  })

  it('offers copy choices for the selected entry', () => {
    const frame = buildFrame(snapshot({ cursor: 1, input: { filter: '', mode: { kind: 'copyMenu', selected: 2 } } }))
    expect(frame.dialog).toEqual({
      kind: 'copyMenu',
      selected: 2,
      choices: [
        { target: 'key', label: 'Key', value: 'catalog.json' },
        { target: 's3Uri', label: 'S3 URI', value: 's3://data/catalog.json' },
        { target: 'objectUrl', label: 'Object URL', value: 'https://data.s3.us-east-1.amazonaws.com/catalog.json' },
        { target: 'arn', label: 'ARN', value: 'arn:aws:s3:::data/catalog.json' },
        { target: 'etag', label: 'ETag', value: 'abc123' }
      ]
    })
    expect(frame.hints).toBe('j/k select · Enter copy · Esc close')
  })

  it('prompts with the selected name as the save-as placeholder', () => {
    const frame = buildFrame(snapshot({ cursor: 1, input: { filter: '', mode: { kind: 'prompt', purpose: 'saveAs', text: '' } } }))
    expect(frame.dialog).toEqual({ kind: 'prompt', title: 'Save as', text: '', placeholder: 'catalog.json' })
  })

  it('passes the notification through', () => {
    const notification = { level: 'success' as const, message: 'Copied' }
    expect(buildFrame(snapshot({ notification })).notification).toEqual(notification)
  })
})
