import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest'
import { existsSync } from 'node:fs'
import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { BrowserSession, type BrowserSessionOptions, type LocalFiles } from './browser-session'
import { StorageError } from './errors'
import type { KeyPress } from './input-machine'
import { MemoryGateway } from '../tests/helpers/memory-gateway'

const CONTENTS = {
  'photos/2024/a.jpg': 'jpg',
  'photos/notes.txt': 'hello notes',
  'photos/readme.md': '# Photos',
  'logs/app.log': 'line one\n'
}

function tempFiles(dir: string): LocalFiles {
  return {
    async resolveDownload(name) {
      const path = join(dir, name)
      return { path, exists: existsSync(path) }
    },
    async resolveUpload(source) {
      try {
        const info = await stat(source)
        return { path: source, size: info.size }
      } catch (err) {
        throw new StorageError('LocalIOError', `${source}: no such file or directory`, { cause: err })
      }
    }
  }
}

async function settle(session: BrowserSession): Promise<void> {
  for (let i = 0; i < 3; i++) {
    await new Promise((resolve) => setImmediate(resolve))
    session.applyPending()
  }
}

function keys(session: BrowserSession, ...presses: Array<string | KeyPress>): void {
  for (const press of presses) {
    session.handleKey(typeof press === 'string' ? { key: press } : press)
  }
}

function rowNames(session: BrowserSession): string[] {
  return session.frame().rows.map((row) => row.name)
}

describe('BrowserSession', () => {
  let dir: string
  let gateway: MemoryGateway
  let platform: {
    copyToClipboard: Mock<(text: string) => Promise<void>>
    openUrl: Mock<(url: string) => Promise<void>>
  }
  let log: Mock<(message: string) => void>

  function createSession(overrides: Partial<BrowserSessionOptions> = {}): BrowserSession {
    return new BrowserSession({
      gateway,
      files: tempFiles(dir),
      platform: {
        copyToClipboard: (text) => platform.copyToClipboard(text),
        openUrl: (url) => platform.openUrl(url)
      },
      region: 'eu-west-1',
      log: (message) => log(message),
      ...overrides
    })
  }

  async function openPhotos(): Promise<BrowserSession> {
    const session = createSession({ root: 'photos/' })
    session.start()
    await settle(session)
    return session
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bucketwalk-session-'))
    gateway = new MemoryGateway(CONTENTS)
    platform = { copyToClipboard: vi.fn(async (_text: string) => {}), openUrl: vi.fn(async (_url: string) => {}) }
    log = vi.fn((_message: string) => {})
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('lists buckets at the account root', async () => {
    const session = createSession()
    const frames = vi.fn()
    session.on('frame', frames)

    session.start()
    expect(session.frame().status).toEqual({ kind: 'loading' })
    await settle(session)

    const frame = session.frame()
    expect(frame.location).toBe('Buckets')
    expect(frame.rows.map((row) => row.name)).toEqual(['logs/', 'photos/'])
    expect(frame.cursor).toBe(0)
    expect(frames).toHaveBeenCalledTimes(2)
  })

  it('descends and restores the parent cursor on the way back', async () => {
    const session = createSession()
    session.start()
    await settle(session)

    keys(session, 'j', 'enter')
    expect(session.frame().breadcrumb).toEqual(['photos'])
    await settle(session)
    expect(rowNames(session)).toEqual(['2024/', 'notes.txt', 'readme.md'])

    keys(session, 'h')
    expect(session.frame().location).toBe('Buckets')
    expect(session.frame().cursor).toBe(1)
    expect(gateway.callsOf('listChildren').map((call) => call.target)).toEqual(['', 'photos/'])
  })

  it('keeps the parent intact when a child listing lands after popping', async () => {
    const session = createSession()
    session.start()
    await settle(session)

    gateway.hold('listChildren')
    keys(session, 'j', 'enter', 'h')
    expect(gateway.held).toHaveLength(1)

    const apply = vi.spyOn(session, 'apply')
    gateway.held[0].release()
    await settle(session)

    expect(apply.mock.results.map((result) => result.value)).toEqual([false])
    expect(session.frame().location).toBe('Buckets')
    expect(rowNames(session)).toEqual(['logs/', 'photos/'])
    expect(session.frame().cursor).toBe(1)

    gateway.resume('listChildren')
    keys(session, 'enter')
    expect(session.frame().status).toEqual({ kind: 'loading' })
    await settle(session)
    expect(rowNames(session)).toEqual(['2024/', 'notes.txt', 'readme.md'])
    expect(gateway.callsOf('listChildren').map((call) => call.target)).toEqual(['', 'photos/', 'photos/'])
  })

  it('drops loads still in flight when jumping back to the root', async () => {
    const session = createSession()
    session.start()
    await settle(session)
    keys(session, 'j', 'enter')
    await settle(session)

    gateway.hold('listChildren')
    keys(session, 'enter', '~')
    expect(session.frame().location).toBe('Buckets')
    expect(gateway.held).toHaveLength(1)

    const apply = vi.spyOn(session, 'apply')
    gateway.held[0].release()
    await settle(session)
    expect(apply.mock.results.map((result) => result.value)).toEqual([false])
  })

  it('does nothing on selection in an empty bucket', async () => {
    gateway = new MemoryGateway({}, { emptyBuckets: ['empty'] })
    const session = createSession({ root: 'empty/' })
    session.start()
    await settle(session)

    keys(session, 'j', 'enter', 'p')
    const frame = session.frame()
    expect(frame.rows).toEqual([])
    expect(frame.cursor).toBeUndefined()
    expect(frame.status).toEqual({ kind: 'empty', message: 'No items' })
    expect(frame.pane).toBeUndefined()
    expect(frame.notification).toEqual({ level: 'info', message: 'Select an object to preview' })
  })

  it('shows a failed listing inline and retries on reload', async () => {
    gateway.failNext('listChildren', new StorageError('AccessDenied', 'List photos/: access denied'))
    const session = await openPhotos()

    expect(session.frame().status).toMatchObject({ kind: 'error', message: 'AccessDenied: List photos/: access denied' })

    keys(session, 'r')
    await settle(session)
    expect(rowNames(session)).toEqual(['2024/', 'notes.txt', 'readme.md'])
  })

  it('loads the next page when moving past the tail', async () => {
    gateway = new MemoryGateway(CONTENTS, { pageSize: 2 })
    const session = await openPhotos()
    expect(session.frame().footer).toBe('More items available, scroll down to load')

    keys(session, 'j', 'j')
    expect(session.frame().footer).toBe('Loading more…')
    expect(session.frame().cursor).toBe(1)

    await settle(session)
    expect(rowNames(session)).toEqual(['2024/', 'notes.txt', 'readme.md'])
    expect(session.frame().footer).toBeUndefined()

    keys(session, 'j')
    expect(session.frame().cursor).toBe(2)
  })

  it('filters rows and resets the cursor', async () => {
    const session = await openPhotos()
    keys(session, 'G', '/', 'r', 'e', 'a', 'enter')

    const frame = session.frame()
    expect(rowNames(session)).toEqual(['readme.md'])
    expect(frame.cursor).toBe(0)
    expect(frame.filter).toEqual({ text: 'rea', editing: false, matches: 1 })

    keys(session, 'escape')
    expect(rowNames(session)).toHaveLength(3)
  })

  it('opens the detail pane and follows the selection', async () => {
    const session = await openPhotos()
    keys(session, 'j', 'enter')
    await settle(session)

    const pane = session.frame().pane
    expect(pane?.kind).toBe('detail')
    if (pane?.kind !== 'detail') return
    expect(pane.title).toBe('s3://photos/notes.txt')
    expect(pane.fields.find((field) => field.label === 'Size')?.value).toBe('11 B (11 bytes)')
    expect(pane.versions).toEqual(['* null  11 B  1970-01-01 00:00:00'])

    keys(session, 'j')
    expect(session.frame().pane).toMatchObject({ kind: 'detail', title: 's3://photos/readme.md', loading: true })

    keys(session, 'escape')
    expect(session.frame().pane).toBeUndefined()
  })

  it('previews the selected object', async () => {
    const session = await openPhotos()
    keys(session, 'j', 'j', 'p')
    expect(session.frame().pane).toMatchObject({ kind: 'preview', status: 'loading' })

    await settle(session)
    const pane = session.frame().pane
    expect(pane?.kind === 'preview' && pane.status).toBe('ready')
    if (pane?.kind !== 'preview') return
    expect(pane.content).toMatchObject({ kind: 'text', format: 'markdown', text: '# Photos', truncated: false })
  })

  it('downloads into the download directory', async () => {
    const session = await openPhotos()
    keys(session, 'j', 's')

    const destination = join(dir, 'notes.txt')
    await vi.waitFor(() => {
      session.applyPending()
      expect(session.frame().notification).toEqual({
        level: 'success',
        message: `Downloaded s3://photos/notes.txt to ${destination}`
      })
    })
    expect(await readFile(destination, 'utf8')).toBe('hello notes')
  })

  it('asks before overwriting an existing file', async () => {
    const destination = join(dir, 'saved.txt')
    await writeFile(destination, 'old')
    const session = await openPhotos()

    keys(session, 'j', 'S', 's', 'a', 'v', 'e', 'd', '.', 't', 'x', 't', 'enter')
    await vi.waitFor(() => {
      session.applyPending()
      expect(session.frame().dialog).toEqual({
        kind: 'confirm',
        message: `${destination} already exists. Overwrite?`
      })
    })

    keys(session, 'y')
    await vi.waitFor(() => {
      session.applyPending()
      expect(session.frame().notification?.level).toBe('success')
    })
    expect(await readFile(destination, 'utf8')).toBe('hello notes')
  })

  it('holds the overwrite question until help is closed', async () => {
    const destination = join(dir, 'saved.txt')
    await writeFile(destination, 'old')
    const session = await openPhotos()

    keys(session, 'j', 'S', 's', 'a', 'v', 'e', 'd', '.', 't', 'x', 't', 'enter', '?')
    await vi.waitFor(() => {
      session.applyPending()
      expect(session.frame().notification).toEqual({
        level: 'info',
        message: `${destination} already exists, download not started yet`
      })
    })
    expect(session.frame().dialog).toBeUndefined()

    keys(session, 'escape')
    expect(session.frame().dialog).toEqual({
      kind: 'confirm',
      message: `${destination} already exists. Overwrite?`
    })
    expect(await readFile(destination, 'utf8')).toBe('old')
  })

  it('uploads into the current prefix and reloads it', async () => {
    const source = join(dir, 'new.txt')
    await writeFile(source, 'fresh')
    const session = await openPhotos()

    session.execute({ type: 'upload', source })
    await vi.waitFor(() => {
      session.applyPending()
      expect(rowNames(session)).toContain('new.txt')
    })
    expect(session.frame().notification).toEqual({
      level: 'success',
      message: `Uploaded ${source} to s3://photos/new.txt`
    })
  })

  it('reports a missing upload source', async () => {
    const session = await openPhotos()
    const source = join(dir, 'missing.txt')

    session.execute({ type: 'upload', source })
    await vi.waitFor(() => {
      session.applyPending()
      expect(session.frame().notification).toEqual({
        level: 'error',
        message: `LocalIOError: ${source}: no such file or directory`,
        hint: 'Check free disk space and permissions on the local path.'
      })
    })
    expect(log).toHaveBeenCalledWith(`${source}: no such file or directory`)
  })

  it('refuses uploads at the account root', async () => {
    const session = createSession()
    session.start()
    await settle(session)

    session.execute({ type: 'upload', source: '/tmp/whatever' })
    expect(session.frame().notification).toEqual({ level: 'error', message: 'Open a bucket before uploading' })
  })

  it('cancels a running download', async () => {
    gateway.hold('downloadTo')
    const session = await openPhotos()
    keys(session, 'j', 's')
    await vi.waitFor(() => {
      session.applyPending()
      expect(gateway.held).toHaveLength(1)
    })
    expect(session.frame().transfers).toEqual(['Downloading s3://photos/notes.txt  0 B / 11 B (0%)'])

    keys(session, { key: 'x', ctrl: true })
    expect(session.frame().notification).toEqual({
      level: 'info',
      message: 'Cancelled download of s3://photos/notes.txt'
    })
    expect(session.frame().transfers).toEqual([])

    await settle(session)
    expect(session.frame().notification?.message).toBe('Cancelled download of s3://photos/notes.txt')
  })

  it('copies the S3 URI of the selection', async () => {
    const session = await openPhotos()
    keys(session, 'j', 'y')

    expect(platform.copyToClipboard).toHaveBeenCalledWith('s3://photos/notes.txt')
    await settle(session)
    expect(session.frame().notification).toEqual({ level: 'success', message: 'Copied s3://photos/notes.txt' })
  })

  it('copies the ETag once the detail is loaded', async () => {
    const session = await openPhotos()
    keys(session, 'j')

    session.execute({ type: 'copy', target: 'etag' })
    expect(session.frame().notification).toEqual({ level: 'error', message: 'No ETag for this entry' })
    expect(platform.copyToClipboard).not.toHaveBeenCalled()

    keys(session, 'enter')
    await settle(session)
    session.execute({ type: 'copy', target: 'etag' })
    expect(platform.copyToClipboard).toHaveBeenCalledWith('etag-11')
  })

  it('reports a console URL that cannot be opened', async () => {
    platform.openUrl.mockRejectedValue(new Error('no browser'))
    const session = await openPhotos()

    keys(session, 'x')
    expect(platform.openUrl).toHaveBeenCalledWith(
      'https://s3.console.aws.amazon.com/s3/buckets/photos?region=eu-west-1&prefix=2024/&showversions=false'
    )
    await settle(session)
    expect(session.frame().notification).toEqual({
      level: 'error',
      message: 'Could not open the browser: no browser'
    })
    expect(log).toHaveBeenCalledWith('Could not open the browser: no browser')
  })

  it('stops the loop on quit', async () => {
    const session = createSession()
    const quit = vi.fn()
    session.on('quit', quit)

    const running = session.run()
    keys(session, 'q')
    await running

    expect(quit).toHaveBeenCalledOnce()
    expect(session.isStopped).toBe(true)
  })
})
