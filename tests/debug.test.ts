import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fsp from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { createDebugLogger, debugEnabledFromEnv, defaultDebugLogPath } from '../bin/utils/debug'

describe('debug logger', () => {
  let root: string
  let file: string
  const now = () => new Date('2024-03-05T07:08:09.000Z')

  beforeEach(async () => {
    root = await fsp.mkdtemp(path.join(os.tmpdir(), 'bucketwalk-debug-'))
    file = path.join(root, 'logs', 'debug.log')
  })

  afterEach(async () => {
    await fsp.rm(root, { recursive: true, force: true })
  })

  it('appends timestamped lines in order', async () => {
    const logger = createDebugLogger({ enabled: true, file, now })
    logger.log('first')
    logger.log('second')
    await logger.flush()

    expect(await fsp.readFile(file, 'utf-8')).toBe(
      '[2024-03-05T07:08:09.000Z] first\n[2024-03-05T07:08:09.000Z] second\n'
    )
    expect(logger.failure).toBeUndefined()
  })

  it('creates the log readable by the owner only', async () => {
    const logger = createDebugLogger({ enabled: true, file, now })
    logger.log('x')
    await logger.flush()

    expect((await fsp.stat(file)).mode & 0o777).toBe(0o600)
  })

  it('redacts secrets before writing', async () => {
    const logger = createDebugLogger({ enabled: true, file, now })
    logger.log('aws_secret_access_key=test-secret')
    await logger.flush()

    expect(await fsp.readFile(file, 'utf-8')).toBe('[2024-03-05T07:08:09.000Z] aws_secret_access_key=[REDACTED]\n')
  })

  it('writes nothing when disabled', async () => {
    const logger = createDebugLogger({ enabled: false, file, now })
    logger.log('ignored')
    await logger.flush()

    await expect(fsp.stat(file)).rejects.toMatchObject({ code: 'ENOENT' })
  })

  it('records the first write failure', async () => {
    await fsp.writeFile(path.join(root, 'logs'), 'not a directory')
    const logger = createDebugLogger({ enabled: true, file, now })
    logger.log('x')
    await logger.flush()

    expect(logger.failure).toBeInstanceOf(Error)
  })

  it('reads the switch from the environment', () => {
    expect(debugEnabledFromEnv({ BUCKETWALK_DEBUG: 'true' })).toBe(true)
    expect(debugEnabledFromEnv({ BUCKETWALK_DEBUG: 'yes' })).toBe(false)
    expect(debugEnabledFromEnv({})).toBe(false)
  })

  it('defaults to the config folder', () => {
    expect(defaultDebugLogPath('/home/u')).toBe(path.join('/home/u', '.bucketwalk', 'debug.log'))
  })
})
