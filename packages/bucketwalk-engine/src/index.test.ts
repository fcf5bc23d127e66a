import { describe, it, expect } from 'vitest'
import * as engine from './index'

describe('package exports', () => {
  it('exposes the session and the S3 gateway', () => {
    expect(typeof engine.BrowserSession).toBe('function')
    expect(typeof engine.S3StorageGateway).toBe('function')
  })

  it('keeps test doubles out of the public surface', () => {
    expect(Object.keys(engine)).not.toContain('MemoryGateway')
    expect(Object.keys(engine)).not.toContain('isStorageError')
  })
})
