/**
 * Local filesystem checks for the browser session: download destinations
 * stay inside the download directory, upload sources must be regular files.
 */

import * as os from 'os'
import { StorageError, toLocalIOError, type LocalFiles } from 'bucketwalk-engine'
import { resolvePath } from './config-loader'
import { SecurityValidator } from './security-validator'

export interface LocalFilesOptions {
  downloadDir: string
  /** Base for relative upload paths */
  workingDir: string
  homeDir?: string
}

function toLocalError(error: unknown, filePath: string): StorageError {
  if (error instanceof Error && !('code' in error)) {
    return new StorageError('LocalIOError', error.message, { cause: error })
  }
  return toLocalIOError(error, filePath)
}

export function createLocalFiles(options: LocalFilesOptions): LocalFiles {
  const homeDir = options.homeDir ?? os.homedir()

  return {
    async resolveDownload(name) {
      try {
        return await SecurityValidator.validateFilePathForWrite(name, options.downloadDir)
      } catch (error) {
        throw toLocalError(error, name)
      }
    },

    async resolveUpload(source) {
      const filePath = resolvePath(source, options.workingDir, homeDir)
      try {
        return await SecurityValidator.validateUploadSource(filePath, options.workingDir)
      } catch (error) {
        throw toLocalError(error, filePath)
      }
    }
  }
}
