/**
 * Security Validator Module
 *
 * Centralized validation and sanitization for:
 * - Clipboard content (ANSI escape sequences, control characters)
 * - Download destinations (directory traversal, symlinks)
 * - Upload sources (regular, readable files only)
 */

import * as path from 'path'
import * as fsp from 'fs/promises'
import { constants } from 'fs'

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

export class SecurityValidator {
  /**
   * Maximum allowed length for clipboard content
   */
  private static readonly MAX_CLIPBOARD_LENGTH = 10000

  /**
   * Sanitize text before it is put on the clipboard
   * Strips ANSI escape sequences, control characters, and limits length
   *
   * Object keys may contain any byte, so a copied key is cleaned the same
   * way as any other untrusted text.
   *
   * @example
   * SecurityValidator.sanitizeClipboard('\x1b[31mlogs/app.log\x1b[0m')
   * // Returns: 'logs/app.log'
   */
  static sanitizeClipboard(content: string): string {
    if (!content || typeof content !== 'string') {
      return ''
    }

    let sanitized = content

    // Strip ANSI color codes: \x1b[...m
    sanitized = sanitized.replace(/\x1b\[[0-9;]*m/g, '')

    // Strip terminal title sequences: \x1b]...\x07
    sanitized = sanitized.replace(/\x1b\][^\x07]*\x07/g, '')

    // Strip other terminal escape sequences
    sanitized = sanitized.replace(/\x1b\[.*?[@-Z\\-_`a-z]/g, '')

    // Strip control characters (except tab, newline, carriage return)
    sanitized = sanitized.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '')

    sanitized = sanitized.slice(0, SecurityValidator.MAX_CLIPBOARD_LENGTH)

    return sanitized.trim()
  }

  /**
   * Resolve `filePath` against `baseDir` and make sure it stays inside it
   * without passing through a symlink.
   *
   * @returns Resolved absolute path
   * @throws Error if the path is unsafe or outside baseDir
   *
   * @example
   * await SecurityValidator.validateFilePath('report.csv', '/home/u/downloads')
   * // Returns: '/home/u/downloads/report.csv'
   *
   * await SecurityValidator.validateFilePath('../.ssh/config', '/home/u/downloads')
   * // Throws: Path is outside base directory
   */
  static async validateFilePath(filePath: string, baseDir: string): Promise<string> {
    if (!filePath || typeof filePath !== 'string') {
      throw new Error('File path must be a non-empty string')
    }

    if (!baseDir || typeof baseDir !== 'string') {
      throw new Error('Base directory must be a non-empty string')
    }

    const normalizedBase = path.resolve(baseDir)
    const normalizedPath = path.resolve(normalizedBase, filePath)

    const baseDirWithSeparator = normalizedBase.endsWith(path.sep) ? normalizedBase : normalizedBase + path.sep
    if (!normalizedPath.startsWith(baseDirWithSeparator)) {
      throw new Error(`Path is outside base directory: ${normalizedPath} not in ${normalizedBase}`)
    }

    // lstat does not follow symlinks; check the target and every parent below baseDir
    let current = normalizedPath
    while (current !== normalizedBase && current.startsWith(baseDirWithSeparator)) {
      try {
        const stats = await fsp.lstat(current)
        if (stats.isSymbolicLink()) {
          throw new Error(
            current === normalizedPath
              ? 'Symlink operations not allowed'
              : 'Parent directory contains a symlink - not allowed'
          )
        }
      } catch (error) {
        if (errnoCode(error) !== 'ENOENT') {
          throw error
        }
      }
      current = path.dirname(current)
    }

    return normalizedPath
  }

  /**
   * Validate that a file path is safe for writing
   * Creates missing parent directories below baseDir
   *
   * @returns Resolved path and whether a file already exists there
   * @throws Error if the path is unsafe or the parent is not writable
   */
  static async validateFilePathForWrite(
    filePath: string,
    baseDir: string
  ): Promise<{ path: string; exists: boolean }> {
    const validatedPath = await SecurityValidator.validateFilePath(filePath, baseDir)

    const parentDir = path.dirname(validatedPath)
    await fsp.mkdir(parentDir, { recursive: true })
    try {
      await fsp.access(parentDir, constants.W_OK)
    } catch {
      throw new Error(`Parent directory is not writable: ${parentDir}`)
    }

    try {
      const stats = await fsp.stat(validatedPath)
      if (stats.isDirectory()) {
        throw new Error(`Destination is a directory: ${validatedPath}`)
      }
      return { path: validatedPath, exists: true }
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return { path: validatedPath, exists: false }
      }
      throw error
    }
  }

  /**
   * Validate that a local file can be uploaded
   *
   * @returns Resolved path and size
   * @throws Error if the file is missing, unreadable or not a regular file
   */
  static async validateUploadSource(
    filePath: string,
    workingDir: string
  ): Promise<{ path: string; size: number }> {
    if (!filePath || typeof filePath !== 'string') {
      throw new Error('File path must be a non-empty string')
    }

    const resolved = path.resolve(workingDir, filePath)
    const stats = await fsp.stat(resolved)
    if (!stats.isFile()) {
      throw new Error(`Not a regular file: ${resolved}`)
    }

    try {
      await fsp.access(resolved, constants.R_OK)
    } catch {
      throw new Error(`File is not readable: ${resolved}`)
    }

    return { path: resolved, size: stats.size }
  }
}
