/**
 * Content detection for previews.
 *
 * Decides how the first bytes of an object are shown: as pretty-printed JSON,
 * markdown, highlighted source code, plain text, or a hex dump when the bytes
 * are not UTF-8 text. Never throws.
 */

import hljs from 'highlight.js';

import { baseName } from './container-key.js';
import { StorageError } from './errors.js';

export type TextFormat = 'json' | 'markdown' | 'code' | 'text';

export type PreviewContent =
  | {
      kind: 'text';
      format: TextFormat;
      text: string;
      /** highlight.js language id */
      language?: string;
      truncated: boolean;
    }
  | {
      kind: 'binary';
      hexDump: string;
      truncated: boolean;
      /** Why the bytes were not shown as text */
      decodeError: StorageError;
    };

const PLAIN_TEXT_EXTENSIONS = new Set(['txt', 'log', 'csv', 'tsv', 'text', 'out']);

// Candidates for auto-detection when the name says nothing
const AUTO_DETECT_LANGUAGES = [
  'json',
  'yaml',
  'xml',
  'javascript',
  'typescript',
  'python',
  'bash',
  'sql',
  'ini',
  'css',
  'go',
  'rust',
  'java',
  'ruby',
  'dockerfile'
];

const AUTO_DETECT_MIN_RELEVANCE = 5;
const AUTO_DETECT_SAMPLE = 4096;
const HEX_DUMP_LIMIT = 64 * 1024;
const BYTES_PER_ROW = 16;

function extensionOf(name: string): string {
  const idx = name.lastIndexOf('.');
  return idx > 0 ? name.slice(idx + 1).toLowerCase() : '';
}

/**
 * Canonical highlight.js id for a language name or alias.
 */
export function resolveLanguage(alias: string): string | undefined {
  if (!alias) return undefined;
  const language = hljs.getLanguage(alias);
  if (!language) return undefined;
  return hljs.listLanguages().find((id) => hljs.getLanguage(id) === language) ?? alias;
}

/**
 * Drop a multi-byte UTF-8 sequence cut off at the end of a byte prefix.
 */
export function trimIncompleteUtf8(bytes: Uint8Array): Uint8Array {
  const end = bytes.length;
  for (let i = end - 1; i >= 0 && i >= end - 4; i--) {
    const byte = bytes[i];
    if ((byte & 0xc0) === 0x80) continue; // continuation byte

    const needed =
      (byte & 0x80) === 0 ? 1
      : (byte & 0xe0) === 0xc0 ? 2
      : (byte & 0xf0) === 0xe0 ? 3
      : (byte & 0xf8) === 0xf0 ? 4
      : 1;
    return i + needed > end ? bytes.subarray(0, i) : bytes;
  }
  return bytes;
}

function toPrintable(byte: number): string {
  return byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : '.';
}

/**
 * Classic `offset  hex bytes  |ascii|` dump, 16 bytes per row.
 */
export function formatHexDump(bytes: Uint8Array, limit = HEX_DUMP_LIMIT): string {
  const rows: string[] = [];
  const shown = Math.min(bytes.length, limit);

  for (let offset = 0; offset < shown; offset += BYTES_PER_ROW) {
    const row = bytes.subarray(offset, Math.min(offset + BYTES_PER_ROW, shown));
    const hex: string[] = [];
    for (let i = 0; i < BYTES_PER_ROW; i++) {
      hex.push(i < row.length ? row[i].toString(16).padStart(2, '0') : '  ');
      if (i === 7) hex.push('');
    }
    const ascii = Array.from(row, toPrintable).join('');
    rows.push(`${offset.toString(16).padStart(8, '0')}  ${hex.join(' ')}  |${ascii}|`);
  }

  if (bytes.length > shown) {
    rows.push(`... ${bytes.length - shown} more bytes`);
  }
  return rows.join('\n');
}

function decodeUtf8(bytes: Uint8Array): string | undefined {
  if (bytes.includes(0)) return undefined;
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

function languageFromName(name: string, contentType: string | undefined): string | undefined {
  const ext = extensionOf(name);
  if (ext) return resolveLanguage(ext);

  // Extensionless names such as Dockerfile or Makefile
  const byName = resolveLanguage(name.toLowerCase());
  if (byName) return byName;

  const ct = (contentType ?? '').toLowerCase();
  if (ct.includes('json')) return 'json';
  if (ct.includes('markdown')) return 'markdown';
  if (ct.includes('yaml')) return 'yaml';
  if (ct.includes('xml')) return 'xml';
  return undefined;
}

function prettyJson(text: string): string {
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    // Truncated or malformed: show as received
    return text;
  }
}

/**
 * Classify the first bytes of an object.
 *
 * @param path - Object path, used for its file name and extension
 * @param truncated - Whether `bytes` is shorter than the object
 */
export function detectContent(
  path: string,
  bytes: Uint8Array,
  truncated: boolean,
  contentType?: string
): PreviewContent {
  const name = baseName(path);
  const text = decodeUtf8(truncated ? trimIncompleteUtf8(bytes) : bytes);

  if (text === undefined) {
    const reason = bytes.includes(0) ? 'contains NUL bytes' : 'is not valid UTF-8';
    return {
      kind: 'binary',
      hexDump: formatHexDump(bytes),
      truncated,
      decodeError: new StorageError('DecodeError', `${name} ${reason}`)
    };
  }

  const ext = extensionOf(name);
  if (text.length === 0 || PLAIN_TEXT_EXTENSIONS.has(ext)) {
    return { kind: 'text', format: 'text', text, truncated };
  }

  let language = languageFromName(name, contentType);
  if (!language) {
    const auto = hljs.highlightAuto(text.slice(0, AUTO_DETECT_SAMPLE), AUTO_DETECT_LANGUAGES);
    if (auto.language && auto.relevance >= AUTO_DETECT_MIN_RELEVANCE) {
      language = auto.language;
    }
  }

  if (language === 'json') {
    return { kind: 'text', format: 'json', text: prettyJson(text), language, truncated };
  }
  if (language === 'markdown') {
    return { kind: 'text', format: 'markdown', text, language, truncated };
  }
  if (language && language !== 'plaintext') {
    return { kind: 'text', format: 'code', text, language, truncated };
  }
  return { kind: 'text', format: 'text', text, truncated };
}
