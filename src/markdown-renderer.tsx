import { marked, type Token, type Tokens } from 'marked';
import hljs from 'highlight.js';
import React from 'react';
import { Box, Text } from 'ink';
import type { PreviewContent } from 'bucketwalk-engine';

/**
 * A run of identically styled text within one terminal line
 */
export interface Segment {
  text: string;
  color?: string;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
}

export type StyledLine = Segment[];

type SegmentStyle = Omit<Segment, 'text'>;

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&#x27;': "'"
};

export function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39|#x27);/g, (entity) => ENTITIES[entity] ?? entity);
}

function isToken<T extends Token>(token: Token, type: T['type']): token is T {
  return token.type === type;
}

/**
 * Map highlight.js token classes to terminal colors
 */
function getColorForClass(className: string): string | undefined {
  if (className.includes('keyword')) return 'magenta';
  if (className.includes('string')) return 'green';
  if (className.includes('number')) return 'cyan';
  if (className.includes('literal')) return 'cyan';
  if (className.includes('comment')) return 'gray';
  if (className.includes('function')) return 'blue';
  if (className.includes('title')) return 'blue';
  if (className.includes('class')) return 'yellow';
  if (className.includes('type')) return 'yellow';
  if (className.includes('variable')) return 'cyan';
  if (className.includes('operator')) return 'magenta';
  if (className.includes('punctuation')) return 'white';
  if (className.includes('property')) return 'cyan';
  if (className.includes('tag')) return 'blue';
  if (className.includes('attr')) return 'cyan';
  if (className.includes('meta')) return 'gray';

  return undefined;
}

/**
 * Break segments at newlines into terminal lines.
 */
function splitLines(segments: Segment[]): StyledLine[] {
  const lines: StyledLine[] = [[]];
  for (const segment of segments) {
    const parts = segment.text.split('\n');
    parts.forEach((part, i) => {
      if (i > 0) lines.push([]);
      if (part) lines[lines.length - 1].push({ ...segment, text: part });
    });
  }
  return lines;
}

/**
 * Syntax highlight code for terminal display, one styled line per source line.
 * Unknown languages are shown uncolored.
 */
export function highlightCode(code: string, lang?: string): StyledLine[] {
  const language = lang && hljs.getLanguage(lang) ? lang : 'plaintext';
  let html: string;
  try {
    html = hljs.highlight(code, { language, ignoreIllegals: true }).value;
  } catch {
    return plainLines(code);
  }

  // highlight.js nests spans (e.g. a string inside a template literal)
  const segments: Segment[] = [];
  const colors: Array<string | undefined> = [];
  const pattern = /<span class="([^"]+)">|<\/span>|([^<]+)/g;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(html)) !== null) {
    if (match[1] !== undefined) {
      colors.push(getColorForClass(match[1]) ?? colors[colors.length - 1]);
    } else if (match[2] !== undefined) {
      const color = colors[colors.length - 1];
      const text = decodeEntities(match[2]);
      segments.push(color ? { text, color } : { text });
    } else {
      colors.pop();
    }
  }

  return splitLines(segments);
}

export function codeLines(code: string, lang?: string): StyledLine[] {
  return highlightCode(code.replace(/\n$/, ''), lang);
}

export function plainLines(text: string): StyledLine[] {
  return text.split('\n').map((line) => (line ? [{ text: line }] : []));
}

function inlineSegments(tokens: Token[], style: SegmentStyle): Segment[] {
  const segments: Segment[] = [];

  for (const token of tokens) {
    if (isToken<Tokens.Strong>(token, 'strong')) {
      segments.push(...inlineSegments(token.tokens, { ...style, bold: true }));
    } else if (isToken<Tokens.Em>(token, 'em')) {
      segments.push(...inlineSegments(token.tokens, { ...style, italic: true }));
    } else if (isToken<Tokens.Del>(token, 'del')) {
      segments.push(...inlineSegments(token.tokens, { ...style, color: 'gray' }));
    } else if (isToken<Tokens.Codespan>(token, 'codespan')) {
      segments.push({ ...style, text: decodeEntities(token.text), color: 'yellow' });
    } else if (isToken<Tokens.Link>(token, 'link')) {
      segments.push(...inlineSegments(token.tokens, { ...style, color: 'blue', underline: true }));
    } else if (isToken<Tokens.Image>(token, 'image')) {
      segments.push({ ...style, text: `[image: ${decodeEntities(token.text)}]`, color: 'gray' });
    } else if (isToken<Tokens.Br>(token, 'br')) {
      segments.push({ ...style, text: '\n' });
    } else if (isToken<Tokens.Text>(token, 'text')) {
      if (token.tokens) {
        segments.push(...inlineSegments(token.tokens, style));
      } else {
        segments.push({ ...style, text: decodeEntities(token.text) });
      }
    } else if (isToken<Tokens.Escape>(token, 'escape')) {
      segments.push({ ...style, text: decodeEntities(token.text) });
    } else {
      segments.push({ ...style, text: token.raw });
    }
  }

  return segments;
}

function indentLines(lines: StyledLine[], first: Segment, rest: Segment): StyledLine[] {
  return lines.map((line, i) => [i === 0 ? first : rest, ...line]);
}

function listLines(list: Tokens.List): StyledLine[] {
  const lines: StyledLine[] = [];
  const start = typeof list.start === 'number' ? list.start : 1;

  list.items.forEach((item, i) => {
    const bullet = list.ordered ? `${start + i}. ` : '• ';
    const marker = item.task ? `[${item.checked ? 'x' : ' '}] ` : '';
    const body = item.tokens.flatMap((token) => blockLines(token));
    const itemLines = body.length > 0 ? body : [[]];
    lines.push(
      ...indentLines(
        itemLines,
        { text: bullet + marker, color: 'yellow' },
        { text: ' '.repeat(bullet.length) }
      )
    );
  });

  return lines;
}

function tableLines(table: Tokens.Table): StyledLine[] {
  const widths = table.header.map((cell, col) =>
    Math.max(
      decodeEntities(cell.text).length,
      ...table.rows.map((row) => decodeEntities(row[col]?.text ?? '').length)
    )
  );
  const formatRow = (cells: Tokens.TableCell[]) =>
    cells.map((cell, col) => decodeEntities(cell.text).padEnd(widths[col] ?? 0)).join(' │ ');

  return [
    [{ text: formatRow(table.header), bold: true }],
    [{ text: widths.map((w) => '─'.repeat(w)).join('─┼─'), color: 'gray' }],
    ...table.rows.map((row) => [{ text: formatRow(row) }])
  ];
}

/**
 * Lines of one block token. Tight list items carry their text as block-level
 * text tokens with inline children.
 */
function blockLines(token: Token): StyledLine[] {
  if (isToken<Tokens.Heading>(token, 'heading')) {
    const prefix: Segment = { text: '#'.repeat(token.depth) + ' ', color: 'cyan', bold: true };
    return indentLines(
      splitLines(inlineSegments(token.tokens, { color: 'cyan', bold: true })),
      prefix,
      { text: '' }
    );
  }
  if (isToken<Tokens.Code>(token, 'code')) {
    const fence: Segment = { text: '```' + (token.lang ?? ''), color: 'gray' };
    return [[fence], ...codeLines(token.text, token.lang), [{ text: '```', color: 'gray' }]];
  }
  if (isToken<Tokens.Blockquote>(token, 'blockquote')) {
    const inner = token.tokens.flatMap((child) => blockLines(child));
    const bar: Segment = { text: '│ ', color: 'gray' };
    return indentLines(inner, bar, bar);
  }
  if (isToken<Tokens.List>(token, 'list')) {
    return listLines(token);
  }
  if (isToken<Tokens.Table>(token, 'table')) {
    return tableLines(token);
  }
  if (isToken<Tokens.Paragraph>(token, 'paragraph')) {
    return splitLines(inlineSegments(token.tokens, {}));
  }
  if (isToken<Tokens.Text>(token, 'text')) {
    return splitLines(token.tokens ? inlineSegments(token.tokens, {}) : [{ text: decodeEntities(token.text) }]);
  }
  if (isToken<Tokens.Hr>(token, 'hr')) {
    return [[{ text: '─'.repeat(40), color: 'gray' }]];
  }
  if (isToken<Tokens.Space>(token, 'space')) {
    return [];
  }
  return plainLines(token.raw.replace(/\n+$/, ''));
}

/**
 * Render markdown into styled terminal lines, blocks separated by a blank line.
 */
export function markdownLines(content: string): StyledLine[] {
  let tokens: Token[];
  try {
    tokens = marked.lexer(content);
  } catch {
    return plainLines(content);
  }

  const lines: StyledLine[] = [];
  for (const token of tokens) {
    const block = blockLines(token);
    if (block.length === 0) continue;
    if (lines.length > 0) lines.push([]);
    lines.push(...block);
  }
  return lines;
}

function textLines(content: Extract<PreviewContent, { kind: 'text' }>): StyledLine[] {
  switch (content.format) {
    case 'json':
      return codeLines(content.text, 'json');
    case 'markdown':
      return markdownLines(content.text);
    case 'code':
      return codeLines(content.text, content.language);
    case 'text':
      return plainLines(content.text);
  }
}

/**
 * Styled lines for a preview pane.
 */
export function previewLines(content: PreviewContent): StyledLine[] {
  const lines: StyledLine[] =
    content.kind === 'binary'
      ? [
          [{ text: `Binary content (${content.decodeError.message})`, color: 'yellow' }],
          [],
          ...plainLines(content.hexDump)
        ]
      : textLines(content);

  if (content.truncated) {
    lines.push([], [{ text: '── preview truncated ──', color: 'gray' }]);
  }
  return lines;
}

export function lineText(line: StyledLine): string {
  return line.map((segment) => segment.text).join('');
}

/**
 * Render styled lines, one terminal row each
 */
export function StyledLines({ lines }: { lines: StyledLine[] }): React.ReactElement {
  return (
    <Box flexDirection="column">
      {lines.map((line, i) => (
        <Text key={i} wrap="truncate-end">
          {line.length === 0
            ? ' '
            : line.map((segment, j) => (
                <Text
                  key={j}
                  color={segment.color}
                  bold={segment.bold}
                  italic={segment.italic}
                  underline={segment.underline}
                >
                  {segment.text}
                </Text>
              ))}
        </Text>
      ))}
    </Box>
  );
}
