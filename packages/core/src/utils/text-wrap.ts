/**
 * @fileoverview Word wrapping
 */

export interface WrapOptions {
  width: number;
  /** Prefix for every line but the first */
  subsequentIndent?: string;
}

/**
 * Wrap text at whitespace. Words longer than the width are never broken;
 * whitespace at line breaks is dropped, other whitespace is kept.
 */
export function wrapText(text: string, { width, subsequentIndent = '' }: WrapOptions): string[] {
  const chunks = text.match(/\S+|\s+/g) ?? [];
  const lines: string[] = [];
  let line: string | null = null;

  for (const chunk of chunks) {
    const isSpace = /^\s/.test(chunk);

    if (line === null) {
      if (isSpace && lines.length > 0) continue;
      line = (lines.length > 0 ? subsequentIndent : '') + chunk;
    } else if (line.length + chunk.length <= width) {
      line += chunk;
    } else if (isSpace) {
      lines.push(line);
      line = null;
    } else {
      lines.push(line.trimEnd());
      line = subsequentIndent + chunk;
    }
  }

  if (line !== null) {
    lines.push(line.trimEnd());
  }
  return lines;
}
