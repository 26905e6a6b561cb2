/**
 * Line Document
 *
 * Model for line-oriented files such as .gitignore or MANIFEST.in: an
 * optional header comment block followed by body lines, each carrying the
 * comment lines written right above it.
 */

import { compareOrdinal, splitLines } from "../core/newline.js";

export interface LineItem {
  /** The body line, or the comment itself for a comment that precedes nothing */
  line: string;
  /** Comment lines attached to the body line */
  comments: string[];
}

export class LineDocument {
  constructor(
    public readonly header: string[],
    public readonly items: LineItem[],
    public readonly commentPattern: RegExp,
  ) {}

  /**
   * Parse a blob.
   *
   * The header is the leading run of comment lines, up to the first blank or
   * non-comment line. Blank lines in the body are dropped, and a comment cut
   * off from the next line by a blank line stands on its own.
   */
  static parse(text: string, commentPattern: RegExp): LineDocument {
    const lines = splitLines(text);
    const isComment = (line: string) => commentPattern.test(line);
    const isBlank = (line: string) => line.trim() === "";

    let index = 0;
    while (index < lines.length && isBlank(lines[index])) {
      index++;
    }

    const header: string[] = [];
    while (index < lines.length && isComment(lines[index]) && !isBlank(lines[index])) {
      header.push(lines[index]);
      index++;
    }

    let pending: string[] = [];
    const items: LineItem[] = [];
    const flushStandalone = () => {
      for (const comment of pending) {
        items.push({ line: comment, comments: [] });
      }
      pending = [];
    };

    for (const line of lines.slice(index)) {
      if (isBlank(line)) {
        flushStandalone();
      } else if (isComment(line)) {
        pending.push(line);
      } else {
        items.push({ line, comments: pending });
        pending = [];
      }
    }
    flushStandalone();

    return new LineDocument(header, items, commentPattern);
  }

  /**
   * Header, a blank separator, then the body; each block of comments is
   * sorted and printed right above the line that follows it. Without a
   * header, comments opening the body are written as the header, which is
   * how they read back.
   */
  serialize(): string {
    let body: string[] = [];
    let comments: string[] = [];

    for (const item of this.items) {
      if (item.comments.length === 0 && this.commentPattern.test(item.line)) {
        comments.push(item.line);
        continue;
      }
      body.push(...uniqueSorted([...comments, ...item.comments]), item.line);
      comments = [];
    }
    body.push(...uniqueSorted(comments));

    let header = this.header;
    if (header.length === 0) {
      let opening = 0;
      while (opening < body.length && this.commentPattern.test(body[opening])) {
        opening++;
      }
      header = body.slice(0, opening);
      body = body.slice(opening);
    }

    const blocks: string[] = [];
    if (header.length > 0) blocks.push(header.join("\n"));
    if (body.length > 0) blocks.push(body.join("\n"));
    return blocks.length === 0 ? "" : `${blocks.join("\n\n")}\n`;
  }
}

function uniqueSorted(lines: string[]): string[] {
  return [...new Set(lines)].sort(compareOrdinal);
}
