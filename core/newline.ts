/**
 * Newline detection and normalisation
 */

import { ParseError } from "./errors.js";
import type { NewlineStyle } from "./types.js";

const TERMINATORS: Record<NewlineStyle, string> = {
  LF: "\n",
  CRLF: "\r\n",
};

/**
 * Any paired terminator makes the blob CRLF; everything else is LF
 */
export function detectNewline(blob: string | Buffer): NewlineStyle {
  const text = typeof blob === "string" ? blob : blob.toString("utf-8");
  return text.includes("\r\n") ? "CRLF" : "LF";
}

/**
 * An existing target keeps its own style; a new file takes the template's
 */
export function preferredNewline(
  target: string | Buffer | null,
  template: string | Buffer,
): NewlineStyle {
  return target !== null ? detectNewline(target) : detectNewline(template);
}

export function normalizeNewlines(blob: string, style: NewlineStyle): string {
  const unified = blob.replace(/\r\n/g, "\n");
  return style === "LF" ? unified : unified.replace(/\n/g, TERMINATORS.CRLF);
}

/**
 * Split text into lines, dropping the empty string after a final terminator
 */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Compare strings by their UTF-8 byte values
 */
export function compareOrdinal(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf-8"), Buffer.from(b, "utf-8"));
}

const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode UTF-8, failing on bytes that aren't valid text
 */
export function decodeText(blob: Buffer, source: string): string {
  try {
    return decoder.decode(blob);
  } catch {
    throw new ParseError(source, "not valid UTF-8 text");
  }
}
