/**
 * INI Document
 *
 * Section/key model for setup.cfg-style files. Comments are dropped on
 * parse, output is sorted so that serialisation never depends on the
 * order a file was written in.
 */

import { compareOrdinal, splitLines } from "../core/newline.js";
import { ParseError } from "../core/errors.js";

/**
 * A single-line value, or a list of sub-items for wrapped values
 */
export type EntryValue = string | string[];

const SECTION_HEADER = /^\[([^\]]+)\]\s*(?:[#;].*)?$/;
const COMMENT_LINE = /^\s*[#;]/;
const CONTINUATION_LINE = /^\s/;
const INDENT = "    ";

export class IniSection {
  private entries = new Map<string, EntryValue>();

  constructor(public readonly name: string) {}

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): EntryValue | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: EntryValue): void {
    this.entries.set(key, value);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Copy of this section under the same name
   */
  clone(): IniSection {
    const copy = new IniSection(this.name);
    for (const [key, value] of this.entries) {
      copy.set(key, Array.isArray(value) ? [...value] : value);
    }
    return copy;
  }

  /**
   * Flat key/value view, list values joined with newlines
   */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of this.entries) {
      record[key] = Array.isArray(value) ? value.join("\n") : value;
    }
    return record;
  }
}

export class IniDocument {
  private sections = new Map<string, IniSection>();

  /**
   * Parse INI text.
   *
   * @param source label used in parse error messages
   */
  static parse(text: string, source = "<string>"): IniDocument {
    const document = new IniDocument();
    let section: IniSection | null = null;
    let pending: { key: string; first: string; continuation: string[] } | null = null;

    const flush = (): void => {
      if (section === null || pending === null) return;
      if (pending.continuation.length === 0) {
        section.set(pending.key, pending.first);
      } else {
        section.set(
          pending.key,
          [pending.first, ...pending.continuation].filter((item) => item !== ""),
        );
      }
      pending = null;
    };

    splitLines(text).forEach((raw, index) => {
      const lineNumber = index + 1;
      const trimmed = raw.trim();

      if (trimmed === "" || COMMENT_LINE.test(raw)) {
        return;
      }

      if (CONTINUATION_LINE.test(raw)) {
        if (pending === null) {
          throw new ParseError(source, "continuation line without a key", lineNumber);
        }
        pending.continuation.push(trimmed);
        return;
      }

      const header = SECTION_HEADER.exec(trimmed);
      if (header) {
        flush();
        const name = header[1].trim();
        if (document.sections.has(name)) {
          throw new ParseError(source, `duplicate section [${name}]`, lineNumber);
        }
        section = new IniSection(name);
        document.sections.set(name, section);
        return;
      }

      if (section === null) {
        throw new ParseError(source, "key/value line before any section header", lineNumber);
      }

      const delimiter = raw.search(/[=:]/);
      if (delimiter <= 0) {
        throw new ParseError(source, `expected "key = value", got "${trimmed}"`, lineNumber);
      }

      flush();
      const key = raw.slice(0, delimiter).trim();
      if (section.has(key)) {
        throw new ParseError(source, `duplicate key "${key}" in [${section.name}]`, lineNumber);
      }
      pending = { key, first: raw.slice(delimiter + 1).trim(), continuation: [] };
    });

    flush();
    return document;
  }

  hasSection(name: string): boolean {
    return this.sections.has(name);
  }

  section(name: string): IniSection | undefined {
    return this.sections.get(name);
  }

  /**
   * Section names in the order they were first read
   */
  sectionNames(): string[] {
    return [...this.sections.keys()];
  }

  /**
   * Get a section, creating an empty one when missing
   */
  ensureSection(name: string): IniSection {
    let section = this.sections.get(name);
    if (section === undefined) {
      section = new IniSection(name);
      this.sections.set(name, section);
    }
    return section;
  }

  setSection(section: IniSection): void {
    this.sections.set(section.name, section);
  }

  /**
   * Sections and keys sorted, wrapped values one item per indented line
   */
  serialize(): string {
    const blocks = [...this.sections.keys()].sort(compareOrdinal).map((name) => {
      const section = this.sections.get(name);
      const lines = [`[${name}]`];
      if (section === undefined) return lines.join("\n");

      for (const key of section.keys().sort(compareOrdinal)) {
        const value = section.get(key) ?? "";
        if (Array.isArray(value)) {
          lines.push(`${key} =`, ...value.map((item) => `${INDENT}${item}`));
        } else {
          lines.push(value === "" ? `${key} =` : `${key} = ${value}`);
        }
      }
      return lines.join("\n");
    });

    return blocks.length === 0 ? "" : `${blocks.join("\n\n")}\n`;
  }
}
