/**
 * TemplateHash strategy
 *
 * Writes the template once per template commit. The commit is recorded in a
 * comment stamp appended to the file; while the target carries the stamp of
 * the current commit, the file is left alone, so a project may diverge from
 * the template until the template moves on.
 */

import { decodeText, normalizeNewlines } from "../core/newline.js";
import type {
  MergeStrategy,
  StrategyInput,
  StrategyOutcome,
  TemplateMeta,
} from "../core/types.js";

export const GENERATED_BY = "Generated by template-rollup";

export interface TemplateHashConfig {
  lineCommentStart: string;
  maxLineLength: number | null;
  maxLineLinterIgnoreMark: string;
}

export class TemplateHashStrategy implements MergeStrategy {
  readonly name = "TemplateHash";

  constructor(private readonly config: TemplateHashConfig) {}

  /**
   * The comment lines recording which template commit produced the file
   */
  stamp(meta: TemplateMeta): string {
    const origin = meta.isDirty ? `From (dirty) ${meta.commitUrl}` : `From ${meta.commitUrl}`;
    return [GENERATED_BY, origin]
      .map((line) => this.withIgnoreMark(`${this.config.lineCommentStart} ${line}`))
      .map((line) => `${line}\n`)
      .join("");
  }

  apply(input: StrategyInput): StrategyOutcome {
    const stamp = this.stamp(input.meta);

    if (input.target !== null && !input.meta.isDirty) {
      const target = normalizeNewlines(input.target.toString("utf-8"), "LF");
      if (target.includes(stamp)) {
        return { action: "skip" };
      }
    }

    const template = decodeText(input.template, `${input.relativePath} (template)`);
    return { action: "write", contents: `${template}\n${stamp}` };
  }

  private withIgnoreMark(line: string): string {
    const { maxLineLength, maxLineLinterIgnoreMark } = this.config;
    if (maxLineLength !== null && line.length >= maxLineLength) {
      return `${line}${maxLineLinterIgnoreMark}`;
    }
    return line;
  }
}
