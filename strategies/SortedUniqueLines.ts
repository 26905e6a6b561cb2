/**
 * Line-set merge for files like .gitignore or MANIFEST.in
 */

import { compareOrdinal, decodeText } from "../core/newline.js";
import type { MergeStrategy, StrategyInput, StrategyOutcome } from "../core/types.js";
import { LineDocument, type LineItem } from "../parsers/LineDocument.js";

export interface SortedUniqueLinesConfig {
  commentPattern: RegExp;
}

/**
 * Union of both sides' lines, sorted byte-wise and deduplicated.
 *
 * The header block comes from the template when it has one, so that shared
 * boilerplate such as license text follows the template. Comments attached to
 * a line stay attached to it.
 */
export function mergeLineDocuments(
  template: LineDocument,
  target: LineDocument | null,
  commentPattern: RegExp,
): LineDocument {
  const header =
    template.header.length > 0 || target === null ? template.header : target.header;

  // Comments already in the header aren't repeated in the body
  const inHeader = new Set(header);

  const byLine = new Map<string, string[]>();
  for (const item of [...template.items, ...(target?.items ?? [])]) {
    if (inHeader.has(item.line)) continue;
    const comments = byLine.get(item.line) ?? [];
    for (const comment of item.comments) {
      if (!comments.includes(comment) && !inHeader.has(comment)) comments.push(comment);
    }
    byLine.set(item.line, comments);
  }

  const items: LineItem[] = [...byLine.keys()]
    .sort(compareOrdinal)
    .map((line) => ({ line, comments: byLine.get(line) ?? [] }));

  return new LineDocument([...header], items, commentPattern);
}

export class SortedUniqueLinesStrategy implements MergeStrategy {
  readonly name = "SortedUniqueLines";

  constructor(private readonly config: SortedUniqueLinesConfig) {}

  apply(input: StrategyInput): StrategyOutcome {
    const { commentPattern } = this.config;
    const template = LineDocument.parse(
      decodeText(input.template, `${input.relativePath} (template)`),
      commentPattern,
    );
    const target =
      input.target === null
        ? null
        : LineDocument.parse(
            decodeText(input.target, `${input.relativePath} (target)`),
            commentPattern,
          );

    return {
      action: "write",
      contents: mergeLineDocuments(template, target, commentPattern).serialize(),
    };
  }
}
