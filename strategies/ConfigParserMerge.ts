/**
 * Structured-section merge for INI-like files (setup.cfg, .pylintrc, tox.ini)
 */

import { decodeText } from "../core/newline.js";
import type {
  KeyRule,
  MergeConfig,
  MergeStrategy,
  SectionRule,
  StrategyInput,
  StrategyName,
  StrategyOutcome,
} from "../core/types.js";
import { IniDocument, type EntryValue } from "../parsers/IniDocument.js";
import { mergeRequirementLists, toRequirementList } from "../parsers/requirements.js";

function matchesSection(rules: SectionRule[], section: string): boolean {
  return rules.some((rule) => rule.sections.test(section));
}

function matchesKey(rules: KeyRule[], section: string, key: string): boolean {
  return rules.some((rule) => rule.sections.test(section) && rule.keys.test(key));
}

function copyValue(value: EntryValue): EntryValue {
  return Array.isArray(value) ? [...value] : value;
}

/**
 * Merge a rendered template document into the target's.
 *
 * For every section in either document: a preserved section present in the
 * target is taken from the target as a whole. Otherwise each key goes, in
 * this order, to the target for preserved keys, to the requirement union for
 * requirement keys, and to the template, falling back to the target.
 */
export function mergeIniDocuments(
  template: IniDocument,
  target: IniDocument | null,
  config: MergeConfig,
): IniDocument {
  const merged = new IniDocument();
  const names = new Set([...template.sectionNames(), ...(target?.sectionNames() ?? [])]);

  for (const name of names) {
    const templateSection = template.section(name);
    const targetSection = target?.section(name);

    if (targetSection !== undefined && matchesSection(config.preserveSections, name)) {
      merged.setSection(targetSection.clone());
      continue;
    }

    const section = merged.ensureSection(name);
    const keys = new Set([...(templateSection?.keys() ?? []), ...(targetSection?.keys() ?? [])]);

    for (const key of keys) {
      const templateValue = templateSection?.get(key);
      const targetValue = targetSection?.get(key);

      if (targetValue !== undefined && matchesKey(config.preserveKeys, name, key)) {
        section.set(key, copyValue(targetValue));
      } else if (matchesKey(config.mergeRequirements, name, key)) {
        section.set(
          key,
          mergeRequirementLists(toRequirementList(templateValue), toRequirementList(targetValue)),
        );
      } else {
        const value = templateValue ?? targetValue;
        if (value !== undefined) {
          section.set(key, copyValue(value));
        }
      }
    }
  }

  return merged;
}

export class ConfigParserMergeStrategy implements MergeStrategy {
  constructor(
    public readonly name: StrategyName,
    private readonly config: MergeConfig,
  ) {}

  apply(input: StrategyInput): StrategyOutcome {
    const template = IniDocument.parse(
      decodeText(input.template, `${input.relativePath} (template)`),
      `${input.relativePath} (template)`,
    );
    const target =
      input.target === null
        ? null
        : IniDocument.parse(
            decodeText(input.target, `${input.relativePath} (target)`),
            `${input.relativePath} (target)`,
          );

    return {
      action: "write",
      contents: mergeIniDocuments(template, target, this.config).serialize(),
    };
  }
}
