/**
 * Config schemas shared by the strategies
 */

import { z } from "zod";
import type { KeyRule, MergeConfig, SectionRule } from "../core/types.js";

export function isValidPattern(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

export const patternSchema = z
  .string()
  .refine(isValidPattern, (source) => ({
    message: `Unable to compile regular expression: ${source}`,
  }));

/** A strategy that takes no config at all */
export const emptyConfigSchema = z.object({}).strict();

const keyRuleSchema = z
  .object({ sections: patternSchema, keys: patternSchema })
  .strict()
  .transform(
    (rule): KeyRule => ({ sections: new RegExp(rule.sections), keys: new RegExp(rule.keys) }),
  );

const sectionRuleSchema = z
  .object({ sections: patternSchema })
  .strict()
  .transform((rule): SectionRule => ({ sections: new RegExp(rule.sections) }));

/**
 * Rule lists as written in rollup.yaml; an omitted list is undefined so a
 * preset can fill it in
 */
export const mergeConfigSchema = z
  .object({
    merge_requirements: z.array(keyRuleSchema).optional(),
    preserve_keys: z.array(keyRuleSchema).optional(),
    preserve_sections: z.array(sectionRuleSchema).optional(),
  })
  .strict();

export type MergeConfigInput = z.output<typeof mergeConfigSchema>;

export function withPreset(input: MergeConfigInput, preset: MergeConfig): MergeConfig {
  return {
    mergeRequirements: input.merge_requirements ?? preset.mergeRequirements,
    preserveKeys: input.preserve_keys ?? preset.preserveKeys,
    preserveSections: input.preserve_sections ?? preset.preserveSections,
  };
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}
