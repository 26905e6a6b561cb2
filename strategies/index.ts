/**
 * Merge Strategies Index
 *
 * The built-in strategies, their config schemas, and the table the registry
 * builds strategies from
 */

import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import type {
  MergeStrategy,
  StrategyInput,
  StrategyName,
  StrategyOutcome,
} from "../core/types.js";
import { ConfigParserMergeStrategy } from "./ConfigParserMerge.js";
import {
  EMPTY_MERGE_CONFIG,
  PYLINTRC_MERGE_CONFIG,
  SETUP_CFG_MERGE_CONFIG,
} from "./presets.js";
import {
  emptyConfigSchema,
  formatIssues,
  mergeConfigSchema,
  patternSchema,
  withPreset,
} from "./schemas.js";
import { SortedUniqueLinesStrategy } from "./SortedUniqueLines.js";
import { TemplateHashStrategy } from "./TemplateHash.js";

/**
 * Always take the template's file
 * Used when no pattern matches a path
 */
export class OverwriteStrategy implements MergeStrategy {
  readonly name = "Overwrite";

  apply(input: StrategyInput): StrategyOutcome {
    return { action: "write", contents: input.template };
  }
}

/**
 * Write the template's file only when the target doesn't have it yet
 */
export class IfMissingStrategy implements MergeStrategy {
  readonly name = "IfMissing";

  apply(input: StrategyInput): StrategyOutcome {
    return { action: "write", contents: input.target ?? input.template };
  }
}

/**
 * Never touch the file
 */
export class IgnoreStrategy implements MergeStrategy {
  readonly name = "Ignore";

  apply(): StrategyOutcome {
    return { action: "skip" };
  }
}

/**
 * Write the file on the first rollup of a project only
 */
export class IfNewProjectStrategy implements MergeStrategy {
  readonly name = "IfNewProject";

  apply(input: StrategyInput): StrategyOutcome {
    return input.isNewProject
      ? { action: "write", contents: input.template }
      : { action: "skip" };
  }
}

export interface StrategyDefinition {
  name: StrategyName;
  /** Validate a raw config from rollup.yaml and build the strategy */
  build(rawConfig: unknown): MergeStrategy;
}

function defineStrategy<C>(
  name: StrategyName,
  schema: z.ZodType<C, z.ZodTypeDef, unknown>,
  factory: (config: C) => MergeStrategy,
): StrategyDefinition {
  return {
    name,
    build(rawConfig: unknown): MergeStrategy {
      const parsed = schema.safeParse(rawConfig ?? {});
      if (!parsed.success) {
        throw new ConfigurationError(`Invalid config for strategy ${name}`, {
          issues: formatIssues(parsed.error),
        });
      }
      return factory(parsed.data);
    },
  };
}

const sortedUniqueLinesSchema = z
  .object({ comment_pattern: patternSchema.default("^ *#") })
  .strict()
  .transform((config) => ({ commentPattern: new RegExp(config.comment_pattern) }));

const templateHashSchema = z
  .object({
    line_comment_start: z.string().default("#"),
    max_line_length: z.number().int().min(10).nullable().default(null),
    max_line_linter_ignore_mark: z.string().default("  # noqa"),
  })
  .strict()
  .transform((config) => ({
    lineCommentStart: config.line_comment_start,
    maxLineLength: config.max_line_length,
    maxLineLinterIgnoreMark: config.max_line_linter_ignore_mark,
  }));

/**
 * Strategy registry
 */
export const strategies: Record<StrategyName, StrategyDefinition> = {
  Overwrite: defineStrategy("Overwrite", emptyConfigSchema, () => new OverwriteStrategy()),
  IfMissing: defineStrategy("IfMissing", emptyConfigSchema, () => new IfMissingStrategy()),
  Ignore: defineStrategy("Ignore", emptyConfigSchema, () => new IgnoreStrategy()),
  IfNewProject: defineStrategy(
    "IfNewProject",
    emptyConfigSchema,
    () => new IfNewProjectStrategy(),
  ),
  TemplateHash: defineStrategy(
    "TemplateHash",
    templateHashSchema,
    (config) => new TemplateHashStrategy(config),
  ),
  SortedUniqueLines: defineStrategy(
    "SortedUniqueLines",
    sortedUniqueLinesSchema,
    (config) => new SortedUniqueLinesStrategy(config),
  ),
  ConfigParserMerge: defineStrategy(
    "ConfigParserMerge",
    mergeConfigSchema,
    (config) =>
      new ConfigParserMergeStrategy("ConfigParserMerge", withPreset(config, EMPTY_MERGE_CONFIG)),
  ),
  SetupCfgMerge: defineStrategy(
    "SetupCfgMerge",
    mergeConfigSchema,
    (config) =>
      new ConfigParserMergeStrategy("SetupCfgMerge", withPreset(config, SETUP_CFG_MERGE_CONFIG)),
  ),
  PylintrcMerge: defineStrategy(
    "PylintrcMerge",
    mergeConfigSchema,
    (config) =>
      new ConfigParserMergeStrategy("PylintrcMerge", withPreset(config, PYLINTRC_MERGE_CONFIG)),
  ),
};

export function isStrategyName(name: string): name is StrategyName {
  return Object.prototype.hasOwnProperty.call(strategies, name);
}

/**
 * Build a strategy by name from its raw config
 */
export function createStrategy(strategyName: string, rawConfig: unknown = {}): MergeStrategy {
  if (!isStrategyName(strategyName)) {
    throw new ConfigurationError("Unknown merge strategy", {
      issues: [`"${strategyName}" is not one of: ${Object.keys(strategies).join(", ")}`],
    });
  }
  return strategies[strategyName].build(rawConfig);
}

export { ConfigParserMergeStrategy, mergeIniDocuments } from "./ConfigParserMerge.js";
export { SortedUniqueLinesStrategy, mergeLineDocuments } from "./SortedUniqueLines.js";
export { TemplateHashStrategy, GENERATED_BY } from "./TemplateHash.js";
