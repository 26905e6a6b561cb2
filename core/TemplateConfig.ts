/**
 * Template Config
 *
 * Loads rollup.yaml from a template directory: the ordered strategy
 * mapping, the default strategy, and where the project keeps its context
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import YAML, { isMap, isNode, isScalar, type Document } from "yaml";
import { z } from "zod";
import { formatIssues } from "../strategies/schemas.js";
import { ConfigurationError, isErrnoCode } from "./errors.js";
import { StrategyRegistry, type StrategyNode } from "./StrategyRegistry.js";
import { TemplateVariableResolver } from "./TemplateVariableResolver.js";
import type { ContextType, GitRemoteType, TemplateContext } from "./types.js";

export const CONFIG_FILE = "rollup.yaml";

export interface TemplateConfig {
  defaultStrategy: StrategyNode;
  /** Pattern/strategy pairs in the order they were written */
  strategiesMapping: Array<[string, StrategyNode]>;
  contextType: ContextType;
  gitRemoteType?: GitRemoteType;
  /** Declared template variables and their defaults */
  variables: Record<string, string>;
}

const strategyNodeSchema = z.union([
  z.string().transform((strategy): StrategyNode => ({ strategy, config: {} })),
  z
    .object({
      strategy: z.string(),
      config: z.record(z.string(), z.unknown()).nullable().default({}),
    })
    .strict()
    .transform((node): StrategyNode => ({ strategy: node.strategy, config: node.config ?? {} })),
]);

const scalarSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((value) => (value === null ? "" : String(value)));

const templateConfigSchema = z
  .object({
    default_strategy: strategyNodeSchema.default("Overwrite"),
    strategies_mapping: z.array(z.tuple([z.string(), strategyNodeSchema])).default([]),
    context_type: z.enum(["conf", "setup-cfg", "yaml"]).default("conf"),
    git_remote_type: z.enum(["github", "gitlab", "bitbucket"]).optional(),
    variables: z.record(z.string(), scalarSchema).default({}),
  })
  .strict();

/**
 * strategies_mapping as [pattern, value] pairs; a plain object would put
 * integer-like patterns first
 */
function orderedMapping(document: Document.Parsed): Array<[string, unknown]> | undefined {
  const node = document.get("strategies_mapping", true);
  if (node === undefined || node === null) {
    return undefined;
  }
  if (!isMap(node)) {
    throw new ConfigurationError("strategies_mapping must be a mapping");
  }
  return node.items.map((pair): [string, unknown] => {
    const key = isScalar(pair.key) ? pair.key.value : pair.key;
    const value = isNode(pair.value) ? pair.value.toJS(document) : pair.value;
    return [String(key), value];
  });
}

/**
 * Parse rollup.yaml text
 * @throws ConfigurationError
 */
export function parseTemplateConfig(text: string, source = CONFIG_FILE): TemplateConfig {
  const document = YAML.parseDocument(text);
  if (document.errors.length > 0) {
    throw new ConfigurationError(`Unable to parse ${source}`, {
      issues: document.errors.map((error) => error.message),
    });
  }

  const raw: unknown = document.toJS() ?? {};
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError(`${source} must be a mapping`);
  }

  const parsed = templateConfigSchema.safeParse({
    ...raw,
    strategies_mapping: orderedMapping(document),
  });
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${source}`, { issues: formatIssues(parsed.error) });
  }

  const config = parsed.data;
  return {
    defaultStrategy: config.default_strategy,
    strategiesMapping: config.strategies_mapping,
    contextType: config.context_type,
    gitRemoteType: config.git_remote_type,
    variables: config.variables,
  };
}

export async function loadTemplateConfig(templateDir: string): Promise<TemplateConfig> {
  const configPath = path.join(templateDir, CONFIG_FILE);
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf-8");
  } catch (error: unknown) {
    if (isErrnoCode(error, "ENOENT")) {
      throw new ConfigurationError(`${CONFIG_FILE} not found in ${templateDir}`);
    }
    throw error;
  }
  return parseTemplateConfig(text, configPath);
}

/**
 * Build the registry once the rendering context is known, since patterns
 * may contain {{ variable }} placeholders
 */
export function buildRegistry(config: TemplateConfig, context: TemplateContext): StrategyRegistry {
  const entries = config.strategiesMapping.map(([pattern, node]): [string, StrategyNode] => {
    try {
      return [TemplateVariableResolver.resolve(pattern, context), node];
    } catch (error: unknown) {
      throw new ConfigurationError("Unresolved placeholder in path pattern", {
        binding: pattern,
        issues: [error instanceof Error ? error.message : String(error)],
      });
    }
  });
  return StrategyRegistry.build(entries, config.defaultStrategy);
}
