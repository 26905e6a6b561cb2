/**
 * Strategy Registry
 *
 * Ordered path-pattern bindings; the first pattern matching a relative path
 * decides its strategy
 */

import { createStrategy, OverwriteStrategy } from "../strategies/index.js";
import { ConfigurationError } from "./errors.js";
import type { MergeStrategy } from "./types.js";

/**
 * A strategy reference as written in rollup.yaml
 */
export interface StrategyNode {
  strategy: string;
  config: Record<string, unknown>;
}

export interface StrategyBinding {
  /** The pattern as written */
  readonly source: string;
  readonly pattern: RegExp;
  readonly strategy: MergeStrategy;
}

export class StrategyRegistry {
  private constructor(
    private readonly bindings: readonly StrategyBinding[],
    private readonly fallback: MergeStrategy,
  ) {}

  /**
   * Compile every pattern and validate every strategy config up front
   * @throws ConfigurationError naming the offending binding
   */
  static build(
    entries: ReadonlyArray<readonly [string, StrategyNode]>,
    defaultNode?: StrategyNode,
  ): StrategyRegistry {
    const bindings = entries.map(([source, node]): StrategyBinding => {
      let pattern: RegExp;
      try {
        pattern = new RegExp(source);
      } catch (error: unknown) {
        throw new ConfigurationError("Invalid path pattern", {
          binding: source,
          issues: [error instanceof Error ? error.message : String(error)],
        });
      }
      return Object.freeze({ source, pattern, strategy: buildStrategy(node, source) });
    });

    const fallback =
      defaultNode === undefined
        ? new OverwriteStrategy()
        : buildStrategy(defaultNode, "default_strategy");

    return new StrategyRegistry(Object.freeze(bindings), fallback);
  }

  /**
   * Strategy for a relative POSIX path. Patterns search the path, so
   * authors anchor them with ^...$ for exact matches.
   */
  resolve(relativePath: string): MergeStrategy {
    for (const binding of this.bindings) {
      if (binding.pattern.test(relativePath)) {
        return binding.strategy;
      }
    }
    return this.fallback;
  }

  get size(): number {
    return this.bindings.length;
  }

  patterns(): string[] {
    return this.bindings.map((binding) => binding.source);
  }
}

function buildStrategy(node: StrategyNode, binding: string): MergeStrategy {
  try {
    return createStrategy(node.strategy, node.config);
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(`Invalid strategy ${node.strategy}`, {
        binding,
        issues: error.issues,
      });
    }
    throw error;
  }
}
