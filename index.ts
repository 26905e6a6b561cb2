/**
 * Template Rollup
 *
 * Library entry point
 */

export { RollupManager, type RollupOptions } from "./core/RollupManager.js";
export { StatusReporter } from "./core/StatusReporter.js";
export {
  PlaceholderRenderer,
  resolveContext,
  type Prompt,
  type RenderRequest,
  type RenderResult,
  type TemplateRenderer,
} from "./core/PlaceholderRenderer.js";
export { StrategyRegistry, type StrategyNode } from "./core/StrategyRegistry.js";
export {
  buildRegistry,
  CONFIG_FILE,
  loadTemplateConfig,
  parseTemplateConfig,
  type TemplateConfig,
} from "./core/TemplateConfig.js";
export { createContextStore, type ContextStore } from "./core/ContextStore.js";
export { GitTemplateMetaReader, type TemplateMetaReader } from "./core/TemplateMetaReader.js";
export { makeGitRemote } from "./core/GitRemote.js";
export * from "./core/errors.js";
export * from "./core/types.js";
export * from "./strategies/index.js";
export { Validator } from "./validation/Validator.js";
