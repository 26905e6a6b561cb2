/**
 * Rollup Manager
 *
 * Main orchestrator: renders a template, then merges every rendered file
 * into the target project with the strategy its path is bound to
 */

import { isUtf8 } from "node:buffer";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { createContextStore } from "./ContextStore.js";
import { ContextError, InvalidTemplateError, isErrnoCode } from "./errors.js";
import { normalizeNewlines, preferredNewline } from "./newline.js";
import { resolveInside } from "./paths.js";
import { PlaceholderRenderer, type Prompt, type TemplateRenderer } from "./PlaceholderRenderer.js";
import type { StrategyRegistry } from "./StrategyRegistry.js";
import { buildRegistry, loadTemplateConfig } from "./TemplateConfig.js";
import { TemplateDiscovery } from "./TemplateDiscovery.js";
import { GitTemplateMetaReader, type TemplateMetaReader } from "./TemplateMetaReader.js";
import type {
  FileOutcome,
  FileResult,
  RollupReport,
  TemplateContext,
  TemplateMeta,
} from "./types.js";

export interface RollupOptions {
  templateDir: string;
  targetDir: string;
  /** Never prompt; a project without persisted context then needs extraContext */
  noInput?: boolean;
  extraContext?: TemplateContext;
  /** Compute the report without writing anything */
  dryRun?: boolean;
  verbose?: boolean;
  renderer?: TemplateRenderer;
  metaReader?: TemplateMetaReader;
  /** Used for undeclared values unless noInput is set */
  prompt?: Prompt;
}

const OUTCOME_ICONS: Record<FileOutcome, string> = {
  created: "➕",
  updated: "📝",
  unchanged: "✔️ ",
  skipped: "⏭️ ",
};

async function readIfExists(file: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(file);
  } catch (error: unknown) {
    if (isErrnoCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

export class RollupManager {
  private renderer: TemplateRenderer;
  private metaReader: TemplateMetaReader;

  constructor(private options: RollupOptions) {
    this.renderer = options.renderer ?? new PlaceholderRenderer();
    this.metaReader = options.metaReader ?? new GitTemplateMetaReader();
  }

  /**
   * Roll the template up into the target project
   */
  async rollup(): Promise<RollupReport> {
    const { templateDir, targetDir, noInput, dryRun } = this.options;
    const extraContext = this.options.extraContext ?? {};

    console.log("🔍 Reading template...\n");

    const config = await loadTemplateConfig(templateDir);
    const meta = await this.metaReader.read(templateDir, config.gitRemoteType);
    const contextStore = createContextStore(config.contextType);
    const persistedContext = await contextStore.read(targetDir);
    const isNewProject = persistedContext === null;

    if (noInput && isNewProject && Object.keys(extraContext).length === 0) {
      throw new ContextError(
        contextStore.fileName,
        "not found in the target project; pass the context explicitly or run interactively",
      );
    }

    if (this.options.verbose) {
      console.log(`  Template commit: ${meta.commitUrl}${meta.isDirty ? " (dirty)" : ""}`);
      console.log(`  ${isNewProject ? "New project" : `Context from ${contextStore.fileName}`}\n`);
    }

    const rendered = await this.renderer.render({
      templateDir,
      variables: config.variables,
      persistedContext,
      extraContext,
      contextStore,
      prompt: noInput ? undefined : this.options.prompt,
    });

    try {
      const context = await contextStore.read(rendered.outputDir);
      if (context === null) {
        throw new InvalidTemplateError(
          `The rendered project has no ${contextStore.fileName} to read the context from`,
        );
      }

      const registry = buildRegistry(config, context);
      const files = await this.applyGeneratedProject(
        rendered.outputDir,
        registry,
        meta,
        isNewProject,
      );

      this.printSummary(files, dryRun === true);

      return { templateDir, targetDir, isNewProject, context, files };
    } finally {
      await rendered.cleanup();
    }
  }

  /**
   * Merge every file of a rendered tree into the target, one at a time
   */
  async applyGeneratedProject(
    generatedDir: string,
    registry: StrategyRegistry,
    meta: TemplateMeta,
    isNewProject: boolean,
  ): Promise<FileResult[]> {
    const discovery = new TemplateDiscovery(generatedDir);
    const relativePaths = await discovery.discoverFiles();

    console.log(`📋 Processing ${relativePaths.length} files...\n`);

    const results: FileResult[] = [];
    for (const relativePath of relativePaths) {
      const result = await this.processFile(
        discovery.resolve(relativePath),
        relativePath,
        registry,
        meta,
        isNewProject,
      );
      if (this.options.verbose) {
        console.log(`  ${OUTCOME_ICONS[result.outcome]} ${relativePath} (${result.strategy})`);
      }
      results.push(result);
    }
    return results;
  }

  private async processFile(
    templatePath: string,
    relativePath: string,
    registry: StrategyRegistry,
    meta: TemplateMeta,
    isNewProject: boolean,
  ): Promise<FileResult> {
    const strategy = registry.resolve(relativePath);
    const targetPath = resolveInside(this.options.targetDir, relativePath);

    const template = await fs.readFile(templatePath);
    const target = await readIfExists(targetPath);

    const outcome = strategy.apply({ relativePath, template, target, meta, isNewProject });
    if (outcome.action === "skip") {
      return { relativePath, strategy: strategy.name, outcome: "skipped" };
    }

    // Text takes the target's newline style; other bytes are copied as they are
    const style = preferredNewline(target, template);
    const contents =
      typeof outcome.contents === "string"
        ? Buffer.from(normalizeNewlines(outcome.contents, style), "utf-8")
        : isUtf8(outcome.contents)
          ? Buffer.from(normalizeNewlines(outcome.contents.toString("utf-8"), style), "utf-8")
          : outcome.contents;

    if (target !== null && target.equals(contents)) {
      return { relativePath, strategy: strategy.name, outcome: "unchanged" };
    }

    if (!this.options.dryRun) {
      const { mode } = await fs.stat(templatePath);
      await fs.mkdir(path.dirname(targetPath), { recursive: true });
      await fs.writeFile(targetPath, contents);
      await fs.chmod(targetPath, mode & 0o777);
    }

    return {
      relativePath,
      strategy: strategy.name,
      outcome: target === null ? "created" : "updated",
    };
  }

  private printSummary(files: FileResult[], dryRun: boolean): void {
    const count = (outcome: FileOutcome) => files.filter((file) => file.outcome === outcome).length;
    const summary =
      `${count("created")} created, ${count("updated")} updated, ` +
      `${count("unchanged")} unchanged, ${count("skipped")} skipped`;

    if (dryRun) {
      console.log(`\n🧪 Dry run, nothing written: ${summary}`);
    } else {
      console.log(`\n✅ Rollup complete: ${summary}`);
    }
  }
}
