/**
 * Validator
 *
 * Checks a template directory before it is rolled up anywhere
 */

import { isUtf8 } from "node:buffer";
import * as fs from "node:fs/promises";
import { createContextStore } from "../core/ContextStore.js";
import { ConfigurationError } from "../core/errors.js";
import type { StrategyRegistry } from "../core/StrategyRegistry.js";
import {
  buildRegistry,
  CONFIG_FILE,
  loadTemplateConfig,
  type TemplateConfig,
} from "../core/TemplateConfig.js";
import { TemplateDiscovery } from "../core/TemplateDiscovery.js";
import { TemplateVariableResolver } from "../core/TemplateVariableResolver.js";
import { type ConfigError, ErrorSeverity, type TemplateContext } from "../core/types.js";

export class Validator {
  private errors: ConfigError[] = [];

  constructor(private templateDir: string) {}

  /**
   * Validate the template configuration and its project directory
   */
  async validate(): Promise<{ valid: boolean; errors: ConfigError[] }> {
    console.log("✅ Validating template...\n");

    this.errors = [];

    const config = await this.validateConfig();
    if (config !== null) {
      const files = await this.validateProject(config);
      const registry = this.validateStrategies(config, files ?? []);
      if (registry !== null && files !== null) {
        this.validatePatterns(registry, files, config);
        this.validateContextFile(config, files);
      }
    }

    this.printResults();

    const hasErrors = this.errors.some((e) => e.severity === ErrorSeverity.ERROR);

    return {
      valid: !hasErrors,
      errors: this.errors,
    };
  }

  private async validateConfig(): Promise<TemplateConfig | null> {
    console.log(`📋 Validating ${CONFIG_FILE}...`);

    try {
      const config = await loadTemplateConfig(this.templateDir);
      console.log(
        `  ✅ ${config.strategiesMapping.length} strategy bindings, ` +
          `${Object.keys(config.variables).length} variables\n`,
      );
      return config;
    } catch (error: unknown) {
      this.addError({
        severity: ErrorSeverity.ERROR,
        code: "CONFIG_INVALID",
        message: errorMessage(error),
        file: CONFIG_FILE,
      });
      return null;
    }
  }

  private async validateProject(config: TemplateConfig): Promise<string[] | null> {
    console.log("📦 Validating project files...");

    const discovery = TemplateDiscovery.forTemplate(this.templateDir);
    try {
      const files = await discovery.discoverFiles();
      console.log(`  ✅ Found ${files.length} files\n`);
      if (files.length === 0) {
        this.addError({
          severity: ErrorSeverity.WARNING,
          code: "PROJECT_EMPTY",
          message: "The template has no files to roll up",
          file: discovery.root,
        });
      }
      await this.validateVariables(discovery, files, config);
      return files;
    } catch (error: unknown) {
      this.addError({
        severity: ErrorSeverity.ERROR,
        code: "PROJECT_MISSING",
        message: errorMessage(error),
        suggestion: "Put the files to render under project/",
      });
      return null;
    }
  }

  /**
   * Placeholders that aren't declared can only be filled from a persisted
   * or explicit context
   */
  private async validateVariables(
    discovery: TemplateDiscovery,
    files: string[],
    config: TemplateConfig,
  ): Promise<void> {
    const declared = new Set(Object.keys(config.variables));
    const undeclared = new Set<string>();

    for (const file of files) {
      const contents = await fs.readFile(discovery.resolve(file));
      const text = isUtf8(contents) ? contents.toString("utf-8") : "";
      for (const name of [
        ...TemplateVariableResolver.extractVariables(file),
        ...TemplateVariableResolver.extractVariables(text),
      ]) {
        if (!declared.has(name)) {
          undeclared.add(name);
        }
      }
    }

    for (const name of undeclared) {
      this.addError({
        severity: ErrorSeverity.INFO,
        code: "UNDECLARED_VARIABLE",
        message: `Variable "${name}" has no default`,
        suggestion: `Declare it under variables in ${CONFIG_FILE}, or always pass it as context`,
      });
    }
  }

  private validateStrategies(config: TemplateConfig, files: string[]): StrategyRegistry | null {
    console.log("🔧 Validating strategies...");

    try {
      const registry = buildRegistry(config, this.sampleContext(config, files));
      console.log(`  ✅ Strategies validated\n`);
      return registry;
    } catch (error: unknown) {
      this.addError({
        severity: ErrorSeverity.ERROR,
        code: "STRATEGY_INVALID",
        message: errorMessage(error),
        file: CONFIG_FILE,
        suggestion:
          error instanceof ConfigurationError && error.binding !== undefined
            ? `Check the "${error.binding}" binding`
            : undefined,
      });
      return null;
    }
  }

  private validatePatterns(
    registry: StrategyRegistry,
    files: string[],
    config: TemplateConfig,
  ): void {
    const context = this.sampleContext(config, files);
    const renderedPaths = files.map((file) => TemplateVariableResolver.resolve(file, context));
    // The renderer adds the context file
    renderedPaths.push(createContextStore(config.contextType).fileName);

    for (const source of registry.patterns()) {
      const pattern = new RegExp(source);
      if (!renderedPaths.some((file) => pattern.test(file))) {
        this.addError({
          severity: ErrorSeverity.WARNING,
          code: "PATTERN_UNUSED",
          message: `Pattern "${source}" matches no file of the template`,
          file: CONFIG_FILE,
        });
      }
    }
  }

  private validateContextFile(config: TemplateConfig, files: string[]): void {
    const store = createContextStore(config.contextType);
    if (!store.writtenByRenderer && !files.includes(store.fileName)) {
      this.addError({
        severity: ErrorSeverity.ERROR,
        code: "CONTEXT_FILE_MISSING",
        message: `context_type ${config.contextType} needs the template to render ${store.fileName}`,
        file: CONFIG_FILE,
      });
    }
  }

  /**
   * Defaults for declared variables, the variable's own name for the rest
   */
  private sampleContext(config: TemplateConfig, files: string[]): TemplateContext {
    const context: TemplateContext = {};
    const names = [
      ...config.strategiesMapping.flatMap(([pattern]) =>
        TemplateVariableResolver.extractVariables(pattern),
      ),
      ...files.flatMap((file) => TemplateVariableResolver.extractVariables(file)),
    ];
    for (const name of names) {
      context[name] = name;
    }
    return { ...context, ...config.variables };
  }

  private addError(error: ConfigError): void {
    this.errors.push(error);
  }

  private printResults(): void {
    if (this.errors.length === 0) {
      console.log("✅ Validation Report\n");
      console.log("═".repeat(60));
      console.log("\n✅ All validation checks passed!\n");
      return;
    }

    console.log("\n⚠️  Validation Report\n");
    console.log("═".repeat(60));

    const errors = this.errors.filter((e) => e.severity === ErrorSeverity.ERROR);
    const warnings = this.errors.filter((e) => e.severity === ErrorSeverity.WARNING);
    const infos = this.errors.filter((e) => e.severity === ErrorSeverity.INFO);

    if (errors.length > 0) {
      console.log("\n❌ Errors:");
      for (const error of errors) {
        this.printError(error);
      }
    }

    if (warnings.length > 0) {
      console.log("\n⚠️  Warnings:");
      for (const warning of warnings) {
        this.printError(warning);
      }
    }

    if (infos.length > 0) {
      console.log("\nℹ️  Information:");
      for (const info of infos) {
        this.printError(info);
      }
    }

    console.log(`\n${"═".repeat(60)}`);
    console.log(
      `\n📊 Summary: ${errors.length} errors, ${warnings.length} warnings, ${infos.length} info`,
    );

    if (errors.length > 0) {
      console.log("\n❌ Validation failed - please fix errors before rolling the template up");
    }
  }

  private printError(error: ConfigError): void {
    const icon =
      error.severity === ErrorSeverity.ERROR
        ? "❌"
        : error.severity === ErrorSeverity.WARNING
          ? "⚠️"
          : "ℹ️";
    console.log(`\n  ${icon} [${error.code}] ${error.message}`);

    if (error.file) {
      console.log(`     File: ${error.file}`);
    }

    if (error.line) {
      console.log(`     Line: ${error.line}`);
    }

    if (error.suggestion) {
      console.log(`     💡 ${error.suggestion}`);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
