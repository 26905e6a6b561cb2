#!/usr/bin/env node

/**
 * Template Rollup CLI
 *
 * Re-apply a project template onto a project, merging each file with the
 * strategy its path is bound to
 */

import * as path from 'node:path';
import { watch } from 'chokidar';
import { Command } from 'commander';
import { RollupManager } from '../core/RollupManager.js';
import { StatusReporter } from '../core/StatusReporter.js';
import { ErrorSeverity, type TemplateContext } from '../core/types.js';
import { Validator } from '../validation/Validator.js';
import { collectContext, terminalPrompt } from './options.js';

interface RollupCommandOptions {
  input: boolean;
  context?: TemplateContext;
  dryRun?: boolean;
  verbose?: boolean;
}

interface ValidateCommandOptions {
  strict?: boolean;
}

interface ContextCommandOptions {
  context?: TemplateContext;
  verbose?: boolean;
}

const program = new Command();

program
  .name('template-rollup')
  .description('Re-apply an evolving project template onto existing projects')
  .version('0.1.0');

// Rollup command
program
  .command('rollup <template_dir> <target_dir>')
  .description('Render the template and merge it into the target project')
  .option('--no-input', 'Never prompt; the context must be persisted or passed with --context')
  .option('--context <pairs...>', 'Extra template context as key=value pairs', collectContext)
  .option('--dry-run', 'Report what would change without writing files')
  .option('--verbose', 'Detailed output')
  .action(async (templateDir: string, targetDir: string, options: RollupCommandOptions) => {
    const terminal = terminalPrompt();

    const manager = new RollupManager({
      templateDir: path.resolve(templateDir),
      targetDir: path.resolve(targetDir),
      noInput: !options.input,
      extraContext: options.context,
      dryRun: options.dryRun,
      verbose: options.verbose,
      prompt: terminal.prompt,
    });

    try {
      await manager.rollup();
    } catch (error) {
      console.error('\n❌ Error rolling up the template:', error instanceof Error ? error.message : error);
      process.exit(1);
    } finally {
      terminal.close();
    }
  });

// Validate command
program
  .command('validate <template_dir>')
  .description('Validate a template directory')
  .option('--strict', 'Fail on warnings')
  .action(async (templateDir: string, options: ValidateCommandOptions) => {
    const validator = new Validator(path.resolve(templateDir));

    try {
      const result = await validator.validate();

      if (!result.valid) {
        process.exit(1);
      }

      if (options.strict && result.errors.some(e => e.severity === ErrorSeverity.WARNING)) {
        console.log('\n❌ Strict mode: Warnings present');
        process.exit(1);
      }
    } catch (error) {
      console.error('\n❌ Error validating template:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// Status command
program
  .command('status <template_dir> <target_dir>')
  .description('Show what a rollup would change, without writing anything')
  .option('--context <pairs...>', 'Extra template context as key=value pairs', collectContext)
  .option('--verbose', 'Detailed output')
  .action(async (templateDir: string, targetDir: string, options: ContextCommandOptions) => {
    const statusReporter = new StatusReporter({
      templateDir: path.resolve(templateDir),
      targetDir: path.resolve(targetDir),
      extraContext: options.context,
      verbose: options.verbose,
    });

    try {
      await statusReporter.showStatus();
    } catch (error) {
      console.error('\n❌ Error showing status:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// Watch command
program
  .command('watch <template_dir> <target_dir>')
  .description('Roll the template up again whenever it changes')
  .option('--context <pairs...>', 'Extra template context as key=value pairs', collectContext)
  .option('--verbose', 'Detailed output')
  .action((templateDir: string, targetDir: string, options: ContextCommandOptions) => {
    const templateRoot = path.resolve(templateDir);

    console.log('👀 Watching for template changes...\n');
    console.log(`  Watching: ${templateRoot}`);
    console.log('\nPress Ctrl+C to stop\n');

    const watcher = watch(templateRoot, {
      ignored: ['**/node_modules/**', '**/.git/**'],
      persistent: true,
      ignoreInitial: true,
    });

    let rollingUp = false;

    const rollup = async () => {
      if (rollingUp) return;

      rollingUp = true;
      const timestamp = new Date().toLocaleTimeString();

      try {
        console.log(`\n[${timestamp}] 🔄 Rolling up...`);

        const manager = new RollupManager({
          templateDir: templateRoot,
          targetDir: path.resolve(targetDir),
          noInput: true,
          extraContext: options.context,
          verbose: options.verbose,
        });

        await manager.rollup();

        console.log(`[${timestamp}] ✅ Done`);
      } catch (error) {
        console.error(`\n[${timestamp}] ❌ Error:`, error instanceof Error ? error.message : error);
      } finally {
        rollingUp = false;
      }
    };

    watcher
      .on('add', (file) => {
        console.log(`\n[${new Date().toLocaleTimeString()}] ➕ Added: ${path.relative(templateRoot, file)}`);
        void rollup();
      })
      .on('change', (file) => {
        console.log(`\n[${new Date().toLocaleTimeString()}] 📝 Changed: ${path.relative(templateRoot, file)}`);
        void rollup();
      })
      .on('unlink', (file) => {
        console.log(`\n[${new Date().toLocaleTimeString()}] ➖ Removed: ${path.relative(templateRoot, file)}`);
        void rollup();
      })
      .on('error', (error) => {
        console.error('\n❌ Watcher error:', error);
      });

    process.on('SIGINT', () => {
      console.log('\n\n👋 Stopping watcher...');
      watcher.close().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('\n❌ Error stopping watcher:', error);
          process.exit(1);
        },
      );
    });
  });

program.parseAsync().catch((error: unknown) => {
  console.error('\n❌', error instanceof Error ? error.message : error);
  process.exit(1);
});
