/**
 * StatusReporter
 *
 * Shows what a rollup would do to a project, without writing anything
 */

import { RollupManager, type RollupOptions } from "./RollupManager.js";
import type { FileOutcome, FileResult, RollupReport } from "./types.js";

const SECTIONS: Array<{ outcome: FileOutcome; title: string }> = [
  { outcome: "created", title: "➕ Would create:" },
  { outcome: "updated", title: "📝 Would update:" },
  { outcome: "unchanged", title: "✔️  Up to date:" },
  { outcome: "skipped", title: "⏭️  Left alone by their strategy:" },
];

const LIST_LIMIT = 10;

export class StatusReporter {
  constructor(private options: Omit<RollupOptions, "dryRun" | "noInput">) {}

  /**
   * Run a dry, non-interactive rollup and print its report
   */
  async showStatus(): Promise<RollupReport> {
    const manager = new RollupManager({ ...this.options, dryRun: true, noInput: true });
    const report = await manager.rollup();
    StatusReporter.print(report);
    return report;
  }

  static print(report: RollupReport): void {
    console.log("\n📊 Rollup Status\n");
    console.log(`Template: ${report.templateDir}`);
    console.log(`Project:  ${report.targetDir}${report.isNewProject ? " (new project)" : ""}\n`);

    for (const { outcome, title } of SECTIONS) {
      const files = report.files.filter((file) => file.outcome === outcome);
      if (files.length === 0) {
        continue;
      }
      console.log(title);
      // Up to date files are the least interesting, keep them short
      const shown = outcome === "unchanged" ? files.slice(0, LIST_LIMIT) : files;
      for (const file of shown) {
        console.log(`  ${formatFile(file)}`);
      }
      if (shown.length < files.length) {
        console.log(`  ... and ${files.length - shown.length} more`);
      }
      console.log();
    }

    const pending = report.files.filter(
      (file) => file.outcome === "created" || file.outcome === "updated",
    ).length;
    console.log("Summary:");
    console.log(`  • ${report.files.length} files in the template`);
    console.log(`  • ${pending} would change`);
  }
}

function formatFile(file: FileResult): string {
  return `${file.relativePath.padEnd(30)} ← ${file.strategy}`;
}
