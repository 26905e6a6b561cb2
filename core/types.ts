/**
 * Core type definitions for the template rollup engine
 */

/**
 * Line terminator style of a text blob
 */
export type NewlineStyle = "LF" | "CRLF";

/**
 * Metadata of the template's git repository at rollup time
 */
export interface TemplateMeta {
  /** Web URL of the template project */
  projectUrl: string;
  /** HEAD commit hash */
  commitHash: string;
  /** Web URL of the HEAD commit */
  commitUrl: string;
  /** Whether the template work tree has uncommitted changes */
  isDirty: boolean;
  /** Checked out branch, null for a detached HEAD */
  headRef: string | null;
}

/**
 * Everything a strategy gets to see for a single file
 */
export interface StrategyInput {
  /** Relative POSIX path of the file inside the project */
  relativePath: string;
  /** File contents rendered from the template */
  template: Buffer;
  /** File contents in the target project, null when the file doesn't exist */
  target: Buffer | null;
  /** Template git metadata */
  meta: TemplateMeta;
  /** True when the target project has never been rolled up before */
  isNewProject: boolean;
}

/**
 * What a strategy decided for a file.
 *
 * Text contents are newline-normalised before writing, byte contents are
 * written as they are.
 */
export type StrategyOutcome =
  | { action: "skip" }
  | { action: "write"; contents: string | Buffer };

export type StrategyName =
  | "Overwrite"
  | "IfMissing"
  | "Ignore"
  | "IfNewProject"
  | "TemplateHash"
  | "SortedUniqueLines"
  | "ConfigParserMerge"
  | "SetupCfgMerge"
  | "PylintrcMerge";

export interface MergeStrategy {
  /** Strategy name */
  readonly name: StrategyName;
  /** Compute the output for a single file */
  apply(input: StrategyInput): StrategyOutcome;
}

/**
 * A rule list entry matching a (section, key) pair
 */
export interface KeyRule {
  sections: RegExp;
  keys: RegExp;
}

/**
 * A rule list entry matching a whole section
 */
export interface SectionRule {
  sections: RegExp;
}

/**
 * Structured-section merge configuration
 */
export interface MergeConfig {
  /** Keys whose values are unioned as requirement lists */
  mergeRequirements: KeyRule[];
  /** Keys whose target value wins when present */
  preserveKeys: KeyRule[];
  /** Sections whose target version wins when present */
  preserveSections: SectionRule[];
}

export type ContextType = "conf" | "setup-cfg" | "yaml";

export type GitRemoteType = "github" | "gitlab" | "bitbucket";

/**
 * Substitution context used to render a template
 */
export type TemplateContext = Record<string, string>;

export type FileOutcome = "created" | "updated" | "unchanged" | "skipped";

export interface FileResult {
  relativePath: string;
  strategy: StrategyName;
  outcome: FileOutcome;
}

export interface RollupReport {
  templateDir: string;
  targetDir: string;
  isNewProject: boolean;
  context: TemplateContext;
  files: FileResult[];
}

export enum ErrorSeverity {
  ERROR = "error",
  WARNING = "warning",
  INFO = "info",
}

export interface ConfigError {
  severity: ErrorSeverity;
  code: string;
  message: string;
  file?: string;
  line?: number;
  suggestion?: string;
}
