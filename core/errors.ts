/**
 * Error types raised by the rollup engine
 */

/**
 * Invalid template configuration: unknown strategy, malformed strategy
 * config, a pattern that doesn't compile. Raised before any file is touched.
 */
export class ConfigurationError extends Error {
  public readonly binding?: string;
  public readonly issues: string[];

  constructor(message: string, options: { binding?: string; issues?: string[] } = {}) {
    const issues = options.issues ?? [];
    super(
      (options.binding !== undefined ? `${message} (binding "${options.binding}")` : message) +
        (issues.length > 0 ? `: ${issues.join("; ")}` : "")
    );
    this.name = "ConfigurationError";
    this.binding = options.binding;
    this.issues = issues;
  }
}

/**
 * A structured or line-set blob that can't be parsed
 */
export class ParseError extends Error {
  public readonly source: string;
  public readonly line?: number;

  constructor(source: string, message: string, line?: number) {
    super(line !== undefined ? `${source}, line ${line}: ${message}` : `${source}: ${message}`);
    this.name = "ParseError";
    this.source = source;
    this.line = line;
  }
}

/**
 * Persisted context is corrupt, empty, or required but missing
 */
export class ContextError extends Error {
  public readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = "ContextError";
    this.file = file;
  }
}

/**
 * The template directory doesn't produce what a rollup needs
 */
export class InvalidTemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTemplateError";
  }
}

export class RenderError extends Error {
  public readonly file?: string;

  constructor(message: string, file?: string) {
    super(file !== undefined ? `${file}: ${message}` : message);
    this.name = "RenderError";
    this.file = file;
  }
}

export class GitError extends Error {
  public readonly command: string[];
  public readonly cwd: string;

  constructor(command: string[], cwd: string, details: string) {
    super(
      `git ${command.join(" ")} failed in '${cwd}'. Ensure that it is a valid git repo.\n${details}`
    );
    this.name = "GitError";
    this.command = command;
    this.cwd = cwd;
  }
}

/**
 * A relative path that would resolve outside of the target root
 */
export class PathTraversalError extends Error {
  public readonly relativePath: string;

  constructor(relativePath: string, root: string) {
    super(`Refusing to write ${relativePath}: resolves outside of ${root}`);
    this.name = "PathTraversalError";
    this.relativePath = relativePath;
  }
}

/**
 * Node's errno-style error check
 */
export function isErrnoCode(error: unknown, code: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === code
  );
}
