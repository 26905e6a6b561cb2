/**
 * Context Store
 *
 * Reads the template context a previous rollup recorded in the project, so
 * that later rollups can run without asking for the variables again
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { IniDocument } from "../parsers/IniDocument.js";
import { ContextError, isErrnoCode, ParseError } from "./errors.js";
import { compareOrdinal } from "./newline.js";
import type { ContextType, TemplateContext } from "./types.js";

const documentSchema = z.record(z.string(), z.unknown());
const contextSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean(), z.null()]),
);

export interface ContextStore {
  /** File holding the context, relative to the project root */
  readonly fileName: string;
  /**
   * Read the context of a project
   * @returns null when the file doesn't exist
   * @throws ContextError when the file is corrupt or holds no context
   */
  read(projectDir: string): Promise<TemplateContext | null>;
  /** Whether the renderer writes the file, rather than the template */
  readonly writtenByRenderer: boolean;
  serialize(context: TemplateContext): string;
}

async function readIfExists(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, "utf-8");
  } catch (error: unknown) {
    if (isErrnoCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

/**
 * Context kept as a section of an INI file
 */
export class IniContextStore implements ContextStore {
  constructor(
    public readonly fileName: string,
    private readonly sectionName: string,
    public readonly writtenByRenderer: boolean,
  ) {}

  async read(projectDir: string): Promise<TemplateContext | null> {
    const text = await readIfExists(path.join(projectDir, this.fileName));
    if (text === null) {
      return null;
    }

    let document: IniDocument;
    try {
      document = IniDocument.parse(text, this.fileName);
    } catch (error: unknown) {
      if (error instanceof ParseError) {
        throw new ContextError(this.fileName, error.message);
      }
      throw error;
    }

    const section = document.section(this.sectionName);
    if (section === undefined || section.keys().length === 0) {
      throw new ContextError(this.fileName, `no context in the [${this.sectionName}] section`);
    }
    return section.toRecord();
  }

  serialize(context: TemplateContext): string {
    const document = new IniDocument();
    const section = document.ensureSection(this.sectionName);
    for (const [key, value] of Object.entries(context)) {
      section.set(key, value.includes("\n") ? value.split("\n") : value);
    }
    return document.serialize();
  }
}

/**
 * Context kept under a top-level key of a YAML document
 */
export class YamlContextStore implements ContextStore {
  readonly writtenByRenderer = true;

  constructor(
    public readonly fileName: string,
    private readonly key: string,
  ) {}

  async read(projectDir: string): Promise<TemplateContext | null> {
    const text = await readIfExists(path.join(projectDir, this.fileName));
    if (text === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = YAML.parse(text);
    } catch (error: unknown) {
      throw new ContextError(
        this.fileName,
        error instanceof Error ? error.message : String(error),
      );
    }

    const document = documentSchema.safeParse(parsed);
    const section = contextSchema.safeParse(document.success ? document.data[this.key] : undefined);
    if (!section.success) {
      throw new ContextError(this.fileName, `no \`${this.key}\` mapping of scalar values`);
    }

    const context: TemplateContext = {};
    for (const [key, value] of Object.entries(section.data)) {
      context[key] = value === null ? "" : String(value);
    }
    if (Object.keys(context).length === 0) {
      throw new ContextError(this.fileName, `\`${this.key}\` is empty`);
    }
    return context;
  }

  serialize(context: TemplateContext): string {
    const sorted = Object.fromEntries(
      Object.entries(context).sort(([a], [b]) => compareOrdinal(a, b)),
    );
    return YAML.stringify({ [this.key]: sorted });
  }
}

export const CONTEXT_SECTION = "template_context";

export function createContextStore(type: ContextType): ContextStore {
  switch (type) {
    case "conf":
      return new IniContextStore(".template-rollup.conf", CONTEXT_SECTION, true);
    case "setup-cfg":
      return new IniContextStore("setup.cfg", `tool:${CONTEXT_SECTION}`, false);
    case "yaml":
      return new YamlContextStore(".template-rollup.yaml", CONTEXT_SECTION);
  }
}
