/**
 * Option parsing helpers for the CLI
 */

import * as readline from "node:readline/promises";
import { InvalidArgumentError } from "commander";
import type { Prompt } from "../core/PlaceholderRenderer.js";
import type { TemplateContext } from "../core/types.js";

/**
 * Accumulate repeated `key=value` pairs into a context
 */
export function collectContext(pair: string, previous: TemplateContext = {}): TemplateContext {
  const separator = pair.indexOf("=");
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${pair}"`);
  }
  return { ...previous, [pair.slice(0, separator)]: pair.slice(separator + 1) };
}

/**
 * Ask for each value on the terminal; an empty answer takes the default
 */
export function terminalPrompt(): { prompt: Prompt; close(): void } {
  let rl: readline.Interface | undefined;

  return {
    async prompt(name: string, defaultValue: string): Promise<string> {
      rl ??= readline.createInterface({ input: process.stdin, output: process.stdout });
      const answer = (await rl.question(`  ${name} [${defaultValue}]: `)).trim();
      return answer === "" ? defaultValue : answer;
    },
    close(): void {
      rl?.close();
    },
  };
}
