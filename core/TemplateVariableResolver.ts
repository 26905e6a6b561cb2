/**
 * Template Variable Resolver
 *
 * Resolves {{ variable }} placeholders in strings from a template context
 */

import { RenderError } from "./errors.js";
import type { TemplateContext } from "./types.js";

const PLACEHOLDER = /\{\{\s*([\w.-]+)\s*\}\}/g;

export class TemplateVariableResolver {
  /**
   * Resolve template variables in a string
   * @param template String containing {{ variable }} placeholders
   * @returns Resolved string with variables substituted
   * @throws RenderError if any variable is missing from the context
   */
  static resolve(template: string, context: TemplateContext, file?: string): string {
    const missingVars: string[] = [];

    const result = template.replace(PLACEHOLDER, (placeholder, varName: string) => {
      const value = Object.prototype.hasOwnProperty.call(context, varName)
        ? context[varName]
        : undefined;
      if (value === undefined) {
        if (!missingVars.includes(varName)) {
          missingVars.push(varName);
        }
        return placeholder;
      }
      return value;
    });

    if (missingVars.length > 0) {
      throw new RenderError(`Missing template variables: ${missingVars.join(", ")}`, file);
    }

    return result;
  }

  /**
   * Check if a string contains template variables
   */
  static hasVariables(template: string): boolean {
    return new RegExp(PLACEHOLDER.source).test(template);
  }

  /**
   * Extract all variable names from a template
   */
  static extractVariables(template: string): string[] {
    const matches = Array.from(template.matchAll(PLACEHOLDER));
    return [...new Set(matches.map((m) => m[1]))];
  }
}
