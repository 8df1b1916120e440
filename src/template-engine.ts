// src/template-engine.ts — Single-pass placeholder substitution
// Section text is inserted verbatim and never rescanned, so placeholder-shaped
// text inside a section survives as-is.

import { PLACEHOLDER_NAMES, TemplateError } from "./types.js";
import type { DocumentSections, PlaceholderName } from "./types.js";
import { TIKZ_STANDALONE_TEMPLATE } from "./templates/tikz-standalone.js";

const PLACEHOLDER_PATTERN = /\{\{([A-Z_]+)\}\}/g;

/**
 * Replace every `{{NAME}}` in the template with `sections[NAME]`.
 * Throws TemplateError for a placeholder with no section and for a missing section.
 */
export function renderTemplate(
  sections: DocumentSections,
  template: string = TIKZ_STANDALONE_TEMPLATE,
): string {
  for (const name of PLACEHOLDER_NAMES) {
    if (typeof sections[name] !== "string") {
      throw new TemplateError(`Missing section for placeholder {{${name}}}`, name);
    }
  }

  return template.replace(PLACEHOLDER_PATTERN, (token: string, name: string) => {
    if (!isPlaceholderName(name)) {
      throw new TemplateError(`Unknown placeholder ${token} in template`, name);
    }
    return sections[name];
  });
}

/**
 * Placeholder names found in a template, in order of appearance.
 */
export function listPlaceholders(template: string = TIKZ_STANDALONE_TEMPLATE): string[] {
  return Array.from(template.matchAll(PLACEHOLDER_PATTERN), (m) => m[1]);
}

function isPlaceholderName(name: string): name is PlaceholderName {
  return PLACEHOLDER_NAMES.some((known) => known === name);
}
