import { TemplateSyntaxError } from "./errors.js";

/**
 * Valid placeholder identifier: letter or underscore, then letters, digits, underscores
 */
export const VALID_NAME_PATTERN = /^[_a-zA-Z][_a-zA-Z0-9]*$/;

/**
 * One `${name}` occurrence in a template source
 */
export interface PlaceholderOccurrence {
  /** Identifier between the braces */
  name: string;
  /** Index of the `$` */
  start: number;
  /** Index just past the closing `}` */
  end: number;
}

/**
 * Result of parsing a template source
 */
export interface ParsedTemplate {
  /** Distinct names in order of first occurrence */
  placeholders: string[];
  /** Every occurrence, in source order */
  occurrences: PlaceholderOccurrence[];
}

/**
 * Parse `${name}` placeholders from a template source
 *
 * Braces outside a `${...}` span are literal text, so JSON bodies
 * embedded in a prompt pass through untouched. Inside a placeholder
 * only a bare identifier is allowed.
 *
 * @param source Raw template text
 * @param templateName Name used to prefix error messages
 * @throws TemplateSyntaxError on an unclosed, nested, empty or invalid placeholder
 *
 * @example
 * ```typescript
 * parseTemplate('Reply as JSON: {"user": "${user}"}').placeholders; // ["user"]
 * ```
 */
export function parseTemplate(source: string, templateName?: string): ParsedTemplate {
  const occurrences: PlaceholderOccurrence[] = [];
  const seen = new Set<string>();
  const placeholders: string[] = [];

  let i = 0;
  while (i < source.length) {
    if (source[i] !== "$" || source[i + 1] !== "{") {
      i += 1;
      continue;
    }

    const start = i;
    let j = i + 2;
    while (j < source.length && source[j] !== "}") {
      if (source[j] === "{") {
        throw new TemplateSyntaxError("nested", source.slice(start, j + 1), start, templateName);
      }
      j += 1;
    }

    if (j >= source.length) {
      throw new TemplateSyntaxError("unclosed", source.slice(start), start, templateName);
    }

    const name = source.slice(start + 2, j);
    const fragment = source.slice(start, j + 1);
    if (name.length === 0) {
      throw new TemplateSyntaxError("empty-name", fragment, start, templateName);
    }
    if (!VALID_NAME_PATTERN.test(name)) {
      throw new TemplateSyntaxError("invalid-name", fragment, start, templateName);
    }

    occurrences.push({ name, start, end: j + 1 });
    if (!seen.has(name)) {
      seen.add(name);
      placeholders.push(name);
    }
    i = j + 1;
  }

  return { placeholders, occurrences };
}

/**
 * Get unique placeholder names from a template source
 */
export function extractPlaceholders(source: string): string[] {
  return parseTemplate(source).placeholders;
}

/**
 * Rebuild a source, replacing the occurrences whose name has a replacement
 *
 * Replacement text is never re-scanned, so a value that itself contains
 * `${...}` is inserted verbatim.
 */
export function replaceOccurrences(
  source: string,
  occurrences: readonly PlaceholderOccurrence[],
  replacements: ReadonlyMap<string, string>
): string {
  let output = "";
  let cursor = 0;

  for (const occurrence of occurrences) {
    const replacement = replacements.get(occurrence.name);
    if (replacement === undefined) {
      continue;
    }
    output += source.slice(cursor, occurrence.start) + replacement;
    cursor = occurrence.end;
  }

  return output + source.slice(cursor);
}
