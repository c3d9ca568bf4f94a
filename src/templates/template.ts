import { TemplateError } from "../lib/errors.js";
import { logger, type Logger } from "../lib/logger.js";
import { ok, err, tryCatch, type Result } from "../lib/result.js";

import { cloneValue } from "./clone.js";
import { dedent } from "./dedent.js";
import {
  InvalidTemplateKeysError,
  MissingTemplateValuesError,
  TemplateSerializationError,
  describeType,
} from "./errors.js";
import { resolveTemplateOptions, type ResolvedTemplateOptions, type TemplateOptions } from "./options.js";
import { parseTemplate, replaceOccurrences, type ParsedTemplate } from "./parser.js";
import { defaultSerializer } from "./serializer.js";

/**
 * Values keyed by placeholder name
 *
 * A key whose value is `undefined` counts as not supplied.
 */
export type TemplateValues = Readonly<Record<string, unknown>>;

/**
 * A prompt template with `${name}` placeholders
 *
 * Source and placeholders are fixed at construction; only the defaults
 * change, through `setDefault`. Defaults are unsynchronized state, so
 * share an instance across callers only after it is set up.
 *
 * @example
 * ```typescript
 * const greeting = new PromptTemplate("Hello ${name}, you have ${count} tasks", "greeting");
 * greeting.setDefault({ count: 0 });
 *
 * greeting.render({ name: "Alice" }); // "Hello Alice, you have 0 tasks"
 *
 * const forBob = greeting.substitute({ name: "Bob" });
 * forBob.placeholders; // ["count"]
 * ```
 */
export class PromptTemplate {
  readonly name: string;
  readonly source: string;

  private readonly parsed: ParsedTemplate;
  private readonly options: ResolvedTemplateOptions;
  private readonly storedDefaults = new Map<string, unknown>();
  private readonly log: Logger;

  /**
   * @param source Template text
   * @param options Template options, or just the template name
   * @throws TemplateSyntaxError when a placeholder is malformed
   * @throws ConfigError when the options are invalid
   */
  constructor(source: string, options?: TemplateOptions | string) {
    this.options = resolveTemplateOptions(options);
    this.name = this.options.name;
    this.source = source;
    this.log = logger.child(this.name ? `[template:${this.name}]` : "[template]");
    this.parsed = parseTemplate(source, this.name);
    this.log.debug(`Parsed ${this.parsed.placeholders.length} placeholder(s)`, this.parsed.placeholders);
  }

  /**
   * Distinct placeholder names in order of first occurrence
   */
  get placeholders(): string[] {
    return [...this.parsed.placeholders];
  }

  /**
   * Snapshot of the stored defaults
   */
  get defaults(): ReadonlyMap<string, unknown> {
    return new Map(this.storedDefaults);
  }

  /**
   * Store defaults, deep-copying each value
   *
   * Keys need not be declared placeholders; a default for an unknown key
   * is kept and ignored when rendering.
   */
  setDefault(values: TemplateValues): void {
    for (const [key, value] of suppliedEntries(values)) {
      this.storedDefaults.set(key, value instanceof PromptTemplate ? value.copy() : cloneValue(value));
    }
  }

  /**
   * Fill some placeholders and return a new template for the rest
   *
   * A PromptTemplate value is inserted as its source, so its placeholders
   * join the new template's.
   *
   * @throws InvalidTemplateKeysError when a key is not a placeholder
   * @throws TemplateSerializationError when a value cannot be serialized
   * @throws TemplateSyntaxError when the rewritten source is malformed
   */
  substitute(values: TemplateValues): PromptTemplate {
    const supplied = suppliedEntries(values);
    this.assertKnownKeys(supplied.map(([key]) => key));

    const replacements = new Map<string, string>();
    for (const [key, value] of supplied) {
      replacements.set(key, value instanceof PromptTemplate ? value.source : this.serializeValue(key, value));
    }

    const next = this.derive(replaceOccurrences(this.source, this.parsed.occurrences, replacements));
    const remaining = new Set(next.parsed.placeholders);

    for (const [key, value] of this.storedDefaults) {
      if (remaining.has(key) && !replacements.has(key)) {
        next.setDefault({ [key]: value });
      }
    }
    for (const [, value] of supplied) {
      if (!(value instanceof PromptTemplate)) {
        continue;
      }
      for (const [key, nested] of value.storedDefaults) {
        if (remaining.has(key) && !next.storedDefaults.has(key)) {
          next.setDefault({ [key]: nested });
        }
      }
    }

    this.log.debug(`Substituted ${[...replacements.keys()].join(",")}`);
    return next;
  }

  /**
   * Render the template, with supplied values overriding defaults
   *
   * @throws InvalidTemplateKeysError when a supplied key is not a placeholder
   * @throws MissingTemplateValuesError when a placeholder has no value
   * @throws TemplateSerializationError when a value cannot be serialized
   */
  render(values: TemplateValues = {}): string {
    const supplied = suppliedEntries(values);
    this.assertKnownKeys(supplied.map(([key]) => key));

    const effective = new Map(this.storedDefaults);
    for (const [key, value] of supplied) {
      effective.set(key, value);
    }

    const missing = this.parsed.placeholders.filter((name) => !effective.has(name));
    if (missing.length > 0) {
      throw new MissingTemplateValuesError(missing, this.name);
    }

    const replacements = new Map<string, string>();
    for (const name of this.parsed.placeholders) {
      const value = effective.get(name);
      replacements.set(name, value instanceof PromptTemplate ? value.render() : this.serializeValue(name, value));
    }

    const output = replaceOccurrences(this.source, this.parsed.occurrences, replacements);
    this.log.debug(`Rendered ${output.length} characters`);
    return this.options.dedent ? dedent(output) : output;
  }

  /**
   * Render without throwing template errors
   */
  safeRender(values: TemplateValues = {}): Result<string, TemplateError> {
    try {
      return ok(this.render(values));
    } catch (error) {
      if (error instanceof TemplateError) {
        return err(error);
      }
      throw error;
    }
  }

  /**
   * Convert a value to text
   *
   * Uses the `serializer` option when given, the default policy otherwise.
   * Subclasses may override this; they should also override `derive`.
   */
  serialize(value: unknown): string {
    return (this.options.serializer ?? defaultSerializer)(value);
  }

  /**
   * Two templates are equal when name and source match
   */
  equals(other: unknown): boolean {
    return other instanceof PromptTemplate && other.name === this.name && other.source === this.source;
  }

  toString(): string {
    const label = this.name ? ` [${this.name}]` : "";
    return `${this.constructor.name}${label}:\n\n${this.source}`;
  }

  /**
   * Build the template returned by `substitute`
   */
  protected derive(source: string): PromptTemplate {
    return new PromptTemplate(source, {
      name: this.name,
      serializer: this.options.serializer,
      dedent: this.options.dedent,
    });
  }

  /**
   * Same template with its own copy of the defaults
   */
  private copy(): PromptTemplate {
    const copy = this.derive(this.source);
    for (const [key, value] of this.storedDefaults) {
      copy.setDefault({ [key]: value });
    }
    return copy;
  }

  private assertKnownKeys(keys: string[]): void {
    const declared = new Set(this.parsed.placeholders);
    const invalid = keys.filter((key) => !declared.has(key));
    if (invalid.length > 0) {
      throw new InvalidTemplateKeysError(invalid, this.placeholders, this.name);
    }
  }

  private serializeValue(key: string, value: unknown): string {
    // Custom serializers are only typed, not checked, to return strings
    const result = tryCatch((): unknown => this.serialize(value));
    if (!result.success) {
      this.log.debug(`Serialization failed for '${key}'`);
      throw new TemplateSerializationError(key, value, result.error, this.name);
    }
    if (typeof result.data !== "string") {
      const error = new TypeError(`Serializer returned ${describeType(result.data)} instead of a string`);
      throw new TemplateSerializationError(key, value, error, this.name);
    }
    return result.data;
  }
}

function suppliedEntries(values: TemplateValues): Array<[string, unknown]> {
  return Object.entries(values).filter(([, value]) => value !== undefined);
}

/**
 * Factory function to create a PromptTemplate
 */
export function createTemplate(source: string, options?: TemplateOptions | string): PromptTemplate {
  return new PromptTemplate(source, options);
}
