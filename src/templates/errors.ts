import { TemplateError } from "../lib/errors.js";

/**
 * Why a placeholder failed to parse
 */
export type SyntaxErrorReason = "unclosed" | "nested" | "empty-name" | "invalid-name";

const REASON_MESSAGES: Record<SyntaxErrorReason, string> = {
  unclosed: "Unclosed variable declaration",
  nested: "Nested variable declaration",
  "empty-name": "Empty variable name",
  "invalid-name": "Invalid variable name",
};

/**
 * Error for malformed placeholder syntax, raised at construction
 */
export class TemplateSyntaxError extends TemplateError {
  constructor(
    public readonly reason: SyntaxErrorReason,
    /** Offending text, starting at `${` */
    public readonly fragment: string,
    /** Index of the `$` that opened the placeholder */
    public readonly position: number,
    templateName?: string
  ) {
    super(
      `${REASON_MESSAGES[reason]} at position ${position}: '${fragment}'`,
      "TEMPLATE_SYNTAX_ERROR",
      templateName,
      { reason, fragment, position }
    );
    this.name = "TemplateSyntaxError";
  }
}

/**
 * Error for keys the template does not declare
 */
export class InvalidTemplateKeysError extends TemplateError {
  constructor(
    public readonly invalidKeys: string[],
    public readonly validKeys: string[],
    templateName?: string
  ) {
    super(
      `Invalid keys provided to PromptTemplate: ${invalidKeys.join(",")}\n\n` +
        `Note: the template defines the following variables: ${validKeys.join(",")}`,
      "INVALID_TEMPLATE_KEYS",
      templateName,
      { invalidKeys, validKeys }
    );
    this.name = "InvalidTemplateKeysError";
  }
}

/**
 * Error for placeholders left without a value after merging defaults
 */
export class MissingTemplateValuesError extends TemplateError {
  constructor(
    public readonly missingValues: string[],
    templateName?: string
  ) {
    super(
      `Missing values for variables: ${missingValues.join(",")}`,
      "MISSING_TEMPLATE_VALUES",
      templateName,
      { missingValues }
    );
    this.name = "MissingTemplateValuesError";
  }
}

/**
 * Error for a value the serializer could not turn into text
 */
export class TemplateSerializationError extends TemplateError {
  public readonly valueType: string;

  constructor(
    public readonly key: string,
    value: unknown,
    public readonly originalError: Error,
    templateName?: string
  ) {
    const valueType = describeType(value);
    super(
      `Failed to serialize value for key '${key}' (${valueType}): ${originalError.message}`,
      "TEMPLATE_SERIALIZATION_ERROR",
      templateName,
      { key, valueType }
    );
    this.name = "TemplateSerializationError";
    this.valueType = valueType;
    this.cause = originalError;
  }
}

/**
 * Name the runtime type of a value: the constructor name for objects
 */
export function describeType(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null) {
      return "Object";
    }
    const name: unknown = value.constructor?.name;
    return typeof name === "string" && name.length > 0 ? name : "Object";
  }
  if (typeof value === "function") {
    return "Function";
  }
  return typeof value;
}
