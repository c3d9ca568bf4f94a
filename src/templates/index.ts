/**
 * Prompt Template Module
 *
 * - Parse `${name}` placeholders, leaving literal JSON braces alone
 * - Store deep-copied defaults
 * - Substitute some placeholders, or render all of them
 * - Serialize non-string values through a pluggable serializer
 *
 * @example
 * ```typescript
 * import { PromptTemplate } from "prompt-template";
 *
 * const template = new PromptTemplate('Classify ${text} as {"label": "..."}');
 * template.render({ text: "great product" });
 * ```
 */

export { PromptTemplate, createTemplate, type TemplateValues } from "./template.js";
export {
  parseTemplate,
  extractPlaceholders,
  replaceOccurrences,
  VALID_NAME_PATTERN,
  type ParsedTemplate,
  type PlaceholderOccurrence,
} from "./parser.js";
export { defaultSerializer, type Serializer } from "./serializer.js";
export { cloneValue } from "./clone.js";
export { dedent } from "./dedent.js";
export {
  TemplateOptionsSchema,
  resolveTemplateOptions,
  type TemplateOptions,
  type ResolvedTemplateOptions,
} from "./options.js";
export {
  TemplateSyntaxError,
  InvalidTemplateKeysError,
  MissingTemplateValuesError,
  TemplateSerializationError,
  describeType,
  type SyntaxErrorReason,
} from "./errors.js";
