/**
 * prompt-template - string templates for LLM prompts with validated placeholders
 *
 * @packageDocumentation
 */

// Templates
export {
  PromptTemplate,
  createTemplate,
  parseTemplate,
  extractPlaceholders,
  replaceOccurrences,
  VALID_NAME_PATTERN,
  defaultSerializer,
  cloneValue,
  dedent,
  TemplateOptionsSchema,
  resolveTemplateOptions,
  // Errors
  TemplateSyntaxError,
  InvalidTemplateKeysError,
  MissingTemplateValuesError,
  TemplateSerializationError,
  describeType,
} from "./templates/index.js";

export type {
  TemplateValues,
  ParsedTemplate,
  PlaceholderOccurrence,
  Serializer,
  TemplateOptions,
  ResolvedTemplateOptions,
  SyntaxErrorReason,
} from "./templates/index.js";

// Library utilities
export {
  // Errors
  TemplateError,
  ConfigError,
  // Result utilities
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
  // Logger
  Logger,
  logger,
  resolveLogLevel,
  LOG_LEVEL_ENV,
} from "./lib/index.js";

export type { Result, LogLevel } from "./lib/index.js";
