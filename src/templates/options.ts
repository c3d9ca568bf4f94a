import { z } from "zod";

import { ConfigError } from "../lib/errors.js";

import type { Serializer } from "./serializer.js";

/**
 * Template options schema
 */
export const TemplateOptionsSchema = z
  .object({
    /** Identifier used for equality, display and error messages */
    name: z.string().optional(),
    /** Replaces the default serialization policy */
    serializer: z.custom<Serializer>((value) => typeof value === "function", {
      message: "serializer must be a function",
    }).optional(),
    /** Strip common indentation and surrounding whitespace from rendered output */
    dedent: z.boolean().optional(),
  })
  .strict();

export type TemplateOptions = z.infer<typeof TemplateOptionsSchema>;

/**
 * Options after defaults are applied
 */
export interface ResolvedTemplateOptions {
  name: string;
  serializer: Serializer | undefined;
  dedent: boolean;
}

/**
 * Validate options, accepting a bare string as the template name
 *
 * @throws ConfigError when the options do not match the schema
 */
export function resolveTemplateOptions(
  options: TemplateOptions | string | undefined
): ResolvedTemplateOptions {
  const input = typeof options === "string" ? { name: options } : options ?? {};
  const result = TemplateOptionsSchema.safeParse(input);

  if (!result.success) {
    throw new ConfigError("Invalid template options", {
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  return {
    name: result.data.name ?? "",
    serializer: result.data.serializer,
    dedent: result.data.dedent ?? false,
  };
}
