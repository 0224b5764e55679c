/**
 * @module options
 * @description Zod schemas for the data half of the logger options.
 * Functions (`logPrint`, `filter`, `clock`) are not part of the schema and
 * are passed through untouched by the config loader.
 */

import { z } from "zod";

export const ColorSchema = z.enum([
  "red",
  "black",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "white",
  "reset",
]);

export const LogLevelSchema = z.enum([
  "error",
  "warn",
  "info",
  "verbose",
  "debug",
  "silly",
]);

/**
 * Layout of the structured pretty-printer. `maxWidth` is the number of
 * display columns before wrapping and must stay positive: every chunking
 * step divides by it.
 */
export const FormatOptionsSchema = z.object({
  maxWidth: z.number().int().positive(),
  compact: z.boolean(),
  initialIndentLevel: z.number().int().nonnegative(),
  chunkSize: z.number().int().positive(),
  maxDepth: z.number().int().positive(),
});

export const LoggerOptionsSchema = z.object({
  request: z.boolean(),
  requestHeader: z.boolean(),
  requestBody: z.boolean(),
  responseHeader: z.boolean(),
  responseBody: z.boolean(),
  error: z.boolean(),
  maxWidth: z.number().int().positive(),
  compact: z.boolean(),
  enabled: z.boolean(),
  logLevel: LogLevelSchema.optional(),
  defaultColor: ColorSchema,
  requestColor: ColorSchema.optional(),
  headerColor: ColorSchema.optional(),
  bodyColor: ColorSchema.optional(),
  errorColor: ColorSchema.optional(),
  responseColor: ColorSchema.optional(),
  responseHeaderColor: ColorSchema.optional(),
  responseStatusColor: ColorSchema.optional(),
});

export type FormatOptions = z.infer<typeof FormatOptionsSchema>;
export type LoggerOptionsData = z.infer<typeof LoggerOptionsSchema>;

/**
 * Flattens zod issues into the single-line message thrown on invalid input.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new Error(
      `PrettyAxiosLogger: invalid options: ${describeIssues(result.error)}`
    );
  }
  return result.data;
}
