/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating declarations, options and dependency manifests
 * at runtime.
 *
 * @module
 */

import { z } from "zod";
import type { Logger } from "pino";

// =============================================================================
// Property Names
// =============================================================================

/**
 * A property name: an identifier usable as a plain object key
 */
export const PropertyNameSchema = z
  .string()
  .regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, { message: "must be an identifier" })
  .refine((name) => name !== "__proto__", { message: "__proto__ is reserved" });

// =============================================================================
// Declarations
// =============================================================================

const isFunction = (value: unknown): boolean => typeof value === "function";

const isIterable = (value: unknown): boolean =>
  typeof value === "object" && value !== null && Symbol.iterator in value;

/**
 * Clause shape: three functions and an iterable of names
 */
export const ClauseShapeSchema = z.object({
  pattern: z.custom<unknown>(isFunction, { message: "pattern must be a function" }),
  guard: z.custom<unknown>(isFunction, { message: "guard must be a function" }),
  body: z.custom<unknown>(isFunction, { message: "body must be a function" }),
  requiredNames: z.custom<Iterable<unknown>>(isIterable, {
    message: "requiredNames must be iterable",
  }),
});

/**
 * Property declaration shape. Only the structure is checked here; the
 * functions themselves are opaque.
 */
export const DeclarationShapeSchema = z.object({
  name: PropertyNameSchema,
  clauses: z.array(ClauseShapeSchema),
  requiredNames: z.custom<Iterable<unknown>>(isIterable, {
    message: "requiredNames must be iterable",
  }),
});

// =============================================================================
// Schema Options
// =============================================================================

/**
 * Options accepted by buildSchema
 */
export const SchemaOptionsSchema = z.object({
  /** Label used in logs and error context */
  name: z.string().min(1).default("properties"),

  /** Logger to use instead of the module logger */
  logger: z.custom<Logger>(
    (value) => typeof value === "object" && value !== null && "child" in value && "debug" in value,
    { message: "logger must be a pino logger" }
  ).optional(),
});

export type SchemaOptions = z.input<typeof SchemaOptionsSchema>;

// =============================================================================
// Dependency Manifest
// =============================================================================

/**
 * JSON manifest describing only names and dependencies, read by the CLI
 */
export const ManifestSchema = z.object({
  name: z.string().min(1).default("properties"),
  properties: z.array(
    z.object({
      name: PropertyNameSchema,
      requires: z.array(PropertyNameSchema).default([]),
    })
  ),
});

export type Manifest = z.output<typeof ManifestSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
