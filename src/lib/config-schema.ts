/**
 * Configuration Schema Validation
 *
 * Zod schemas for validating CLI configuration and JSON filter files.
 * Provides runtime type safety and helpful error messages for misconfiguration.
 */

import { z } from 'zod';

/**
 * CLI Configuration Schema
 *
 * Validates configuration from .wikisqlrc files and environment variables.
 */
export const CliConfigSchema = z.object({
  /** Directory CSV files are written to when no output path is given */
  outputDir: z.string().min(1).optional(),

  /** Rows between progress log lines */
  progressInterval: z.number().int().positive().optional(),

  /** Input compression */
  compression: z.enum(['auto', 'gzip', 'none']).optional(),

  /** Minimum log level */
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

/** Type inferred from CliConfigSchema */
export type CliConfig = z.infer<typeof CliConfigSchema>;

const columnList = z.array(z.string().min(1));
const valueLists = z.record(z.string().min(1), z.array(z.string()));

/**
 * Filter file schema
 *
 * `{ "keepColumnNames": [...], "allowlists": { "page_namespace": ["0"] } }`
 */
export const FilterSpecSchema = z
  .object({
    keepColumnNames: columnList.optional(),
    dropColumnNames: columnList.optional(),
    allowlists: valueLists.optional(),
    blocklists: valueLists.optional(),
  })
  .strict();

/** Type inferred from FilterSpecSchema */
export type FilterSpecInput = z.infer<typeof FilterSpecSchema>;

/**
 * Safely validate CLI configuration without throwing
 */
export function safeValidateCliConfig(config: unknown): z.SafeParseReturnType<unknown, CliConfig> {
  return CliConfigSchema.safeParse(config);
}

/**
 * Safely validate a filter file's contents without throwing
 */
export function safeValidateFilterSpec(
  spec: unknown
): z.SafeParseReturnType<unknown, FilterSpecInput> {
  return FilterSpecSchema.safeParse(spec);
}

/**
 * Format Zod validation errors for user display
 *
 * @param error - Zod error object
 * @returns Formatted error message string
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n');
}
