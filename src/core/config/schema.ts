/**
 * Configuration schema. Keys are snake_case, as written in config.yaml.
 */
import { z } from 'zod';

/**
 * Makes an object field optional and applies the inner schema's defaults
 * when it is missing (undefined or null).
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Documentation dialects understood by the docstring extractor. */
export const DocstringDialectSchema = z.enum(['google', 'numpy', 'rst', 'jsdoc']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Help rendering, forwarded to commander's help configuration. */
export const HelpSettingsSchema = z.object({
  sort_options: z.boolean().default(false),
  sort_subcommands: z.boolean().default(false),
  show_global_options: z.boolean().default(false),
  /** Print the full help after a usage error, not just the error line */
  show_help_after_error: z.boolean().default(false),
  width: z.number().int().min(40).optional(),
});

export const ConfigSchema = z.object({
  /** Dialect used by ConstructorParser when none is passed */
  docstring_dialect: DocstringDialectSchema.default('google'),
  /** parseArgs exits the process on usage errors and terminal actions */
  exit_on_error: z.boolean().default(true),
  log_level: LogLevelSchema.default('warn'),
  help: withDefaults(HelpSettingsSchema),
});

export type Config = z.output<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type HelpSettings = z.output<typeof HelpSettingsSchema>;
export type DocstringDialect = z.output<typeof DocstringDialectSchema>;
