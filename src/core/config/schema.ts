import { z } from 'zod'

/**
 * Default R install command. The library and package paths are appended.
 */
export const DEFAULT_INSTALL_COMMAND: readonly string[] = ['R', 'CMD', 'INSTALL', '-l']

/**
 * Configuration file schema
 */
export const ConfigSchema = z.object({
  sparkHome: z.string()
    .min(1, 'sparkHome must not be empty')
    .optional()
    .describe('Spark installation used when SPARK_HOME is not set'),

  installCommand: z.array(z.string().min(1, 'Command parts must not be empty'))
    .min(1, 'installCommand needs at least the executable')
    .default(() => [...DEFAULT_INSTALL_COMMAND])
    .describe('Command that installs an R package, before the library and package paths'),

  workDir: z.string()
    .min(1, 'workDir must not be empty')
    .optional()
    .describe('Parent directory for scratch directories'),

  inheritEnv: z.boolean()
    .default(false)
    .describe('Pass the parent environment to the install command')
}).strict()

export type Config = z.infer<typeof ConfigSchema>

export type ValidationResult =
  | { success: true; data: Config }
  | { success: false; errors: z.ZodError }

/**
 * Validate raw configuration data, throwing on failure
 */
export function validateConfig(data: unknown): Config {
  return ConfigSchema.parse(data ?? {})
}

/**
 * Validate raw configuration data without throwing
 */
export function validateConfigSafe(data: unknown): ValidationResult {
  const result = ConfigSchema.safeParse(data ?? {})
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: result.error }
}

/**
 * Format zod issues as `path: message` lines
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}
