import { ConfigError, formatZodIssues, mappingConfigSchema } from '@rdg-mapper/core';
import type { MappingConfig, MappingConfigInput } from '@rdg-mapper/core';

/**
 * Validate mapping options and fill defaults.
 *
 * @throws ConfigError listing every invalid option
 */
export function resolveMappingConfig(input: MappingConfigInput = {}): MappingConfig {
  const parsed = mappingConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(formatZodIssues('Invalid mapping configuration', parsed.error), {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return parsed.data;
}
