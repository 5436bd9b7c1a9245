/**
 * Cascade configuration
 * Loaded from environment variables, validated with zod and cached.
 */

import { z } from 'zod';
import { CascadeError, ErrorCategory } from '../types/index.js';

const flagText = z
  .string()
  .transform(value => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false']));

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .pipe(flagText)
    .transform(value => value === 'true');

export const cascadeEnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  CASCADE_LOOKUP_LIMIT: z.coerce.number().int().min(0).default(3),
  CASCADE_INCLUDE_TECHNICAL_FIELDS: booleanFlag('true'),
  CASCADE_ATTRIBUTE_ORDER_START: z.coerce.number().int().min(0).default(100),
  CASCADE_ORDER_OFFSET: z.coerce.number().int().min(0).default(100),
  CASCADE_LOG_TO_CONSOLE: flagText.optional()
});

export interface CascadeConfig {
  /** Maximum columns a lookup relation contributes */
  lookupLimit: number;
  includeTechnicalFields: boolean;
  /** Floor of the attribute order counter */
  attributeOrderStart: number;
  /** Added to the upstream order of non-attribute columns */
  orderOffset: number;
  logToConsole: boolean;
}

let cachedConfig: CascadeConfig | null = null;

/**
 * Parse configuration from an environment map
 */
export function parseCascadeConfig(env: Record<string, string | undefined>): CascadeConfig {
  const result = cascadeEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    console.error('[CascadeConfig] Configuration validation failed:', issues);
    throw new CascadeError(
      `Invalid cascade configuration: ${issues.join('; ')}`,
      ErrorCategory.CONFIGURATION,
      'ERR_CONFIG_INVALID'
    );
  }

  const data = result.data;
  return {
    lookupLimit: data.CASCADE_LOOKUP_LIMIT,
    includeTechnicalFields: data.CASCADE_INCLUDE_TECHNICAL_FIELDS,
    attributeOrderStart: data.CASCADE_ATTRIBUTE_ORDER_START,
    orderOffset: data.CASCADE_ORDER_OFFSET,
    logToConsole:
      data.CASCADE_LOG_TO_CONSOLE !== undefined
        ? data.CASCADE_LOG_TO_CONSOLE === 'true'
        : data.NODE_ENV === 'development'
  };
}

/**
 * Load configuration from process.env (cached after the first call)
 */
export function loadCascadeConfig(env: Record<string, string | undefined> = process.env): CascadeConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = Object.freeze(parseCascadeConfig(env));
  return cachedConfig;
}

/**
 * Reset cached config (useful for testing)
 */
export function resetCascadeConfig(): void {
  cachedConfig = null;
}

/**
 * Cached configuration with per-service overrides applied
 */
export function resolveCascadeConfig(overrides: Partial<CascadeConfig> = {}): CascadeConfig {
  return { ...loadCascadeConfig(), ...overrides };
}
