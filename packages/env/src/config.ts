import { z } from 'zod';

export const PROCESSING_MODES = ['sequential', 'partitioned'] as const;
export type ProcessingMode = (typeof PROCESSING_MODES)[number];

export const AMOUNT_PRECISION_POLICIES = ['reject', 'round'] as const;

const envSchema = z.object({
  LEDGERFOLD_AMOUNT_PRECISION: z.enum(AMOUNT_PRECISION_POLICIES).default('reject'),
  LEDGERFOLD_PROCESSING_MODE: z.enum(PROCESSING_MODES).default('sequential'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables.
 * @throws Error if validation fails
 */
export function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access and caches the result.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Default processing mode when the CLI is not given --partitioned.
 */
export function getDefaultProcessingMode(): ProcessingMode {
  return validateEnv().LEDGERFOLD_PROCESSING_MODE;
}

/**
 * Default handling of input amounts with more than four fractional digits.
 */
export function getDefaultAmountPrecision(): ValidatedEnv['LEDGERFOLD_AMOUNT_PRECISION'] {
  return validateEnv().LEDGERFOLD_AMOUNT_PRECISION;
}

/**
 * Drop the cached environment (tests change process.env between cases).
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}
