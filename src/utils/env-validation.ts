/**
 * Environment Variable Validation
 *
 * Validates the reporter's environment with Zod schemas and turns it into
 * the runtime configuration used by the client, fetcher and normalizer.
 */

import { z } from 'zod';

/**
 * Custom error class for environment validation failures
 */
export class EnvValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: z.ZodError['errors'],
    public readonly suggestions: string[]
  ) {
    super(message);
    this.name = 'EnvValidationError';
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines: string[] = [this.message, ''];

    if (this.errors.length > 0) {
      lines.push('Validation errors:');
      for (const error of this.errors) {
        const path = error.path.join('.');
        lines.push(`  - ${path}: ${error.message}`);
      }
      lines.push('');
    }

    if (this.suggestions.length > 0) {
      lines.push('Suggestions:');
      for (const suggestion of this.suggestions) {
        lines.push(`  - ${suggestion}`);
      }
    }

    return lines.join('\n');
  }
}

// ============================================================================
// Helper Schemas
// ============================================================================

/** Boolean from string with a default for unset values */
const booleanFromString = (defaultVal: boolean) =>
  z
    .string()
    .optional()
    .transform((val) => (val === undefined || val.trim() === '' ? defaultVal : ['true', '1', 'yes'].includes(val.trim().toLowerCase())));

/** Positive integer with bounds */
const positiveInt = (min: number, max: number, defaultVal: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : defaultVal))
    .pipe(z.number().int().min(min).max(max));

/** Bare FQDN, or a URL when the server is not on https/443 */
const hostSchema = z
  .string()
  .trim()
  .min(1)
  .refine((val) => !/\s/.test(val), { message: 'Host must not contain whitespace' });

// ============================================================================
// Schemas
// ============================================================================

export const CredentialsSchema = z.object({
  /** API account name */
  CASPER_USER: z.string().min(1),

  /** API account password */
  CASPER_PASS: z.string().min(1),

  /** Server FQDN, e.g. casper.example.com */
  CASPER_HOST: hostSchema,
});

export const RunOptionsSchema = z.object({
  /** Skip TLS certificate verification (self-signed servers) */
  CASPER_INSECURE: booleanFromString(false),

  /** Per-request timeout in ms (1000-600000) */
  CASPER_TIMEOUT_MS: positiveInt(1000, 600000, 60000),

  /** Parallel detail requests (1-32) */
  CASPER_FETCH_CONCURRENCY: positiveInt(1, 32, 1),

  /** What to do when a single detail fetch fails */
  CASPER_FAILURE_POLICY: z.enum(['skip', 'abort']).default('skip'),

  /** Leave out computers that have not checked in recently */
  CASPER_SKIP_STALE: booleanFromString(true),

  /** Days without check-in before a computer counts as stale (1-3650) */
  CASPER_STALE_DAYS: positiveInt(1, 3650, 30),

  /** Directory the report files are written to */
  CASPER_OUTPUT_DIR: z.string().min(1).default('output'),

  /** Log level */
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

export const FullEnvSchema = CredentialsSchema.merge(RunOptionsSchema);

export type FullEnvConfig = z.infer<typeof FullEnvSchema>;

export type FailurePolicy = FullEnvConfig['CASPER_FAILURE_POLICY'];

export interface InventoryConfig {
  username: string;
  password: string;
  host: string;
  /** `<scheme>://<host>` without the /JSSResource suffix */
  baseUrl: string;
  rejectUnauthorized: boolean;
  timeoutMs: number;
  concurrency: number;
  failurePolicy: FailurePolicy;
  skipStale: boolean;
  staleDays: number;
  outputDir: string;
  logLevel?: string;
}

// ============================================================================
// Validation Functions
// ============================================================================

export const toBaseUrl = (host: string): string => {
  const trimmed = host.trim().replace(/\/+$/, '').replace(/\/JSSResource$/i, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
};

/**
 * Validate the environment and build the run configuration
 */
export function validateEnvironment(env: NodeJS.ProcessEnv): {
  valid: boolean;
  config?: InventoryConfig;
  error?: EnvValidationError;
} {
  const result = FullEnvSchema.safeParse(env);

  if (!result.success) {
    const suggestions: string[] = [];
    const missingFields: string[] = [];

    for (const error of result.error.errors) {
      const field = String(error.path[0]);
      if (error.code === 'invalid_type' && error.received === 'undefined') {
        missingFields.push(field);
      }
      if (field === 'CASPER_FETCH_CONCURRENCY') {
        suggestions.push('CASPER_FETCH_CONCURRENCY must be between 1 and 32');
      }
      if (field === 'CASPER_TIMEOUT_MS') {
        suggestions.push('CASPER_TIMEOUT_MS must be between 1000 and 600000 ms');
      }
      if (field === 'CASPER_FAILURE_POLICY') {
        suggestions.push('CASPER_FAILURE_POLICY must be "skip" or "abort"');
      }
    }

    if (missingFields.length > 0) {
      suggestions.push(
        `Set ${missingFields.join(', ')} in your environment or .env file (e.g. CASPER_HOST=casper.example.com)`
      );
    }

    return {
      valid: false,
      error: new EnvValidationError('Invalid inventory reporter configuration', result.error.errors, suggestions),
    };
  }

  const data = result.data;
  return {
    valid: true,
    config: {
      username: data.CASPER_USER,
      password: data.CASPER_PASS,
      host: data.CASPER_HOST,
      baseUrl: toBaseUrl(data.CASPER_HOST),
      rejectUnauthorized: !data.CASPER_INSECURE,
      timeoutMs: data.CASPER_TIMEOUT_MS,
      concurrency: data.CASPER_FETCH_CONCURRENCY,
      failurePolicy: data.CASPER_FAILURE_POLICY,
      skipStale: data.CASPER_SKIP_STALE,
      staleDays: data.CASPER_STALE_DAYS,
      outputDir: data.CASPER_OUTPUT_DIR,
      logLevel: data.LOG_LEVEL,
    },
  };
}

/**
 * Validate and return the configuration, throwing EnvValidationError otherwise
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): InventoryConfig {
  const result = validateEnvironment(env);
  if (!result.valid || !result.config) {
    throw result.error ?? new EnvValidationError('Invalid inventory reporter configuration', [], []);
  }
  return result.config;
}
