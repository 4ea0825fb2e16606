// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Zod Schema for Resolver Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'staging', 'production', 'test']);

export type Environment = z.infer<typeof EnvironmentSchema>;

export const BackendConfigSchema = z.object({
  host: z.string().min(1).default('memory://local'),
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  requestTimeoutMs: z.number().int().positive().default(60_000),
});

export const IngestConfigSchema = z.object({
  batchSize: z.number().int().min(1).max(10_000).default(50),
  maxInFlightBatches: z.number().int().min(1).max(32).default(2),
});

export const FuzzyConfigSchema = z.object({
  topK: z.number().int().min(1).max(1000).default(10),
  sampleSize: z.number().int().min(1).default(20),
  maxGroups: z.number().int().min(1).default(100),
});

export const ConnectConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).max(20).default(3),
  initialDelayMs: z.number().int().min(0).default(100),
  maxDelayMs: z.number().int().min(0).default(5_000),
});

// ─────────────────────────────────────────────────────────────────────────────────
// ROOT
// ─────────────────────────────────────────────────────────────────────────────────

export const ResolverConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  backend: BackendConfigSchema.default({}),
  ingest: IngestConfigSchema.default({}),
  fuzzy: FuzzyConfigSchema.default({}),
  connect: ConnectConfigSchema.default({}),
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;
export type ResolverConfigInput = z.input<typeof ResolverConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export class ConfigValidationError extends Error {
  readonly name = 'ConfigValidationError';
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid resolver configuration:\n  ${issues.join('\n  ')}`);
    this.issues = issues;
  }
}

/**
 * Render zod issues as `path: message` lines.
 */
export function formatConfigErrors(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate raw configuration, throwing ConfigValidationError on failure.
 */
export function validateConfig(input: unknown): ResolverConfig {
  const result = ResolverConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(formatConfigErrors(result.error));
  }
  return result.data;
}

export function getDefaultConfig(): ResolverConfig {
  return ResolverConfigSchema.parse({});
}
