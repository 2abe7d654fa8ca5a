/**
 * Engine configuration: defaults, schema and the YAML loader.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { WORKSPACE_DIR } from '../storage/files.js';

export const CONFIG_FILE = 'config.yaml';

const fieldList = z.array(z.string().min(1));

const scoringFieldsSchema = z.object({
  critical: fieldList.min(1, 'at least one critical field is required'),
  optional: fieldList.default([]),
});

export const configSchema = z
  .object({
    log_level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    scoring: z
      .object({
        lease: scoringFieldsSchema.default({
          critical: [
            'tenant',
            'landlord',
            'property_address',
            'commencement_date',
            'expiration_date',
            'base_rent_monthly',
            'rentable_square_feet',
          ],
          optional: ['security_deposit', 'cam_terms', 'escalation_schedule'],
        }),
        amendment: scoringFieldsSchema.default({
          critical: ['target_lease_id', 'effective_date', 'supersedes'],
          optional: ['effective_until'],
        }),
      })
      .default({}),
    resolution: z
      .object({
        confidence_threshold: z.number().min(0).max(1).default(0.7),
      })
      .default({}),
    tolerances: z
      .object({
        square_feet: z.number().nonnegative().default(1),
        calculation: z.number().nonnegative().default(0.01),
      })
      .default({}),
  })
  .strict();

export type EngineConfig = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

/**
 * Build a configuration from a partial object, filling every default.
 */
export function resolveConfig(input: unknown = {}): EngineConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${detail}`);
  }
  return result.data;
}

export const DEFAULT_CONFIG: EngineConfig = resolveConfig();

/**
 * Load `.leasegraph/config.yaml` under a workspace root. A missing file means defaults.
 */
export function loadConfig(workspaceRoot: string): EngineConfig {
  const filePath = join(workspaceRoot, WORKSPACE_DIR, CONFIG_FILE);
  if (!existsSync(filePath)) {
    return DEFAULT_CONFIG;
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(
      `Cannot parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  if (raw === null || raw === undefined) {
    return DEFAULT_CONFIG;
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigurationError(`${filePath} must contain a mapping`);
  }
  return resolveConfig(raw);
}
