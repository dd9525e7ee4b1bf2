/**
 * Configuration lifecycle: load → validate → freeze.
 *
 * The environment is passed in by the caller. Nothing below this module
 * reads process state; components only receive the frozen result.
 */

import { readFileSync } from 'node:fs';
import _Ajv from 'ajv';
import { ConfigError } from '../errors.js';
import { deepFreeze, isRecord } from '../guards.js';
import { defaultConfig } from './defaults.js';
import { PROVIDERS } from './providers.js';
import { configSchema } from './schema_json.js';
import type { LoadedConfig, ResolvedEndpoint, VerisqlConfig } from './types.js';

const Ajv = _Ajv.default;
const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<VerisqlConfig>(configSchema);

export type Env = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  /** JSON file merged over the defaults */
  file?: string;
  env?: Env;
}

export const LOG_LEVEL_ENV = 'VERISQL_LOG_LEVEL';

// ── Helpers ──────────────────────────────────────────────────────────

/** Objects merge key by key; arrays and scalars from `override` replace. */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) {
    return override === undefined ? base : override;
  }
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    out[key] = deepMerge(base[key], value);
  }
  return out;
}

function readConfigFile(file: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(file, 'utf-8');
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`cannot read ${file}: ${msg}`]);
  }
  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`${file} is not valid JSON: ${msg}`]);
  }
}

/** Fill the optional profile fields so the schema can require them. */
function normalizeProfiles(merged: unknown): unknown {
  if (!isRecord(merged) || !Array.isArray(merged.profiles)) return merged;
  return {
    ...merged,
    profiles: merged.profiles.map((p: unknown) =>
      isRecord(p) ? { canCritique: true, criticExcludes: [], ...p } : p,
    ),
  };
}

function crossFieldProblems(config: VerisqlConfig): string[] {
  const problems: string[] = [];
  const ids = new Set<string>();
  for (const profile of config.profiles) {
    if (ids.has(profile.id)) {
      problems.push(`profiles: duplicate id "${profile.id}"`);
    }
    ids.add(profile.id);
  }
  for (const profile of config.profiles) {
    for (const excluded of profile.criticExcludes) {
      if (!ids.has(excluded)) {
        problems.push(`profiles/${profile.id}/criticExcludes: unknown profile "${excluded}"`);
      }
    }
  }
  return problems;
}

export function resolveEndpoints(config: VerisqlConfig, env: Env): ResolvedEndpoint[] {
  return config.profiles.map((profile) => {
    const provider = PROVIDERS[profile.provider];
    const apiKeyEnv = profile.apiKeyEnv ?? provider.apiKeyEnv;
    const apiKey = apiKeyEnv ? env[apiKeyEnv] || null : null;
    return {
      profileId: profile.id,
      baseURL: profile.baseURL ?? provider.baseURL,
      apiKeyEnv,
      apiKey,
    };
  });
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Validate an already merged config object. Throws ConfigError listing
 * every schema and cross-field problem.
 */
export function validateConfigObject(candidate: unknown): VerisqlConfig {
  const normalized = normalizeProfiles(candidate);
  if (!validateConfig(normalized)) {
    const problems = (validateConfig.errors ?? []).map(
      (e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`,
    );
    throw new ConfigError(problems.length > 0 ? problems : ['unknown validation error']);
  }
  const problems = crossFieldProblems(normalized);
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return normalized;
}

export function loadConfig(opts: LoadConfigOptions = {}): LoadedConfig {
  const env = opts.env ?? {};
  let merged = deepMerge(defaultConfig(), opts.file ? readConfigFile(opts.file) : {});

  const levelOverride = env[LOG_LEVEL_ENV];
  if (levelOverride) {
    merged = deepMerge(merged, { logging: { level: levelOverride } });
  }

  const config = validateConfigObject(merged);
  return deepFreeze({
    config,
    endpoints: resolveEndpoints(config, env),
    source: opts.file ?? null,
  });
}

/**
 * Non-fatal observations about a valid config, reported by `doctor`.
 */
export function configWarnings(loaded: LoadedConfig): string[] {
  const { config, endpoints } = loaded;
  const warnings: string[] = [];
  if (config.profiles.length === 0) {
    warnings.push('no model profiles are configured');
  }
  for (const tier of ['simple', 'complex'] as const) {
    if (config.profiles.length > 0 && !config.profiles.some((p) => p.tiers.includes(tier))) {
      warnings.push(`no profile serves the "${tier}" tier`);
    }
  }
  if (config.orchestrator.verificationEnabled) {
    for (const generator of config.profiles) {
      const hasCritic = config.profiles.some(
        (c) => c.id !== generator.id && c.canCritique && !c.criticExcludes.includes(generator.id),
      );
      if (!hasCritic) {
        warnings.push(`profile "${generator.id}" has no eligible critic and will never be used`);
      }
    }
  }
  for (const endpoint of endpoints) {
    if (endpoint.apiKeyEnv && !endpoint.apiKey) {
      warnings.push(`profile "${endpoint.profileId}": ${endpoint.apiKeyEnv} is not set`);
    }
  }
  return warnings;
}
