/**
 * Site Planner CLI Configuration Management
 *
 * Loads configuration from .siteplannerrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (SITE_PLANNER_*)
 * 3. Config file (.siteplannerrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { ZoneDefaults } from '../../scoring/attributes.js';
import type { PlanningOptions } from '../../pipeline/planning-pipeline.js';
import { describeZodError } from '../../validation/record-schemas.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Layer and report files. Relative names resolve against `data`, which
 * resolves against the config file's directory (or the working directory).
 */
export interface PathsConfig {
  readonly data: string;
  readonly cells: string;
  readonly sites: string;
  readonly zones: string;
  readonly corridors: string;
  /** Zone rollup CSV written by coverage */
  readonly rollup: string;
  /** Tier B target rollup CSV written by scoring */
  readonly requirements: string;
}

export type PathKey = Exclude<keyof PathsConfig, 'data'>;

export interface ValidationConfig {
  readonly maxFailureRate: number;
}

export interface AdjacencyConfig {
  readonly snapDecimals: number | null;
}

export interface ScoringConfig {
  readonly zoneDefaults: Readonly<Record<string, ZoneDefaults>>;
  readonly fallbackDefaults: ZoneDefaults | null;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly validation: ValidationConfig;
  readonly adjacency: AdjacencyConfig;
  readonly scoring: ScoringConfig;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Compute and report, write nothing */
  readonly dryRun: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

export class ConfigError extends Error {
  public readonly name = 'ConfigError' as const;

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

// ============================================================================
// Config File Schema
// ============================================================================

const FlagDefaultSchema = z.union([z.literal(0), z.literal(1)]);
const WeightDefaultSchema = z.number().min(0).max(1);

const ZoneDefaultsSchema = z
  .object({
    elev_adv_avail: FlagDefaultSchema,
    tall_struct_avail: FlagDefaultSchema,
    backbone_los_likely: FlagDefaultSchema,
    clutter_high: FlagDefaultSchema,
    pop_weight: WeightDefaultSchema,
    critical_weight: WeightDefaultSchema,
  })
  .partial()
  .strict();

const ConfigFileSchema = z
  .object({
    version: z.number().int(),
    paths: z
      .object({
        data: z.string(),
        cells: z.string(),
        sites: z.string(),
        zones: z.string(),
        corridors: z.string(),
        rollup: z.string(),
        requirements: z.string(),
      })
      .partial(),
    validation: z.object({ max_failure_rate: z.number() }).partial(),
    adjacency: z.object({ snap_decimals: z.number().nullable() }).partial(),
    scoring: z
      .object({
        zone_defaults: z.record(ZoneDefaultsSchema),
        fallback_defaults: ZoneDefaultsSchema.nullable(),
      })
      .partial(),
  })
  .partial();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'dryRun' | 'configPath'> = {
  version: 1,

  paths: {
    data: './data',
    cells: 'hex_cells.geojson',
    sites: 'sites.geojson',
    zones: 'zones.geojson',
    corridors: 'corridors.geojson',
    rollup: 'tierb_after_tiera_by_zone.csv',
    requirements: 'tierb_requirements_by_zone.csv',
  },

  validation: {
    maxFailureRate: 0.2,
  },

  adjacency: {
    snapDecimals: null,
  },

  scoring: {
    zoneDefaults: {},
    fallbackDefaults: null,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.siteplannerrc',
  '.siteplannerrc.yaml',
  '.siteplannerrc.yml',
  '.siteplannerrc.json',
];

/**
 * Find config file in the start directory or its ancestors
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and schema-check a config file. YAML parsing also covers JSON.
 */
export function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Cannot parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config ${filePath}: ${describeZodError(result.error).join('; ')}`);
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`SITE_PLANNER_${name}`];
  return value === '' ? undefined : value;
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

/**
 * "none" clears snapping from the environment
 */
function getEnvSnap(env: Env): number | null | undefined {
  const value = getEnvVar(env, 'SNAP_DECIMALS');
  if (value === undefined) return undefined;
  if (value.toLowerCase() === 'none') return null;
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    dryRun?: boolean;
    dataDir?: string;
  };
  /** Defaults to process.env */
  env?: Env;
  /** Defaults to process.cwd() */
  cwd?: string;
}

/**
 * Load and merge configuration from all sources
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar(env, 'CONFIG');
    if (envConfigPath) {
      configPath = resolve(cwd, envConfigPath);
      if (!existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath} (from SITE_PLANNER_CONFIG)`);
      }
      fileConfig = parseConfigFile(configPath);
    } else {
      configPath = findConfigFile(cwd);
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const envSnap = getEnvSnap(env);

  const config: CLIConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      ...DEFAULT_CONFIG.paths,
      ...fileConfig.paths,
      data:
        options.overrides?.dataDir ??
        getEnvVar(env, 'DATA_DIR') ??
        fileConfig.paths?.data ??
        DEFAULT_CONFIG.paths.data,
    },

    validation: {
      maxFailureRate:
        getEnvNumber(env, 'MAX_FAILURE_RATE') ??
        fileConfig.validation?.max_failure_rate ??
        DEFAULT_CONFIG.validation.maxFailureRate,
    },

    adjacency: {
      snapDecimals:
        envSnap !== undefined
          ? envSnap
          : fileConfig.adjacency?.snap_decimals !== undefined
            ? fileConfig.adjacency.snap_decimals
            : DEFAULT_CONFIG.adjacency.snapDecimals,
    },

    scoring: {
      zoneDefaults: fileConfig.scoring?.zone_defaults ?? DEFAULT_CONFIG.scoring.zoneDefaults,
      fallbackDefaults:
        fileConfig.scoring?.fallback_defaults ?? DEFAULT_CONFIG.scoring.fallbackDefaults,
    },

    verbose: options.overrides?.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: options.overrides?.json ?? getEnvBool(env, 'JSON') ?? false,
    dryRun: options.overrides?.dryRun ?? getEnvBool(env, 'DRY_RUN') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Validate configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new ConfigError(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  const rate = config.validation.maxFailureRate;
  if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
    throw new ConfigError(`max_failure_rate must be between 0 and 1, got ${rate}`);
  }

  const snap = config.adjacency.snapDecimals;
  if (snap !== null && (!Number.isInteger(snap) || snap < 0 || snap > 15)) {
    throw new ConfigError(`snap_decimals must be an integer from 0 to 15 or null, got ${snap}`);
  }
}

// ============================================================================
// Derived Settings
// ============================================================================

/**
 * Absolute path of a layer or report file
 */
export function resolveLayerPath(config: CLIConfig, key: PathKey, cwd: string = process.cwd()): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : cwd;
  return resolve(basePath, config.paths.data, config.paths[key]);
}

export function toPlanningOptions(config: CLIConfig): Omit<PlanningOptions, 'logger'> {
  return {
    maxFailureRate: config.validation.maxFailureRate,
    snapDecimals: config.adjacency.snapDecimals,
    scaffold: {
      zoneDefaults: config.scoring.zoneDefaults,
      fallbackDefaults: config.scoring.fallbackDefaults,
    },
  };
}
