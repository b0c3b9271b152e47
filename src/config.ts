import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { CONFIG_FILE, DEFAULT_SCANNER_IMAGE, ENV_PREFIX } from './constants.js';

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const ConfigSchema = z
  .object({
    scannerImage: z.string().min(1, 'scannerImage cannot be empty'),
    timeoutMs: z.number().int().positive(),
    fetchTimeoutMs: z.number().int().positive(),
    workRoot: z.string().min(1),
    storeDir: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65535),
    logLevel: LogLevelSchema,
    logJson: z.boolean(),
    dockerBin: z.string().min(1),
    gitBin: z.string().min(1),
    disabledChecks: z.array(z.string().min(1)),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/** Partial config as read from the config file or given on the command line. */
export type ConfigOverrides = Partial<Config>;

export function defaultConfig(): Config {
  return {
    scannerImage: DEFAULT_SCANNER_IMAGE,
    timeoutMs: 60_000,
    fetchTimeoutMs: 300_000,
    workRoot: os.tmpdir(),
    port: 8000,
    logLevel: 'info',
    logJson: false,
    dockerBin: 'docker',
    gitBin: 'git',
    disabledChecks: [],
  };
}

// env name -> config key, with the raw string parsed by the schema below
const ENV_KEYS: Record<string, keyof Config> = {
  SCANNER_IMAGE: 'scannerImage',
  TIMEOUT_MS: 'timeoutMs',
  FETCH_TIMEOUT_MS: 'fetchTimeoutMs',
  WORK_ROOT: 'workRoot',
  STORE_DIR: 'storeDir',
  PORT: 'port',
  LOG_LEVEL: 'logLevel',
  LOG_JSON: 'logJson',
  DOCKER_BIN: 'dockerBin',
  GIT_BIN: 'gitBin',
  DISABLED_CHECKS: 'disabledChecks',
};

const NUMERIC_KEYS = new Set<keyof Config>(['timeoutMs', 'fetchTimeoutMs', 'port']);

function coerceEnvValue(key: keyof Config, raw: string): unknown {
  if (NUMERIC_KEYS.has(key)) {
    const n = Number(raw);
    return raw.trim() === '' || Number.isNaN(n) ? raw : n;
  }
  if (key === 'logJson') return raw === 'true' || raw === '1';
  if (key === 'disabledChecks') {
    return raw
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
  return raw;
}

export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [suffix, key] of Object.entries(ENV_KEYS)) {
    const raw = env[`${ENV_PREFIX}${suffix}`];
    if (raw === undefined || raw === '') continue;
    out[key] = coerceEnvValue(key, raw);
  }
  return out;
}

async function readConfigFile(file: string, required: boolean): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf8');
  } catch {
    if (required) throw new Error(`Invalid configuration: cannot read ${file}`);
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new Error(`Invalid configuration: ${file} is not valid JSON`);
  }
  const obj = z.record(z.unknown()).safeParse(parsed);
  if (!obj.success) throw new Error(`Invalid configuration: ${file} must contain a JSON object`);
  return obj.data;
}

export type LoadConfigOptions = {
  cwd?: string;
  /** Explicit config file; an error if it cannot be read. Defaults to `.debtscan.json` in cwd. */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
};

/**
 * Resolves configuration: overrides, then environment, then the config file,
 * then defaults. Throws `Invalid configuration: ...` when the merged result
 * does not validate.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<Config> {
  const cwd = opts.cwd ?? process.cwd();
  const file = opts.configFile ? path.resolve(cwd, opts.configFile) : path.join(cwd, CONFIG_FILE);
  const fromFile = await readConfigFile(file, !!opts.configFile);
  const fromEnv = readEnvConfig(opts.env ?? process.env);
  const overrides = Object.fromEntries(Object.entries(opts.overrides ?? {}).filter(([, v]) => v !== undefined));
  return validateConfig({ ...defaultConfig(), ...fromFile, ...fromEnv, ...overrides });
}

export function validateConfig(data: unknown): Config {
  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
