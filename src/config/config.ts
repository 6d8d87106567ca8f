import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';
import { dump, load } from 'js-yaml';
import { ValidationError } from '../shared/errors.js';
import { generateId } from '../shared/ids.js';
import { parseLogLevel, setLogLevel } from '../shared/logger.js';
import {
  FinpipeConfigSchema,
  parseOrThrow,
  type FinpipeConfig,
  type FinpipeConfigInput,
} from '../shared/schemas.js';
import { getFinpipePaths, type FinpipePaths } from './paths.js';

export function parseConfig(raw: unknown): FinpipeConfig {
  return parseOrThrow(FinpipeConfigSchema, raw, 'config');
}

export function readConfig(configPath: string): FinpipeConfig {
  if (!existsSync(configPath)) {
    throw new Error('Project not initialized. Run `finpipe init` first.');
  }
  return parseConfig(load(readFileSync(configPath, 'utf8')));
}

export function writeConfig(configPath: string, config: FinpipeConfigInput): void {
  writeFileSync(configPath, dump(config), 'utf8');
}

function envBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

function envInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  if (!Number.isInteger(n)) throw new ValidationError(`${name} must be an integer`);
  return n;
}

/** Apply FINPIPE_* overrides from the environment on top of the file config. */
export function applyEnvOverrides(
  config: FinpipeConfig,
  env: NodeJS.ProcessEnv = process.env,
): FinpipeConfig {
  return parseConfig({
    ...config,
    api: {
      ...config.api,
      host: env['FINPIPE_API_HOST'] ?? config.api.host,
      port: envInt('FINPIPE_API_PORT', env['FINPIPE_API_PORT']) ?? config.api.port,
    },
    scheduler: {
      ...config.scheduler,
      daily_enabled:
        envBool(env['FINPIPE_PIPELINE_DAILY_ENABLED']) ?? config.scheduler.daily_enabled,
      pipeline_utc_hour:
        envInt('FINPIPE_PIPELINE_DAILY_UTC_HOUR', env['FINPIPE_PIPELINE_DAILY_UTC_HOUR']) ??
        config.scheduler.pipeline_utc_hour,
    },
  });
}

export interface LoadedConfig {
  paths: FinpipePaths;
  config: FinpipeConfig;
}

/** Read the project config with env overrides, and apply LOG_LEVEL. */
export function loadConfig(cwd: string = process.cwd()): LoadedConfig {
  const paths = getFinpipePaths(cwd);
  const config = applyEnvOverrides(readConfig(paths.config));
  const level = parseLogLevel(process.env['LOG_LEVEL']);
  if (level) setLogLevel(level);
  return { paths, config };
}

/** Resolve a source file named in the config relative to the project directory. */
export function resolveSourcePath(paths: FinpipePaths, file: string): string {
  return isAbsolute(file) ? file : join(dirname(paths.root), file);
}

export interface InitOptions {
  cwd?: string;
  force?: boolean;
}

export function initProject(opts: InitOptions = {}): LoadedConfig {
  const paths = getFinpipePaths(opts.cwd);
  if (existsSync(paths.config) && !opts.force) {
    throw new Error(`Project already initialized at ${paths.root}. Use --force to reinitialize.`);
  }
  mkdirSync(paths.root, { recursive: true });
  const config = parseConfig({
    instance_id: generateId(12),
    created_at: new Date().toISOString(),
    version: '0.1.0',
  });
  writeConfig(paths.config, config);
  return { paths, config };
}
