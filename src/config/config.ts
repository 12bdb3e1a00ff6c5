import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import yaml from 'js-yaml';
import * as TOML from 'smol-toml';
import {
  DEFAULT_NORMALIZE_OPTIONS,
  NORMALIZE_OPTION_KEYS,
  type NormalizeOptions,
} from '../normalize/options.js';
import { ConfigError } from '../errors.js';
import { getExtension } from '../utils/path.js';

export interface IrDivergeConfig {
  normalize: NormalizeOptions;
  exclude: { a: string[]; b: string[] };
  /** Header dialect id per pipeline */
  dialects: { a: string; b: string };
}

export interface LoadedConfig {
  config: IrDivergeConfig;
  /** Path of the file the config came from, if any */
  source?: string;
}

export const CONFIG_FILE_NAMES = [
  '.irdivergerc.json',
  '.irdivergerc.yml',
  '.irdivergerc.yaml',
  '.irdivergerc.toml',
];

export function defaultConfig(): IrDivergeConfig {
  return {
    normalize: { ...DEFAULT_NORMALIZE_OPTIONS },
    exclude: { a: [], b: [] },
    dialects: { a: 'legacy', b: 'npm' },
  };
}

/**
 * Load `explicitPath`, or the first `.irdivergerc.*` found in `cwd`.
 * Without either, the defaults apply.
 */
export async function loadConfig(cwd: string, explicitPath?: string): Promise<LoadedConfig> {
  let configFile: string | undefined;
  if (explicitPath) {
    configFile = resolve(cwd, explicitPath);
    if (!existsSync(configFile)) {
      throw new ConfigError(configFile, 'file not found');
    }
  } else {
    configFile = CONFIG_FILE_NAMES.map(name => resolve(cwd, name)).find(p => existsSync(p));
  }

  if (!configFile) return { config: defaultConfig() };

  const content = await readFile(configFile, 'utf-8');
  return { config: parseConfig(content, configFile), source: configFile };
}

export function parseConfig(content: string, source: string): IrDivergeConfig {
  let raw: unknown;
  try {
    switch (getExtension(source)) {
      case '.toml': raw = TOML.parse(content); break;
      case '.yml':
      case '.yaml': raw = yaml.load(content); break;
      default: raw = JSON.parse(content);
    }
  } catch (err) {
    throw new ConfigError(source, err instanceof Error ? err.message : String(err));
  }
  return resolveConfig(raw ?? {}, source);
}

/** Validate a parsed config document and fill in defaults. */
export function resolveConfig(raw: unknown, source: string): IrDivergeConfig {
  if (!isRecord(raw)) throw new ConfigError(source, 'expected a table of settings');
  const config = defaultConfig();

  if (raw.normalize !== undefined) {
    const section = expectRecord(raw.normalize, 'normalize', source);
    for (const key of NORMALIZE_OPTION_KEYS) {
      const value = section[key];
      if (value === undefined) continue;
      if (typeof value !== 'boolean') {
        throw new ConfigError(source, `normalize.${key} must be true or false`);
      }
      config.normalize[key] = value;
    }
  }

  if (raw.exclude !== undefined) {
    const section = expectRecord(raw.exclude, 'exclude', source);
    config.exclude.a = stringList(section.a, 'exclude.a', source);
    config.exclude.b = stringList(section.b, 'exclude.b', source);
  }

  if (raw.dialects !== undefined) {
    const section = expectRecord(raw.dialects, 'dialects', source);
    for (const side of ['a', 'b'] as const) {
      const value = section[side];
      if (value === undefined) continue;
      if (typeof value !== 'string') throw new ConfigError(source, `dialects.${side} must be a string`);
      config.dialects[side] = value;
    }
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, key: string, source: string): Record<string, unknown> {
  if (!isRecord(value)) throw new ConfigError(source, `${key} must be a table`);
  return value;
}

function stringList(value: unknown, key: string, source: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(source, `${key} must be a list of pass names`);
  }
  return value;
}
