import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { DEFAULT_WRAP_OPTIONS, isPositiveInteger, resolveWrapOptions } from '../wrap/options.js';
import type { WrapOptions } from '../wrap/types.js';
import { logger } from './logger.js';

export const SETTINGS_FILE = '.colwrap/settings.json';

export interface Config {
  width?: number;
  delimiter?: string;
  tabWidth?: number;
  autoWrap?: boolean;
}

export interface EditorSettings extends WrapOptions {
  autoWrap: boolean;
}

/**
 * Keep only the keys we understand, with the types we expect.
 */
function sanitize(raw: unknown): Config {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return {};
  const source = new Map<string, unknown>(Object.entries(raw));
  const config: Config = {};

  const width = source.get('width');
  const delimiter = source.get('delimiter');
  const tabWidth = source.get('tabWidth');
  const autoWrap = source.get('autoWrap');
  if (isPositiveInteger(width)) config.width = width;
  if (typeof delimiter === 'string' && delimiter) config.delimiter = delimiter;
  if (isPositiveInteger(tabWidth)) config.tabWidth = tabWidth;
  if (typeof autoWrap === 'boolean') config.autoWrap = autoWrap;

  for (const key of ['width', 'delimiter', 'tabWidth', 'autoWrap'] as const) {
    if (source.has(key) && config[key] === undefined) {
      logger.warn(`Ignoring invalid setting "${key}"`, source.get(key));
    }
  }

  return config;
}

export function loadConfig(path = SETTINGS_FILE): Config {
  if (!existsSync(path)) {
    return {};
  }

  try {
    return sanitize(JSON.parse(readFileSync(path, 'utf-8')));
  } catch (e) {
    logger.warn(`Could not read settings from ${path}`, e instanceof Error ? e.message : e);
    return {};
  }
}

export function saveConfig(config: Config, path = SETTINGS_FILE): boolean {
  try {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(path, JSON.stringify(config, null, 2));
    return true;
  } catch (e) {
    logger.error(`Could not save settings to ${path}`, e instanceof Error ? e.message : e);
    return false;
  }
}

export function getSetting<K extends keyof Config>(key: K, defaultValue: NonNullable<Config[K]>, path = SETTINGS_FILE): NonNullable<Config[K]> {
  return loadConfig(path)[key] ?? defaultValue;
}

export function setSetting<K extends keyof Config>(key: K, value: Config[K], path = SETTINGS_FILE): boolean {
  const config = loadConfig(path);
  config[key] = value;
  return saveConfig(config, path);
}

function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Wrap settings from COLWRAP_* environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  const config: Config = {};
  const width = parseIntOrUndefined(env.COLWRAP_WIDTH);
  const tabWidth = parseIntOrUndefined(env.COLWRAP_TAB_WIDTH);
  if (width !== undefined) config.width = width;
  if (tabWidth !== undefined) config.tabWidth = tabWidth;
  if (env.COLWRAP_DELIMITER) config.delimiter = env.COLWRAP_DELIMITER;
  return config;
}

/**
 * Merge layers, later ones winning: settings file, environment, CLI flags.
 */
export function resolveSettings(...layers: Config[]): EditorSettings {
  const merged: Config = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }

  return {
    ...resolveWrapOptions({
      width: merged.width,
      delimiter: merged.delimiter,
      tabWidth: merged.tabWidth,
    }),
    autoWrap: merged.autoWrap ?? true,
  };
}

export const DEFAULT_SETTINGS: EditorSettings = { ...DEFAULT_WRAP_OPTIONS, autoWrap: true };
