/**
 * Server configuration module.
 *
 * Loads config from config/config.{ENTITY_LINKS_CONFIG}.json under the
 * working directory. Missing files fall back to defaults.
 */

import fs from 'fs-extra';
import path from 'node:path';

export interface ServerConfig {
  port: number;
  /** JSON file of threads to seed the feed with */
  seedFile?: string;
  /** Page size for feed listings when the request gives none */
  defaultListLimit: number;
}

const DEFAULTS: ServerConfig = {
  port: 3000,
  defaultListLimit: 50
};

let cachedConfig: ServerConfig | null = null;

function readConfigFile(raw: unknown): Partial<ServerConfig> {
  if (typeof raw !== 'object' || raw === null) {
    return {};
  }
  const result: Partial<ServerConfig> = {};
  if ('port' in raw && typeof raw.port === 'number') {
    result.port = raw.port;
  }
  if ('seedFile' in raw && typeof raw.seedFile === 'string') {
    result.seedFile = raw.seedFile;
  }
  if ('defaultListLimit' in raw && typeof raw.defaultListLimit === 'number') {
    result.defaultListLimit = raw.defaultListLimit;
  }
  return result;
}

/**
 * Load configuration from file. Safe to call multiple times.
 */
export async function loadConfig(configDir = path.join(process.cwd(), 'config')): Promise<ServerConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configEnv = process.env.ENTITY_LINKS_CONFIG ?? 'dev';
  const configFileName = `config.${configEnv}.json`;
  const configPath = path.join(configDir, configFileName);

  if (await fs.pathExists(configPath)) {
    const raw: unknown = await fs.readJson(configPath);
    cachedConfig = { ...DEFAULTS, ...readConfigFile(raw) };
    console.log(`Loaded config from ${configFileName}`);
  } else {
    console.warn(`Config file ${configFileName} not found, using defaults`);
    cachedConfig = { ...DEFAULTS };
  }

  if (cachedConfig.seedFile && !path.isAbsolute(cachedConfig.seedFile)) {
    cachedConfig.seedFile = path.resolve(configDir, '..', cachedConfig.seedFile);
  }
  return cachedConfig;
}

/**
 * Forget the loaded configuration so the next loadConfig reads again.
 */
export function resetConfig(): void {
  cachedConfig = null;
}
