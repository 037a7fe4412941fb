import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { Config, ConfigSchema } from './schema';
import { getProjectRoot } from '../utils/paths';
import logger from '../utils/logger';

const log = logger.child({ module: 'Config' });

export function getConfigPaths(): string[] {
  return [
    path.join(process.cwd(), 'config.json'),
    path.join(getProjectRoot(), 'config.json'),
    path.join(os.homedir(), '.ragchat', 'config.json'),
  ];
}

export async function loadConfig(configPath?: string): Promise<Config> {
  const paths = configPath ? [configPath] : getConfigPaths();

  for (const p of paths) {
    if (await fs.pathExists(p)) {
      try {
        const data: unknown = await fs.readJson(p);
        const config = ConfigSchema.parse(data);
        log.info(`Loaded config from ${p}`);
        return config;
      } catch (err) {
        log.warn(`Failed to load config from ${p}: ${err}`);
      }
    }
  }

  log.info('Using default configuration');
  return ConfigSchema.parse({});
}

export async function saveConfig(config: Config, configPath?: string): Promise<void> {
  const p = configPath || getConfigPaths()[0];
  await fs.ensureDir(path.dirname(p));
  await fs.writeJson(p, config, { spaces: 2 });
}

export async function backupConfig(configPath?: string): Promise<string | null> {
  const p = configPath || getConfigPaths()[0];
  if (await fs.pathExists(p)) {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const backupPath = `${p}.${timestamp}.bak`;
    await fs.copy(p, backupPath);
    log.info(`Config backed up to ${backupPath}`);
    return backupPath;
  }
  return null;
}

type PlainObject = Record<string, unknown>;

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Arrays and scalars from `source` replace those in `target`; objects merge.
export function mergeDeep(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isPlainObject(targetValue) && isPlainObject(sourceValue)) {
      result[key] = mergeDeep(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }
  return result;
}

export async function updateConfig(partialConfig: PlainObject, configPath?: string): Promise<Config> {
  const p = configPath || getConfigPaths()[0];

  // 1. Load current config from disk to ensure we have the latest base
  let currentConfig: PlainObject = {};
  if (await fs.pathExists(p)) {
    try {
      const data: unknown = await fs.readJson(p);
      if (isPlainObject(data)) currentConfig = data;
    } catch (err) {
      log.warn(`Failed to read current config for update: ${err}`);
    }
  }

  // 2. Backup existing config
  await backupConfig(p);

  // 3. Merge and validate
  const parsed = ConfigSchema.safeParse(mergeDeep(currentConfig, partialConfig));
  if (!parsed.success) {
    log.error(`Config validation failed: ${parsed.error.message}`);
    throw new Error(`Invalid configuration: ${parsed.error.message}`);
  }

  // 4. Save to disk
  await saveConfig(parsed.data, p);
  log.info(`Config updated and saved to ${p}`);
  return parsed.data;
}
