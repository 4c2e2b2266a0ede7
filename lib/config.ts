import { join } from 'node:path';
import chokidar from 'chokidar';
import type { Logger } from 'pino';

import { defaultFileSystem, type FileSystem } from './deps';
import { logger } from './logger';
import { ConfigurationError } from './telemetry/errors';
import { ENGINE_KINDS, type BackendProfile, type EngineKind } from './telemetry/types';

// Relative to the working directory
const DEFAULT_PROFILES_FILE = join(process.cwd(), 'config', 'profiles.json');

export interface Settings {
  port: number;
  profilesFile: string;
  retryDelayMs: number;
  pollIntervalMs: number;
  showDestinationPorts: boolean;
}

type Env = Record<string, string | undefined>;

function resolveInt(env: Env, name: string, fallback: number, min = 1) {
  const raw = env[name];
  if (raw === undefined || raw.trim().length === 0) return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min) {
    logger.warn({ variable: name, value: raw, fallback }, 'Ignoring invalid numeric setting');
    return fallback;
  }
  return value;
}

export function resolveSettings(env: Env = process.env): Settings {
  return {
    port: resolveInt(env, 'PORT', 3000),
    profilesFile: env['PROFILES_FILE'] ?? DEFAULT_PROFILES_FILE,
    retryDelayMs: resolveInt(env, 'RETRY_DELAY_MS', 3000),
    pollIntervalMs: resolveInt(env, 'POLL_INTERVAL_MS', 1000),
    showDestinationPorts: env['SHOW_DESTINATION_PORTS'] === 'true',
  };
}

// ============================================================================
// Profiles
// ============================================================================

export interface ProfileFile {
  active: string | null;
  profiles: Array<BackendProfile>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEngine(value: unknown): value is EngineKind {
  return ENGINE_KINDS.some(kind => kind === value);
}

function parseProfile(entry: unknown): BackendProfile | string {
  if (!isRecord(entry)) return 'entry is not an object';

  const { id, name, host, port, useTls, secret, engine, surgeKey } = entry;
  if (typeof id !== 'string' || id.length === 0) return 'missing id';
  if (typeof host !== 'string' || host.trim().length === 0) return 'missing host';
  if (typeof port !== 'number' || !Number.isInteger(port) || port <= 0 || port > 65535) return 'invalid port';
  if (name !== undefined && typeof name !== 'string') return 'name must be a string';
  if (useTls !== undefined && typeof useTls !== 'boolean') return 'useTls must be a boolean';
  if (secret !== undefined && typeof secret !== 'string') return 'secret must be a string';
  if (surgeKey !== undefined && typeof surgeKey !== 'string') return 'surgeKey must be a string';
  if (engine !== undefined && !isEngine(engine)) return `unknown engine ${String(engine)}`;

  return {
    id,
    name: name ?? id,
    host: host.trim(),
    port,
    useTls: useTls ?? false,
    secret: secret ?? '',
    engine: engine ?? 'standard',
    ...(surgeKey !== undefined ? { surgeKey } : {}),
  };
}

/**
 * Parse the profile file. Broken entries are skipped with a warning; a file
 * that is not a profile document at all throws ConfigurationError.
 */
export function parseProfiles(raw: string, log: Logger = logger): ProfileFile {
  let data: unknown;
  try {
    data = JSON.parse(raw) as unknown;
  } catch (error) {
    throw new ConfigurationError(`Profile file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const entries: unknown = isRecord(data) ? data['profiles'] : undefined;
  if (!isRecord(data) || !Array.isArray(entries)) {
    throw new ConfigurationError('Profile file must be an object with a "profiles" array');
  }

  const profiles: Array<BackendProfile> = [];
  entries.forEach((entry: unknown, index) => {
    const parsed = parseProfile(entry);
    if (typeof parsed === 'string') {
      log.warn({ index, reason: parsed }, 'Skipping invalid profile');
      return;
    }
    if (profiles.some(profile => profile.id === parsed.id)) {
      log.warn({ index, id: parsed.id }, 'Skipping duplicate profile id');
      return;
    }
    profiles.push(parsed);
  });

  const active = data['active'];
  return {
    active: typeof active === 'string' && active.length > 0 ? active : null,
    profiles,
  };
}

export function findActiveProfile(file: ProfileFile) {
  if (file.active === null) return null;
  return file.profiles.find(profile => profile.id === file.active) ?? null;
}

export async function loadProfiles(path: string, fileSystem: FileSystem = defaultFileSystem, log: Logger = logger): Promise<ProfileFile> {
  let raw: string;
  try {
    raw = await fileSystem.readFile(path, 'utf-8');
  } catch (error) {
    if (isRecord(error) && error['code'] === 'ENOENT') {
      log.info({ path }, 'No profile file found, staying idle');
      return { active: null, profiles: [] };
    }
    throw new ConfigurationError(`Cannot read profile file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const file = parseProfiles(raw, log);
  log.info({ path, profiles: file.profiles.length, active: file.active }, 'Loaded profiles');
  return file;
}

/**
 * Wrap an async reload so calls run one after another. A call made while one
 * is running waits for it. Failures are logged and never reject.
 */
export function serializeReloads(reload: () => Promise<void>, log: Logger = logger) {
  let tail: Promise<void> = Promise.resolve();
  return () => {
    tail = tail.then(reload).catch((error: unknown) => {
      log.error({ err: error }, 'Profile reload failed');
    });
    return tail;
  };
}

/**
 * Call `onChange` whenever the profile file is written. Returns a function
 * that stops watching.
 */
export function watchProfiles(path: string, onChange: () => void) {
  logger.info({ path }, 'Watching profile file');

  const watcher = chokidar.watch(path, {
    persistent: false,
    ignoreInitial: true,
    awaitWriteFinish: {
      stabilityThreshold: 100,
      pollInterval: 100,
    },
  });

  watcher.on('add', () => { onChange(); });
  watcher.on('change', () => { onChange(); });
  watcher.on('error', (error) => {
    logger.error({ err: error }, 'Error watching profile file');
  });

  return () => watcher.close();
}
