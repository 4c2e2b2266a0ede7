import { ConfigurationError } from './errors';
import type { BackendProfile, ChannelKind } from './types';

const SURGE_PATHS: Partial<Record<ChannelKind, string>> = {
  traffic: 'v1/traffic',
  connections: 'v1/requests/active',
};

function hostPart(host: string) {
  const trimmed = host.trim();
  // Bare IPv6 literals need brackets inside a URL
  if (trimmed.includes(':') && !trimmed.startsWith('[')) {
    return `[${trimmed}]`;
  }
  return trimmed;
}

function buildUrl(scheme: string, profile: BackendProfile, path: string) {
  if (profile.host.trim().length === 0) {
    throw new ConfigurationError(`Profile ${profile.id} has no host`);
  }
  if (!Number.isInteger(profile.port) || profile.port <= 0 || profile.port > 65535) {
    throw new ConfigurationError(`Profile ${profile.id} has invalid port ${String(profile.port)}`);
  }

  const raw = `${scheme}://${hostPart(profile.host)}:${String(profile.port)}/${path}`;
  try {
    return new URL(raw).toString();
  } catch {
    throw new ConfigurationError(`Profile ${profile.id} produces an invalid URL: ${raw}`);
  }
}

/**
 * WebSocket endpoint of a push channel, e.g. `wss://10.0.0.1:9090/traffic`.
 */
export function pushUrl(profile: BackendProfile, kind: ChannelKind) {
  return buildUrl(profile.useTls ? 'wss' : 'ws', profile, kind);
}

/**
 * REST endpoint polled for a Surge channel. Surge has no memory endpoint.
 */
export function pollUrl(profile: BackendProfile, kind: ChannelKind) {
  const path = SURGE_PATHS[kind];
  if (path === undefined) {
    throw new ConfigurationError(`Surge controllers have no ${kind} endpoint`);
  }
  return buildUrl(profile.useTls ? 'https' : 'http', profile, path);
}

export function pushHeaders(profile: BackendProfile): Record<string, string> {
  return profile.secret.length > 0 ? { Authorization: `Bearer ${profile.secret}` } : {};
}

export function pollHeaders(profile: BackendProfile) {
  const key = profile.surgeKey ?? '';
  return key.length > 0 ? [`x-key: ${key}`] : [];
}
