import express, { type Request, type Response } from 'express';
import { WebSocketServer, type WebSocket } from 'ws';

import { logger } from './lib/logger';
import { findActiveProfile, loadProfiles, resolveSettings, serializeReloads, watchProfiles } from './lib/config';
import { defaultHttpClient } from './lib/deps';
import { TelemetryMonitor, describeError, type BackendProfile, type MonitorState } from './lib/telemetry';

const settings = resolveSettings();
const app = express();

// WebSocket clients
const wsClients = new Set<WebSocket>();

const monitor = new TelemetryMonitor({}, {
  retryDelayMs: settings.retryDelayMs,
  pollIntervalMs: settings.pollIntervalMs,
  includePortInDescriptors: settings.showDestinationPorts,
});

function publicProfile(profile: BackendProfile | null) {
  if (profile === null) return null;
  const { secret: _secret, surgeKey: _surgeKey, ...rest } = profile;
  return rest;
}

app.get('/api/state', (_req: Request, res: Response) => {
  res.json(monitor.getState());
});

app.get('/api/channels', (_req: Request, res: Response) => {
  res.json(monitor.getChannelStatuses());
});

app.get('/api/profile', (_req: Request, res: Response) => {
  res.json(publicProfile(monitor.activeProfile));
});

function broadcastToClients(message: unknown) {
  const payload = JSON.stringify(message);
  for (const client of wsClients) {
    if (client.readyState === 1) { // WebSocket.OPEN
      client.send(payload);
    }
  }
}

monitor.subscribe((state: MonitorState) => {
  if (wsClients.size > 0) {
    broadcastToClients({ type: 'state', data: state });
  }
});

function sameProfile(a: BackendProfile | null, b: BackendProfile | null) {
  return JSON.stringify(a) === JSON.stringify(b);
}

function startOn(profile: BackendProfile) {
  monitor.startMonitoring(profile);
  // Nobody is watching yet: keep the channels configured but hold delivery
  if (wsClients.size === 0) {
    monitor.pauseMonitoring();
  }
}

async function applyProfiles() {
  let next: BackendProfile | null;
  try {
    next = findActiveProfile(await loadProfiles(settings.profilesFile));
  } catch (error) {
    logger.error({ err: error }, 'Failed to load profiles, keeping current session');
    return;
  }

  const current = monitor.activeProfile;
  if (sameProfile(current, next)) return;

  if (current !== null) {
    logger.info({ from: current.id, to: next?.id ?? null }, 'Active profile changed');
    monitor.stopMonitoring();
    monitor.resetData();
  }

  if (next === null) {
    logger.warn('No active profile configured, monitor idle');
    return;
  }
  startOn(next);
}

// A slow read must not finish after a newer one and start a stale profile
const reloadProfiles = serializeReloads(applyProfiles);

const stopWatching = watchProfiles(settings.profilesFile, () => {
  void reloadProfiles();
});

void reloadProfiles();

// Create HTTP server
const server = app.listen(settings.port, () => {
  logger.info({
    port: settings.port,
    profilesFile: settings.profilesFile,
    pollIntervalMs: settings.pollIntervalMs,
    retryDelayMs: settings.retryDelayMs,
  }, 'Monitor server started');
});

// Create WebSocket server
const wss = new WebSocketServer({ server });

wss.on('connection', (ws: WebSocket) => {
  const firstClient = wsClients.size === 0;
  wsClients.add(ws);

  if (firstClient) {
    monitor.resetRealtimeData();
    monitor.resumeMonitoring();
  }
  ws.send(JSON.stringify({ type: 'state', data: monitor.getState() }));

  const detach = () => {
    if (!wsClients.delete(ws)) return;
    if (wsClients.size === 0) {
      monitor.pauseMonitoring();
    }
  };

  ws.on('close', detach);

  ws.on('error', (error) => {
    logger.error({ err: error }, 'WebSocket error');
    detach();
  });
});

function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down');
  monitor.stopMonitoring();
  defaultHttpClient.shutdown();
  stopWatching().catch((error: unknown) => {
    logger.error({ detail: describeError(error) }, 'Failed to close profile watcher');
  });
  for (const client of wsClients) {
    client.terminate();
  }
  wss.close();
  server.close(() => {
    process.exit(0);
  });
}

process.on('SIGINT', () => { shutdown('SIGINT'); });
process.on('SIGTERM', () => { shutdown('SIGTERM'); });
