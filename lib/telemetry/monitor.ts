/**
 * Single entry point for live controller metrics. Picks the channel set for
 * the profile's engine, gates every channel on "monitoring" and "view active",
 * and republishes the merged MonitorState to subscribers.
 */
import type { Logger } from 'pino';

import {
  defaultHttpClient,
  defaultPushTransport,
  systemClock,
  type Clock,
  type HttpClient,
  type PushTransport,
} from '../deps';
import { logger as rootLogger } from '../logger';
import { PollChannel, PushChannel, type ChannelGate, type MetricChannel, type PayloadHandler } from './channel';
import {
  decodeConnections,
  decodeMemory,
  decodeSurgeRequests,
  decodeSurgeTraffic,
  decodeTraffic,
  type DecodeResult,
} from './decoders';
import { pollHeaders, pollUrl, pushHeaders, pushUrl } from './endpoints';
import { MonitorStateStore } from './state';
import type { BackendProfile, ChannelKind, ChannelStatus, MonitorState, StateListener } from './types';

// Connection lists from busy controllers get large
const CONNECTIONS_MAX_PAYLOAD_BYTES = 10 * 1024 * 1024;

export interface MonitorDeps {
  transport?: PushTransport;
  http?: HttpClient;
  clock?: Clock;
  logger?: Logger;
}

export interface MonitorOptions {
  retryDelayMs?: number;
  pollIntervalMs?: number;
  historyCapacity?: number;
  includePortInDescriptors?: boolean;
}

export class TelemetryMonitor implements ChannelGate {
  private readonly transport: PushTransport;
  private readonly http: HttpClient;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly store: MonitorStateStore;
  private readonly listeners = new Set<StateListener>();
  private readonly channels = new Map<ChannelKind, MetricChannel>();
  private profile: BackendProfile | null = null;
  private monitoringFlag = false;
  private viewActiveFlag = false;

  constructor(deps: MonitorDeps = {}, private readonly options: MonitorOptions = {}) {
    this.transport = deps.transport ?? defaultPushTransport;
    this.http = deps.http ?? defaultHttpClient;
    this.clock = deps.clock ?? systemClock;
    this.log = (deps.logger ?? rootLogger).child({ component: 'telemetry' });
    this.store = new MonitorStateStore({
      historyCapacity: options.historyCapacity,
      includePortInDescriptors: options.includePortInDescriptors,
    });
  }

  get monitoring() {
    return this.monitoringFlag;
  }

  get viewActive() {
    return this.viewActiveFlag;
  }

  get activeProfile() {
    return this.profile;
  }

  getState(): MonitorState {
    return this.store.snapshot;
  }

  getChannelStatuses(): Array<ChannelStatus> {
    return [...this.channels.values()].map(channel => channel.status());
  }

  /**
   * Receive every new snapshot. Returns the unsubscribe function.
   */
  subscribe(listener: StateListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  startMonitoring(profile: BackendProfile) {
    if (this.monitoringFlag) {
      if (this.profile?.id !== profile.id) {
        this.log.warn({ active: this.profile?.id, requested: profile.id }, 'Already monitoring another profile, stop first');
      }
      return;
    }

    this.profile = profile;
    this.monitoringFlag = true;
    this.viewActiveFlag = true;
    this.log.info({ profile: profile.id, engine: profile.engine }, 'Starting monitoring');

    if (profile.engine === 'surge') {
      this.openPollChannel(profile, 'traffic', this.handleSurgeTraffic);
      this.openPollChannel(profile, 'connections', this.handleSurgeRequests);
      this.publish(this.store.markMemoryNotApplicable());
      return;
    }

    this.openPushChannel(profile, 'traffic', this.handleTraffic);
    this.openPushChannel(profile, 'connections', this.handleConnections);
    if (profile.engine === 'premium') {
      this.publish(this.store.markMemoryNotApplicable());
    } else {
      this.openPushChannel(profile, 'memory', this.handleMemory);
    }
  }

  pauseMonitoring() {
    this.viewActiveFlag = false;
    for (const channel of this.channels.values()) {
      channel.pause();
    }
  }

  resumeMonitoring() {
    if (this.profile === null) return;
    this.viewActiveFlag = true;
    for (const channel of this.channels.values()) {
      channel.resume();
    }
  }

  stopMonitoring() {
    const wasMonitoring = this.monitoringFlag;
    this.monitoringFlag = false;
    this.viewActiveFlag = false;
    for (const channel of this.channels.values()) {
      channel.stop();
    }
    this.channels.clear();
    this.profile = null;
    if (wasMonitoring) {
      this.log.info('Monitoring stopped');
    }
  }

  /**
   * Forget speed and memory history but keep cumulative totals. Used when a
   * view is revisited.
   */
  resetRealtimeData() {
    this.publish(this.store.resetRealtime());
  }

  /**
   * Forget everything, totals included. Used when switching profiles. An
   * active engine without memory reporting keeps `N/A`.
   */
  resetData() {
    const state = this.store.reset();
    this.publish(this.reportsMemory() ? state : this.store.markMemoryNotApplicable());
  }

  private reportsMemory() {
    return this.profile === null || this.profile.engine === 'standard';
  }

  private openPushChannel(profile: BackendProfile, kind: ChannelKind, deliver: PayloadHandler) {
    let url: string;
    try {
      url = pushUrl(profile, kind);
    } catch (error) {
      this.log.error({ err: error, channel: kind, profile: profile.id }, 'Cannot open channel');
      return;
    }

    const channel = new PushChannel({
      kind,
      gate: this,
      clock: this.clock,
      logger: this.log,
      deliver,
      transport: this.transport,
      request: {
        url,
        headers: pushHeaders(profile),
        maxPayloadBytes: kind === 'connections' ? CONNECTIONS_MAX_PAYLOAD_BYTES : undefined,
      },
      retryDelayMs: this.options.retryDelayMs,
    });
    this.channels.set(kind, channel);
    channel.start();
  }

  private openPollChannel(profile: BackendProfile, kind: ChannelKind, deliver: PayloadHandler) {
    let url: string;
    try {
      url = pollUrl(profile, kind);
    } catch (error) {
      this.log.error({ err: error, channel: kind, profile: profile.id }, 'Cannot open channel');
      return;
    }

    const channel = new PollChannel({
      kind,
      gate: this,
      clock: this.clock,
      logger: this.log,
      deliver,
      http: this.http,
      url,
      headers: pollHeaders(profile),
      intervalMs: this.options.pollIntervalMs,
    });
    this.channels.set(kind, channel);
    channel.start();
  }

  private publish(state: MonitorState) {
    for (const listener of [...this.listeners]) {
      try {
        listener(state);
      } catch (error) {
        this.log.error({ err: error }, 'State listener failed');
      }
    }
  }

  private accept<T>(kind: ChannelKind, result: DecodeResult<T>, apply: (value: T, timestamp: number) => MonitorState) {
    if (!result.ok) {
      this.log.warn({ channel: kind, reason: result.reason, detail: result.error }, 'Dropped undecodable payload');
      return false;
    }
    this.publish(apply(result.value, this.clock.now()));
    return true;
  }

  private readonly handleTraffic: PayloadHandler = (payload) =>
    this.accept('traffic', decodeTraffic(payload), (value, ts) => this.store.applyTraffic(value, ts));

  private readonly handleMemory: PayloadHandler = (payload) =>
    this.accept('memory', decodeMemory(payload), (value, ts) => this.store.applyMemory(value, ts));

  private readonly handleConnections: PayloadHandler = (payload) =>
    this.accept('connections', decodeConnections(payload), (value, ts) => this.store.applyConnections(value, ts));

  private readonly handleSurgeTraffic: PayloadHandler = (payload) =>
    this.accept('traffic', decodeSurgeTraffic(payload), (value, ts) => this.store.applySurgeTraffic(value, ts));

  private readonly handleSurgeRequests: PayloadHandler = (payload) =>
    this.accept('connections', decodeSurgeRequests(payload), (value, ts) => this.store.applySurgeRequests(value, ts));
}
