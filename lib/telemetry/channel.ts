/**
 * Lifecycle of one metric feed (traffic, memory or connections) for one
 * controller. Push channels hold a WebSocket open and reconnect after a
 * fixed delay; poll channels fetch on a fixed period. Both consult the
 * monitor's gate before reconnecting or polling.
 */
import type { Logger } from 'pino';

import type { Clock, HttpClient, PushConnection, PushRequest, PushTransport, Timer } from '../deps';
import { classifyTransportError, describeError } from './errors';
import type { ChannelKind, ChannelPhase, ChannelStatus, TransportKind } from './types';

export const RETRY_DELAY_MS = 3000;
export const POLL_INTERVAL_MS = 1000;

export interface ChannelGate {
  readonly monitoring: boolean;
  readonly viewActive: boolean;
}

/**
 * Decodes one payload and applies it. Returns false when the payload was
 * rejected by the decoder.
 */
export type PayloadHandler = (payload: string) => boolean;

export interface ChannelOptions {
  kind: ChannelKind;
  gate: ChannelGate;
  clock: Clock;
  logger: Logger;
  deliver: PayloadHandler;
}

export abstract class MetricChannel {
  abstract readonly transport: TransportKind;

  protected phase: ChannelPhase = 'idle';
  protected connected = false;
  protected lastError: string | null = null;
  protected readonly log: Logger;
  private messagesReceived = 0;
  private decodeFailures = 0;

  constructor(protected readonly options: ChannelOptions) {
    this.log = options.logger.child({ channel: options.kind });
  }

  get kind() {
    return this.options.kind;
  }

  abstract start(): void;
  abstract pause(): void;
  abstract resume(): void;
  abstract stop(): void;

  status(): ChannelStatus {
    return {
      kind: this.kind,
      transport: this.transport,
      phase: this.phase,
      connected: this.connected,
      retryPending: this.phase === 'retrying',
      lastError: this.lastError,
      messagesReceived: this.messagesReceived,
      decodeFailures: this.decodeFailures,
    };
  }

  protected get gateOpen() {
    return this.options.gate.monitoring && this.options.gate.viewActive;
  }

  protected markConnected() {
    if (this.connected) return;
    this.connected = true;
    this.phase = 'open';
    this.lastError = null;
    this.log.info({ transport: this.transport }, 'Channel connected');
  }

  protected receive(payload: string) {
    this.messagesReceived += 1;
    let accepted = false;
    try {
      accepted = this.options.deliver(payload);
    } catch (error) {
      this.log.error({ err: error }, 'Channel update failed');
    }
    if (!accepted) {
      this.decodeFailures += 1;
    }
  }
}

// ============================================================================
// Push transport
// ============================================================================

export interface PushChannelOptions extends ChannelOptions {
  transport: PushTransport;
  request: PushRequest;
  retryDelayMs?: number;
}

export class PushChannel extends MetricChannel {
  readonly transport = 'push' as const;

  private connection: PushConnection | null = null;
  private retryTimer: Timer | null = null;
  // Bumped whenever the current connection is abandoned so late callbacks are ignored
  private generation = 0;

  constructor(private readonly push: PushChannelOptions) {
    super(push);
  }

  start() {
    if (this.phase === 'stopped' || this.phase === 'connecting' || this.phase === 'open') return;
    this.cancelRetry();

    this.generation += 1;
    const generation = this.generation;
    const isCurrent = () => generation === this.generation;
    this.phase = 'connecting';
    this.log.debug({ url: this.push.request.url }, 'Opening channel');

    let connection: PushConnection;
    try {
      connection = this.push.transport.connect(this.push.request, {
        onOpen: () => {
          if (isCurrent()) this.markConnected();
        },
        onMessage: (text) => {
          if (!isCurrent()) return;
          this.markConnected();
          // Paused: keep the socket, drop the sample
          if (!this.gateOpen) return;
          this.receive(text);
        },
        onError: (error) => {
          if (isCurrent()) this.fail(error);
        },
        onClose: (code, reason) => {
          if (!isCurrent()) return;
          const detail = reason.length > 0 ? `: ${reason}` : '';
          this.fail(new Error(`Connection closed with code ${String(code)}${detail}`));
        },
      });
    } catch (error) {
      if (isCurrent()) this.fail(error);
      return;
    }

    if (isCurrent()) {
      this.connection = connection;
    } else {
      // Failed or stopped while connecting
      connection.close();
    }
  }

  pause() {
    if (this.phase === 'retrying') {
      this.cancelRetry();
      this.phase = 'idle';
    }
  }

  resume() {
    if (this.phase === 'stopped' || this.phase === 'connecting' || this.phase === 'open') return;
    this.start();
  }

  stop() {
    this.generation += 1;
    this.cancelRetry();
    this.closeConnection();
    this.connected = false;
    this.phase = 'stopped';
  }

  private closeConnection() {
    const connection = this.connection;
    this.connection = null;
    connection?.close();
  }

  private cancelRetry() {
    if (this.retryTimer !== null) {
      this.retryTimer.cancel();
      this.retryTimer = null;
    }
  }

  private fail(error: unknown) {
    this.generation += 1;
    this.closeConnection();
    const wasConnected = this.connected;
    this.connected = false;
    this.lastError = describeError(error);
    this.log.warn(
      { err: error, errorKind: classifyTransportError(error), wasConnected },
      'Channel transport failed'
    );
    this.scheduleRetry();
  }

  private scheduleRetry() {
    if (!this.gateOpen) {
      this.phase = 'idle';
      this.log.debug('Monitoring paused, reconnect deferred until resume');
      return;
    }

    const delayMs = this.push.retryDelayMs ?? RETRY_DELAY_MS;
    this.phase = 'retrying';
    this.retryTimer = this.options.clock.schedule(() => {
      this.retryTimer = null;
      if (this.phase !== 'retrying') return;
      this.phase = 'idle';
      // A timer that outlived a pause or stop is a no-op
      if (!this.gateOpen) return;
      this.start();
    }, delayMs);
    this.log.debug({ delayMs }, 'Reconnect scheduled');
  }
}

// ============================================================================
// Poll transport
// ============================================================================

export interface PollChannelOptions extends ChannelOptions {
  http: HttpClient;
  url: string;
  headers: Array<string>;
  intervalMs?: number;
}

export class PollChannel extends MetricChannel {
  readonly transport = 'poll' as const;

  private ticker: Timer | null = null;
  // Generation that owns the pending request, if any
  private inFlight: number | null = null;
  private failing = false;
  private generation = 0;

  constructor(private readonly poll: PollChannelOptions) {
    super(poll);
  }

  start() {
    if (this.phase === 'stopped' || this.ticker !== null) return;

    this.generation += 1;
    const generation = this.generation;
    this.phase = 'connecting';
    this.ticker = this.options.clock.every(() => {
      void this.fetchOnce(generation);
    }, this.poll.intervalMs ?? POLL_INTERVAL_MS);

    // First fetch right away so consumers do not wait a full period
    void this.fetchOnce(generation);
  }

  pause() {
    if (this.phase === 'stopped') return;
    this.disarm();
    this.phase = 'idle';
  }

  resume() {
    if (this.phase === 'stopped' || this.ticker !== null) return;
    this.start();
  }

  stop() {
    this.disarm();
    this.phase = 'stopped';
  }

  private disarm() {
    this.generation += 1;
    if (this.ticker !== null) {
      this.ticker.cancel();
      this.ticker = null;
    }
    this.connected = false;
  }

  private async fetchOnce(generation: number) {
    // Ticks never overlap, which keeps updates in request order
    if (generation !== this.generation || this.inFlight === generation || !this.gateOpen) return;

    this.inFlight = generation;
    try {
      const response = await this.poll.http.get(this.poll.url, this.poll.headers);
      if (generation !== this.generation) return;

      if (!response.ok) {
        const detail = response.status > 0 ? `HTTP ${String(response.status)}` : response.out;
        this.markFailed(new Error(detail));
        return;
      }

      this.failing = false;
      this.markConnected();
      this.receive(response.out);
    } catch (error) {
      if (generation === this.generation) this.markFailed(error);
    } finally {
      if (this.inFlight === generation) this.inFlight = null;
    }
  }

  private markFailed(error: unknown) {
    this.connected = false;
    this.lastError = describeError(error);
    this.phase = 'connecting';

    const fields = { err: error, errorKind: classifyTransportError(error), url: this.poll.url };
    // A dead controller fails every tick; only the first failure of a run is worth a warning
    if (this.failing) {
      this.log.debug(fields, 'Poll request failed');
    } else {
      this.log.warn(fields, 'Poll request failed');
    }
    this.failing = true;
  }
}
