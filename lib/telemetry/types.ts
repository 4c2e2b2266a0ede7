/**
 * Type definitions for the telemetry monitor
 */

/**
 * Proxy engine family / API dialect spoken by a controller.
 * `premium` speaks the standard push API but has no memory endpoint;
 * `surge` only offers a polled REST API.
 */
export const ENGINE_KINDS = ['standard', 'premium', 'surge'] as const;
export type EngineKind = typeof ENGINE_KINDS[number];

export const CHANNEL_KINDS = ['traffic', 'memory', 'connections'] as const;
export type ChannelKind = typeof CHANNEL_KINDS[number];

export type TransportKind = 'push' | 'poll';

/**
 * Remote controller a monitoring session is bound to. Read-only to the monitor.
 */
export interface BackendProfile {
  readonly id: string;
  readonly name: string;
  readonly host: string;
  readonly port: number;
  readonly useTls: boolean;
  /** Bearer secret for push engines, empty when the controller has none */
  readonly secret: string;
  readonly engine: EngineKind;
  /** Static API key sent as `x-key` to Surge controllers */
  readonly surgeKey?: string;
}

export interface SpeedSample {
  timestamp: number;
  uploadBytesPerSec: number;
  downloadBytesPerSec: number;
}

export interface MemorySample {
  timestamp: number;
  usageBytes: number;
}

/**
 * One active or recently active flow as reported by the controller.
 */
export interface ConnectionRecord {
  id: string;
  network: string;
  type: string;
  sourceIP: string;
  sourcePort: string;
  destinationIP: string;
  destinationPort: string;
  host: string;
  processPath: string;
  specialProxy: string;
  chains: Array<string>;
  rule: string;
  rulePayload: string;
  upload: number;
  download: number;
  uploadSpeed: number;
  downloadSpeed: number;
  alive: boolean;
  start: string;
}

export interface AggregateTotals {
  totalUploadBytes: number;
  totalDownloadBytes: number;
  activeConnectionCount: number;
  /** Newest first */
  mostRecentConnectionDescriptors: ReadonlyArray<string>;
}

/**
 * Snapshot handed to subscribers. Replaced wholesale on every update.
 */
export interface MonitorState {
  uploadSpeed: string;
  downloadSpeed: string;
  rawUploadSpeed: number;
  rawDownloadSpeed: number;
  totalUpload: string;
  totalDownload: string;
  totals: AggregateTotals;
  /** Formatted usage, or `N/A` when the engine has no memory endpoint */
  memoryUsage: string;
  rawMemoryUsage: number | null;
  speedHistory: ReadonlyArray<SpeedSample>;
  memoryHistory: ReadonlyArray<MemorySample>;
  connections: ReadonlyArray<ConnectionRecord>;
  updatedAt: number | null;
}

export type ChannelPhase = 'idle' | 'connecting' | 'open' | 'retrying' | 'stopped';

export interface ChannelStatus {
  kind: ChannelKind;
  transport: TransportKind;
  phase: ChannelPhase;
  connected: boolean;
  retryPending: boolean;
  lastError: string | null;
  messagesReceived: number;
  decodeFailures: number;
}

export type StateListener = (state: MonitorState) => void;
