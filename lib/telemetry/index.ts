export { TelemetryMonitor, type MonitorDeps, type MonitorOptions } from './monitor';
export { MonitorStateStore, createInitialState, describeConnection, MAX_RECENT_CONNECTIONS } from './state';
export { PushChannel, PollChannel, RETRY_DELAY_MS, POLL_INTERVAL_MS, type ChannelGate } from './channel';
export {
  decodeTraffic,
  decodeSurgeTraffic,
  decodeMemory,
  decodeConnections,
  decodeSurgeRequests,
  selectPrimaryInterface,
  stripPort,
  type DecodeResult,
} from './decoders';
export { pushUrl, pollUrl, pushHeaders, pollHeaders } from './endpoints';
export { ConfigurationError, classifyTransportError, describeError } from './errors';
export { formatSpeed, formatBytes, MEMORY_NOT_APPLICABLE } from './format';
export { HistoryBuffer, HISTORY_CAPACITY } from './history';
export { ema, smoothSpeed, SMOOTHING_FACTOR } from './smoothing';
export type {
  BackendProfile,
  EngineKind,
  ChannelKind,
  ChannelStatus,
  ConnectionRecord,
  MonitorState,
  StateListener,
} from './types';
