import type { SurgeRequestsSnapshot, SurgeTrafficSample, ConnectionsSnapshot, MemoryReading, TrafficDelta } from './decoders';
import { formatBytes, formatSpeed, MEMORY_NOT_APPLICABLE, ZERO_SIZE, ZERO_SPEED } from './format';
import { HistoryBuffer, HISTORY_CAPACITY } from './history';
import { smoothSpeed } from './smoothing';
import type { AggregateTotals, ConnectionRecord, MemorySample, MonitorState, SpeedSample } from './types';

export const MAX_RECENT_CONNECTIONS = 50;

export interface StateOptions {
  historyCapacity?: number;
  /** Append the destination port (other than 80/443) to connection descriptors */
  includePortInDescriptors?: boolean;
}

function emptyTotals(): AggregateTotals {
  return {
    totalUploadBytes: 0,
    totalDownloadBytes: 0,
    activeConnectionCount: 0,
    mostRecentConnectionDescriptors: [],
  };
}

export function createInitialState(): MonitorState {
  return {
    uploadSpeed: ZERO_SPEED,
    downloadSpeed: ZERO_SPEED,
    rawUploadSpeed: 0,
    rawDownloadSpeed: 0,
    totalUpload: ZERO_SIZE,
    totalDownload: ZERO_SIZE,
    totals: emptyTotals(),
    memoryUsage: ZERO_SIZE,
    rawMemoryUsage: null,
    speedHistory: [],
    memoryHistory: [],
    connections: [],
    updatedAt: null,
  };
}

export function describeConnection(record: ConnectionRecord, includePort: boolean) {
  const base = record.host.length > 0 ? record.host : record.destinationIP;
  if (base.length === 0) return null;
  const port = record.destinationPort;
  if (includePort && port.length > 0 && port !== '80' && port !== '443') {
    return `${base}:${port}`;
  }
  return base;
}

/**
 * Owns the current MonitorState. Every update replaces the snapshot with a
 * new frozen object, so a reader never sees a half-applied update.
 */
export class MonitorStateStore {
  private state: MonitorState;
  private readonly speedHistory: HistoryBuffer<SpeedSample>;
  private readonly memoryHistory: HistoryBuffer<MemorySample>;
  private readonly includePort: boolean;

  constructor(options: StateOptions = {}) {
    const capacity = options.historyCapacity ?? HISTORY_CAPACITY;
    this.speedHistory = new HistoryBuffer(capacity);
    this.memoryHistory = new HistoryBuffer(capacity);
    this.includePort = options.includePortInDescriptors ?? false;
    this.state = Object.freeze(createInitialState());
  }

  get snapshot(): MonitorState {
    return this.state;
  }

  private commit(partial: Partial<MonitorState>, timestamp: number | null) {
    this.state = Object.freeze({
      ...this.state,
      ...partial,
      updatedAt: timestamp ?? this.state.updatedAt,
    });
    return this.state;
  }

  private recordSpeed(timestamp: number, upload: number, download: number) {
    const raw: SpeedSample = { timestamp, uploadBytesPerSec: upload, downloadBytesPerSec: download };
    this.speedHistory.push(smoothSpeed(this.speedHistory.last(), raw));
    return Object.freeze(this.speedHistory.toArray());
  }

  applyTraffic(delta: TrafficDelta, timestamp: number) {
    return this.commit({
      uploadSpeed: formatSpeed(delta.up),
      downloadSpeed: formatSpeed(delta.down),
      rawUploadSpeed: delta.up,
      rawDownloadSpeed: delta.down,
      speedHistory: this.recordSpeed(timestamp, delta.up, delta.down),
    }, timestamp);
  }

  /**
   * Surge reports speeds and cumulative totals in one payload.
   */
  applySurgeTraffic(sample: SurgeTrafficSample, timestamp: number) {
    const { traffic } = sample;
    return this.commit({
      uploadSpeed: formatSpeed(traffic.outCurrentSpeed),
      downloadSpeed: formatSpeed(traffic.inCurrentSpeed),
      rawUploadSpeed: traffic.outCurrentSpeed,
      rawDownloadSpeed: traffic.inCurrentSpeed,
      totalUpload: formatBytes(traffic.out),
      totalDownload: formatBytes(traffic.in),
      totals: {
        ...this.state.totals,
        totalUploadBytes: traffic.out,
        totalDownloadBytes: traffic.in,
      },
      speedHistory: this.recordSpeed(timestamp, traffic.outCurrentSpeed, traffic.inCurrentSpeed),
    }, timestamp);
  }

  applyMemory(reading: MemoryReading, timestamp: number) {
    this.memoryHistory.push({ timestamp, usageBytes: reading.inUse });
    return this.commit({
      memoryUsage: formatBytes(reading.inUse),
      rawMemoryUsage: reading.inUse,
      memoryHistory: Object.freeze(this.memoryHistory.toArray()),
    }, timestamp);
  }

  markMemoryNotApplicable() {
    this.memoryHistory.clear();
    return this.commit({
      memoryUsage: MEMORY_NOT_APPLICABLE,
      rawMemoryUsage: null,
      memoryHistory: [],
    }, null);
  }

  applyConnections(snapshot: ConnectionsSnapshot, timestamp: number) {
    const descriptors: Array<string> = [];
    for (const record of snapshot.connections) {
      const descriptor = describeConnection(record, this.includePort);
      if (descriptor !== null) descriptors.push(descriptor);
    }

    return this.commit({
      totalUpload: formatBytes(snapshot.uploadTotal),
      totalDownload: formatBytes(snapshot.downloadTotal),
      totals: {
        totalUploadBytes: snapshot.uploadTotal,
        totalDownloadBytes: snapshot.downloadTotal,
        activeConnectionCount: snapshot.connections.length,
        mostRecentConnectionDescriptors: newestFirst(descriptors),
      },
      connections: Object.freeze(snapshot.connections),
    }, timestamp);
  }

  /**
   * Surge totals come from the traffic payload, so only the count and
   * descriptors change here.
   */
  applySurgeRequests(snapshot: SurgeRequestsSnapshot, timestamp: number) {
    return this.commit({
      totals: {
        ...this.state.totals,
        activeConnectionCount: snapshot.connections.length,
        mostRecentConnectionDescriptors: newestFirst(snapshot.remoteHosts),
      },
      connections: Object.freeze(snapshot.connections),
    }, timestamp);
  }

  /**
   * Clear the instantaneous series. Totals, the connection count and the
   * descriptor list survive so a revisited view does not flash to zero.
   */
  resetRealtime() {
    this.speedHistory.clear();
    this.memoryHistory.clear();
    const memoryUsage = this.state.memoryUsage === MEMORY_NOT_APPLICABLE ? MEMORY_NOT_APPLICABLE : ZERO_SIZE;
    return this.commit({
      uploadSpeed: ZERO_SPEED,
      downloadSpeed: ZERO_SPEED,
      rawUploadSpeed: 0,
      rawDownloadSpeed: 0,
      memoryUsage,
      rawMemoryUsage: null,
      speedHistory: [],
      memoryHistory: [],
    }, null);
  }

  reset() {
    this.speedHistory.clear();
    this.memoryHistory.clear();
    this.state = Object.freeze(createInitialState());
    return this.state;
  }
}

function newestFirst(descriptors: Array<string>) {
  return Object.freeze(descriptors.slice(-MAX_RECENT_CONNECTIONS).reverse());
}
