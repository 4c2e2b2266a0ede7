/**
 * Wire payload decoders. Every decoder returns a result instead of throwing,
 * so one bad message never takes a channel down.
 */
import type { ConnectionRecord } from './types';

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'malformed' | 'schema-mismatch' | 'empty'; error: string };

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isStringArray(value: unknown): value is Array<string> {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function parsePayload(payload: string): DecodeResult<unknown> {
  try {
    return { ok: true, value: JSON.parse(payload) as unknown };
  } catch (error) {
    return { ok: false, reason: 'malformed', error: error instanceof Error ? error.message : String(error) };
  }
}

function mismatch(error: string): { ok: false; reason: 'schema-mismatch'; error: string } {
  return { ok: false, reason: 'schema-mismatch', error };
}

// Controllers send `null` for optional fields as often as they omit them
function isAbsent(value: unknown) {
  return value === undefined || value === null;
}

/**
 * Reads typed fields off a JSON object, remembering the first mismatch.
 * Missing or null optional fields fall back to their default.
 */
class FieldReader {
  problem: string | null = null;

  constructor(private readonly obj: JsonObject, private readonly path: string) {}

  private fail(key: string, expected: string) {
    this.problem ??= `${this.path}.${key}: expected ${expected}`;
  }

  string(key: string, fallback?: string) {
    const value = this.obj[key];
    if (typeof value === 'string') return value;
    if (isAbsent(value) && fallback !== undefined) return fallback;
    this.fail(key, 'string');
    return '';
  }

  number(key: string, fallback?: number) {
    const value = this.obj[key];
    if (isNumber(value)) return value;
    if (isAbsent(value) && fallback !== undefined) return fallback;
    this.fail(key, 'number');
    return 0;
  }

  boolean(key: string, fallback: boolean) {
    const value = this.obj[key];
    if (typeof value === 'boolean') return value;
    if (!isAbsent(value)) this.fail(key, 'boolean');
    return fallback;
  }

  strings(key: string) {
    const value = this.obj[key];
    if (isStringArray(value)) return [...value];
    this.fail(key, 'string[]');
    return [];
  }
}

// ============================================================================
// Traffic
// ============================================================================

export interface TrafficDelta {
  up: number;
  down: number;
}

export function decodeTraffic(payload: string): DecodeResult<TrafficDelta> {
  const parsed = parsePayload(payload);
  if (!parsed.ok) return parsed;
  const data = parsed.value;
  if (!isObject(data)) return mismatch('traffic: expected object');

  const fields = new FieldReader(data, 'traffic');
  const value = { up: fields.number('up'), down: fields.number('down') };
  if (fields.problem !== null) return mismatch(fields.problem);
  return { ok: true, value };
}

export interface SurgeInterfaceTraffic {
  in: number;
  out: number;
  inCurrentSpeed: number;
  outCurrentSpeed: number;
  inMaxSpeed: number;
  outMaxSpeed: number;
}

export interface SurgeTrafficSample {
  /** Name of the interface (or connector) the sample was taken from */
  source: string;
  origin: 'interface' | 'connector';
  traffic: SurgeInterfaceTraffic;
}

function readSurgeEntries(map: unknown, path: string): Array<[string, SurgeInterfaceTraffic]> | string {
  if (map === undefined || map === null) return [];
  if (!isObject(map)) return `${path}: expected object`;

  const entries: Array<[string, SurgeInterfaceTraffic]> = [];
  for (const [name, raw] of Object.entries(map)) {
    if (!isObject(raw)) return `${path}.${name}: expected object`;
    const fields = new FieldReader(raw, `${path}.${name}`);
    const traffic: SurgeInterfaceTraffic = {
      in: fields.number('in'),
      out: fields.number('out'),
      inCurrentSpeed: fields.number('inCurrentSpeed'),
      outCurrentSpeed: fields.number('outCurrentSpeed'),
      inMaxSpeed: fields.number('inMaxSpeed', 0),
      outMaxSpeed: fields.number('outMaxSpeed', 0),
    };
    if (fields.problem !== null) return fields.problem;
    entries.push([name, traffic]);
  }
  return entries;
}

/**
 * Pick the interface with the largest in+out total. Ties keep the first
 * entry in payload order. With no interface entries the first connector is used.
 */
export function selectPrimaryInterface(
  interfaces: Array<[string, SurgeInterfaceTraffic]>,
  connectors: Array<[string, SurgeInterfaceTraffic]>
): SurgeTrafficSample | null {
  let selected: [string, SurgeInterfaceTraffic] | null = null;
  for (const entry of interfaces) {
    const total = entry[1].in + entry[1].out;
    if (selected === null || total > selected[1].in + selected[1].out) {
      selected = entry;
    }
  }
  if (selected !== null) {
    return { source: selected[0], origin: 'interface', traffic: selected[1] };
  }

  const firstConnector = connectors[0];
  if (firstConnector !== undefined) {
    return { source: firstConnector[0], origin: 'connector', traffic: firstConnector[1] };
  }
  return null;
}

export function decodeSurgeTraffic(payload: string): DecodeResult<SurgeTrafficSample> {
  const parsed = parsePayload(payload);
  if (!parsed.ok) return parsed;
  const data = parsed.value;
  if (!isObject(data)) return mismatch('traffic: expected object');

  const interfaces = readSurgeEntries(data['interface'], 'traffic.interface');
  if (typeof interfaces === 'string') return mismatch(interfaces);
  const connectors = readSurgeEntries(data['connector'], 'traffic.connector');
  if (typeof connectors === 'string') return mismatch(connectors);

  const sample = selectPrimaryInterface(interfaces, connectors);
  if (sample === null) {
    return { ok: false, reason: 'empty', error: 'traffic: no interface or connector entries' };
  }
  return { ok: true, value: sample };
}

// ============================================================================
// Memory
// ============================================================================

export interface MemoryReading {
  inUse: number;
  limit: number;
}

export function decodeMemory(payload: string): DecodeResult<MemoryReading> {
  const parsed = parsePayload(payload);
  if (!parsed.ok) return parsed;
  const data = parsed.value;
  if (!isObject(data)) return mismatch('memory: expected object');
  const fields = new FieldReader(data, 'memory');
  const value = { inUse: fields.number('inuse'), limit: fields.number('oslimit', 0) };
  if (fields.problem !== null) return mismatch(fields.problem);
  return { ok: true, value };
}

// ============================================================================
// Connections
// ============================================================================

export interface ConnectionsSnapshot {
  uploadTotal: number;
  downloadTotal: number;
  connections: Array<ConnectionRecord>;
  schema: ConnectionSchema;
}

export type ConnectionSchema = 'basic' | 'extended';

// The basic shape always reports the process and special-proxy fields; the
// extended one adds dnsMode and may leave those two out.
function readMetadata(metadata: JsonObject, schema: ConnectionSchema, path: string) {
  const fields = new FieldReader(metadata, path);
  const optional = schema === 'extended' ? '' : undefined;
  const value = {
    network: fields.string('network'),
    type: fields.string('type'),
    sourceIP: fields.string('sourceIP'),
    sourcePort: fields.string('sourcePort'),
    destinationIP: fields.string('destinationIP'),
    destinationPort: fields.string('destinationPort'),
    host: fields.string('host'),
    processPath: fields.string('processPath', optional),
    specialProxy: fields.string('specialProxy', optional),
  };
  if (schema === 'extended') fields.string('dnsMode');
  return fields.problem ?? value;
}

function readConnection(raw: unknown, schema: ConnectionSchema, path: string): ConnectionRecord | string {
  if (!isObject(raw)) return `${path}: expected object`;
  const metadata = raw['metadata'];
  if (!isObject(metadata)) return `${path}.metadata: expected object`;
  const meta = readMetadata(metadata, schema, `${path}.metadata`);
  if (typeof meta === 'string') return meta;

  const fields = new FieldReader(raw, path);
  const record: ConnectionRecord = {
    id: fields.string('id'),
    ...meta,
    chains: fields.strings('chains'),
    rule: fields.string('rule'),
    rulePayload: fields.string('rulePayload'),
    upload: fields.number('upload'),
    download: fields.number('download'),
    uploadSpeed: fields.number('uploadSpeed', 0),
    downloadSpeed: fields.number('downloadSpeed', 0),
    alive: fields.boolean('isAlive', true),
    start: fields.string('start'),
  };
  return fields.problem ?? record;
}

function readConnectionList(list: Array<unknown>, schema: ConnectionSchema): Array<ConnectionRecord> | string {
  const records: Array<ConnectionRecord> = [];
  for (const [index, raw] of list.entries()) {
    const record = readConnection(raw, schema, `connections[${String(index)}]`);
    if (typeof record === 'string') return record;
    records.push(record);
  }
  return records;
}

/**
 * Decode a connections message. The basic record shape is tried first and
 * the extended shape only when the records (not the envelope) fail to match.
 * On failure nothing is returned, so callers keep their previous state.
 */
export function decodeConnections(payload: string): DecodeResult<ConnectionsSnapshot> {
  const parsed = parsePayload(payload);
  if (!parsed.ok) return parsed;
  const data = parsed.value;
  if (!isObject(data)) return mismatch('connections: expected object');

  const envelope = new FieldReader(data, 'connections');
  const uploadTotal = envelope.number('uploadTotal');
  const downloadTotal = envelope.number('downloadTotal');
  if (envelope.problem !== null) return mismatch(envelope.problem);
  const list = data['connections'];

  // Idle controllers report `null` rather than an empty array
  if (list === null || list === undefined) {
    return { ok: true, value: { uploadTotal, downloadTotal, connections: [], schema: 'basic' } };
  }
  if (!Array.isArray(list)) return mismatch('connections.connections: expected array');

  const basic = readConnectionList(list, 'basic');
  if (typeof basic !== 'string') {
    return { ok: true, value: { uploadTotal, downloadTotal, connections: basic, schema: 'basic' } };
  }

  const extended = readConnectionList(list, 'extended');
  if (typeof extended !== 'string') {
    return { ok: true, value: { uploadTotal, downloadTotal, connections: extended, schema: 'extended' } };
  }

  return mismatch(`basic: ${basic}; extended: ${extended}`);
}

// ============================================================================
// Surge requests
// ============================================================================

export interface SurgeRequestsSnapshot {
  connections: Array<ConnectionRecord>;
  /** Remote host of every request, payload order, entries without a host skipped */
  remoteHosts: Array<string>;
}

/**
 * Strip a trailing port from `host:port` or `[v6]:port`. Bare IPv6 literals are kept whole.
 */
export function stripPort(remoteHost: string) {
  if (remoteHost.startsWith('[')) {
    const end = remoteHost.indexOf(']');
    return end > 0 ? remoteHost.slice(1, end) : remoteHost;
  }
  const first = remoteHost.indexOf(':');
  if (first === -1 || first !== remoteHost.lastIndexOf(':')) return remoteHost;
  return remoteHost.slice(0, first);
}

function portOf(remoteHost: string) {
  const match = /:(\d+)$/.exec(remoteHost);
  if (match?.[1] === undefined) return '';
  return stripPort(remoteHost) === remoteHost ? '' : match[1];
}

function readSurgeRequest(raw: unknown, index: number): ConnectionRecord | string {
  const path = `requests[${String(index)}]`;
  if (!isObject(raw)) return `${path}: expected object`;

  const fields = new FieldReader(raw, path);
  const remoteHost = fields.string('remoteHost');
  const id = fields.number('id', -1);
  const sourcePort = fields.number('sourcePort', -1);
  const startDate = fields.number('startDate', -1);
  const policyName = fields.string('policyName', '');
  const record: ConnectionRecord = {
    id: id >= 0 ? String(id) : `request-${String(index)}`,
    network: 'TCP',
    type: fields.string('method', ''),
    sourceIP: fields.string('sourceAddress', ''),
    sourcePort: sourcePort >= 0 ? String(sourcePort) : '',
    destinationIP: fields.string('remoteAddress', ''),
    destinationPort: portOf(remoteHost),
    host: stripPort(remoteHost),
    processPath: fields.string('processPath', ''),
    specialProxy: '',
    chains: policyName.length > 0 ? [policyName] : [],
    rule: fields.string('rule', ''),
    rulePayload: '',
    upload: fields.number('outBytes', 0),
    download: fields.number('inBytes', 0),
    uploadSpeed: fields.number('outCurrentSpeed', 0),
    downloadSpeed: fields.number('inCurrentSpeed', 0),
    alive: !fields.boolean('completed', false) && !fields.boolean('failed', false),
    start: startDate >= 0 ? new Date(startDate * 1000).toISOString() : '',
  };
  return fields.problem ?? record;
}

export function decodeSurgeRequests(payload: string): DecodeResult<SurgeRequestsSnapshot> {
  const parsed = parsePayload(payload);
  if (!parsed.ok) return parsed;
  const data = parsed.value;
  if (!isObject(data)) return mismatch('requests: expected object');
  const list = data['requests'];
  if (!Array.isArray(list)) return mismatch('requests.requests: expected array');

  const connections: Array<ConnectionRecord> = [];
  for (const [index, raw] of list.entries()) {
    const record = readSurgeRequest(raw, index);
    if (typeof record === 'string') return mismatch(record);
    connections.push(record);
  }

  const remoteHosts = connections
    .map(record => record.host)
    .filter(host => host.length > 0);

  return { ok: true, value: { connections, remoteHosts } };
}
