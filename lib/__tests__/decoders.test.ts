import { describe, it, expect } from 'vitest';
import {
  decodeConnections,
  decodeMemory,
  decodeSurgeRequests,
  decodeSurgeTraffic,
  decodeTraffic,
  stripPort,
} from '../telemetry/decoders';
import { fixtures } from './mocks';

describe('Traffic decoding', () => {
  it('should decode an up/down delta', () => {
    expect(decodeTraffic('{"up":100,"down":200}')).toEqual({ ok: true, value: { up: 100, down: 200 } });
  });

  it('should report malformed JSON', () => {
    const result = decodeTraffic('not json');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe('malformed');
  });

  it('should report the first mismatched field', () => {
    expect(decodeTraffic('{"up":"1","down":2}')).toEqual({
      ok: false,
      reason: 'schema-mismatch',
      error: 'traffic.up: expected number',
    });
    expect(decodeTraffic('[1,2]')).toEqual({
      ok: false,
      reason: 'schema-mismatch',
      error: 'traffic: expected object',
    });
  });
});

describe('Memory decoding', () => {
  it('should read inuse and oslimit', () => {
    expect(decodeMemory('{"inuse":52428800,"oslimit":1073741824}')).toEqual({
      ok: true,
      value: { inUse: 52428800, limit: 1073741824 },
    });
  });

  it('should default a missing oslimit to zero', () => {
    expect(decodeMemory('{"inuse":1024}')).toEqual({ ok: true, value: { inUse: 1024, limit: 0 } });
  });

  it('should require inuse', () => {
    expect(decodeMemory('{"oslimit":0}')).toEqual({
      ok: false,
      reason: 'schema-mismatch',
      error: 'memory.inuse: expected number',
    });
  });
});

describe('Connections decoding', () => {
  it('should decode the basic schema', () => {
    const result = decodeConnections(JSON.stringify(fixtures.basicConnections));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.schema).toBe('basic');
    expect(result.value.uploadTotal).toBe(1572864);
    expect(result.value.downloadTotal).toBe(3221225472);
    expect(result.value.connections).toHaveLength(2);
    expect(result.value.connections[0]).toEqual({
      id: 'c1',
      network: 'tcp',
      type: 'HTTPS',
      sourceIP: '192.168.1.20',
      sourcePort: '51234',
      destinationIP: '203.0.113.10',
      destinationPort: '443',
      host: 'example.com',
      processPath: '/usr/bin/curl',
      specialProxy: '',
      chains: ['Proxy', 'node-a'],
      rule: 'DomainSuffix',
      rulePayload: 'example.com',
      upload: 1200,
      download: 64000,
      uploadSpeed: 0,
      downloadSpeed: 0,
      alive: true,
      start: '2024-05-01T10:00:00.000Z',
    });
  });

  it('should fall back to the extended schema', () => {
    const result = decodeConnections(JSON.stringify(fixtures.extendedConnections));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.schema).toBe('extended');
    const [record] = result.value.connections;
    expect(record?.processPath).toBe('');
    expect(record?.specialProxy).toBe('');
    expect(record?.host).toBe('dns.example.net');
    expect(record?.uploadSpeed).toBe(8);
    expect(record?.alive).toBe(false);
  });

  it('should decode both schemas to the same record', () => {
    const basic = fixtures.connection('c1', 'example.com', '203.0.113.10', '443');
    basic.metadata.processPath = '';
    const { processPath: _processPath, specialProxy: _specialProxy, ...metadata } = basic.metadata;
    const extended = { ...basic, metadata: { ...metadata, dnsMode: 'normal' } };

    const fromBasic = decodeConnections(JSON.stringify({ uploadTotal: 0, downloadTotal: 0, connections: [basic] }));
    const fromExtended = decodeConnections(JSON.stringify({ uploadTotal: 0, downloadTotal: 0, connections: [extended] }));

    expect(fromBasic.ok && fromBasic.value.schema).toBe('basic');
    expect(fromExtended.ok && fromExtended.value.schema).toBe('extended');
    expect(fromExtended.ok && fromExtended.value.connections).toEqual(fromBasic.ok && fromBasic.value.connections);
  });

  it('should read null optional metadata as empty', () => {
    const [record] = fixtures.extendedConnections.connections;
    const payload = JSON.stringify({
      ...fixtures.extendedConnections,
      connections: [{ ...record, metadata: { ...record?.metadata, processPath: null, specialProxy: null } }],
    });

    const result = decodeConnections(payload);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.schema).toBe('extended');
    expect(result.value.connections[0]?.processPath).toBe('');
    expect(result.value.connections[0]?.specialProxy).toBe('');
  });

  it('should count an empty list as zero connections', () => {
    const result = decodeConnections('{"uploadTotal":500,"downloadTotal":700,"connections":[]}');
    expect(result).toEqual({
      ok: true,
      value: { uploadTotal: 500, downloadTotal: 700, connections: [], schema: 'basic' },
    });
  });

  it('should treat null connections as an empty list', () => {
    const result = decodeConnections('{"uploadTotal":10,"downloadTotal":20,"connections":null}');
    expect(result).toEqual({
      ok: true,
      value: { uploadTotal: 10, downloadTotal: 20, connections: [], schema: 'basic' },
    });
  });

  it('should require the envelope totals', () => {
    expect(decodeConnections('{"downloadTotal":20,"connections":[]}')).toEqual({
      ok: false,
      reason: 'schema-mismatch',
      error: 'connections.uploadTotal: expected number',
    });
  });

  it('should report both schemas when neither matches', () => {
    const broken = fixtures.connection('c1', 'example.com', '203.0.113.10', '443');
    const { host: _host, ...metadata } = broken.metadata;
    const payload = JSON.stringify({
      uploadTotal: 0,
      downloadTotal: 0,
      connections: [{ ...broken, metadata }],
    });

    expect(decodeConnections(payload)).toEqual({
      ok: false,
      reason: 'schema-mismatch',
      error: 'basic: connections[0].metadata.host: expected string; extended: connections[0].metadata.host: expected string',
    });
  });
});

describe('Surge traffic decoding', () => {
  it('should pick the interface with the most traffic', () => {
    const result = decodeSurgeTraffic(JSON.stringify(fixtures.surgeTraffic));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.source).toBe('en0');
    expect(result.value.origin).toBe('interface');
    expect(result.value.traffic).toEqual({
      in: 5242880,
      out: 1048576,
      inCurrentSpeed: 2048,
      outCurrentSpeed: 1024,
      inMaxSpeed: 9000,
      outMaxSpeed: 3000,
    });
  });

  it('should keep the first interface on a tie', () => {
    const payload = JSON.stringify({
      interface: {
        en1: { in: 50, out: 50, inCurrentSpeed: 1, outCurrentSpeed: 1 },
        en0: { in: 90, out: 10, inCurrentSpeed: 2, outCurrentSpeed: 2 },
      },
    });

    const result = decodeSurgeTraffic(payload);
    expect(result.ok && result.value.source).toBe('en1');
  });

  it('should prefer an idle interface over any connector', () => {
    const payload = JSON.stringify({
      interface: { en0: { in: 0, out: 0, inCurrentSpeed: 0, outCurrentSpeed: 0 } },
      connector: { Proxy: { in: 100, out: 100, inCurrentSpeed: 9, outCurrentSpeed: 9 } },
    });

    const result = decodeSurgeTraffic(payload);
    expect(result.ok && result.value.origin).toBe('interface');
  });

  it('should fall back to the first connector without interfaces', () => {
    const payload = JSON.stringify({
      connector: {
        Proxy: { in: 100, out: 50, inCurrentSpeed: 5, outCurrentSpeed: 1 },
        Direct: { in: 900, out: 900, inCurrentSpeed: 9, outCurrentSpeed: 9 },
      },
    });

    const result = decodeSurgeTraffic(payload);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.source).toBe('Proxy');
    expect(result.value.origin).toBe('connector');
  });

  it('should report an empty sample', () => {
    const result = decodeSurgeTraffic('{"interface":{},"connector":{}}');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe('empty');
  });

  it('should reject an interface without speeds', () => {
    expect(decodeSurgeTraffic('{"interface":{"en0":{"in":1,"out":2}}}')).toEqual({
      ok: false,
      reason: 'schema-mismatch',
      error: 'traffic.interface.en0.inCurrentSpeed: expected number',
    });
  });
});

describe('stripPort', () => {
  it('should remove a trailing port', () => {
    expect(stripPort('example.com:443')).toBe('example.com');
    expect(stripPort('203.0.113.10:8080')).toBe('203.0.113.10');
    expect(stripPort('[2001:db8::1]:443')).toBe('2001:db8::1');
  });

  it('should leave hosts without a port alone', () => {
    expect(stripPort('example.com')).toBe('example.com');
    expect(stripPort('2001:db8::1')).toBe('2001:db8::1');
  });
});

describe('Surge requests decoding', () => {
  it('should map requests to connection records', () => {
    const result = decodeSurgeRequests(JSON.stringify(fixtures.surgeRequests));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.connections[0]).toEqual({
      id: '11',
      network: 'TCP',
      type: 'CONNECT',
      sourceIP: '192.168.1.20',
      sourcePort: '51234',
      destinationIP: '203.0.113.10',
      destinationPort: '443',
      host: 'example.com',
      processPath: '',
      specialProxy: '',
      chains: ['Proxy'],
      rule: 'DOMAIN-SUFFIX,example.com',
      rulePayload: '',
      upload: 300,
      download: 4000,
      uploadSpeed: 10,
      downloadSpeed: 200,
      alive: true,
      start: '2023-11-14T22:13:20.000Z',
    });
  });

  it('should fill gaps for sparse requests', () => {
    const result = decodeSurgeRequests(JSON.stringify(fixtures.surgeRequests));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const sparse = result.value.connections[1];
    expect(sparse?.id).toBe('request-1');
    expect(sparse?.alive).toBe(false);
    expect(sparse?.start).toBe('');
    expect(sparse?.chains).toEqual([]);
  });

  it('should list remote hosts without ports, skipping blanks', () => {
    const result = decodeSurgeRequests(JSON.stringify(fixtures.surgeRequests));
    expect(result.ok && result.value.remoteHosts).toEqual(['example.com']);
  });

  it('should read null optional request fields as absent', () => {
    const payload = JSON.stringify({
      requests: [{ remoteHost: 'example.com:443', id: null, policyName: null, completed: null, startDate: null }],
    });

    const result = decodeSurgeRequests(payload);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const [record] = result.value.connections;
    expect(record?.id).toBe('request-0');
    expect(record?.chains).toEqual([]);
    expect(record?.alive).toBe(true);
    expect(record?.start).toBe('');
    expect(result.value.remoteHosts).toEqual(['example.com']);
  });

  it('should still reject a null remoteHost', () => {
    expect(decodeSurgeRequests('{"requests":[{"remoteHost":null}]}')).toEqual({
      ok: false,
      reason: 'schema-mismatch',
      error: 'requests[0].remoteHost: expected string',
    });
  });

  it('should require remoteHost', () => {
    expect(decodeSurgeRequests('{"requests":[{"id":1}]}')).toEqual({
      ok: false,
      reason: 'schema-mismatch',
      error: 'requests[0].remoteHost: expected string',
    });
  });

  it('should require a requests array', () => {
    expect(decodeSurgeRequests('{"requests":{}}')).toEqual({
      ok: false,
      reason: 'schema-mismatch',
      error: 'requests.requests: expected array',
    });
  });
});
