import { describe, it, expect, beforeEach } from 'vitest';
import { findActiveProfile, loadProfiles, parseProfiles, resolveSettings, serializeReloads } from '../config';
import { ConfigurationError } from '../telemetry/errors';
import { MockFileSystem, flushPromises, silentLogger } from './mocks';

describe('Settings', () => {
  it('should fall back to defaults', () => {
    const settings = resolveSettings({});

    expect(settings.port).toBe(3000);
    expect(settings.retryDelayMs).toBe(3000);
    expect(settings.pollIntervalMs).toBe(1000);
    expect(settings.showDestinationPorts).toBe(false);
    expect(settings.profilesFile).toMatch(/config[\\/]profiles\.json$/);
  });

  it('should read overrides from the environment', () => {
    const settings = resolveSettings({
      PORT: '8080',
      PROFILES_FILE: '/etc/telemetry/profiles.json',
      RETRY_DELAY_MS: '500',
      POLL_INTERVAL_MS: '2000',
      SHOW_DESTINATION_PORTS: 'true',
    });

    expect(settings).toEqual({
      port: 8080,
      profilesFile: '/etc/telemetry/profiles.json',
      retryDelayMs: 500,
      pollIntervalMs: 2000,
      showDestinationPorts: true,
    });
  });

  it('should ignore invalid numbers', () => {
    const settings = resolveSettings({ PORT: 'abc', POLL_INTERVAL_MS: '0' });
    expect(settings.port).toBe(3000);
    expect(settings.pollIntervalMs).toBe(1000);
  });
});

describe('Profile parsing', () => {
  it('should apply defaults to minimal entries', () => {
    const file = parseProfiles(JSON.stringify({
      active: 'home',
      profiles: [{ id: 'home', host: ' 192.168.1.1 ', port: 9090 }],
    }), silentLogger);

    expect(file).toEqual({
      active: 'home',
      profiles: [{
        id: 'home',
        name: 'home',
        host: '192.168.1.1',
        port: 9090,
        useTls: false,
        secret: '',
        engine: 'standard',
      }],
    });
  });

  it('should keep the Surge key', () => {
    const file = parseProfiles(JSON.stringify({
      profiles: [{ id: 'mac', host: '127.0.0.1', port: 6171, engine: 'surge', surgeKey: 'test-key' }],
    }), silentLogger);

    expect(file.active).toBeNull();
    expect(file.profiles[0]?.surgeKey).toBe('test-key');
    expect(file.profiles[0]?.engine).toBe('surge');
  });

  it('should skip invalid and duplicate entries', () => {
    const file = parseProfiles(JSON.stringify({
      active: 'a',
      profiles: [
        { id: 'a', host: 'router.lan', port: 9090 },
        { id: 'b', host: 'router.lan', port: 70000 },
        { id: 'c', host: 'router.lan', port: 9090, engine: 'quantum' },
        { id: 'd', port: 9090 },
        'not-an-object',
        { id: 'a', host: 'other.lan', port: 9091 },
      ],
    }), silentLogger);

    expect(file.profiles.map(profile => profile.id)).toEqual(['a']);
    expect(file.profiles[0]?.host).toBe('router.lan');
  });

  it('should reject a file that is not a profile document', () => {
    expect(() => parseProfiles('{', silentLogger)).toThrow(ConfigurationError);
    expect(() => parseProfiles('{"profiles":{}}', silentLogger)).toThrow(ConfigurationError);
    expect(() => parseProfiles('[]', silentLogger)).toThrow(ConfigurationError);
  });

  it('should resolve the active profile', () => {
    const file = parseProfiles(JSON.stringify({
      active: 'b',
      profiles: [
        { id: 'a', host: 'one.lan', port: 9090 },
        { id: 'b', host: 'two.lan', port: 9090 },
      ],
    }), silentLogger);

    expect(findActiveProfile(file)?.host).toBe('two.lan');
    expect(findActiveProfile({ ...file, active: 'missing' })).toBeNull();
    expect(findActiveProfile({ ...file, active: null })).toBeNull();
  });
});

describe('Profile loading', () => {
  let mockFs: MockFileSystem;

  beforeEach(() => {
    mockFs = new MockFileSystem();
  });

  it('should read and parse the profile file', async () => {
    mockFs.setFile('/config/profiles.json', JSON.stringify({
      active: 'home',
      profiles: [{ id: 'home', host: '127.0.0.1', port: 9090, secret: 'test-secret' }],
    }));

    const file = await loadProfiles('/config/profiles.json', mockFs, silentLogger);

    expect(file.active).toBe('home');
    expect(findActiveProfile(file)?.secret).toBe('test-secret');
  });

  it('should treat a missing file as no profiles', async () => {
    const file = await loadProfiles('/config/profiles.json', mockFs, silentLogger);
    expect(file).toEqual({ active: null, profiles: [] });
  });

  it('should surface a broken file as a configuration error', async () => {
    mockFs.setFile('/config/profiles.json', 'profiles: []');
    await expect(loadProfiles('/config/profiles.json', mockFs, silentLogger)).rejects.toThrow(ConfigurationError);
  });
});

describe('Profile reloads', () => {
  it('should run overlapping reloads one after another', async () => {
    const events: Array<string> = [];
    const gates: Array<() => void> = [];
    let started = 0;
    const reload = serializeReloads(async () => {
      const run = ++started;
      events.push(`start ${String(run)}`);
      await new Promise<void>((resolve) => { gates.push(resolve); });
      events.push(`end ${String(run)}`);
    }, silentLogger);

    const first = reload();
    const second = reload();
    await flushPromises();
    expect(events).toEqual(['start 1']);

    gates[0]?.();
    await flushPromises();
    expect(events).toEqual(['start 1', 'end 1', 'start 2']);

    gates[1]?.();
    await Promise.all([first, second]);
    expect(events).toEqual(['start 1', 'end 1', 'start 2', 'end 2']);
  });

  it('should keep going after a failed reload', async () => {
    const runs: Array<number> = [];
    const reload = serializeReloads(async () => {
      runs.push(runs.length + 1);
      if (runs.length === 1) throw new Error('disk unavailable');
      await Promise.resolve();
    }, silentLogger);

    await expect(reload()).resolves.toBeUndefined();
    await reload();
    expect(runs).toEqual([1, 2]);
  });
});
