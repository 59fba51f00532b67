import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FatalConfigError } from '../errors';
import { loadConfig, validateConfig } from '../loader';

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;
  let envPath: string;

  const writeConfig = (content: unknown) => {
    fs.writeFileSync(configPath, typeof content === 'string' ? content : JSON.stringify(content));
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'las-config-'));
    configPath = path.join(dir, 'config.json');
    envPath = path.join(dir, '.env');
    vi.stubEnv('MONITOR_URL', '');
    vi.stubEnv('NOTIFY_WEBHOOK_URL', '');
    vi.stubEnv('KUBERNETES_SERVICE_HOST', '');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to defaults when no config file exists', () => {
    const { config, env } = loadConfig({ configPath, envPath });

    expect(config.autoscaler).toEqual({
      pollIntervalMs: 10_000,
      latencyCeilingMs: 330,
      scaleUpFactor: 1.2,
      scaleDownStep: 1,
      minReplicas: 1,
      maxReplicas: 8,
      minSamples: 20,
      callTimeoutMs: 5000,
    });
    expect(config.monitor.url).toBe('http://monitor:9000');
    expect(config.monitor.windowCapacity).toBe(1000);
    expect(config.dispatcher.port).toBe(8080);
    expect(config.discovery.mode).toBe('kubernetes');
    expect(config.telemetry.notifyWebhookUrl).toBeUndefined();
    expect(env.KUBERNETES_SERVICE_HOST).toBeUndefined();
  });

  it('fills in defaults around partial sections', () => {
    writeConfig({ autoscaler: { minReplicas: 2, maxReplicas: 4 }, monitor: { windowCapacity: 50 } });

    const { config } = loadConfig({ configPath, envPath });

    expect(config.autoscaler.minReplicas).toBe(2);
    expect(config.autoscaler.maxReplicas).toBe(4);
    expect(config.autoscaler.latencyCeilingMs).toBe(330);
    expect(config.monitor.windowCapacity).toBe(50);
    expect(config.monitor.port).toBe(9000);
  });

  it('rejects minReplicas above maxReplicas', () => {
    writeConfig({ autoscaler: { minReplicas: 5, maxReplicas: 2 } });

    expect(() => loadConfig({ configPath, envPath })).toThrow(FatalConfigError);
    try {
      loadConfig({ configPath, envPath });
    } catch (error) {
      expect(error).toBeInstanceOf(FatalConfigError);
      if (error instanceof FatalConfigError) {
        expect(error.issues).toEqual(['  - autoscaler.minReplicas: minReplicas (5) must not exceed maxReplicas (2)']);
      }
    }
  });

  it('rejects a replica floor of zero', () => {
    writeConfig({ autoscaler: { minReplicas: 0 } });

    expect(() => loadConfig({ configPath, envPath })).toThrow('minReplicas must be at least 1');
  });

  it('rejects a scale-up factor of 1 or less', () => {
    writeConfig({ autoscaler: { scaleUpFactor: 1 } });

    expect(() => loadConfig({ configPath, envPath })).toThrow('scaleUpFactor must be greater than 1');
  });

  it('requires endpoints for static discovery', () => {
    writeConfig({ discovery: { mode: 'static' } });

    expect(() => loadConfig({ configPath, envPath })).toThrow('Static discovery needs at least one endpoint');
  });

  it('accepts host:port static endpoints', () => {
    writeConfig({ discovery: { mode: 'static', staticEndpoints: ['10.0.0.1:5000', 'backend-b:5000'] } });

    const { config } = loadConfig({ configPath, envPath });

    expect(config.discovery.staticEndpoints).toEqual(['10.0.0.1:5000', 'backend-b:5000']);
  });

  it('rejects unknown keys', () => {
    writeConfig({ autoscaler: { ceiling: 300 } });

    expect(() => loadConfig({ configPath, envPath })).toThrow(/^Configuration file validation failed/);
  });

  it('reports a file that is not JSON', () => {
    writeConfig('{ not json');

    expect(() => loadConfig({ configPath, envPath })).toThrow(/^Configuration file is not valid JSON/);
  });

  it('takes the monitor URL and webhook from the .env file', () => {
    fs.writeFileSync(
      envPath,
      ['# local overrides', 'MONITOR_URL=http://localhost:9100', 'NOTIFY_WEBHOOK_URL="https://hooks.example.test/scaling"'].join(
        '\n',
      ),
    );

    const { config, env } = loadConfig({ configPath, envPath });

    expect(env.MONITOR_URL).toBe('http://localhost:9100');
    expect(config.monitor.url).toBe('http://localhost:9100');
    expect(config.telemetry.notifyWebhookUrl).toBe('https://hooks.example.test/scaling');
  });

  it('lets the process environment override the .env file', () => {
    fs.writeFileSync(envPath, 'MONITOR_URL=http://localhost:9100\n');
    vi.stubEnv('MONITOR_URL', 'http://monitor.internal:9000');

    const { config } = loadConfig({ configPath, envPath });

    expect(config.monitor.url).toBe('http://monitor.internal:9000');
  });

  it('ignores the .env file when skipEnv is set', () => {
    fs.writeFileSync(envPath, 'MONITOR_URL=http://localhost:9100\n');

    const { config } = loadConfig({ configPath, envPath, skipEnv: true });

    expect(config.monitor.url).toBe('http://monitor:9000');
  });

  it('validates an already loaded config', () => {
    const { config } = loadConfig({ configPath, envPath });

    expect(validateConfig(config)).toBe(true);
    expect(validateConfig({ ...config, autoscaler: { ...config.autoscaler, minReplicas: 9 } })).toBe(false);
  });

  it('rejects a malformed monitor URL', () => {
    vi.stubEnv('MONITOR_URL', 'not a url');

    expect(() => loadConfig({ configPath, envPath })).toThrow(/^\.env validation failed/);
  });
});
