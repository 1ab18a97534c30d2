import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError, expandEnvVars, loadConfig } from '../src/index.js';

let tmpDir = '';

function writeJson(name: string, value: unknown, prefix = ''): string {
  const filePath = join(tmpDir, name);
  writeFileSync(filePath, `${prefix}${JSON.stringify(value)}`, 'utf-8');
  return filePath;
}

async function loadError(configPath: string): Promise<unknown> {
  try {
    await loadConfig(configPath, { env: {} });
  } catch (error) {
    return error;
  }
  throw new Error('expected loadConfig to fail');
}

const feeds = {
  orders: { type: 'csv', filePath: 'orders.csv' },
  commissions: { type: 'json', filePath: 'data/lines.json', recordsPath: 'lines' },
};

const rules = { providers: [{ providerId: 'ACME' }] };

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('expandEnvVars', () => {
  const env = { DATA_DIR: '/data', EMPTY: '' };

  it('expands variables and defaults in nested values', () => {
    expect(
      expandEnvVars(
        { path: '${DATA_DIR}/orders.csv', list: ['${MISSING:-fallback}', 3], flag: true },
        { env }
      )
    ).toEqual({ path: '/data/orders.csv', list: ['fallback', 3], flag: true });
  });

  it('treats an empty variable as unset', () => {
    expect(expandEnvVars('${EMPTY:-x}', { env })).toBe('x');
  });

  it('fails on a missing variable unless allowed', () => {
    expect(() => expandEnvVars('${MISSING}', { env })).toThrow(ConfigError);
    expect(() => expandEnvVars('${MISSING}', { env })).toThrow(
      'Missing required environment variable: MISSING'
    );
    expect(expandEnvVars('${MISSING}', { env, allowMissing: true })).toBe('${MISSING}');
  });
});

describe('loadConfig', () => {
  it('resolves paths against the config directory and fills rule defaults', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'recon-config-'));
    const configPath = writeJson(
      'recon.json',
      { feeds, rules, output: { format: 'csv', path: 'out' } },
      '\uFEFF'
    );

    const config = await loadConfig(configPath, { env: {} });

    expect(config.feeds.orders.filePath).toBe(join(tmpDir, 'orders.csv'));
    expect(config.feeds.commissions.filePath).toBe(join(tmpDir, 'data', 'lines.json'));
    expect(config.output).toEqual({ format: 'csv', path: join(tmpDir, 'out') });
    expect(config.rules.defaults.acceptanceThreshold).toBe(0.8);
    expect(config.rules.defaults.tolerance).toEqual({ absolute: 0.25, percentage: 0 });
    expect(config.rules.providers[0]?.aliases).toEqual([]);
    expect(config.engine).toEqual({});
    expect(config.logging).toEqual({});
  });

  it('loads rules from a separate file with environment expansion', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'recon-config-'));
    writeJson('rules.json', {
      defaults: { acceptanceThreshold: 0.9 },
      providers: [{ providerId: '${PROVIDER}', aliases: ['Acme Travel'] }],
    });
    writeFileSync(
      join(tmpDir, 'recon.json'),
      JSON.stringify({ feeds, rules: '${RULES_FILE:-rules.json}', engine: { onInvalidRecord: 'fail' } }),
      'utf-8'
    );

    const config = await loadConfig(join(tmpDir, 'recon.json'), { env: { PROVIDER: 'ACME' } });

    expect(config.rules.defaults.acceptanceThreshold).toBe(0.9);
    expect(config.rules.providers[0]?.providerId).toBe('ACME');
    expect(config.engine).toEqual({ onInvalidRecord: 'fail' });
    expect(config.output).toBeUndefined();
  });

  it('lists invalid config fields', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'recon-config-'));
    const configPath = writeJson('recon.json', {
      feeds: { ...feeds, orders: { type: 'csv' } },
      rules,
      engine: { maxConcurrency: 0 },
    });

    const error = await loadError(configPath);

    expect(error).toBeInstanceOf(ConfigError);
    const message = error instanceof Error ? error.message : '';
    expect(message.split('\n')[0]).toBe('Invalid config.json:');
    expect(message).toContain('- feeds.orders.filePath: Required');
    expect(message).toContain('- engine.maxConcurrency:');
  });

  it('labels errors in inline rules', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'recon-config-'));
    const configPath = writeJson('recon.json', {
      feeds,
      rules: { defaults: { acceptanceThreshold: 2 }, providers: [{ providerId: 'ACME' }] },
    });

    const error = await loadError(configPath);

    expect(error).toBeInstanceOf(ConfigError);
    const message = error instanceof Error ? error.message : '';
    expect(message.split('\n')[0]).toBe('Invalid rules in config.json:');
    expect(message).toContain('- defaults.acceptanceThreshold:');
  });

  it('reports malformed JSON and missing files', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'recon-config-'));
    const configPath = join(tmpDir, 'broken.json');
    writeFileSync(configPath, '{"feeds":', 'utf-8');

    const broken = await loadError(configPath);
    expect(broken).toBeInstanceOf(ConfigError);
    expect(broken instanceof Error ? broken.message : '').toMatch(/^Invalid JSON in config /);

    const missing = await loadError(join(tmpDir, 'absent.json'));
    expect(missing).toBeInstanceOf(ConfigError);
    expect(missing instanceof Error ? missing.message : '').toMatch(/^Cannot read config /);
  });
});
