import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../../../src/core/errors.js';
import {
  CONFIG_FILE_NAME,
  createConfigLoader,
  resolveSimulationConfig,
} from '../../../src/config/config-loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/config-schema.js';

describe('resolveSimulationConfig', () => {
  it('fills defaults', () => {
    expect(resolveSimulationConfig({})).toEqual({
      propagation: { mode: 'immediate', gateDelayMs: 1 },
      maxCascadeDepth: 256,
      maxSettleEvents: 100_000,
      multiWriterWarnThreshold: 1,
      warningRetention: 100,
      logging: { level: 'info', pretty: false },
    });
  });

  it('keeps given values', () => {
    const config = resolveSimulationConfig({
      propagation: { mode: 'delayed', gateDelayMs: 0 },
      multiWriterWarnThreshold: 2,
    });
    expect(config.propagation).toEqual({ mode: 'delayed', gateDelayMs: 0 });
    expect(config.multiWriterWarnThreshold).toBe(2);
  });

  it('lists every failing field', () => {
    expect(() =>
      resolveSimulationConfig({ maxCascadeDepth: 0, propagation: { mode: 'sometimes' } })
    ).toThrow(/propagation\.mode: .*; maxCascadeDepth: /);
  });

  it('rejects unknown nested keys', () => {
    expect(() => resolveSimulationConfig({ logging: { colour: true } })).toThrow(ConfigError);
  });

  it('rejects a non-object', () => {
    expect(() => resolveSimulationConfig(42)).toThrow(/\(root\)/);
  });

  it('rejects a zero writer threshold', () => {
    expect(() => resolveSimulationConfig({ multiWriterWarnThreshold: 0 })).toThrow(ConfigError);
  });
});

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tritwire-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<void> {
    await writeFile(join(dir, CONFIG_FILE_NAME), content, 'utf-8');
  }

  it('uses defaults without a config file', async () => {
    const loader = createConfigLoader(dir, {});

    await expect(loader.load()).resolves.toEqual(DEFAULT_CONFIG);
    expect(loader.getLoadedConfigFile()).toBeNull();
  });

  it('reads the config file', async () => {
    await writeConfig(JSON.stringify({ propagation: { mode: 'delayed' }, maxCascadeDepth: 64 }));
    const loader = createConfigLoader(dir, {});

    const config = await loader.load();

    expect(config.propagation).toEqual({ mode: 'delayed', gateDelayMs: 1 });
    expect(config.maxCascadeDepth).toBe(64);
    expect(loader.getLoadedConfigFile()).toEqual({
      propagation: { mode: 'delayed' },
      maxCascadeDepth: 64,
    });
  });

  it('lets environment variables override the file', async () => {
    await writeConfig(JSON.stringify({ propagation: { mode: 'delayed', gateDelayMs: 2 }, logging: { pretty: true } }));
    const loader = createConfigLoader(dir, {
      TRIT_GATE_DELAY_MS: '3',
      TRIT_LOG_LEVEL: 'debug',
      TRIT_LOG_PRETTY: 'false',
      TRIT_MAX_CASCADE_DEPTH: '32',
    });

    const config = await loader.load();

    expect(config.propagation).toEqual({ mode: 'delayed', gateDelayMs: 3 });
    expect(config.logging).toEqual({ level: 'debug', pretty: false });
    expect(config.maxCascadeDepth).toBe(32);
  });

  it('applies environment variables without a file', async () => {
    const config = await createConfigLoader(dir, {
      TRIT_PROPAGATION_MODE: 'delayed',
      TRIT_LOG_DIR: 'logs',
    }).load();

    expect(config.propagation.mode).toBe('delayed');
    expect(config.logging.logDir).toBe('logs');
  });

  it('rejects malformed environment values', async () => {
    const loader = createConfigLoader(dir, { TRIT_LOG_PRETTY: 'sometimes' });
    await expect(loader.load()).rejects.toThrow(ConfigError);
  });

  it('rejects a non-numeric gate delay', async () => {
    const loader = createConfigLoader(dir, { TRIT_GATE_DELAY_MS: 'soon' });
    await expect(loader.load()).rejects.toThrow(/propagation\.gateDelayMs/);
  });

  it('rejects a file that is not a JSON object', async () => {
    await writeConfig('[1, 2, 3]');
    await expect(createConfigLoader(dir, {}).load()).rejects.toThrow('must contain a JSON object');
  });

  it('rejects invalid JSON', async () => {
    await writeConfig('{ "propagation": ');
    await expect(createConfigLoader(dir, {}).load()).rejects.toThrow(/^Failed to load config file: /);
  });
});
