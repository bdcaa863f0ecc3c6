import { readFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError } from '../core/errors.js';
import { simulationConfigSchema, type SimulationConfig } from './config-schema.js';

type RawConfig = Record<string, unknown>;

export const CONFIG_FILE_NAME = 'simulation.json';

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): RawConfig {
  return isRecord(value) ? value : {};
}

/**
 * Validate raw configuration and apply defaults.
 * Throws ConfigError listing every failing field.
 */
export function resolveSimulationConfig(input: unknown = {}): SimulationConfig {
  const result = simulationConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid simulation config: ${issues}`);
  }
  return result.data;
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/simulation.json)
 * 3. Schema defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: RawConfig | null = null;

  constructor(configPath = 'data/config', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load, merge and validate configuration from all sources.
   */
  async load(): Promise<SimulationConfig> {
    this.loadedConfig = await this.loadConfigFile();

    const merged = this.mergeEnvironment(this.loadedConfig ?? {});

    return resolveSimulationConfig(merged);
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): RawConfig | null {
    return this.loadedConfig;
  }

  /**
   * Load config file from disk.
   */
  private async loadConfigFile(): Promise<RawConfig | null> {
    const filePath = join(this.configPath, CONFIG_FILE_NAME);

    try {
      await access(filePath);
      const content = await readFile(filePath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (!isRecord(parsed)) {
        throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
      }
      return parsed;
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        // File doesn't exist - that's OK, use defaults
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to load config file: ${message}`);
    }
  }

  /**
   * Overlay environment variables onto the file values.
   * Values stay raw here; the schema rejects anything malformed.
   */
  private mergeEnvironment(file: RawConfig): RawConfig {
    const env = this.env;
    const config: RawConfig = { ...file };

    const logging = { ...asRecord(file['logging']) };
    if (env['TRIT_LOG_LEVEL']) logging['level'] = env['TRIT_LOG_LEVEL'];
    if (env['TRIT_LOG_PRETTY']) logging['pretty'] = parseBoolean(env['TRIT_LOG_PRETTY']);
    if (env['TRIT_LOG_DIR']) logging['logDir'] = env['TRIT_LOG_DIR'];
    config['logging'] = logging;

    const propagation = { ...asRecord(file['propagation']) };
    if (env['TRIT_PROPAGATION_MODE']) propagation['mode'] = env['TRIT_PROPAGATION_MODE'];
    if (env['TRIT_GATE_DELAY_MS']) propagation['gateDelayMs'] = Number(env['TRIT_GATE_DELAY_MS']);
    config['propagation'] = propagation;

    if (env['TRIT_MAX_CASCADE_DEPTH']) {
      config['maxCascadeDepth'] = Number(env['TRIT_MAX_CASCADE_DEPTH']);
    }

    return config;
  }
}

function parseBoolean(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
}

/**
 * Create a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration (convenience function).
 */
export async function loadConfig(configPath?: string): Promise<SimulationConfig> {
  const loader = createConfigLoader(configPath);
  return loader.load();
}
