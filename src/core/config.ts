import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { FleetConfigSchema, type FleetConfig, type FleetConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

export const CONFIG_FILE_NAME = 'fleetsim.yaml';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseIntEnv(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Environment variable ${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

export class ConfigManager {
  private config: FleetConfig | null = null;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, env: NodeJS.ProcessEnv = process.env) {
    this.projectDir = projectDir || process.cwd();
    this.env = env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- config file <- env vars <- overrides
   *
   * An explicit configPath must exist; the project-level fleetsim.yaml is optional.
   */
  load(overrides?: FleetConfigInput, configPath?: string): FleetConfig {
    let raw: RawConfig = {};

    // 1. Config file
    const filePath = configPath ? resolve(this.projectDir, configPath) : join(this.projectDir, CONFIG_FILE_NAME);
    if (configPath && !existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    if (existsSync(filePath)) {
      raw = this.deepMerge(raw, this.readFile(filePath));
    }

    // 2. Environment variables
    raw = this.applyEnvVars(raw);

    // 3. Overrides
    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    // 4. Validate with Zod
    const result = FleetConfigSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${details}`, result.error);
    }

    this.config = result.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): FleetConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private readFile(path: string): RawConfig {
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse config at ${path}`, toError(err));
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config at ${path} must be a mapping`);
    }
    return parsed;
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const fleet = isRecord(raw.fleet) ? { ...raw.fleet } : {};
    const device = isRecord(raw.device) ? { ...raw.device } : {};
    const transport = isRecord(raw.transport) ? { ...raw.transport } : {};
    const logging = isRecord(raw.logging) ? { ...raw.logging } : {};

    if (this.env.FLEETSIM_DEVICES) {
      fleet.deviceCount = parseIntEnv('FLEETSIM_DEVICES', this.env.FLEETSIM_DEVICES);
    }
    if (this.env.FLEETSIM_BUFFER_SIZE) {
      device.bufferCapacity = parseIntEnv('FLEETSIM_BUFFER_SIZE', this.env.FLEETSIM_BUFFER_SIZE);
    }
    if (this.env.FLEETSIM_PORT) {
      transport.port = parseIntEnv('FLEETSIM_PORT', this.env.FLEETSIM_PORT);
    }
    if (this.env.FLEETSIM_HOST) {
      transport.host = this.env.FLEETSIM_HOST;
    }
    if (this.env.FLEETSIM_LOG_LEVEL) {
      logging.level = this.env.FLEETSIM_LOG_LEVEL;
    }

    return { ...raw, fleet, device, transport, logging };
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const next = source[key];
      const current = target[key];
      if (next === undefined) continue;
      if (isRecord(next) && isRecord(current)) {
        result[key] = this.deepMerge(current, next);
      } else {
        result[key] = next;
      }
    }
    return result;
  }
}
