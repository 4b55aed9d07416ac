import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createCLI, describeError } from '../../../src/cli/index.js';
import { resolveSimulateConfig } from '../../../src/cli/commands/simulate.js';
import {
  parseKindList,
  parseNonNegativeNumber,
  parsePositiveInt,
  parseSeverityList,
} from '../../../src/cli/options.js';
import { ConfigManager } from '../../../src/core/config.js';

describe('option parsers', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInt('12')).toBe(12);
    expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('abc')).toThrow('The value must be an integer.');
    expect(() => parsePositiveInt('0')).toThrow('The value must be greater than 0.');
  });

  it('should parse non-negative numbers', () => {
    expect(parseNonNegativeNumber('0')).toBe(0);
    expect(parseNonNegativeNumber('0.25')).toBe(0.25);
    expect(() => parseNonNegativeNumber('-1')).toThrow('The value must be a number >= 0.');
    expect(() => parseNonNegativeNumber(' ')).toThrow(InvalidArgumentError);
  });

  it('should parse kind lists', () => {
    expect(parseKindList('sensorData,log')).toEqual(['sensorData', 'log']);
    expect(() => parseKindList('gps')).toThrow(InvalidArgumentError);
  });

  it('should parse severity lists case-insensitively', () => {
    expect(parseSeverityList('Error, WARNING')).toEqual(['error', 'warning']);
    expect(() => parseSeverityList('fatal')).toThrow(
      'Unknown severity "fatal" (expected one of: debug, info, warning, error)',
    );
  });
});

describe('resolveSimulateConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fleetsim-cli-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults for omitted options', () => {
    const config = resolveSimulateConfig({}, new ConfigManager(dir, {}));

    expect(config.fleet.deviceCount).toBe(3);
    expect(config.device.bufferCapacity).toBe(3);
    expect(config.transport.port).toBe(8080);
    expect(config.logging.level).toBe('info');
  });

  it('should map flags onto the config', () => {
    const config = resolveSimulateConfig(
      {
        number: 5,
        logInterval: 200,
        sensorInterval: 100,
        writeInterval: 1000,
        bufferSize: 4,
        port: 9090,
        host: 'collector',
        endpoint: '/ingest',
        priority: ['sensorData', 'log'],
        escalate: ['error'],
        verbose: true,
      },
      new ConfigManager(dir, {}),
    );

    expect(config.fleet.deviceCount).toBe(5);
    expect(config.device).toMatchObject({
      logIntervalMs: 200,
      sensorIntervalMs: 100,
      writeIntervalMs: 1000,
      bufferCapacity: 4,
    });
    expect(config.priority).toEqual({ order: ['sensorData', 'log'], escalateSeverities: ['error'] });
    expect(config.transport).toMatchObject({ host: 'collector', port: 9090, endpoint: '/ingest' });
    expect(config.logging).toMatchObject({ level: 'debug', pretty: true });
  });
});

describe('createCLI', () => {
  it('should register the simulate, replay and serve commands', () => {
    const cli = createCLI();
    expect(cli.name()).toBe('fleetsim');
    expect(cli.commands.map((c) => c.name())).toEqual(['simulate', 'replay', 'serve']);
  });
});

describe('describeError', () => {
  it('should report an Error by its message', () => {
    expect(describeError(new Error('Port 8080 is in use'))).toBe('❌ Port 8080 is in use');
  });

  it('should report thrown non-Error values', () => {
    expect(describeError('config missing')).toBe('❌ config missing');
    expect(describeError(42)).toBe('❌ 42');
    expect(describeError(undefined)).toBe('❌ undefined');
  });
});
