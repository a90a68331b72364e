import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG, normalizeConfig, parseConfig, parseTomlConfig } from './config.ts';

describe('cli config', () => {
  let dir = '';

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'grid-snake-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('normalizes an empty input to the defaults', () => {
    expect(normalizeConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('clamps the tick rate and rejects unknown log levels', () => {
    const warnings: string[] = [];
    const config = normalizeConfig(
      { tickRateHz: 500, logLevel: 'loud' },
      (msg) => warnings.push(msg)
    );
    expect(config.tickRateHz).toBe(60);
    expect(config.logLevel).toBe('warn');
    expect(warnings).toEqual([
      'tickRateHz was clamped to 60.',
      'logLevel "loud" is invalid; using warn.'
    ]);
  });

  it('reads loose booleans and seeds', () => {
    const warnings: string[] = [];
    expect(normalizeConfig({ color: 'off', seed: '42' }).color).toBe(false);
    expect(normalizeConfig({ seed: '42' }).seed).toBe(42);
    const config = normalizeConfig({ color: 'maybe', seed: 'abc' }, (msg) => warnings.push(msg));
    expect(config.color).toBe(true);
    expect('seed' in config).toBe(false);
    expect(warnings).toEqual(['color is invalid; using true.', 'seed is invalid; ignoring.']);
  });

  it('keeps known TOML keys only', () => {
    const raw = parseTomlConfig(
      'width = 20\ntickRateHz = 30\nstartHeading = "up"\nunknown = 1\n',
      'test.toml'
    );
    expect(raw).toEqual({ width: 20, tickRateHz: 30, startHeading: 'up' });
  });

  it('reports malformed TOML and ignores it', () => {
    const warnings: string[] = [];
    expect(parseTomlConfig('width = [', 'bad.toml', (msg) => warnings.push(msg))).toEqual({});
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^Failed to parse bad\.toml: /);
  });

  it('layers the TOML file, then env, then flags', () => {
    const file = path.join(dir, 'snake.toml');
    fs.writeFileSync(file, 'width = 20\nheight = 12\ntickRateHz = 5\n');
    const warnings: string[] = [];
    const config = parseConfig(
      ['--config', file, '--tick=9', '--no-color', '--seed', '7'],
      { GRID_HEIGHT: '14', TICK_RATE: '8' },
      (msg) => warnings.push(msg)
    );
    expect(config.width).toBe(20);
    expect(config.height).toBe(14);
    expect(config.tickRateHz).toBe(9);
    expect(config.color).toBe(false);
    expect(config.seed).toBe(7);
    expect(config.configPath).toBe(file);
    expect(warnings).toEqual([]);
  });

  it('uses env alone when the config file is missing', () => {
    const file = path.join(dir, 'missing.toml');
    const config = parseConfig([], { SNAKE_CONFIG: file, LOG_LEVEL: 'debug', NO_COLOR: '1' }, () => {});
    expect(config.width).toBe(40);
    expect(config.logLevel).toBe('debug');
    expect(config.color).toBe(false);
    expect(config.configPath).toBe(file);
  });
});
