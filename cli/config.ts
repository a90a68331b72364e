import fs from 'node:fs';
import path from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { GAME_DEFAULTS, normalizeGameOptions, type GameOptions } from '../src/config.ts';
import { coerceInt } from '../src/utils.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface CliConfig extends GameOptions {
  tickRateHz: number;
  color: boolean;
  logLevel: LogLevel;
  /** Absolute path of the TOML file that was consulted. */
  configPath: string;
  seed?: number;
}

/** Config fields as read from TOML, env or argv, before validation. */
export type RawConfig = { [K in keyof CliConfig]?: unknown };

export const DEFAULT_CONFIG_FILE = 'snake.toml';

export const DEFAULT_CONFIG: CliConfig = {
  ...GAME_DEFAULTS,
  tickRateHz: 15,
  color: true,
  logLevel: 'warn',
  configPath: DEFAULT_CONFIG_FILE
};

type Env = Record<string, string | undefined>;

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseIntValue(raw: string | undefined): number | undefined {
  if (raw == null) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) return undefined;
  return parsed;
}

function getArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === flag) {
      return argv[i + 1];
    }
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
  }
  return undefined;
}

function hasFlag(argv: string[], flag: string): boolean {
  return argv.includes(flag);
}

/**
 * Interpret a loose boolean.
 * @param value - Boolean, or a string such as "true", "0", "off".
 * @returns Parsed boolean, or undefined when unrecognized.
 */
function coerceBool(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

/**
 * Validate and fill in a raw config.
 * @param input - Merged raw values.
 * @param warn - Optional sink for adjustment warnings.
 * @returns Complete config.
 */
export function normalizeConfig(input: RawConfig, warn?: (msg: string) => void): CliConfig {
  const game = normalizeGameOptions(
    {
      width: input.width,
      height: input.height,
      startLength: input.startLength,
      startHeading: input.startHeading
    },
    warn
  );
  const tickRateHz = coerceInt(
    'tickRateHz',
    input.tickRateHz,
    DEFAULT_CONFIG.tickRateHz,
    1,
    60,
    warn
  );

  let color = DEFAULT_CONFIG.color;
  if (input.color !== undefined) {
    const parsed = coerceBool(input.color);
    if (parsed === undefined) {
      warn?.(`color is invalid; using ${color}.`);
    } else {
      color = parsed;
    }
  }

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (isLogLevel(input.logLevel)) {
    logLevel = input.logLevel;
  } else if (input.logLevel !== undefined) {
    warn?.(`logLevel "${String(input.logLevel)}" is invalid; using ${logLevel}.`);
  }

  const rawPath = input.configPath;
  const configPath =
    typeof rawPath === 'string' && rawPath.trim() ? rawPath : DEFAULT_CONFIG.configPath;

  let seed: number | undefined;
  if (input.seed !== undefined) {
    const parsedSeed =
      typeof input.seed === 'number'
        ? input.seed
        : Number.parseInt(String(input.seed), 10);
    if (Number.isFinite(parsedSeed)) {
      seed = Math.floor(parsedSeed);
    } else {
      warn?.('seed is invalid; ignoring.');
    }
  }

  const output: CliConfig = { ...game, tickRateHz, color, logLevel, configPath };
  if (seed !== undefined) output.seed = seed;
  return output;
}

/**
 * Parse TOML text into raw config fields. Unknown keys are ignored.
 * @param raw - TOML source.
 * @param source - Label used in warnings.
 * @param warn - Optional sink for parse failures.
 * @returns Raw config, empty when the text is blank or malformed.
 */
export function parseTomlConfig(
  raw: string,
  source: string,
  warn?: (msg: string) => void
): RawConfig {
  if (!raw.trim()) return {};
  let parsed: Record<string, unknown>;
  try {
    parsed = parseToml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    warn?.(`Failed to parse ${source}: ${message}`);
    return {};
  }
  const output: RawConfig = {};
  const keys: Array<keyof CliConfig> = [
    'width',
    'height',
    'startLength',
    'startHeading',
    'tickRateHz',
    'seed',
    'color',
    'logLevel'
  ];
  for (const key of keys) {
    if (parsed[key] !== undefined) output[key] = parsed[key];
  }
  return output;
}

/**
 * Load raw config fields from a TOML file.
 * @param filePath - TOML path to read.
 * @param warn - Optional sink for parse failures.
 * @returns Raw config, empty when the file is missing.
 */
export function loadTomlConfig(filePath: string, warn?: (msg: string) => void): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, 'utf8');
  return parseTomlConfig(raw, filePath, warn);
}

function readEnv(env: Env): RawConfig {
  const input: RawConfig = {};
  const width = parseIntValue(env['GRID_WIDTH']);
  if (width !== undefined) input.width = width;
  const height = parseIntValue(env['GRID_HEIGHT']);
  if (height !== undefined) input.height = height;
  const length = parseIntValue(env['START_LENGTH']);
  if (length !== undefined) input.startLength = length;
  if (env['START_HEADING']) input.startHeading = env['START_HEADING'];
  const tickRate = parseIntValue(env['TICK_RATE']);
  if (tickRate !== undefined) input.tickRateHz = tickRate;
  const seed = parseIntValue(env['SNAKE_SEED']);
  if (seed !== undefined) input.seed = seed;
  // https://no-color.org: any non-empty value disables colour.
  if (env['NO_COLOR']) input.color = false;
  if (env['LOG_LEVEL']) input.logLevel = env['LOG_LEVEL'];
  return input;
}

function readArgv(argv: string[]): RawConfig {
  const input: RawConfig = {};
  const width = parseIntValue(getArgValue(argv, '--width'));
  if (width !== undefined) input.width = width;
  const height = parseIntValue(getArgValue(argv, '--height'));
  if (height !== undefined) input.height = height;
  const length = parseIntValue(getArgValue(argv, '--length'));
  if (length !== undefined) input.startLength = length;
  const heading = getArgValue(argv, '--heading');
  if (heading) input.startHeading = heading;
  const tickRate = parseIntValue(getArgValue(argv, '--tick'));
  if (tickRate !== undefined) input.tickRateHz = tickRate;
  const seed = parseIntValue(getArgValue(argv, '--seed'));
  if (seed !== undefined) input.seed = seed;
  if (hasFlag(argv, '--no-color')) input.color = false;
  const logLevel = getArgValue(argv, '--log');
  if (logLevel) input.logLevel = logLevel;
  return input;
}

/**
 * Build the CLI config: defaults, then the TOML file, then env, then argv.
 * @param argv - Arguments after the script name.
 * @param env - Process environment.
 * @param warn - Sink for warnings; defaults to stderr.
 */
export function parseConfig(
  argv: string[],
  env: Env,
  warn: (msg: string) => void = (msg) => console.warn(`[config] ${msg}`)
): CliConfig {
  const requested =
    getArgValue(argv, '--config') ?? env['SNAKE_CONFIG'] ?? DEFAULT_CONFIG_FILE;
  const configPath = path.resolve(process.cwd(), requested);
  const input: RawConfig = {
    ...loadTomlConfig(configPath, warn),
    ...readEnv(env),
    ...readArgv(argv),
    configPath
  };
  return normalizeConfig(input, warn);
}
