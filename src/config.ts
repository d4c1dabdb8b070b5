import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import * as dotenv from 'dotenv';
import { ThousandEyesAuthError, ThousandEyesConfigError } from './errors.js';

dotenv.config();

// TE_CONFIG_DIR overrides the default location.
function configDir(): string {
  return process.env.TE_CONFIG_DIR || join(homedir(), '.config', 'te-cli');
}

function configFile(): string {
  return join(configDir(), 'config.json');
}

export const BASE_URL = 'https://api.thousandeyes.com/v7';
export const DEFAULT_INTERVAL = 3600;

// Test frequencies the API accepts, in seconds.
export const VALID_INTERVALS: readonly number[] = [60, 120, 300, 600, 900, 1800, 3600];

interface StoredConfig {
  token?: string;
}

export interface RunConfig {
  readonly token: string;
  readonly testName: string;
  readonly target: string;
  readonly baseUrl: string;
  readonly interval: number;
}

export interface RunConfigOverrides {
  token?: string;
  testName?: string;
  target?: string;
  interval?: string | number;
}

function loadConfig(): StoredConfig {
  if (!existsSync(configFile())) return {};
  try {
    const parsed: unknown = JSON.parse(readFileSync(configFile(), 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'token' in parsed && typeof parsed.token === 'string') {
      return { token: parsed.token };
    }
    return {};
  } catch {
    return {};
  }
}

function saveConfig(config: StoredConfig): void {
  mkdirSync(configDir(), { recursive: true });
  writeFileSync(configFile(), JSON.stringify(config, null, 2));
}

/**
 * Resolution order:
 * 1. --token flag (passed as argument)
 * 2. TE_API_TOKEN environment variable
 * 3. Config file
 */
export function resolveToken(flagValue?: string): string {
  return flagValue || process.env.TE_API_TOKEN || loadConfig().token || '';
}

export function setToken(token: string): void {
  const config = loadConfig();
  config.token = token;
  saveConfig(config);
}

export function getConfigPath(): string {
  return configFile();
}

export function parseInterval(raw: string | number | undefined): number {
  if (raw === undefined || raw === '') return DEFAULT_INTERVAL;
  const interval = Number(raw);
  if (!VALID_INTERVALS.includes(interval)) {
    throw new ThousandEyesConfigError(
      `Invalid interval: ${raw}. Supported intervals (seconds): ${VALID_INTERVALS.join(', ')}`
    );
  }
  return interval;
}

export function parseTarget(raw: string): string {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new ThousandEyesConfigError(`Invalid target URL: ${raw}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ThousandEyesConfigError(`Target URL must use http or https: ${raw}`);
  }
  return raw;
}

/**
 * Builds the configuration shared by every workflow step. Flags win over
 * TEST_NAME / TARGET from the environment.
 */
export function buildRunConfig(overrides: RunConfigOverrides = {}): RunConfig {
  const token = resolveToken(overrides.token);
  if (!token) {
    throw new ThousandEyesAuthError();
  }

  const testName = (overrides.testName ?? process.env.TEST_NAME ?? '').trim();
  if (!testName) {
    throw new ThousandEyesConfigError('No test name configured. Pass --name or set TEST_NAME.');
  }

  const target = (overrides.target ?? process.env.TARGET ?? '').trim();
  if (!target) {
    throw new ThousandEyesConfigError('No target URL configured. Pass --target or set TARGET.');
  }

  return Object.freeze({
    token,
    testName,
    target: parseTarget(target),
    baseUrl: BASE_URL,
    interval: parseInterval(overrides.interval),
  });
}
