import 'dotenv/config';
import { IANAZone } from 'luxon';
import { FatalError } from './errors.js';
import { isSuppressionType, type SuppressionType } from './types.js';

export type Config = {
  apiKey: string;
  host: string;
  baseUri: string;
  timezone: string;
  properties: string[];
  batchSize: number;
  typeDefault: SuppressionType;
  descriptionDefault: string;
  encodings: string[];
  deleteThreads: number;
  subaccount: number;
};

type Env = Record<string, string | undefined>;

function req(env: Env, name: string): string {
  const v = env[name];
  if (!v || !v.trim()) throw new FatalError(`Missing env: ${name}`);
  return v.trim();
}

function opt(env: Env, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

function int(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) throw new FatalError(`Invalid ${name}: ${raw} (expected an integer)`);
  const n = parseInt(raw, 10);
  if (n < min) throw new FatalError(`Invalid ${name}: ${raw} (must be at least ${min})`);
  return n;
}

function list(value: string): string[] {
  return value
    .replace(/[\r\n]/g, '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

/**
 * Accepts `api.sparkpost.com` or `https://api.sparkpost.com`; the host has to
 * be a SparkPost one.
 */
export function normalizeHost(raw: string): string {
  const host = raw.replace(/^https?:\/\//i, '').replace(/\/+$/, '').toLowerCase();
  if (!/^[a-z0-9.-]+$/.test(host)) {
    throw new FatalError(`Invalid SPARKPOST_HOST: ${raw}`);
  }
  if (host !== 'sparkpost.com' && !host.endsWith('.sparkpost.com')) {
    throw new FatalError(`Invalid SPARKPOST_HOST: ${raw} (must be a sparkpost.com host)`);
  }
  return host;
}

export function loadConfig(env: Env = process.env): Config {
  const apiKey = req(env, 'SPARKPOST_API_KEY');
  const host = normalizeHost(opt(env, 'SPARKPOST_HOST', 'api.sparkpost.com'));

  const timezone = opt(env, 'TIMEZONE', 'UTC');
  if (!IANAZone.isValidZone(timezone)) throw new FatalError(`Invalid TIMEZONE: ${timezone}`);

  const typeDefault = opt(env, 'TYPE_DEFAULT', 'non_transactional').toLowerCase();
  if (!isSuppressionType(typeDefault)) {
    throw new FatalError(`Invalid TYPE_DEFAULT: ${typeDefault} (transactional | non_transactional)`);
  }

  const properties = list(opt(env, 'PROPERTIES', 'recipient,type,description'));
  const encodings = list(opt(env, 'FILE_CHARACTER_ENCODINGS', 'utf-8'));

  return {
    apiKey,
    host,
    baseUri: `https://${host}`,
    timezone,
    properties,
    batchSize: int(env, 'BATCH_SIZE', 10000, 1),
    typeDefault,
    descriptionDefault: opt(env, 'DESCRIPTION_DEFAULT', 'Uploaded by suppression-sync'),
    encodings,
    deleteThreads: int(env, 'DELETE_THREADS', 10, 1),
    subaccount: int(env, 'SUBACCOUNT', 0, 0)
  };
}
