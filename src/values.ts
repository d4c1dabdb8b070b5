import type { Agent, HttpServerTest, JsonObject, ResultEntry } from './types.js';

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function toInteger(value: unknown): number | null {
  const parsed = toNumber(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

export function toText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

/** Returns the array stored under `key`, or an empty list when the payload has none. */
export function listField(payload: unknown, key: string): unknown[] {
  if (!isObject(payload)) return [];
  const value = payload[key];
  return Array.isArray(value) ? value : [];
}

export function parseAgent(raw: unknown): Agent | null {
  if (!isObject(raw)) return null;
  const agentId = toInteger(raw.agentId);
  if (agentId === null) return null;
  return {
    agentId,
    agentName: toText(raw.agentName) ?? '',
    agentType: toText(raw.agentType),
    location: toText(raw.location),
    countryId: toText(raw.countryId),
  };
}

export function parseTest(raw: unknown): HttpServerTest | null {
  if (!isObject(raw)) return null;
  const testId = toInteger(raw.testId);
  if (testId === null) return null;
  const agents: number[] = [];
  for (const agent of listField(raw, 'agents')) {
    const agentId = isObject(agent) ? toInteger(agent.agentId) : null;
    if (agentId !== null) agents.push(agentId);
  }
  return {
    testId,
    testName: toText(raw.testName) ?? '',
    url: toText(raw.url),
    interval: toInteger(raw.interval),
    enabled: typeof raw.enabled === 'boolean' ? raw.enabled : null,
    agents,
  };
}

export function parseResultEntry(raw: unknown): ResultEntry {
  const entry: JsonObject = isObject(raw) ? raw : {};
  const agent: JsonObject = isObject(entry.agent) ? entry.agent : {};
  return {
    date: toText(entry.date),
    agentId: toInteger(agent.agentId),
    agentName: toText(agent.agentName),
    responseCode: toInteger(entry.responseCode),
    responseTime: toNumber(entry.responseTime),
    redirectTime: toNumber(entry.redirectTime),
    dnsTime: toNumber(entry.dnsTime),
    sslTime: toNumber(entry.sslTime),
    connectTime: toNumber(entry.connectTime),
    waitTime: toNumber(entry.waitTime),
    receiveTime: toNumber(entry.receiveTime),
    totalTime: toNumber(entry.totalTime),
    throughput: toNumber(entry.throughput),
    wireSize: toNumber(entry.wireSize),
    serverIp: toText(entry.serverIp),
    sslCipher: toText(entry.sslCipher),
    sslVersion: toText(entry.sslVersion),
    healthScore: toNumber(entry.healthScore),
  };
}
