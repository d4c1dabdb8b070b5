export interface ApiResponse {
  status: number;
  data: unknown;
  text: string;
}

export interface Agent {
  agentId: number;
  agentName: string;
  agentType: string | null;
  location: string | null;
  countryId: string | null;
}

export interface HttpServerTest {
  testId: number;
  testName: string;
  url: string | null;
  interval: number | null;
  enabled: boolean | null;
  agents: number[];
}

/** One execution of an HTTP-server test. Fields the API omitted are `null`. */
export interface ResultEntry {
  date: string | null;
  agentId: number | null;
  agentName: string | null;
  responseCode: number | null;
  responseTime: number | null;
  redirectTime: number | null;
  dnsTime: number | null;
  sslTime: number | null;
  connectTime: number | null;
  waitTime: number | null;
  receiveTime: number | null;
  totalTime: number | null;
  throughput: number | null;
  wireSize: number | null;
  serverIp: string | null;
  sslCipher: string | null;
  sslVersion: string | null;
  healthScore: number | null;
}

export type JsonObject = { [key: string]: unknown };

/**
 * Raw decoded body of a results fetch, kept as the API sent it. Its `results`
 * array holds entries, newest first.
 */
export type ResultsPayload = JsonObject | unknown[];

export interface OutputOptions {
  json?: boolean;
  table?: boolean;
  csv?: boolean;
  quiet?: boolean;
}

export interface GlobalOptions extends OutputOptions {
  token?: string;
  debug?: boolean;
}
