import chalk from 'chalk';
import { BASE_URL, resolveToken } from './config.js';
import { ThousandEyesApiError, ThousandEyesAuthError } from './errors.js';
import type { ApiResponse } from './types.js';

export interface ClientOptions {
  baseUrl?: string;
  debug?: boolean;
}

export class ThousandEyesClient {
  private token: string;
  private baseUrl: string;
  private debug: boolean;

  constructor(token?: string, options: ClientOptions = {}) {
    this.token = resolveToken(token);
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.debug = options.debug ?? false;

    if (!this.token) {
      throw new ThousandEyesAuthError();
    }
  }

  private async request(method: string, path: string, body?: unknown): Promise<ApiResponse> {
    const url = `${this.baseUrl}${path}`;

    if (this.debug) {
      console.error(chalk.dim(`→ ${method} ${url}`));
      if (body !== undefined) {
        console.error(chalk.dim(`  body: ${JSON.stringify(body)}`));
      }
    }

    const headers: Record<string, string> = {
      'Authorization': `Bearer ${this.token}`,
      'Content-Type': 'application/json',
    };

    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    const response = await fetch(url, init);
    const text = await response.text();

    if (this.debug) {
      console.error(chalk.dim(`← ${response.status} ${response.statusText}`));
    }

    if (!response.ok) {
      if (this.debug) {
        console.error(chalk.dim(`  error: ${text}`));
      }
      throw new ThousandEyesApiError(response.status, text);
    }

    return { status: response.status, data: decodeBody(text), text };
  }

  async get(path: string): Promise<ApiResponse> {
    return this.request('GET', path);
  }

  async post(path: string, body?: unknown): Promise<ApiResponse> {
    return this.request('POST', path, body);
  }
}

function decodeBody(text: string): unknown {
  if (text.trim() === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
