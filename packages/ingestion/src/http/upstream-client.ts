/**
 * Thin axios wrapper for the upstream data APIs.
 *
 * Every request carries a timeout and, when a gate is configured, waits for
 * its slot first (retries included). Network errors, 429 and 5xx responses
 * are retried after the configured delays; any other non-2xx status fails
 * immediately. Failures surface as `UpstreamError`.
 */

import axios, { type AxiosRequestConfig } from "axios";
import { delay } from "../delay.js";
import { UpstreamError, errorMessage } from "../errors.js";
import type { RateGate } from "../polling/rate-gate.js";

export interface HttpResponse {
  status: number;
  statusText: string;
  data: unknown;
}

/** The subset of an axios instance the client uses */
export interface HttpTransport {
  get(url: string, config: AxiosRequestConfig): Promise<HttpResponse>;
}

export interface UpstreamClientConfig {
  /** Base URL for the upstream API (e.g., "https://api.tomtom.com") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 15000) */
  timeoutMs?: number;
  /** Delay before each retry; its length is the retry count (default: [2000, 5000]) */
  retryDelaysMs?: readonly number[];
  /** Sent as the `key` query parameter when set */
  apiKey?: string;
  /** Spacing shared by every client of the same rate-limit domain */
  gate?: RateGate;
  /** Injectable transport for testability */
  transport?: HttpTransport;
}

export const DEFAULT_TIMEOUT_MS = 15_000;
export const DEFAULT_RETRY_DELAYS_MS: readonly number[] = [2000, 5000];

function isRetryable(status: number): boolean {
  return status === 429 || status >= 500;
}

export class UpstreamClient {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retryDelaysMs: readonly number[];
  private readonly apiKey?: string;
  private readonly gate?: RateGate;
  private readonly transport: HttpTransport;

  constructor(name: string, config: UpstreamClientConfig) {
    this.name = name;
    this.baseUrl = config.baseUrl;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryDelaysMs = config.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
    this.apiKey = config.apiKey;
    this.gate = config.gate;
    this.transport = config.transport ?? axios.create();
  }

  /**
   * GET a JSON document. Resolves with the parsed body of a 2xx response.
   */
  async get(
    path: string,
    query: Record<string, string | number> = {},
    signal?: AbortSignal,
  ): Promise<unknown> {
    const params: Record<string, string | number> = { ...query };
    if (this.apiKey) params["key"] = this.apiKey;

    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
      params,
      headers: { Accept: "application/json" },
      validateStatus: () => true,
      signal,
    };

    const maxRetries = this.retryDelaysMs.length;
    for (let attempt = 0; ; attempt++) {
      await this.gate?.acquire(signal);
      let res: HttpResponse;
      try {
        res = await this.transport.get(path, config);
      } catch (err) {
        if (signal?.aborted) {
          throw new UpstreamError(`${this.name} request aborted: ${path}`, this.name);
        }
        if (attempt < maxRetries) {
          const wait = this.retryDelaysMs[attempt] ?? 0;
          console.log(
            `[${this.name}] Network error: ${errorMessage(err)} — retrying in ${wait / 1000}s`,
          );
          await delay(wait, signal);
          continue;
        }
        throw new UpstreamError(
          `${this.name} network error: ${errorMessage(err)}`,
          this.name,
        );
      }

      if (res.status >= 200 && res.status < 300) {
        return res.data;
      }

      if (isRetryable(res.status) && attempt < maxRetries) {
        const wait = this.retryDelaysMs[attempt] ?? 0;
        console.log(
          `[${this.name}] ${res.status} ${res.statusText} — retrying in ${wait / 1000}s`,
        );
        await delay(wait, signal);
        continue;
      }

      throw new UpstreamError(
        `${this.name} API error: ${res.status} ${res.statusText}`,
        this.name,
        res.status,
      );
    }
  }
}
