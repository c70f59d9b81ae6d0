/**
 * Steam store API client: bulk app listing and per-app detail lookups.
 *
 * Failures surface as the pipeline's error taxonomy; the caller decides what
 * to retry. There is no in-process retry loop here.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  ApiReportedFailureError,
  EnricherError,
  ParseError,
  RateLimitedError,
  TransportError,
  errorMessage,
} from './errors';
import { AppDetailsData } from './types';

export interface SteamStoreClientConfig {
  appListUrl: string;
  appDetailsUrl: string;
  locale: string;
  requestTimeoutMs: number;
  http?: AxiosInstance;
}

/**
 * Anything that can answer a detail lookup. The worker depends on this rather
 * than on the concrete client.
 */
export interface AppDetailsSource {
  getAppDetails(appid: number): Promise<AppDetailsData>;
}

export interface AppListSource {
  getAppList(): Promise<number[]>;
}

const appListSchema = z.object({
  applist: z.object({
    apps: z.array(
      z
        .object({
          appid: z.number().int(),
        })
        .passthrough()
    ),
  }),
});

const RATE_LIMIT_PATTERN = /\b429\b|too many requests|rate.?limit/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Map an HTTP failure onto the error taxonomy.
 */
export function classifyHttpError(error: unknown): EnricherError {
  if (error instanceof EnricherError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 429 || RATE_LIMIT_PATTERN.test(error.message)) {
      return new RateLimitedError(error.message, { status });
    }
    return new TransportError(error.message, status, { code: error.code });
  }

  const message = errorMessage(error);
  if (RATE_LIMIT_PATTERN.test(message)) {
    return new RateLimitedError(message);
  }
  return new TransportError(message);
}

/**
 * Extract the attribute bag for `appid` from a raw detail response body.
 * The body is `{ "<appid>": { success: boolean, data: {...} } }`.
 */
export function parseAppDetails(appid: number, body: unknown): AppDetailsData {
  let payload: unknown = body;
  if (typeof body === 'string') {
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new ParseError(`Invalid JSON for appid ${appid}: ${errorMessage(error)}`, { appid });
    }
  }

  if (!isRecord(payload)) {
    throw new ParseError(`Response for appid ${appid} is not an object`, { appid });
  }

  const entry = payload[String(appid)];
  if (!isRecord(entry)) {
    throw new ParseError(`Response has no entry for appid ${appid}`, { appid });
  }

  if (entry.success !== true) {
    throw new ApiReportedFailureError(appid);
  }

  if (!isRecord(entry.data)) {
    throw new ParseError(`Entry for appid ${appid} has no data object`, { appid });
  }

  return entry.data;
}

export class SteamStoreClient implements AppDetailsSource, AppListSource {
  private axiosInstance: AxiosInstance;
  private config: SteamStoreClientConfig;

  constructor(config: SteamStoreClientConfig) {
    this.config = config;
    this.axiosInstance =
      config.http ??
      axios.create({
        timeout: config.requestTimeoutMs,
        headers: {
          Accept: 'application/json',
        },
      });
  }

  /**
   * Fetch the full identifier universe from the bulk listing endpoint.
   * Returns unique positive identifiers in ascending order.
   */
  async getAppList(): Promise<number[]> {
    let body: unknown;
    try {
      const response = await this.axiosInstance.get<unknown>(this.config.appListUrl, {
        timeout: Math.max(this.config.requestTimeoutMs, 60_000),
      });
      body = response.data;
    } catch (error) {
      throw classifyHttpError(error);
    }

    const parsed = appListSchema.safeParse(body);
    if (!parsed.success) {
      throw new ParseError(`Unexpected app list shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    const ids = new Set<number>();
    for (const app of parsed.data.applist.apps) {
      if (app.appid > 0) ids.add(app.appid);
    }
    return [...ids].sort((a, b) => a - b);
  }

  /**
   * Fetch and unwrap the detail attribute bag for one identifier.
   */
  async getAppDetails(appid: number): Promise<AppDetailsData> {
    let body: string;
    try {
      const response = await this.axiosInstance.get<string>(this.config.appDetailsUrl, {
        params: { appids: appid, l: this.config.locale },
        responseType: 'text',
        timeout: this.config.requestTimeoutMs,
      });
      body = response.data;
    } catch (error) {
      throw classifyHttpError(error);
    }

    return parseAppDetails(appid, body);
  }
}
