import fetch, { Response } from 'node-fetch';
import { USER_AGENT } from '../config/default';
import { HttpError } from '../errors';
import { logger } from '../utils/logger';
import { FetchLike } from './types';

/**
 * Thin HTTP layer over the Zenodo REST API. Every request carries the API key
 * as a bearer token.
 */
export class ZenodoApi {
  private baseUrl: string;

  constructor(
    baseUrl: string,
    private apiKey: string,
    private fetchImpl: FetchLike = fetch
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * Drains the body of a rejected response so its socket returns to the pool.
   */
  private failure(response: Response, url: string): HttpError {
    response.body.resume();
    return new HttpError(response.status, response.statusText, url);
  }

  buildUrl(pathname: string, params?: Record<string, string | number>): string {
    const url = `${this.baseUrl}${pathname}`;
    if (!params) return url;

    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      query.set(key, String(value));
    }
    return `${url}?${query}`;
  }

  private headers(accept: string): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      Accept: accept,
      'User-Agent': USER_AGENT,
    };
  }

  async getJson(pathname: string, params?: Record<string, string | number>): Promise<unknown> {
    const url = this.buildUrl(pathname, params);
    logger.debug(`GET ${url}`);

    const response = await this.fetchImpl(url, {
      headers: this.headers('application/json'),
    });

    if (!response.ok) {
      throw this.failure(response, url);
    }

    const payload: unknown = await response.json();
    return payload;
  }

  /**
   * Opens a file download. The caller consumes the body stream.
   */
  async openDownload(url: string, signal?: AbortSignal): Promise<Response> {
    logger.debug(`GET ${url}`);

    const response = await this.fetchImpl(url, {
      signal,
      headers: this.headers('*/*'),
    });

    if (!response.ok) {
      throw this.failure(response, url);
    }

    return response;
  }
}
