// CHANGE: Provide an axios session factory and GET helpers that surface status codes.
// WHY: Callers distinguish 404 (soft miss) and 403 rate limiting from other failures; no retries are made.

import axios, { AxiosInstance, AxiosResponse } from "axios";
import { GITHUB, NET } from "../config.js";
import { debug } from "../logger.js";

/**
 * Options fixed for the lifetime of a session.
 *
 * @property token - Bearer token attached to every request when present.
 * @property timeout - Per-request timeout in milliseconds.
 */
export interface HttpSessionOptions {
  readonly token?: string;
  readonly timeout?: number;
}

export interface HttpResponse<T> {
  readonly data: T;
  readonly status: number;
}

/**
 * Raised for responses outside the 2xx range that the caller did not accept.
 */
export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number
  ) {
    super(`Request to ${url} failed with status ${status}`);
    this.name = "HttpStatusError";
  }
}

/**
 * Create an axios instance carrying the crawler's identity and optional token.
 *
 * Every status resolves so that callers can inspect it; use {@link ensureOk} to reject the rest.
 */
export function createHttpSession(options: HttpSessionOptions = {}): AxiosInstance {
  const headers: Record<string, string> = {
    "User-Agent": GITHUB.USER_AGENT,
    Accept: GITHUB.ACCEPT
  };
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }
  return axios.create({
    timeout: options.timeout ?? NET.TIMEOUT,
    maxRedirects: 5,
    headers,
    validateStatus: () => true
  });
}

function toResponse<T>(response: AxiosResponse<T>): HttpResponse<T> {
  return { data: response.data, status: response.status };
}

/**
 * Throw {@link HttpStatusError} unless the status is 2xx.
 */
export function ensureOk<T>(response: HttpResponse<T>, url: string): HttpResponse<T> {
  if (response.status < 200 || response.status >= 300) {
    throw new HttpStatusError(url, response.status);
  }
  return response;
}

/**
 * Perform GET request expecting JSON payload.
 *
 * @param session - Instance from {@link createHttpSession}.
 * @param url - Target URL.
 * @param params - Query string parameters.
 */
export async function getJson<T>(
  session: AxiosInstance,
  url: string,
  params?: Record<string, string | number>
): Promise<HttpResponse<T>> {
  const response = await session.get<T>(url, { params });
  debug(`GET ${url} -> ${response.status}`);
  return toResponse(response);
}

/**
 * Perform GET request returning the body as text, whatever its content type.
 */
export async function getText(session: AxiosInstance, url: string): Promise<HttpResponse<string>> {
  const response = await session.get<string>(url, { responseType: "text" });
  debug(`GET ${url} -> ${response.status}`);
  return toResponse(response);
}
