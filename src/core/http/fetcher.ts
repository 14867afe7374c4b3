/**
 * Shared HTTP fetching utilities
 */

import { BROWSER_CONSTANTS, NETWORK_CONSTANTS } from "../constants/index";
import { NetworkError, toError } from "../errors/index";

export interface FetchOptions {
  timeoutMs?: number;
  userAgent?: string;
  accept?: string;
}

/**
 * Fetches a URL once with browser-like headers and a bounded timeout
 * @param url - URL to fetch
 * @returns The response, guaranteed to be 2xx
 * @throws NetworkError on transport failure, timeout or non-2xx status
 */
export async function fetchOnce(
  url: string,
  options: FetchOptions = {},
): Promise<Response> {
  let r: Response;
  try {
    r = await fetch(url, {
      redirect: "follow",
      headers: {
        "user-agent": options.userAgent ?? BROWSER_CONSTANTS.USER_AGENT,
        accept: options.accept ?? BROWSER_CONSTANTS.ACCEPT_HEADER,
        "accept-language": BROWSER_CONSTANTS.ACCEPT_LANGUAGE,
      },
      signal: AbortSignal.timeout(
        options.timeoutMs ?? NETWORK_CONSTANTS.REQUEST_TIMEOUT_MS,
      ),
    });
  } catch (error) {
    const cause = toError(error);
    throw new NetworkError(`Request to ${url} failed: ${cause.message}`, url, {
      cause,
    });
  }
  if (!r.ok) throw new NetworkError(`HTTP ${r.status} for ${url}`, url);
  return r;
}

/**
 * Fetches text content from a URL
 * @throws NetworkError if the request fails
 */
export async function fetchText(
  url: string,
  options: FetchOptions = {},
): Promise<string> {
  const r = await fetchOnce(url, options);
  try {
    return await r.text();
  } catch (error) {
    throw new NetworkError(`Could not read body of ${url}`, url, {
      cause: error,
    });
  }
}

/**
 * Fetches and parses a JSON document
 * @throws NetworkError if the request fails or the body is not JSON
 */
export async function fetchJson(
  url: string,
  options: FetchOptions = {},
): Promise<unknown> {
  const r = await fetchOnce(url, { accept: "application/json", ...options });
  try {
    const body: unknown = await r.json();
    return body;
  } catch (error) {
    throw new NetworkError(`Invalid JSON from ${url}`, url, { cause: error });
  }
}
