/**
 * JSON over HTTP for the plug drivers
 */

import type { FetchFn } from '@logging';
import { PlugError, PlugTimeoutError, errorMessage } from '$types/errors';

export interface JsonRequestOptions {
  timeoutMs: number;
  headers?: Readonly<Record<string, string>>;
}

/**
 * POST a JSON body and resolve the parsed response body
 *
 * The request is aborted after `timeoutMs`.
 *
 * @throws {PlugTimeoutError} When the time budget runs out
 * @throws {PlugError} On transport failures, non-2xx responses and non-JSON bodies
 */
export async function postJson(
  fetchFn: FetchFn,
  url: string,
  body: unknown,
  options: JsonRequestOptions
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(function() { controller.abort(); }, options.timeoutMs);

  try {
    const response = await fetchFn(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...options.headers },
      body: JSON.stringify(body),
      signal: controller.signal
    });

    if (!response.ok) {
      throw new PlugError('HTTP ' + response.status + ': ' + response.statusText);
    }

    const data: unknown = await response.json();
    return data;
  } catch (error) {
    if (controller.signal.aborted) {
      throw new PlugTimeoutError(options.timeoutMs);
    }
    if (error instanceof PlugError) {
      throw error;
    }
    throw new PlugError('Request to ' + hostOf(url) + ' failed: ' + errorMessage(error));
  } finally {
    clearTimeout(timeoutId);
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch (_error) {
    return url;
  }
}
