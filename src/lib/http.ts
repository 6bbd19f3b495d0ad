import { UpstreamError } from './errors.js';

export interface JsonRequest {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  /** Serialized as JSON when present. */
  body?: unknown;
  /** Abort the request after this many milliseconds. `0` or absent waits forever. */
  timeoutMs?: number;
}

export interface JsonResponse {
  status: number;
  body: unknown;
}

/**
 * Performs a single JSON request using native fetch (no retries).
 *
 * Throws {@link UpstreamError} when the request cannot be sent, times out,
 * answers with a non-2xx status (the parsed error body is attached when the
 * server returned JSON) or answers 2xx with a body that is not JSON.
 */
export async function requestJson(
  url: string,
  request: JsonRequest
): Promise<JsonResponse> {
  const controller = new AbortController();
  const timeoutId =
    request.timeoutMs && request.timeoutMs > 0
      ? setTimeout(() => controller.abort(), request.timeoutMs)
      : undefined;

  const headers: Record<string, string> = { ...request.headers };
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  let response: Response;
  let text: string;
  try {
    response = await fetch(url, {
      method: request.method,
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: controller.signal,
    });
    text = await response.text();
  } catch (error) {
    const reason = controller.signal.aborted
      ? `timed out after ${request.timeoutMs}ms`
      : error instanceof Error
        ? error.message
        : String(error);
    throw new UpstreamError(`Request to ${url} failed: ${reason}`, {
      cause: error,
    });
  } finally {
    clearTimeout(timeoutId);
  }

  const body = parseJson(text);

  if (!response.ok) {
    throw new UpstreamError(
      `Request Failed. Status Code: ${response.status}`,
      { status: response.status, body }
    );
  }

  if (body === undefined) {
    throw new UpstreamError(
      `Response from ${url} is not valid JSON (status ${response.status})`,
      { status: response.status }
    );
  }

  return { status: response.status, body };
}

/**
 * @param text Raw response body.
 * @returns The parsed value, or `undefined` for an empty or non-JSON body.
 */
function parseJson(text: string): unknown {
  if (text.trim() === '') return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}
