import { Logger } from '../src/lib/Logger.js';

/**
 * Helper to simulate a JSON response from one of the APIs
 */
export function mockJsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Helper to simulate a plain text response
 */
export function mockTextResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

/**
 * Helper to simulate a network error (fetch rejects with a TypeError)
 */
export function mockFetchError(errorMessage: string): Error {
  const error = new Error(errorMessage);
  error.name = 'TypeError';
  return error;
}

/**
 * A logger that keeps every line in memory, with a fixed clock.
 */
export function memoryLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger(
    [(line) => lines.push(line)],
    'debug',
    () => new Date('2024-05-01T10:00:00.000Z')
  );
  return { logger, lines };
}

/**
 * Reads the JSON body a fetch spy was called with.
 */
export function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}
