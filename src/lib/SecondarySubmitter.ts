import { GoogleAuth } from 'google-auth-library';
import { z } from 'zod';
import { UpstreamError, describeFailure } from './errors.js';
import { requestJson } from './http.js';
import type { Logger } from './Logger.js';
import {
  type NotificationType,
  type SecondaryEngine,
  type SubmissionOutcome,
  SubmissionStatus,
} from './types.js';

export const INDEXING_SCOPE = 'https://www.googleapis.com/auth/indexing';

const UNEXPECTED_SHAPE = 'Unexpected response shape from the Indexing API';

const PublishResponseSchema = z.object({
  urlNotificationMetadata: z
    .object({
      latestUpdate: z
        .object({ type: z.unknown().optional() })
        .passthrough()
        .optional(),
    })
    .passthrough(),
});

/**
 * Supplies bearer tokens for the Indexing API.
 */
export interface TokenProvider {
  getAccessToken(): Promise<string>;
}

/**
 * Mints tokens from a service account key file. The underlying client
 * caches the token and refreshes it only when it is about to expire.
 */
export class ServiceAccountTokenProvider implements TokenProvider {
  private readonly auth: GoogleAuth;

  constructor(keyFile: string, scopes: string[] = [INDEXING_SCOPE]) {
    this.auth = new GoogleAuth({ keyFile, scopes });
  }

  async getAccessToken(): Promise<string> {
    const token = await this.auth.getAccessToken();
    if (!token) {
      throw new UpstreamError('The service account returned an empty access token');
    }
    return token;
  }
}

export interface SecondaryApiOptions {
  /** e.g. `https://indexing.googleapis.com/v3`, without a trailing slash. */
  apiBase: string;
  tokens: TokenProvider;
  timeoutMs?: number;
}

/**
 * Publishes URL notifications to the Google Indexing API.
 */
export class SecondarySubmitter implements SecondaryEngine {
  private readonly api: SecondaryApiOptions;
  private readonly logger: Logger;

  constructor(api: SecondaryApiOptions, logger: Logger) {
    this.api = api;
    this.logger = logger;
  }

  /**
   * Publishes one notification. Never throws: token and request failures
   * become a `Failure` outcome for this URL only.
   */
  async submit(
    url: string,
    action: NotificationType = 'URL_UPDATED'
  ): Promise<SubmissionOutcome> {
    let token: string;
    try {
      token = await this.api.tokens.getAccessToken();
    } catch (error) {
      const errorDetail = `Failed to obtain an access token: ${describeFailure(error)}`;
      this.logger.error(errorDetail);
      return { status: SubmissionStatus.Failure, errorDetail };
    }

    const endpoint = `${this.api.apiBase}/urlNotifications:publish`;
    const payload = { url, type: action };
    this.logger.debug(`Indexing API request: POST ${endpoint} ${JSON.stringify(payload)}`);

    let body: unknown;
    try {
      ({ body } = await requestJson(endpoint, {
        method: 'POST',
        headers: { Authorization: `Bearer ${token}` },
        body: payload,
        timeoutMs: this.api.timeoutMs,
      }));
    } catch (error) {
      const errorDetail = describeFailure(error);
      this.logger.error(`Indexing API publish failed for ${url}: ${errorDetail}`);
      return { status: SubmissionStatus.Failure, errorDetail };
    }

    this.logger.debug(`Indexing API response: ${JSON.stringify(body)}`);
    return classifyPublishResponse(body, action);
  }
}

/**
 * Requires the `urlNotificationMetadata` envelope. When the envelope reports
 * a latest update type, it has to match the requested action; a type that is
 * not a string is reported as JSON.
 * @param body Parsed response body.
 * @param action The notification type that was sent.
 * @returns Success, or Failure with the reason.
 */
export function classifyPublishResponse(
  body: unknown,
  action: NotificationType
): SubmissionOutcome {
  const parsed = PublishResponseSchema.safeParse(body);
  if (!parsed.success) {
    return { status: SubmissionStatus.Failure, errorDetail: UNEXPECTED_SHAPE };
  }

  const actual = parsed.data.urlNotificationMetadata.latestUpdate?.type;
  if (actual !== undefined && actual !== action) {
    return {
      status: SubmissionStatus.Failure,
      errorDetail: `Expected notification type ${action}, got ${
        typeof actual === 'string' ? actual : JSON.stringify(actual)
      }`,
    };
  }

  return { status: SubmissionStatus.Success };
}
