import { z } from 'zod';
import { describeFailure } from './errors.js';
import { requestJson } from './http.js';
import { type PrimaryApiOptions, primaryAuthHeaders } from './IdentityResolver.js';
import type { Logger } from './Logger.js';
import {
  type PrimaryEngine,
  type SubmissionOutcome,
  SubmissionStatus,
} from './types.js';

const RecrawlResponseSchema = z.record(z.unknown());

/**
 * Adds URLs to the Yandex Webmaster recrawl queue.
 */
export class PrimarySubmitter implements PrimaryEngine {
  private readonly api: PrimaryApiOptions;
  private readonly logger: Logger;

  constructor(api: PrimaryApiOptions, logger: Logger) {
    this.api = api;
    this.logger = logger;
  }

  /**
   * Queues one URL. Never throws: every failure becomes a `Failure` outcome.
   */
  async submit(
    accountId: string,
    hostId: string,
    url: string
  ): Promise<SubmissionOutcome> {
    const endpoint = `${this.api.apiBase}/user/${accountId}/hosts/${hostId}/recrawl/queue`;
    this.logger.debug(`Webmaster request: POST ${endpoint} ${JSON.stringify({ url })}`);

    let body: unknown;
    try {
      ({ body } = await requestJson(endpoint, {
        method: 'POST',
        headers: primaryAuthHeaders(this.api.token),
        body: { url },
        timeoutMs: this.api.timeoutMs,
      }));
    } catch (error) {
      const errorDetail = describeFailure(error);
      this.logger.error(`Webmaster recrawl failed for ${url}: ${errorDetail}`);
      return { status: SubmissionStatus.Failure, errorDetail };
    }

    this.logger.debug(`Webmaster response: ${JSON.stringify(body)}`);
    return classifyRecrawlResponse(body);
  }
}

/**
 * `error` wins over everything else; a `task_id` confirms the queueing;
 * a body with neither is taken as accepted but unconfirmed.
 */
export function classifyRecrawlResponse(body: unknown): SubmissionOutcome {
  const parsed = RecrawlResponseSchema.safeParse(body);
  const fields: Record<string, unknown> = parsed.success ? parsed.data : {};

  if ('error' in fields) {
    const { error } = fields;
    return {
      status: SubmissionStatus.Failure,
      errorDetail: typeof error === 'string' ? error : JSON.stringify(error),
    };
  }

  if ('task_id' in fields) {
    return { status: SubmissionStatus.Success };
  }

  return { status: SubmissionStatus.SuccessNoConfirmation };
}
