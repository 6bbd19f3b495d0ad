import { z } from 'zod';
import { ConfigurationError, ResolutionError, describeFailure } from './errors.js';
import { requestJson } from './http.js';
import type { Logger } from './Logger.js';
import type { IdentitySource, SiteIdentity } from './types.js';

const UserResponseSchema = z.object({
  user_id: z.union([z.number(), z.string().min(1)]),
});

export interface PrimaryApiOptions {
  /** e.g. `https://api.webmaster.yandex.net/v4`, without a trailing slash. */
  apiBase: string;
  /** OAuth token sent as `Authorization: OAuth <token>`. */
  token: string;
  timeoutMs?: number;
}

/** Headers shared by every Yandex Webmaster call. */
export function primaryAuthHeaders(token: string): Record<string, string> {
  return { Authorization: `OAuth ${token}` };
}

const AUTHORITY_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\/([^/?#]*)/;

/**
 * Builds the Webmaster host identifier for a site, e.g.
 * `https://example.com` → `https:example.com:443`.
 *
 * The authority is taken as written, keeping its case and any userinfo or
 * port. The port is chosen by scheme (443 for https, 80 for anything else)
 * and is never read from the URL.
 */
export function deriveHostId(siteUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(siteUrl);
  } catch (error) {
    throw new ConfigurationError(`Invalid site URL: ${siteUrl}`, { cause: error });
  }

  const scheme = parsed.protocol.replace(/:$/, '');
  const authority = AUTHORITY_PATTERN.exec(siteUrl.trim())?.[1];
  if (!scheme || !authority) {
    throw new ConfigurationError(`Invalid site URL: ${siteUrl}`);
  }

  const port = scheme === 'https' ? 443 : 80;
  return `${scheme}:${authority}:${port}`;
}

/**
 * Resolves the identifiers every Webmaster submission is addressed with.
 */
export class IdentityResolver implements IdentitySource {
  private readonly api: PrimaryApiOptions;
  private readonly siteUrl: string;
  private readonly logger: Logger;

  constructor(api: PrimaryApiOptions, siteUrl: string, logger: Logger) {
    this.api = api;
    this.siteUrl = siteUrl;
    this.logger = logger;
  }

  /**
   * Derives the host id, then asks the API for the account id.
   * Throws {@link ConfigurationError} or {@link ResolutionError}.
   */
  async resolve(): Promise<SiteIdentity> {
    const hostId = deriveHostId(this.siteUrl);
    this.logger.info(`Host ID: ${hostId}`);

    const accountId = await this.resolveAccountId();

    return Object.freeze({ accountId, hostId });
  }

  async resolveAccountId(): Promise<string> {
    let body: unknown;
    try {
      ({ body } = await requestJson(`${this.api.apiBase}/user`, {
        method: 'GET',
        headers: primaryAuthHeaders(this.api.token),
        timeoutMs: this.api.timeoutMs,
      }));
    } catch (error) {
      throw new ResolutionError(
        `Failed to fetch the Webmaster user id: ${describeFailure(error)}`,
        { cause: error }
      );
    }

    const parsed = UserResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResolutionError(
        `Webmaster user response has no user_id: ${JSON.stringify(body)}`,
        { body }
      );
    }

    const accountId = String(parsed.data.user_id);
    this.logger.info(`User ID: ${accountId}`);
    return accountId;
  }
}
