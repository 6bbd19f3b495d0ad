/**
 * Normalized result of a single reindex request.
 */
export const SubmissionStatus = {
  Success: 'Success',
  /** The request was accepted but the API returned no task identifier. */
  SuccessNoConfirmation: 'SuccessNoConfirmation',
  Failure: 'Failure',
} as const;

export type SubmissionStatus =
  (typeof SubmissionStatus)[keyof typeof SubmissionStatus];

/**
 * Outcome produced by one engine for one URL.
 */
export interface SubmissionOutcome {
  status: SubmissionStatus;
  /** Present only when something went wrong. */
  errorDetail?: string;
}

/**
 * Identifiers addressing the site in the Yandex Webmaster API.
 * Resolved once per run and frozen.
 */
export interface SiteIdentity {
  readonly accountId: string;
  /** `scheme:authority:port`, e.g. `https:example.com:443`. */
  readonly hostId: string;
}

/** Notification types accepted by the Google Indexing API. */
export const NOTIFICATION_TYPES = ['URL_UPDATED', 'URL_DELETED'] as const;

export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

/**
 * One line of the results table.
 */
export interface ResultRow {
  url: string;
  primaryStatus: SubmissionStatus;
  primaryError?: string;
  secondaryStatus: SubmissionStatus;
  secondaryError?: string;
}

export interface IdentitySource {
  resolve(): Promise<SiteIdentity>;
}

export interface PrimaryEngine {
  submit(accountId: string, hostId: string, url: string): Promise<SubmissionOutcome>;
}

export interface SecondaryEngine {
  submit(url: string, action?: NotificationType): Promise<SubmissionOutcome>;
}
