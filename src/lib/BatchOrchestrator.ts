import { stat } from 'fs/promises';
import { type CsvTable, readTable, writeTable } from './CsvTable.js';
import {
  InputError,
  OutputError,
  ReindexError,
  describeFailure,
} from './errors.js';
import type { Logger } from './Logger.js';
import type { RateLimiter } from './RateLimiter.js';
import type {
  IdentitySource,
  NotificationType,
  PrimaryEngine,
  ResultRow,
  SecondaryEngine,
  SiteIdentity,
} from './types.js';

/** Column holding the URLs in the input table. */
export const URL_COLUMN = 'URL';

/** Results table header, in output order. */
export const RESULT_COLUMNS = [
  'URL',
  'Primary_Status',
  'Primary_Error',
  'Secondary_Status',
  'Secondary_Error',
] as const;

export type RunState = 'Done' | 'Aborted';

export interface RunSummary {
  state: RunState;
  /** Why the run was aborted, or why the output could not be written. */
  error?: ReindexError;
  /** Data rows read from the input. */
  total: number;
  processed: number;
  /** Rows without a URL. */
  skipped: number;
  results: ResultRow[];
  outputWritten: boolean;
}

export interface BatchOrchestratorOptions {
  identity: IdentitySource;
  primary: PrimaryEngine;
  secondary: SecondaryEngine;
  rateLimiter: RateLimiter;
  logger: Logger;
  /** Notification type published to the Indexing API. */
  action?: NotificationType;
}

export function toResultRecord(row: ResultRow): string[] {
  return [
    row.url,
    row.primaryStatus,
    row.primaryError ?? '',
    row.secondaryStatus,
    row.secondaryError ?? '',
  ];
}

/**
 * Drives one reindex run:
 * Init → ResolveIdentity → ReadInput → ForEachUrl → WriteOutput → Done.
 *
 * Failures before the loop abort the run without touching the output file.
 * Submission failures are recorded per row and never stop the loop.
 */
export class BatchOrchestrator {
  private readonly options: BatchOrchestratorOptions;

  constructor(options: BatchOrchestratorOptions) {
    this.options = options;
  }

  async run(inputPath: string, outputPath: string): Promise<RunSummary> {
    const { logger } = this.options;

    // Init
    const inputError = await this.checkInputFile(inputPath);
    if (inputError) return this.abort(inputError);

    // ResolveIdentity
    let identity: SiteIdentity;
    try {
      identity = await this.options.identity.resolve();
    } catch (error) {
      return this.abort(error);
    }
    logger.info(
      `Initialization complete. User ID: ${identity.accountId}, Host ID: ${identity.hostId}`
    );

    // ReadInput
    let table: CsvTable;
    try {
      table = await readTable(inputPath);
    } catch (error) {
      return this.abort(
        new InputError(`Failed to read ${inputPath}: ${describeFailure(error)}`, {
          cause: error,
        })
      );
    }
    if (!table.headers.includes(URL_COLUMN)) {
      return this.abort(
        new InputError(
          `Input has no '${URL_COLUMN}' column. Available columns: ${table.headers.join(', ')}`
        )
      );
    }

    // ForEachUrl
    const summary = await this.processRows(table.rows, identity);

    // WriteOutput
    try {
      await writeTable(outputPath, RESULT_COLUMNS, summary.results.map(toResultRecord));
      summary.outputWritten = true;
    } catch (error) {
      summary.error = new OutputError(
        `Failed to write ${outputPath}: ${describeFailure(error)}`,
        { cause: error }
      );
      logger.error(summary.error.message);
    }

    logger.info(`Processing complete. Processed URLs: ${summary.processed}/${summary.total}`);
    if (summary.outputWritten) {
      logger.info(`Results written to ${outputPath}`);
    }
    return summary;
  }

  /**
   * Submits every non-empty URL to both engines in input order, waiting on the
   * rate limiter between rows. Empty URLs are skipped and counted.
   * @param rows Input rows keyed by header.
   * @param identity The run's resolved site identity.
   * @returns A `Done` summary whose output has not been written yet.
   */
  private async processRows(
    rows: Record<string, string>[],
    identity: SiteIdentity
  ): Promise<RunSummary> {
    const { logger, primary, secondary, rateLimiter, action } = this.options;
    const summary: RunSummary = {
      state: 'Done',
      total: rows.length,
      processed: 0,
      skipped: 0,
      results: [],
      outputWritten: false,
    };

    for (const [index, row] of rows.entries()) {
      const url = (row[URL_COLUMN] ?? '').trim();
      if (!url) {
        summary.skipped++;
        logger.warn(`Skipping empty URL in row ${index + 1}`);
        continue;
      }

      logger.info(`Processing URL [${summary.processed + 1}/${rows.length}]: ${url}`);

      const primaryOutcome = await primary.submit(identity.accountId, identity.hostId, url);
      const secondaryOutcome = await secondary.submit(url, action);

      summary.results.push({
        url,
        primaryStatus: primaryOutcome.status,
        primaryError: primaryOutcome.errorDetail,
        secondaryStatus: secondaryOutcome.status,
        secondaryError: secondaryOutcome.errorDetail,
      });
      summary.processed++;
      logger.info(
        `Result: Primary - ${primaryOutcome.status}, Secondary - ${secondaryOutcome.status}`
      );

      if (index < rows.length - 1) {
        await rateLimiter.wait();
      }
    }

    return summary;
  }

  /**
   * @param inputPath Path of the input table.
   * @returns An error when the path is missing or not a regular file.
   */
  private async checkInputFile(inputPath: string): Promise<InputError | undefined> {
    try {
      const stats = await stat(inputPath);
      if (!stats.isFile()) {
        return new InputError(`Input path is not a file: ${inputPath}`);
      }
      return undefined;
    } catch (error) {
      return new InputError(`Input file not found: ${inputPath}`, { cause: error });
    }
  }

  /**
   * Logs the reason and builds an empty `Aborted` summary. Errors outside the
   * {@link ReindexError} family are wrapped so the summary always carries one.
   * @param error What stopped the run.
   */
  private abort(error: unknown): RunSummary {
    const reason =
      error instanceof ReindexError
        ? error
        : new ReindexError(describeFailure(error), { cause: error });
    this.options.logger.error(`Run aborted: ${reason.message}`);

    return {
      state: 'Aborted',
      error: reason,
      total: 0,
      processed: 0,
      skipped: 0,
      results: [],
      outputWritten: false,
    };
  }
}
