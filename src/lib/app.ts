import { BatchOrchestrator, type RunSummary } from './BatchOrchestrator.js';
import { type AppConfig, loadConfig } from './config.js';
import { IdentityResolver } from './IdentityResolver.js';
import { ConfigurationError, describeFailure } from './errors.js';
import { Logger, consoleSink, openFileSink } from './Logger.js';
import { PrimarySubmitter } from './PrimarySubmitter.js';
import { FixedDelayRateLimiter, type RateLimiter } from './RateLimiter.js';
import {
  SecondarySubmitter,
  ServiceAccountTokenProvider,
  type TokenProvider,
} from './SecondarySubmitter.js';

export interface ReindexRunOptions {
  inputPath: string;
  outputPath: string;
  /** Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** Overrides the service account token source. */
  tokens?: TokenProvider;
  /** Overrides the fixed delay built from `REQUEST_DELAY_MS`. */
  rateLimiter?: RateLimiter;
  /** Overrides the console + file logger built from the configuration. */
  logger?: Logger;
}

/**
 * Builds the collaborators from a validated configuration.
 */
export function createOrchestrator(
  config: AppConfig,
  logger: Logger,
  overrides: Pick<ReindexRunOptions, 'tokens' | 'rateLimiter'> = {}
): BatchOrchestrator {
  const primaryApi = {
    apiBase: config.yandex.apiBase,
    token: config.yandex.token,
    timeoutMs: config.requestTimeoutMs,
  };

  return new BatchOrchestrator({
    identity: new IdentityResolver(primaryApi, config.siteUrl, logger),
    primary: new PrimarySubmitter(primaryApi, logger),
    secondary: new SecondarySubmitter(
      {
        apiBase: config.google.apiBase,
        tokens:
          overrides.tokens ??
          new ServiceAccountTokenProvider(config.google.serviceAccountFile),
        timeoutMs: config.requestTimeoutMs,
      },
      logger
    ),
    rateLimiter:
      overrides.rateLimiter ?? new FixedDelayRateLimiter(config.requestDelayMs),
    logger,
    action: config.google.notificationType,
  });
}

/**
 * Loads the configuration and runs one batch.
 * Throws {@link ConfigurationError} before any work when settings are invalid.
 */
export async function runReindex(options: ReindexRunOptions): Promise<RunSummary> {
  const config = loadConfig(options.env);

  if (options.logger) {
    return createOrchestrator(config, options.logger, options).run(
      options.inputPath,
      options.outputPath
    );
  }

  const file = await openFileSink(config.logFile).catch((error: unknown) => {
    throw new ConfigurationError(
      `Cannot open log file ${config.logFile}: ${describeFailure(error)}`,
      { cause: error }
    );
  });
  const logger = new Logger([consoleSink(), file.write], config.logLevel);
  try {
    logger.info('Starting URL reindex');
    const summary = await createOrchestrator(config, logger, options).run(
      options.inputPath,
      options.outputPath
    );
    logger.info('Reindex finished');
    return summary;
  } finally {
    await file.close();
  }
}
