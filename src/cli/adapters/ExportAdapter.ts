/**
 * Export Adapter - runs a backend export from the command line
 * Loads config, authenticates, walks the controller and writes the CSV file
 */

import { Logger } from 'winston';
import { createBackendExtractor } from '../../core/engine/BackendExtractor';
import { ExtractionSummary } from '../../core/engine/interfaces';
import { AuthError, ConfigError, TransportError } from '../../core/errors';
import { createConfigValidator, RawConfig } from '../../core/validators/ConfigValidator';
import { ControllerAuthenticator } from '../clients/ControllerAuthenticator';
import { ControllerClient } from '../clients/ControllerClient';
import { ControllerTransport, FetchFunction } from '../clients/ControllerTransport';
import { applyEnvFallbacks, loadConfigFile } from '../config/ConfigLoader';
import { createLogger } from '../logging/logger';
import { CsvBackendWriter } from '../writers/CsvBackendWriter';

export interface ExportOptions {
  config: string;
  output?: string;
  skipThreadTasks?: boolean;
  continueOnError?: boolean;
  quoteFields?: boolean;
  logFile?: string;
  verbose?: boolean;
  color?: boolean;
}

export interface ExportDependencies {
  logger?: Logger;
  fetch?: FetchFunction;
  env?: NodeJS.ProcessEnv;
}

export const EXIT_CODES = {
  failure: 1,
  config: 2,
  auth: 3,
  transport: 4,
} as const;

const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143,
} as const;

export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) {
    return EXIT_CODES.config;
  }
  if (error instanceof AuthError) {
    return EXIT_CODES.auth;
  }
  if (error instanceof TransportError) {
    return EXIT_CODES.transport;
  }
  return EXIT_CODES.failure;
}

/**
 * Command-line flags win over config file entries
 */
export function applyOverrides(config: RawConfig, options: ExportOptions): RawConfig {
  const merged: RawConfig = { ...config };

  if (options.output) {
    merged.output_file = options.output;
  }
  if (options.skipThreadTasks) {
    merged.skip_thread_tasks = true;
  }
  if (options.continueOnError) {
    merged.continue_on_error = true;
  }
  if (options.quoteFields) {
    merged.quote_fields = true;
  }

  return merged;
}

export class ExportAdapter {
  private writer?: CsvBackendWriter;

  constructor(private readonly deps: ExportDependencies = {}) {}

  /**
   * Main export execution; sets the process exit code on failure
   */
  async execute(options: ExportOptions): Promise<void> {
    const logger =
      this.deps.logger ??
      createLogger({ verbose: options.verbose, color: options.color, logFile: options.logFile });
    const removeSignalHandlers = this.installSignalHandlers(logger);

    try {
      await this.run(options, logger);
    } catch (error) {
      logger.error(error instanceof Error ? error.message : `Export failed: ${error}`);
      process.exitCode = exitCodeFor(error);
    } finally {
      removeSignalHandlers();
    }
  }

  /**
   * Run one export; errors propagate after the output file is closed
   */
  async run(options: ExportOptions, logger: Logger): Promise<ExtractionSummary> {
    const raw = applyOverrides(
      applyEnvFallbacks(await loadConfigFile(options.config), this.deps.env ?? process.env),
      options
    );
    const config = createConfigValidator().resolve(raw);

    logger.info('Running backend exporter');
    logger.info(`Using controller URL: ${config.url}`);
    logger.info(`Using application name regex: ${config.applicationNames}`);
    logger.info(`Using backend type regex: ${config.backendType}`);
    if (config.skipThreadTasks) {
      logger.info('Skipping thread task search');
    }

    const transport = new ControllerTransport({
      url: config.url,
      proxy: config.proxy,
      timeout: config.requestTimeoutMs,
      fetch: this.deps.fetch,
    });
    const auth = await new ControllerAuthenticator(
      transport,
      { account: config.account, user: config.apiUser },
      config.credential,
      logger
    ).authenticate();

    const writer = new CsvBackendWriter(config.outputFile, { quoteFields: config.quoteFields });
    this.writer = writer;

    try {
      await writer.open();
      const extractor = createBackendExtractor(new ControllerClient(transport, auth), config, logger);
      const summary = await extractor.extract(writer);

      logger.info(
        `Exported ${summary.backends} backends from ${summary.tiers} tiers of ` +
          `${summary.applications} applications to ${config.outputFile}`
      );
      if (summary.failedApplications.length > 0) {
        logger.warn(`Failed applications: ${summary.failedApplications.join(', ')}`);
      }
      return summary;
    } finally {
      this.writer = undefined;
      await writer.close();
    }
  }

  /**
   * Close the output file before exiting on SIGINT/SIGTERM
   */
  private installSignalHandlers(logger: Logger): () => void {
    const onSignal = (signal: keyof typeof SIGNAL_EXIT_CODES) => () => {
      logger.warn(`Received ${signal}, stopping export`);

      const writer = this.writer;
      this.writer = undefined;
      (writer ? writer.close() : Promise.resolve())
        .catch(error => logger.error(`Could not close output file: ${error}`))
        .finally(() => process.exit(SIGNAL_EXIT_CODES[signal]));
    };
    const onInterrupt = onSignal('SIGINT');
    const onTerminate = onSignal('SIGTERM');

    process.once('SIGINT', onInterrupt);
    process.once('SIGTERM', onTerminate);

    return () => {
      process.removeListener('SIGINT', onInterrupt);
      process.removeListener('SIGTERM', onTerminate);
    };
  }
}
