import { createReporter, resolveReporterConfig, type ReporterInput } from '../core/reporter-config.js';
import { ConfigError, describeError, isReportError } from '../core/errors.js';
import { collectSystemInfo, parseInfoEntries } from '../utils/system-info.js';
import { configureLogger, logger } from '../utils/logger.js';

export interface ReportOptions extends ReporterInput {
  description?: string;
  info?: string[];
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * File one bug report and print the created issue's URL on stdout.
 */
export async function reportCommand(title: string, options: ReportOptions): Promise<void> {
  configureLogger({ verbose: options.verbose, quiet: options.quiet });

  try {
    const config = resolveReporterConfig(options);
    const systemInfo = [...collectSystemInfo(), ...parseInfoEntries(options.info ?? [])];

    logger.debug(config.mode === 'proxy' ? `Reporting via relay: ${config.url}` : 'Reporting directly to Linear');
    const url = await createReporter(config).createIssue(title, options.description, systemInfo);

    process.stdout.write(`${url}\n`);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(`Error: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    if (isReportError(err)) {
      logger.error(describeError(err));
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}
