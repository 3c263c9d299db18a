import chalk from 'chalk';

// Diagnostics go to stderr; stdout is reserved for command results.
const settings = {
  verbose: false,
  quiet: false,
};

export function configureLogger(options: { verbose?: boolean; quiet?: boolean }): void {
  settings.verbose = options.verbose ?? false;
  settings.quiet = options.quiet ?? false;
}

export const logger = {
  info(msg: string): void {
    if (settings.quiet) return;
    console.error(msg);
  },

  success(msg: string): void {
    if (settings.quiet) return;
    console.error(chalk.green(msg));
  },

  warn(msg: string): void {
    console.error(chalk.yellow(msg));
  },

  error(msg: string): void {
    console.error(chalk.red(msg));
  },

  debug(msg: string): void {
    if (!settings.verbose) return;
    console.error(chalk.gray(`[debug] ${msg}`));
  },

  dim(msg: string): void {
    if (settings.quiet) return;
    console.error(chalk.dim(msg));
  },
};
