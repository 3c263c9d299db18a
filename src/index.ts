import { Command, InvalidArgumentError, Option } from 'commander';
import { reportCommand, type ReportOptions } from './commands/report.js';
import { relayCommand, type RelayOptions } from './commands/relay.js';
import {
  DEFAULT_RELAY_PORT,
  ENV,
  RATE_LIMIT_MAX,
  RATE_LIMIT_WINDOW_SECONDS,
  VERSION,
} from './constants.js';

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// Credentials shared by `report` (direct mode) and `relay`
function linearOptions(): Option[] {
  return [
    new Option('--api-key <key>', 'Linear API key').env(ENV.apiKey),
    new Option('--team-id <id>', 'Linear team ID (required for direct mode)').env(ENV.teamId),
    new Option('--project-id <id>', 'Linear project ID (required for direct mode)').env(ENV.projectId),
  ];
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('hotline')
    .description('File a bug report to Linear, directly or through a relay')
    .version(VERSION);

  const report = program
    .command('report <title>', { isDefault: true })
    .description('File a bug report and print the issue URL')
    .option('-d, --description <text>', 'Detailed description')
    .option('-i, --info <key=value>', 'Extra system info row (repeatable)', collect, [])
    .addOption(new Option('--proxy-url <url>', 'Relay URL to use instead of calling Linear directly').env(ENV.proxyUrl))
    .addOption(new Option('--proxy-token <token>', 'Bearer token for relay authentication').env(ENV.proxyToken))
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only print the issue URL');
  for (const opt of linearOptions()) report.addOption(opt);
  report.action(async (title: string, opts: ReportOptions) => {
    await reportCommand(title, opts);
  });

  const relay = program
    .command('relay')
    .description('Run a relay that files reports with server-held Linear credentials')
    .addOption(
      new Option('--port <port>', 'Port to listen on')
        .env(ENV.port)
        .argParser(parsePositiveInt)
        .default(DEFAULT_RELAY_PORT),
    )
    .option('--host <host>', 'Interface to bind')
    .addOption(new Option('--token <token>', 'Require this bearer token from callers').env(ENV.relayToken))
    .option('--rate-limit <count>', 'Reports allowed per IP per window', parsePositiveInt, RATE_LIMIT_MAX)
    .option('--no-rate-limit', 'Disable per-IP rate limiting')
    .option('--rate-window <seconds>', 'Rate limit window in seconds', parsePositiveInt, RATE_LIMIT_WINDOW_SECONDS)
    .option('--trust-proxy', 'Take the client IP from X-Forwarded-For (only behind a trusted proxy)')
    .option('--verbose', 'Show debug output');
  for (const opt of linearOptions()) relay.addOption(opt);
  relay.action(async (opts: RelayOptions) => {
    await relayCommand(opts);
  });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await buildProgram().parseAsync(argv);
}
