#!/usr/bin/env node

import { loadEnv } from './config/env.js';
import { loadSettings } from './config/settings.js';
import { REMOTE_DEFAULTS } from './config/constants.js';
import { CommandCredentialBroker, StaticCredentialBroker, TokenCache } from './auth/index.js';
import type { CredentialBroker } from './auth/index.js';
import { HttpQueryService } from './client/index.js';
import { runBatch, formatSummary, toJsonReport } from './batch/index.js';
import { parseCliArgs } from './cli-args.js';
import { ConfigurationError, QueryError } from './errors/index.js';
import { createStructuredLogger } from './observability/logger.js';
import { serialize } from './utils/file.js';
import { errorMessage } from './utils/type-guards.js';

const HELP = `
fleetquery - Run analytic queries across many workspaces and export the results

Usage:
  fleetquery --query <text> [--name <name>] [--query <text> ...] [options]

Options:
  --query <text>       Query to run on every selected target (repeatable)
  --name <name>        Name for the preceding --query; used as the output file name
  --targets <spec>     'all' (default), comma-separated id/name fragments, or a glob like 'prod-*'
  --output <dir>       Output folder (default: ./output)
  --config <file>      JSON settings file (supports env var references)
  --env <file>         Path to .env file (default: .env in current directory)
  --json               Print results to stdout as JSON
  --verbose            Enable debug logging
  --help, -h           Show this help message

Environment Variables:
  FLEETQUERY_<OPTION>  Any setting, e.g. FLEETQUERY_RETRY_COUNT=2, FLEETQUERY_EXPORT_JSON=true
  FLEETQUERY_ACCESS_TOKEN  Use a fixed bearer token instead of 'az account get-access-token'

Examples:
  fleetquery --query "SigninLogs | take 100" --name "Sign-ins" --targets prod-*
  fleetquery --query "Heartbeat | summarize count() by Computer" --json > report.json
`;

async function main() {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help || options.queries.length === 0) {
    console.log(HELP);
    process.exit(options.help ? 0 : 1);
  }

  loadEnv({ envFile: options.env });
  const settings = loadSettings({
    file: options.config,
    overrides: {
      output_folder: options.output,
      log_level: options.verbose ? 'debug' : undefined,
    },
  });

  const logger = createStructuredLogger({ prefix: 'fleetquery', level: settings.log_level });

  const broker: CredentialBroker = settings.access_token
    ? new StaticCredentialBroker(settings.access_token)
    : new CommandCredentialBroker();
  const tokens = new TokenCache(broker, {
    policies: { [REMOTE_DEFAULTS.QUERY_SCOPE]: 'cache', [REMOTE_DEFAULTS.MANAGEMENT_SCOPE]: 'cache' },
    logger,
  });
  const service = new HttpQueryService({
    tokens,
    validationIntervalMs: settings.validation_interval * 1000,
    logger,
  });

  const result = await runBatch({
    service,
    queries: options.queries,
    selection: options.targets,
    settings,
    logger,
    callbacks: {
      onStart: ({ queries, targets }) => {
        console.error(
          `Executing ${queries} ${queries === 1 ? 'query' : 'queries'} across ${targets.length} ${
            targets.length === 1 ? 'target' : 'targets'
          }...`
        );
      },
      onJobFinished: (job) => {
        const status = job.status === 'completed' ? '✓' : '✗';
        const detail = job.result ? `${job.result.rowCount} rows` : job.error?.shortLabel();
        console.error(`  ${status} ${job.target.name} [${job.settings.jobName}] ${detail ?? ''}`);
      },
    },
  });

  if (options.json) {
    process.stdout.write(`${serialize(toJsonReport(result.results))}\n`);
  } else {
    console.error(`\n${formatSummary(result)}`);
  }

  process.exitCode = result.exitCode;
}

main().catch((error: unknown) => {
  if (error instanceof QueryError) {
    console.error(`Error: ${error.describe()}`);
  } else if (error instanceof ConfigurationError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error(`Error: ${errorMessage(error)}`);
  }
  process.exit(1);
});
