#!/usr/bin/env node
/**
 * Flight Report CLI
 *
 * Searches every configured destination × date × trip type, renders the
 * HTML report and emails it. Settings come from the environment (and a
 * local .env file).
 *
 * Usage:
 *   npx ts-node src/cli/flight-report.ts
 *   npx ts-node src/cli/flight-report.ts --save-fixtures
 *   npx ts-node src/cli/flight-report.ts --mock --out report.html
 *   npm run report -- --mock
 */

import * as dotenv from 'dotenv';
import { loadConfig, type Env } from '../config';
import { runFlightReport } from '../report/pipeline';
import { EmailService, type ReportMailer } from '../services/email-service';
import { FileReportWriter } from '../services/file-report-writer';
import { SerpApiClient } from '../services/serpapi-client';
import { toError } from '../types';

const HELP = `
Flight Report CLI - Daily flight price report by email

Usage:
  npx ts-node src/cli/flight-report.ts [options]

Options:
  --mock              Replay saved fixtures instead of calling SerpApi (MOCK_MODE=1)
  --save-fixtures     Save every live response to the fixtures directory (SAVE_FIXTURES=1)
  --out <file>        Write the HTML report to a file instead of emailing it
  --help              Show this help message

Environment:
  SERPAPI_KEY                 API key (required unless --mock)
  ORIGIN                      Origin airport (default: YYZ)
  DESTINATIONS                "Name=CODE,Name=CODE" (default: data/destinations.json)
  DEPARTURE_DATES             Comma-separated YYYY-MM-DD (default: DAYS_AHEAD 30,60,90)
  RETURN_DATES                Comma-separated YYYY-MM-DD (none: outbound only)
  TRIP_TYPES                  outbound,return,roundtrip
  SMTP_HOST, SMTP_PORT, SMTP_USER, SMTP_PASS, EMAIL_FROM, EMAIL_TO

Examples:
  # Capture responses once, then iterate on the report offline
  npx ts-node src/cli/flight-report.ts --save-fixtures --out report.html
  npx ts-node src/cli/flight-report.ts --mock --out report.html
`;

interface CliArgs {
  mock: boolean;
  saveFixtures: boolean;
  out?: string;
  help: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    mock: false,
    saveFixtures: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--mock':
        result.mock = true;
        break;
      case '--save-fixtures':
        result.saveFixtures = true;
        break;
      case '--out': {
        const file = args[++i];
        if (!file) throw new Error('--out requires a file path');
        result.out = file;
        break;
      }
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg} (see --help)`);
    }
  }

  return result;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP);
    return;
  }

  dotenv.config();

  const env: Env = { ...process.env };
  if (args.mock) env.MOCK_MODE = '1';
  if (args.saveFixtures) env.SAVE_FIXTURES = '1';

  const config = loadConfig(env);
  const mailer: ReportMailer = args.out ? new FileReportWriter(args.out) : new EmailService(config.smtp);

  process.exitCode = await runFlightReport(config, {
    searchClient: SerpApiClient.fromConfig(config),
    mailer,
  });
}

main().catch(err => {
  console.error('Error:', toError(err).message);
  process.exit(1);
});
