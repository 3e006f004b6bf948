import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../config.js';
import { ordinal } from '../utils/format.js';
import { createLogger } from '../utils/logger.js';
import { getDb } from '../modules/state/db.js';
import { CongressApi } from '../modules/sources/congress-api.js';
import { buildNationalStats, congressYears } from '../modules/pipeline/national-stats.js';
import { buildNetworkView, buildTimelineView } from '../modules/pipeline/network-view.js';
import { createStatsCacheModel } from '../modules/state/models/stats-cache.js';
import {
  failAndExit,
  parseIntOption,
  parseViewOption,
  printNetwork,
  printReport,
  printTimeline,
  printUnmatched,
} from './shared.js';

const DEFAULT_CONGRESS = '119';

interface BuildOptions {
  congress: string;
  full?: boolean;
  bulkDir?: string;
  bulk: boolean;
  limit: string;
  json?: boolean;
}

interface ShowOptions {
  congress: string;
  limit: string;
  json?: boolean;
}

interface NetworkOptions extends ShowOptions {
  minConnections: string;
  view: string;
}

export function registerCongressCommand(program: Command): void {
  const congress = program
    .command('congress')
    .description('U.S. Congress sponsorship statistics from Congress.gov');

  // ─── build ────────────────────────────────────────────────────────────
  congress
    .command('build')
    .description('Fetch bills, co-sponsors and laws, then rebuild the statistics')
    .option('--congress <n>', 'Congress number', DEFAULT_CONGRESS)
    .option('--full', 'Refetch every bill instead of only new and pending ones')
    .option('--bulk-dir <dir>', 'Bill Status bulk XML directory (defaults to BULK_BILL_STATUS_DIR)')
    .option('--no-bulk', 'Ignore bulk XML and use the API for every bill')
    .option('--limit <n>', 'Rows to print', '25')
    .option('--json', 'Output the report as JSON')
    .action(async (opts: BuildOptions) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      if (!config.congressApiKey) {
        console.error(chalk.red('Error: CONGRESS_API_KEY is required. Set it in .env'));
        process.exit(1);
      }

      const db = getDb(config.dbPath);
      const api = new CongressApi(config.congressApiKey, {
        baseUrl: config.congressApiRoot,
        delayMs: config.requestDelayMs,
      });
      const spinner = ora();

      try {
        const number = parseIntOption(opts.congress, 'congress');
        const limit = parseIntOption(opts.limit, 'limit');
        spinner.start(`Building statistics for the ${ordinal(number)} Congress...`);

        const report = await buildNationalStats(api, db, {
          congress: number,
          incremental: !opts.full,
          concurrency: config.detailWorkers,
          bulkDir: opts.bulk ? opts.bulkDir ?? config.bulkBillStatusDir : null,
          onProgress: (done, total) => {
            spinner.text = `Collecting bills ${done}/${total}...`;
          },
        });
        spinner.succeed(`Built statistics for ${report.rows.length} members`);

        if (opts.json) {
          console.log(JSON.stringify(report, null, 2));
          return;
        }
        printReport(report, `${ordinal(number)} Congress`, limit);
      } catch (err) {
        if (spinner.isSpinning) spinner.fail('Build failed');
        failAndExit(err);
      }
    });

  // ─── show ─────────────────────────────────────────────────────────────
  congress
    .command('show')
    .description('Print the last built report for a congress')
    .option('--congress <n>', 'Congress number', DEFAULT_CONGRESS)
    .option('--limit <n>', 'Rows to print', '25')
    .option('--json', 'Output the report as JSON')
    .action((opts: ShowOptions) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const number = parseIntOption(opts.congress, 'congress');
        const report = createStatsCacheModel(getDb(config.dbPath)).get('national', number);
        if (!report) {
          console.log(chalk.yellow(`\n  No report for the ${ordinal(number)} Congress. Run \`congress build\` first.\n`));
          return;
        }
        if (opts.json) {
          console.log(JSON.stringify(report, null, 2));
          return;
        }
        printReport(report, `${ordinal(number)} Congress`, parseIntOption(opts.limit, 'limit'));
      } catch (err) {
        failAndExit(err);
      }
    });

  // ─── unmatched ────────────────────────────────────────────────────────
  congress
    .command('unmatched')
    .description('List co-sponsor ids missing from the member directory')
    .option('--congress <n>', 'Congress number', DEFAULT_CONGRESS)
    .option('--limit <n>', 'Names to print', '50')
    .action((opts: ShowOptions) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const number = parseIntOption(opts.congress, 'congress');
        const report = createStatsCacheModel(getDb(config.dbPath)).get('national', number);
        if (!report) {
          console.log(chalk.yellow(`\n  No report for the ${ordinal(number)} Congress. Run \`congress build\` first.\n`));
          return;
        }
        printUnmatched(report, parseIntOption(opts.limit, 'limit'));
      } catch (err) {
        failAndExit(err);
      }
    });

  // ─── network ──────────────────────────────────────────────────────────
  congress
    .command('network')
    .description('Co-sponsorship network from the stored bills of a congress')
    .option('--congress <n>', 'Congress number', DEFAULT_CONGRESS)
    .option('--min-connections <n>', 'Shared bills a pair needs to be linked', '3')
    .option('--view <kind>', 'force or edge-bundling', 'force')
    .option('--limit <n>', 'Links to print', '25')
    .option('--json', 'Output the network as JSON')
    .action((opts: NetworkOptions) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const number = parseIntOption(opts.congress, 'congress');
        const view = buildNetworkView(getDb(config.dbPath), 'national', number, {
          minConnections: parseIntOption(opts.minConnections, 'min-connections'),
          view: parseViewOption(opts.view),
        });
        if (opts.json) {
          console.log(JSON.stringify(view, null, 2));
          return;
        }
        printNetwork(view, `${ordinal(number)} Congress`, parseIntOption(opts.limit, 'limit'));
      } catch (err) {
        failAndExit(err);
      }
    });

  // ─── timeline ─────────────────────────────────────────────────────────
  congress
    .command('timeline')
    .description('Bills introduced and enacted per month')
    .option('--congress <n>', 'Congress number', DEFAULT_CONGRESS)
    .option('--json', 'Output the timeline as JSON')
    .action((opts: Omit<ShowOptions, 'limit'>) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const number = parseIntOption(opts.congress, 'congress');
        const view = buildTimelineView(getDb(config.dbPath), 'national', number);
        if (opts.json) {
          console.log(JSON.stringify(view, null, 2));
          return;
        }
        printTimeline(view, `${ordinal(number)} Congress`);
      } catch (err) {
        failAndExit(err);
      }
    });

  // ─── sessions ─────────────────────────────────────────────────────────
  congress
    .command('sessions')
    .description('List congresses with a built report')
    .action(() => {
      const config = loadConfig();
      createLogger(config.logLevel);
      const built = createStatsCacheModel(getDb(config.dbPath)).listSessions('national');

      if (built.length === 0) {
        console.log(chalk.yellow('\n  No congress has been built yet. Run `congress build` first.\n'));
        return;
      }

      console.log(chalk.bold('\n  Built congresses'));
      for (const { session, generatedAt } of built) {
        console.log(`  ${session}  ${congressYears(session)}  ${chalk.dim(`built ${generatedAt}`)}`);
      }
      console.log('');
    });
}
