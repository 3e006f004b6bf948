import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../config.js';
import { ordinal } from '../utils/format.js';
import { createLogger } from '../utils/logger.js';
import { getDb } from '../modules/state/db.js';
import { IlgaFtpClient } from '../modules/sources/ilga-ftp.js';
import { buildStateStats } from '../modules/pipeline/state-stats.js';
import { createStatsCacheModel } from '../modules/state/models/stats-cache.js';
import { buildNetworkView, buildTimelineView } from '../modules/pipeline/network-view.js';
import { knownSessions } from '../modules/bills/state-xml.js';
import {
  failAndExit,
  parseIntOption,
  parseViewOption,
  printNetwork,
  printReport,
  printTimeline,
  printUnmatched,
} from './shared.js';

const DEFAULT_SESSION = String(knownSessions()[0]?.session ?? 104);

interface BuildOptions {
  session: string;
  full?: boolean;
  limit: string;
  json?: boolean;
}

interface ShowOptions {
  session: string;
  limit: string;
  json?: boolean;
}

interface NetworkOptions extends ShowOptions {
  minConnections: string;
  view: string;
}

export function registerStateCommand(program: Command): void {
  const state = program
    .command('state')
    .description('Illinois General Assembly sponsorship statistics');

  // ─── build ────────────────────────────────────────────────────────────
  state
    .command('build')
    .description('Fetch member lists and bill status XML, then rebuild the statistics')
    .option('--session <n>', 'General Assembly number', DEFAULT_SESSION)
    .option('--full', 'Refetch every bill instead of only new and pending ones')
    .option('--limit <n>', 'Rows to print', '25')
    .option('--json', 'Output the report as JSON')
    .action(async (opts: BuildOptions) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      const db = getDb(config.dbPath);
      const feed = new IlgaFtpClient({ root: config.ilFtpRoot, delayMs: config.requestDelayMs });
      const spinner = ora();

      try {
        const session = parseIntOption(opts.session, 'session');
        const limit = parseIntOption(opts.limit, 'limit');
        spinner.start(`Building statistics for the ${ordinal(session)} GA...`);

        const report = await buildStateStats(feed, db, {
          session,
          incremental: !opts.full,
          concurrency: config.ilMaxWorkers,
          onProgress: (done, total) => {
            spinner.text = `Fetching bills ${done}/${total}...`;
          },
        });
        spinner.succeed(`Built statistics for ${report.rows.length} legislators`);

        if (opts.json) {
          console.log(JSON.stringify(report, null, 2));
          return;
        }
        printReport(report, `Illinois ${ordinal(session)} General Assembly`, limit);
      } catch (err) {
        if (spinner.isSpinning) spinner.fail('Build failed');
        failAndExit(err);
      }
    });

  // ─── show ─────────────────────────────────────────────────────────────
  state
    .command('show')
    .description('Print the last built report for a session')
    .option('--session <n>', 'General Assembly number', DEFAULT_SESSION)
    .option('--limit <n>', 'Rows to print', '25')
    .option('--json', 'Output the report as JSON')
    .action((opts: ShowOptions) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const session = parseIntOption(opts.session, 'session');
        const report = createStatsCacheModel(getDb(config.dbPath)).get('state', session);
        if (!report) {
          console.log(chalk.yellow(`\n  No report for session ${session}. Run \`state build\` first.\n`));
          return;
        }
        if (opts.json) {
          console.log(JSON.stringify(report, null, 2));
          return;
        }
        printReport(report, `Illinois ${ordinal(session)} General Assembly`, parseIntOption(opts.limit, 'limit'));
      } catch (err) {
        failAndExit(err);
      }
    });

  // ─── unmatched ────────────────────────────────────────────────────────
  state
    .command('unmatched')
    .description('List sponsor names that did not resolve to a member')
    .option('--session <n>', 'General Assembly number', DEFAULT_SESSION)
    .option('--limit <n>', 'Names to print', '50')
    .action((opts: ShowOptions) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const session = parseIntOption(opts.session, 'session');
        const report = createStatsCacheModel(getDb(config.dbPath)).get('state', session);
        if (!report) {
          console.log(chalk.yellow(`\n  No report for session ${session}. Run \`state build\` first.\n`));
          return;
        }
        printUnmatched(report, parseIntOption(opts.limit, 'limit'));
      } catch (err) {
        failAndExit(err);
      }
    });

  // ─── network ──────────────────────────────────────────────────────────
  state
    .command('network')
    .description('Co-sponsorship network from the stored bills of a session')
    .option('--session <n>', 'General Assembly number', DEFAULT_SESSION)
    .option('--min-connections <n>', 'Shared bills a pair needs to be linked', '3')
    .option('--view <kind>', 'force or edge-bundling', 'force')
    .option('--limit <n>', 'Links to print', '25')
    .option('--json', 'Output the network as JSON')
    .action((opts: NetworkOptions) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const session = parseIntOption(opts.session, 'session');
        const view = buildNetworkView(getDb(config.dbPath), 'state', session, {
          minConnections: parseIntOption(opts.minConnections, 'min-connections'),
          view: parseViewOption(opts.view),
        });
        if (opts.json) {
          console.log(JSON.stringify(view, null, 2));
          return;
        }
        printNetwork(view, `Illinois ${ordinal(session)} General Assembly`, parseIntOption(opts.limit, 'limit'));
      } catch (err) {
        failAndExit(err);
      }
    });

  // ─── timeline ─────────────────────────────────────────────────────────
  state
    .command('timeline')
    .description('Bills filed and Public Acts enacted per month')
    .option('--session <n>', 'General Assembly number', DEFAULT_SESSION)
    .option('--json', 'Output the timeline as JSON')
    .action((opts: Omit<ShowOptions, 'limit'>) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const session = parseIntOption(opts.session, 'session');
        const view = buildTimelineView(getDb(config.dbPath), 'state', session);
        if (opts.json) {
          console.log(JSON.stringify(view, null, 2));
          return;
        }
        printTimeline(view, `Illinois ${ordinal(session)} General Assembly`);
      } catch (err) {
        failAndExit(err);
      }
    });

  // ─── sessions ─────────────────────────────────────────────────────────
  state
    .command('sessions')
    .description('List known sessions and when each was last built')
    .action(() => {
      const config = loadConfig();
      createLogger(config.logLevel);
      const cached = new Map(
        createStatsCacheModel(getDb(config.dbPath))
          .listSessions('state')
          .map(s => [s.session, s.generatedAt]),
      );

      console.log(chalk.bold('\n  Illinois General Assembly sessions'));
      knownSessions().forEach(({ session, years }, i) => {
        const built = cached.get(session);
        const current = i === 0 ? chalk.cyan(' (current)') : '';
        console.log(`  ${session}  ${years}${current}  ${built ? chalk.dim(`built ${built}`) : chalk.dim('not built')}`);
      });
      console.log('');
    });
}
