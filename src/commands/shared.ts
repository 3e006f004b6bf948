import chalk from 'chalk';
import type { NetworkView, NetworkViewKind, TimelineView } from '../modules/pipeline/network-view.js';
import type { StatsReport } from '../modules/pipeline/report.js';
import { cell, formatRow, formatSummary, rowHeader } from '../utils/format.js';

export function parseIntOption(value: string, name: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`--${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function failAndExit(err: unknown): never {
  console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
}

export function printReport(report: StatsReport, title: string, limit: number): void {
  console.log(chalk.bold(`\n  ${title} (${report.years})`));
  console.log(chalk.dim(`  ${'═'.repeat(50)}`));
  for (const line of formatSummary(report.summary)) console.log(`  ${line}`);
  if (report.unmatchedSponsors > 0 || report.unmatchedCoSponsors > 0) {
    console.log(
      chalk.yellow(
        `  Unmatched: ${report.unmatchedSponsors} sponsor(s), ${report.unmatchedCoSponsors} co-sponsor(s)`,
      ),
    );
  }

  console.log(chalk.dim(`\n  ${rowHeader()}`));
  report.rows.slice(0, limit).forEach((row, i) => {
    const line = `  ${formatRow(row, i + 1)}`;
    console.log(row.enactedTotal > 0 ? chalk.green(line) : line);
  });
  if (report.rows.length > limit) {
    console.log(chalk.dim(`\n  ... ${report.rows.length - limit} more. Use --limit or --json for all rows.`));
  }

  console.log(chalk.dim(`\n  ${report.note}`));
  console.log(chalk.dim(`  Generated ${report.generatedAt}\n`));
}

export function printUnmatched(report: StatsReport, limit: number): void {
  if (report.unmatched.length === 0) {
    console.log(chalk.green('\n  Every name resolved.\n'));
    return;
  }

  // Same name seen on many bills collapses to one line with a count
  const counts = new Map<string, { rawName: string; chamber: string; seen: number }>();
  for (const entry of report.unmatched) {
    const key = `${entry.chamberHint ?? ''}|${entry.normalizedKey}`;
    const existing = counts.get(key);
    if (existing) existing.seen += 1;
    else counts.set(key, { rawName: entry.rawName, chamber: entry.chamberHint ?? '?', seen: 1 });
  }

  const sorted = [...counts.values()].sort((a, b) => b.seen - a.seen || a.rawName.localeCompare(b.rawName));
  console.log(chalk.bold(`\n  Unmatched names (${sorted.length} distinct, ${report.unmatched.length} total)`));
  for (const entry of sorted.slice(0, limit)) {
    console.log(`  ${chalk.cyan(String(entry.seen).padStart(4))}  ${entry.rawName} ${chalk.dim(`[${entry.chamber}]`)}`);
  }
  console.log('');
}

export function parseViewOption(value: string): NetworkViewKind {
  if (value === 'force' || value === 'edge-bundling') return value;
  throw new Error(`--view must be "force" or "edge-bundling", got "${value}"`);
}

export function printNetwork(view: NetworkView, title: string, limit: number): void {
  console.log(chalk.bold(`\n  ${title}: co-sponsorship network`));
  console.log(chalk.dim(`  ${'═'.repeat(50)}`));
  console.log(`  Members: ${view.nodes.length}  Links: ${view.links.length}  (at least ${view.minConnections} shared bills)`);
  if (view.links.length === 0) {
    console.log(chalk.yellow('\n  No pair reaches the threshold. Try a lower --min-connections.\n'));
    return;
  }

  const names = new Map(view.nodes.map(n => [n.id, `${n.name} (${n.party || '?'})`]));
  console.log('');
  for (const link of view.links.slice(0, limit)) {
    const a = cell(names.get(link.source) ?? link.source, 28);
    const b = cell(names.get(link.target) ?? link.target, 28);
    console.log(`  ${chalk.cyan(String(link.value).padStart(4))}  ${a}  ${b}`);
  }
  if (view.links.length > limit) {
    console.log(chalk.dim(`\n  ... ${view.links.length - limit} more. Use --limit or --json for all links.`));
  }
  console.log('');
}

export function printTimeline(view: TimelineView, title: string): void {
  console.log(chalk.bold(`\n  ${title}: bills filed and enacted by month`));
  console.log(chalk.dim(`  ${'═'.repeat(50)}`));
  if (view.months.length === 0) {
    console.log(chalk.yellow('\n  No dated bills stored for this session.\n'));
    return;
  }
  view.months.forEach((month, i) => {
    const filed = view.filed[i] ?? 0;
    const enacted = view.enacted[i] ?? 0;
    console.log(`  ${month}  ${cell(String(filed), 6, 'right')} filed  ${cell(String(enacted), 5, 'right')} enacted`);
  });
  console.log('');
}
