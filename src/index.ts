#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, parseQ3Policy } from './core/config.js';
import { loadFactSetFile } from './core/fact-loader.js';
import { FactSetError, ConfigError } from './core/errors.js';
import { reconstructFactSet, periodsFor } from './processing/engine.js';
import { parseDateConstraints } from './processing/date-filter.js';
import { classifyDerivability, DERIVABILITY_RULE_DESCRIPTIONS } from './processing/derivability.js';
import { classifyPeriod, durationDays } from './processing/period-classifier.js';
import { renderTable } from './output/table-renderer.js';
import { renderJson } from './output/json-renderer.js';
import { renderCsv } from './output/csv-renderer.js';
import { padRight, type ScaleChoice } from './output/format-utils.js';
import type { NatureFilter, PeriodFilter } from './core/types.js';

interface ReconstructOptions {
  raw?: boolean;
  json?: boolean;
  csv?: boolean;
  q3Policy?: string;
  round: boolean;
  quarterly?: boolean;
  yearly?: boolean;
  instant?: boolean;
  flow?: boolean;
  concept?: string[];
  date?: string[];
  scale: string;
  verbose?: boolean;
}

const SCALE_CHOICES: ScaleChoice[] = ['auto', 'B', 'M', 'K', 'none'];

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

function reportError(err: unknown): never {
  if (err instanceof FactSetError || err instanceof ConfigError) {
    fail(err.message);
  }
  fail(`Error: ${err instanceof Error ? err.message : String(err)}`);
}

function parseScale(value: string): ScaleChoice {
  const match = SCALE_CHOICES.find(s => s === value);
  if (!match) fail(`Unknown scale "${value}". Use one of: ${SCALE_CHOICES.join(', ')}`);
  return match;
}

function runReconstruct(file: string, options: ReconstructOptions): void {
  try {
    if (options.quarterly && options.yearly) fail('--quarterly and --yearly are mutually exclusive.');
    if (options.instant && options.flow) fail('--instant and --flow are mutually exclusive.');
    if (options.json && options.csv) fail('--json and --csv are mutually exclusive.');

    const config = loadConfig();
    const q3Policy = options.q3Policy ? parseQ3Policy(options.q3Policy) : config.q3Policy;
    const periodFilter: PeriodFilter = options.quarterly ? 'quarterly' : options.yearly ? 'yearly' : 'all';
    const nature: NatureFilter = options.instant ? 'instant' : options.flow ? 'flow' : 'all';
    const scale = parseScale(options.scale);
    const dates = parseDateConstraints(options.date);

    const factSet = loadFactSetFile(file);
    const result = reconstructFactSet(factSet, {
      mode: options.raw ? 'raw' : 'derived',
      q3Policy,
      roundDerived: options.round && config.roundDerived,
      concepts: options.concept,
      nature,
      dates,
    });

    if (options.verbose && result.skipped.length > 0) {
      for (const s of result.skipped) {
        console.error(chalk.dim(`skipped ${s.fact.concept} ${s.fact.fiscal_period} FY${s.fact.fiscal_year} (${s.reason})`));
      }
    }

    if (result.tables.length === 0) {
      console.error(chalk.yellow('Note: no consolidated facts matched the filters.'));
    }

    const periods = periodsFor(periodFilter);
    if (options.json) {
      console.log(renderJson(result, periods));
    } else if (options.csv) {
      console.log(renderCsv(result, periods));
    } else {
      console.log('');
      console.log(renderTable(result, { periods, scale, verbose: options.verbose ?? false }));
      console.log('');
    }
  } catch (err) {
    reportError(err);
  }
}

const program = new Command();

program
  .name('xbrl-quarters')
  .description('Reconstruct consistent quarterly series from as-filed financial facts, with provenance')
  .version('0.1.0');

program
  .command('reconstruct')
  .alias('r')
  .description('Select and derive Q1-Q4/FY values for every concept and fiscal year in a fact set')
  .argument('<file>', 'JSON fact set ({ concepts: [...], facts: [...] })')
  .option('--raw', 'Only show as-filed values, no derivation')
  .option('-j, --json', 'Output as JSON instead of table')
  .option('--csv', 'Output as CSV')
  .option('--q3-policy <policy>', 'cumulative_first or direct_first')
  .option('--no-round', 'Do not round derived values to the filed precision')
  .option('-q, --quarterly', 'Show only Q1-Q4')
  .option('-y, --yearly', 'Show only FY')
  .option('-i, --instant', 'Only instant (balance sheet) concepts')
  .option('-f, --flow', 'Only duration (flow) concepts')
  .option('-c, --concept <concepts...>', 'Only these concepts')
  .option('-d, --date <constraints...>', "Filter facts by end date ('>2024-01-01', '<=2024-12-31')")
  .option('-s, --scale <scale>', 'auto, B, M, K or none', 'auto')
  .option('-v, --verbose', 'Explain every reconstructed value')
  .action((file: string, options: ReconstructOptions) => {
    runReconstruct(file, options);
  });

program
  .command('classify')
  .description('Show whether each concept in a fact set is derivable by subtraction or copy-only')
  .argument('<file>', 'JSON fact set')
  .option('-j, --json', 'Output as JSON')
  .action((file: string, options: { json?: boolean }) => {
    try {
      const factSet = loadFactSetFile(file);
      const rows = factSet.concepts.map(c => ({ concept: c.concept, ...classifyDerivability(c) }));

      if (options.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }

      console.log(chalk.bold('\nConcept Derivability\n'));
      for (const row of rows) {
        const label = row.derivability === 'derivable' ? chalk.green('derivable') : chalk.yellow('copy-only');
        console.log(`  ${chalk.cyan(padRight(row.concept, 60))} ${padRight(label, 10)} ${chalk.dim(DERIVABILITY_RULE_DESCRIPTIONS[row.rule])}`);
      }
      console.log('');
    } catch (err) {
      reportError(err);
    }
  });

program
  .command('period')
  .description('Classify a reporting interval (omit start for an instant)')
  .argument('<end>', 'End date (YYYY-MM-DD)')
  .argument('[start]', 'Start date (YYYY-MM-DD)')
  .action((end: string, start: string | undefined) => {
    const mode = classifyPeriod(start ?? null, end);
    const days = start ? durationDays(start, end) : null;
    console.log(days === null ? mode : `${mode} (${days} days)`);
  });

program.parse();
