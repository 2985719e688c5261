import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import fg from 'fast-glob';
import {
  GitRepository,
  analyzeCommitCalls,
  analyzeSnapshotCalls,
  languageOf,
  parseFunctions,
  readFunctionNames,
  toPairCallRecord,
  toSnapshotCallRecord,
  writeJSONL,
} from '@funcdelta/core';
import type { GrammarRegistry, PairCallRecord, SnapshotCallRecord } from '@funcdelta/core';
import { readFile } from 'fs/promises';
import { resolve } from 'path';

interface CallsCommandOptions {
  repo: string;
  functions?: string[];
  fromJsonl?: string;
  fromFiles?: string[];
  commit: string;
  compare?: boolean;
  output: string;
}

/** Expand the glob patterns among `inputs`; plain paths pass through as given. */
export async function expandFilePatterns(inputs: string[]): Promise<string[]> {
  const paths: string[] = [];

  for (const input of inputs) {
    if (fg.isDynamicPattern(input)) {
      const matches = await fg(input, { dot: false, onlyFiles: true });
      paths.push(...matches.sort());
    } else {
      paths.push(input);
    }
  }

  return paths;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Function names declared in local source files. Missing, unreadable,
 * binary and unsupported files are reported and skipped.
 */
export async function collectNamesFromFiles(
  registry: GrammarRegistry,
  filePaths: string[],
): Promise<string[]> {
  const names: string[] = [];

  for (const filePath of await expandFilePatterns(filePaths)) {
    const language = languageOf(filePath);
    if (language === null) {
      console.error(chalk.yellow(`Warning: unsupported file type ${filePath}`));
      continue;
    }

    let data: Buffer;
    try {
      data = await readFile(resolve(filePath));
    } catch (err) {
      console.error(
        chalk.yellow(`Warning: cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`),
      );
      continue;
    }

    let content: string;
    try {
      content = utf8.decode(data);
    } catch {
      console.error(chalk.yellow(`Warning: skipping binary file ${filePath}`));
      continue;
    }

    names.push(...parseFunctions(registry, content, language, filePath).map((fn) => fn.name));
  }

  return names;
}

function average(total: number, count: number): string {
  return (count === 0 ? 0 : total / count).toFixed(1);
}

export function formatSnapshotSummary(records: SnapshotCallRecord[]): string {
  const callees = records.reduce((sum, r) => sum + r.callees.length, 0);
  const callers = records.reduce((sum, r) => sum + r.callers.length, 0);

  const lines: string[] = [];
  lines.push(chalk.bold('Summary'));
  lines.push(`  Functions analyzed: ${records.length}`);
  lines.push(`  Total callees found: ${callees}`);
  lines.push(`  Total callers found: ${callers}`);
  if (records.length > 0) {
    lines.push(`  Average callees per function: ${average(callees, records.length)}`);
    lines.push(`  Average callers per function: ${average(callers, records.length)}`);
  }

  return lines.join('\n');
}

export function formatPairSummary(records: PairCallRecord[]): string {
  const total = (pick: (r: PairCallRecord) => unknown[]): number =>
    records.reduce((sum, r) => sum + pick(r).length, 0);

  const lines: string[] = [];
  lines.push(chalk.bold('Summary'));
  lines.push(`  Functions analyzed: ${records.length}`);
  lines.push(
    `  Before - callees: ${total((r) => r.before_fix.callees)}, callers: ${total((r) => r.before_fix.callers)}`,
  );
  lines.push(
    `  After - callees: ${total((r) => r.after_fix.callees)}, callers: ${total((r) => r.after_fix.callers)}`,
  );
  lines.push(
    `  Callees - ${chalk.green('+' + total((r) => r.changes.added_callees))} ` +
      `${chalk.red('-' + total((r) => r.changes.removed_callees))}`,
  );
  lines.push(
    `  Callers - ${chalk.green('+' + total((r) => r.changes.added_callers))} ` +
      `${chalk.red('-' + total((r) => r.changes.removed_callers))}`,
  );

  return lines.join('\n');
}

function describeTargets(names: string[]): string {
  const shown = names.slice(0, 5).join(', ');
  return names.length > 5 ? `${shown} and ${names.length - 5} more` : shown;
}

export function registerCallsCommand(program: Command, registry: GrammarRegistry): void {
  program
    .command('calls')
    .description('Find the callees and callers of functions across a repository')
    .option('--repo <path>', 'Path to a local clone', process.cwd())
    .option('--functions <names...>', 'Function names to analyze')
    .option('--from-jsonl <file>', 'Read function names from an extract JSONL file')
    .option('--from-files <files...>', 'Analyze every function defined in these local files (globs allowed)')
    .option('--commit <ref>', 'Commit whose tree is analyzed', 'HEAD')
    .option('--compare', 'Compare the commit against its parent')
    .option('--output <file>', 'Output JSONL file', 'function_call_analysis.jsonl')
    .action(async (opts: CallsCommandOptions) => {
      const sources = [opts.functions, opts.fromJsonl, opts.fromFiles].filter(
        (source) => source !== undefined,
      );
      if (sources.length !== 1) {
        console.error(
          chalk.red('Specify exactly one of --functions, --from-jsonl or --from-files'),
        );
        process.exit(1);
        return;
      }

      const spinner = ora({ text: 'Collecting target functions...', stream: process.stderr });
      try {
        let names: string[];
        if (opts.functions) {
          names = opts.functions;
        } else if (opts.fromJsonl) {
          names = readFunctionNames(await readFile(resolve(opts.fromJsonl), 'utf-8'));
        } else {
          names = await collectNamesFromFiles(registry, opts.fromFiles ?? []);
        }

        names = [...new Set(names)];
        if (names.length === 0) {
          console.log(chalk.yellow('No functions found to analyze'));
          return;
        }

        spinner.start(`Analyzing ${names.length} functions: ${describeTargets(names)}`);
        const repo = new GitRepository(resolve(opts.repo));
        const output = resolve(opts.output);

        if (opts.compare) {
          const commit = await repo.resolveCommit(opts.commit);
          const results = await analyzeCommitCalls(repo, registry, names, commit, (message) => {
            spinner.text = message;
          });
          const records = [...results.values()].map(toPairCallRecord);
          await writeJSONL(output, records);
          spinner.stop();

          console.log(chalk.green(`Saved call analysis for ${records.length} functions to ${opts.output}`));
          console.log(formatPairSummary(records));
        } else {
          const results = await analyzeSnapshotCalls(repo, registry, names, opts.commit);
          const records = [...results.values()].map(toSnapshotCallRecord);
          await writeJSONL(output, records);
          spinner.stop();

          console.log(chalk.green(`Saved call analysis for ${records.length} functions to ${opts.output}`));
          console.log(formatSnapshotSummary(records));
        }
      } catch (err) {
        spinner.fail('Call analysis failed');
        console.error(
          chalk.red(err instanceof Error ? err.message : String(err)),
        );
        process.exit(2);
      }
    });
}
