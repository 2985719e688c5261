import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  DEFAULT_EXTRACTION_OPTIONS,
  extractCommitFunctions,
  toExtractionRecord,
  writeJSONL,
} from '@funcdelta/core';
import type { FunctionChangeResult, GrammarRegistry } from '@funcdelta/core';
import { resolve } from 'path';
import { parsePositiveInt } from '../options.js';

interface ExtractCommandOptions {
  repo: string;
  output: string;
  callAnalysis: boolean;
  includeTests?: boolean;
  maxFunctionLines: number;
  maxChangedLines: number;
}

export function formatExtractionSummary(results: FunctionChangeResult[], output: string): string {
  const files = new Set(results.map((r) => r.filePath));
  const added = results.reduce((sum, r) => sum + r.diffStat.addedLines.length, 0);
  const deleted = results.reduce((sum, r) => sum + r.diffStat.deletedLines.length, 0);
  const analyzed = results.filter((r) => r.callAnalysis !== undefined).length;

  const lines: string[] = [];
  lines.push(
    chalk.green(`Saved ${results.length} function${results.length === 1 ? '' : 's'} to ${output}`),
  );
  lines.push('');
  lines.push(chalk.bold('Summary'));
  lines.push(`  Files with changed functions: ${files.size}`);
  lines.push(`  Lines added: ${added}, lines deleted: ${deleted}`);
  lines.push(`  Functions with call analysis: ${analyzed}`);

  return lines.join('\n');
}

export function registerExtractCommand(program: Command, registry: GrammarRegistry): void {
  program
    .command('extract')
    .description('Extract the functions whose bodies changed in a commit')
    .argument('<repo-url>', 'Repository URL, recorded in every result')
    .argument('<commit>', 'Commit to analyze (compared against its first parent)')
    .option('--repo <path>', 'Path to a local clone', process.cwd())
    .option('--output <file>', 'Output JSONL file', 'extracted_functions.jsonl')
    .option('--no-call-analysis', 'Skip callee/caller analysis')
    .option('--include-tests', 'Also analyze files whose path mentions "test"')
    .option(
      '--max-function-lines <n>',
      'Skip functions longer than this on either side',
      parsePositiveInt,
      DEFAULT_EXTRACTION_OPTIONS.maxFunctionLines,
    )
    .option(
      '--max-changed-lines <n>',
      'Skip functions with more added plus deleted lines than this',
      parsePositiveInt,
      DEFAULT_EXTRACTION_OPTIONS.maxChangedLines,
    )
    .action(async (repoUrl: string, commit: string, opts: ExtractCommandOptions) => {
      const spinner = ora({ text: 'Extracting changed functions...', stream: process.stderr }).start();
      try {
        const results = await extractCommitFunctions(
          {
            repoPath: resolve(opts.repo),
            repoUrl,
            commit,
            callAnalysis: opts.callAnalysis,
            skipTests: opts.includeTests !== true,
            maxFunctionLines: opts.maxFunctionLines,
            maxChangedLines: opts.maxChangedLines,
            onProgress: (message) => {
              spinner.text = message;
            },
          },
          registry,
        );

        await writeJSONL(resolve(opts.output), results.map(toExtractionRecord));
        spinner.stop();

        console.log(formatExtractionSummary(results, opts.output));
      } catch (err) {
        spinner.fail('Extraction failed');
        console.error(
          chalk.red(err instanceof Error ? err.message : String(err)),
        );
        process.exit(2);
      }
    });
}
