import { sortConfig } from '@tfsort/sorter';
import chalk from 'chalk';
import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import path from 'node:path';

import { DEFAULT_BLOCKS, type RawSortOptions, resolveOptions, type SortOptions } from '../config';
import { discoverFiles } from '../files';

type FileOutcome = 'sorted' | 'unchanged' | 'unsorted' | 'printed';

function errorMessage(error: unknown): unknown {
  return error instanceof Error ? error.message : error;
}

// Sorted output always has LF line endings and no byte order mark
function normalizeSource(content: string): string {
  return content.replace(/^\uFEFF/, '').replaceAll('\r\n', '\n');
}

async function processFile(file: string, options: SortOptions): Promise<FileOutcome> {
  const displayName = path.relative(process.cwd(), file) || file;
  const content = await fs.readFile(file, 'utf8');
  const sorted = sortConfig(content, displayName, options.blocks);
  const unchanged = sorted === normalizeSource(content);

  if (options.check) {
    if (unchanged) {
      console.log(chalk.green(`  ✓ ${displayName}`));
      return 'unchanged';
    }
    console.log(chalk.yellow(`  ⚠ ${displayName} is not sorted`));
    return 'unsorted';
  }

  if (options.write) {
    if (unchanged) {
      console.log(chalk.green(`  ✓ ${displayName} (unchanged)`));
      return 'unchanged';
    }
    await fs.writeFile(file, sorted, 'utf8');
    console.log(chalk.green(`  ✓ Sorted ${displayName}`));
    return 'sorted';
  }

  process.stdout.write(sorted);
  return 'printed';
}

function displaySummary(outcomes: FileOutcome[], failures: number, options: SortOptions): void {
  const count = (outcome: FileOutcome) => outcomes.filter((o) => o === outcome).length;

  if (options.check) console.log(chalk.bold(`\nChecked ${outcomes.length + failures} file(s): ${count('unsorted')} not sorted, ${failures} failed.`));
  else console.log(chalk.bold(`\nSorted ${count('sorted')} file(s), ${count('unchanged')} unchanged, ${failures} failed.`));
}

export function createSortCommand(): Command {
  const command = new Command('sort');

  command
    .description('Sort blocks and attributes of Terraform configuration files')
    .argument('[paths...]', 'Files or directories to process', ['.'])
    .option('-b, --blocks <kinds>', 'Comma-separated top-level block types to order by label', DEFAULT_BLOCKS)
    .option('-w, --write', 'Write the sorted content back to each file')
    .option('-c, --check', 'Exit with an error if any file is not sorted')
    .option('-r, --recursive', 'Descend into subdirectories')
    .action(async (paths: string[], raw: RawSortOptions) => {
      let options: SortOptions;
      try {
        options = resolveOptions(raw);
      } catch (error) {
        console.error(chalk.red('✗'), errorMessage(error));
        process.exit(1);
      }

      let files: string[];
      try {
        files = await discoverFiles(paths, options.recursive);
      } catch (error) {
        console.error(chalk.red('✗ Cannot read input:'), errorMessage(error));
        process.exit(1);
      }

      if (files.length === 0) {
        console.log(chalk.yellow('⚠ No Terraform files found'));
        process.exit(1);
      }

      const quiet = !options.check && !options.write;
      if (!quiet) console.log(chalk.cyan(`→ ${options.check ? 'Checking' : 'Sorting'} ${files.length} file(s)...`));

      const outcomes: FileOutcome[] = [];
      let failures = 0;
      for (const file of files)
        try {
          outcomes.push(await processFile(file, options));
        } catch (error) {
          console.error(chalk.red(`✗ ${path.relative(process.cwd(), file) || file}:`), errorMessage(error));
          failures++;
        }

      if (!quiet) displaySummary(outcomes, failures, options);
      if (failures > 0 || outcomes.includes('unsorted')) process.exit(1);
    });

  return command;
}
