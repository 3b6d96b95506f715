import chalk from 'chalk';
import { Command } from 'commander';

import { createSortCommand } from './commands/sort';

const program = new Command();

program.name('tfsort').description('Canonical ordering for Terraform configuration files').version('1.0.0');

program.addCommand(createSortCommand(), { isDefault: true });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Unexpected error:'), error instanceof Error ? error.message : error);
  process.exit(1);
});
