import { Command } from 'commander';
import chalk from 'chalk';
import { evalCommand } from './commands/eval.js';
import { infoCommand } from './commands/info.js';
import { listCommand } from './commands/list.js';
import { serveCommand } from './commands/serve.js';
import { trainCommand } from './commands/train.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('logic-net')
    .description('Train and evaluate small feed-forward networks on logic gates')
    .version('0.1.0', '-V, --version');

  // Register commands
  listCommand(program);
  trainCommand(program);
  evalCommand(program);
  infoCommand(program);
  serveCommand(program);

  // Global error handler
  program.on('command:*', () => {
    console.error(
      chalk.red(
        `\nInvalid command: ${program.args.join(' ')}\nSee --help for a list of available commands.\n`
      )
    );
    process.exitCode = 1;
  });

  return program;
}
