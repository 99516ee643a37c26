import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { CommandHandler } from './CommandHandler';
import type { CommandResult } from './CommandHandler';
import { createLogger } from '../utils/logger';

const logger = createLogger('CLI');

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/**
 * CLI 入口
 */
async function main(): Promise<void> {
  const program = new Command();

  program
    .name('dag-workflow')
    .description('Validate and run dependency-ordered task workflows')
    .version('1.0.0');

  program
    .command('validate <file>')
    .description('Validate a workflow definition and print its execution layers')
    .action(async (file: string) => {
      await runSingleCommand((handler) => handler.handleValidate(file));
    });

  program
    .command('run <file>')
    .description('Run a workflow definition')
    .option('-c, --concurrency <n>', 'maximum tasks in flight', parseInteger)
    .option('-t, --timeout <ms>', 'per-task timeout in milliseconds (0 = none)', parseInteger)
    .option('--json', 'print the execution report as JSON')
    .action(async (file: string, options: { concurrency?: number; timeout?: number; json?: boolean }) => {
      await runSingleCommand((handler) => handler.handleRun(file, options));
    });

  program
    .command('plan <query...>')
    .description('Plan a workflow for a request with the LLM planner')
    .action(async (query: string[]) => {
      await runSingleCommand((handler) => handler.handlePlan(query.join(' ')));
    });

  program
    .command('config')
    .description('Check configuration status')
    .action(async () => {
      await runSingleCommand(async (handler) => handler.handleConfig());
    });

  await program.parseAsync();
}

/**
 * 运行单个命令
 */
async function runSingleCommand(command: (handler: CommandHandler) => Promise<CommandResult>): Promise<void> {
  const handler = new CommandHandler();

  try {
    const result = await command(handler);

    if (!result.success) {
      console.log(chalk.red(`\nError: ${result.message}\n`));
      process.exitCode = 1;
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.log(chalk.red(`\nError: ${errorMessage}\n`));
    logger.logError(error, 'Command execution error');
    process.exitCode = 1;
  }
}

// 运行主函数
main().catch((error: unknown) => {
  logger.logError(error, 'Fatal error');
  process.exit(1);
});
