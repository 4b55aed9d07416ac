/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createSimulateCommand } from './commands/simulate.js';
import { createReplayCommand } from './commands/replay.js';
import { createServeCommand } from './commands/serve.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Simulate fleets of telemetry devices with bounded, priority-aware buffering');

  program.addCommand(createSimulateCommand());
  program.addCommand(createReplayCommand());
  program.addCommand(createServeCommand());

  return program;
}

/** One-line failure report for anything a command throws */
export function describeError(error: unknown): string {
  return `❌ ${error instanceof Error ? error.message : String(error)}`;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    console.error(`\n${describeError(error)}\n`);
    if (process.env.DEBUG && error instanceof Error) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}
