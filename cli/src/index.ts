#!/usr/bin/env node

/**
 * Markoshka CLI
 *
 * Entry point for the markoshka command: runs the display loop on the
 * device and offers a couple of offline helpers.
 */

import { Command } from 'commander';
import { runDevice } from './commands/run.js';
import { previewMessage } from './commands/preview.js';
import { listPhrases } from './commands/list-phrases.js';

function fail(error: unknown): never {
  if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error(`Error: ${String(error)}`);
  }
  process.exit(1);
}

const program = new Command();

program
  .name('markoshka')
  .description('Motivational phrases on a 20x2 character display')
  .version('1.0.0');

// Run command
program
  .command('run', { isDefault: true })
  .description('Drive the display until interrupted')
  .action(async () => {
    try {
      await runDevice();
    } catch (error) {
      fail(error);
    }
  });

// Preview command
program
  .command('preview <message>')
  .description('Print the frames a message would produce')
  .option('--format <format>', 'Output format (text|json)', 'text')
  .action(async (message: string, options: { format: string }) => {
    try {
      await previewMessage(message, options);
    } catch (error) {
      fail(error);
    }
  });

// Phrases command
program
  .command('phrases')
  .description('List the phrase catalogue')
  .option('--format <format>', 'Output format (text|json)', 'text')
  .action((options: { format: string }) => {
    try {
      listPhrases(options);
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync();
