#!/usr/bin/env node
/**
 * chatmd CLI - Main entry point
 * Converts ChatGPT conversation exports to Markdown
 */

import { Command } from 'commander';
import { version } from '../version.js';
import { registerConvertCommands } from './commands/index.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('chatmd')
    .description('Convert ChatGPT conversation JSON (including Canvas) to Markdown')
    .version(version);

  registerConvertCommands(program);

  return program;
}

// Run CLI when executed directly (not when imported as module)
if (process.argv[1]?.includes('cli/index') || process.argv[1]?.includes('cli\\index')) {
  createProgram()
    .parseAsync()
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : err);
      process.exitCode = 1;
    });
}
