/**
 * Conversion CLI commands
 * convert (default), batch
 */

import { Command } from 'commander';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { getConfig, setConfig } from '../../config/index.js';
import { convertDirectory, convertToMarkdown } from '../../convert.js';
import { createLogger, resetLogger } from '../../utils/logger.js';

/** Options for the convert command */
export interface ConvertCommandOptions {
  output?: string;
  debug?: boolean;
  title?: string;
}

/** Options for the batch command */
export interface BatchCommandOptions {
  debug?: boolean;
}

/**
 * Raise the log level to debug for this run
 */
function enableDebug(): void {
  setConfig({ ...getConfig(), logLevel: 'debug' });
  resetLogger();
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read the input file, or standard input when the path is `-`
 */
export async function readInput(input: string): Promise<string> {
  if (input !== '-') {
    return readFile(input, 'utf-8');
  }

  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Convert one export to Markdown, written to a file or stdout
 */
export async function runConvert(input: string, options: ConvertCommandOptions): Promise<void> {
  if (options.debug) enableDebug();

  const config = getConfig();
  const logger = createLogger({ command: 'convert' });

  try {
    const raw = await readInput(input);
    const result = convertToMarkdown(raw, {
      title: options.title,
      defaultTitle: config.title,
      snippetMaxChars: config.snippetMaxChars,
      logger,
    });

    if (options.output) {
      const outputPath = resolve(options.output);
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, result.markdown, 'utf-8');
      logger.info(
        { outputPath, messages: result.messageCount, references: result.referenceCount },
        'Markdown written'
      );
    } else {
      process.stdout.write(result.markdown);
    }
  } catch (err) {
    console.error(`[ERROR] ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

/**
 * Convert every JSON export in a directory
 */
export async function runBatch(dir: string, options: BatchCommandOptions): Promise<void> {
  if (options.debug) enableDebug();

  const config = getConfig();
  const logger = createLogger({ command: 'batch' });

  try {
    const result = await convertDirectory(resolve(dir), {
      defaultTitle: config.title,
      snippetMaxChars: config.snippetMaxChars,
      logger,
    });

    console.log(`Converted ${result.written.length} file(s)`);
    for (const file of result.written) {
      console.log(`  + ${file.outputPath}`);
    }

    if (result.errors.length > 0) {
      console.log(`\nErrors (${result.errors.length}):`);
      for (const err of result.errors) {
        console.log(`  ! ${err.inputPath}: ${err.error}`);
      }
      process.exitCode = 1;
    }
  } catch (err) {
    console.error(`[ERROR] ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

/**
 * Register conversion commands on the program
 */
export function registerConvertCommands(program: Command): void {
  program
    .command('convert <input>', { isDefault: true })
    .description("Convert a ChatGPT JSON export to Markdown (use '-' for stdin)")
    .option('-o, --output <path>', 'Output Markdown file path (default: stdout)')
    .option('-t, --title <title>', 'Document title (default: conversation title)')
    .option('-d, --debug', 'Print debugging information')
    .action(async (input: string, options: ConvertCommandOptions) => {
      await runConvert(input, options);
    });

  program
    .command('batch <dir>')
    .description('Convert every *.json export in a directory to a sibling .md file')
    .option('-d, --debug', 'Print debugging information')
    .action(async (dir: string, options: BatchCommandOptions) => {
      await runBatch(dir, options);
    });
}
