/**
 * Conversion entry point
 * Raw export text in, one Markdown document out
 */

import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { Logger } from 'pino';
import { toMarkdown } from './export/index.js';
import { parseChatGPTExport, type ExportFormat, type Message } from './ingest/chatgpt/index.js';
import { collapseWhitespace, truncate } from './utils/index.js';
import { silentLogger } from './utils/logger.js';

const DEFAULT_TITLE = 'ChatGPT Conversation';
const DEBUG_PREVIEW_COUNT = 5;

/**
 * Options for a conversion run
 */
export interface ConvertOptions {
  /** Overrides the title found in the export */
  title?: string;
  /** Title used when neither the option nor the export provides one */
  defaultTitle?: string;
  snippetMaxChars?: number;
  /** Diagnostic channel; silent unless the caller passes one */
  logger?: Logger;
}

/**
 * Conversion result
 */
export interface ConversionResult {
  markdown: string;
  format: ExportFormat;
  messageCount: number;
  referenceCount: number;
}

function preview(message: Message): string {
  const { content } = message;
  const text = content.kind === 'text' ? content.text : `[${content.kind}]`;
  return truncate(collapseWhitespace(text), 50);
}

/**
 * Convert a ChatGPT export (JSON text) to Markdown
 *
 * @throws ParseError when the text is not JSON
 * @throws UnsupportedFormatError when the JSON has none of the known shapes
 */
export function convertToMarkdown(raw: string, options: ConvertOptions = {}): ConversionResult {
  const logger = options.logger ?? silentLogger();
  const conversation = parseChatGPTExport(raw, logger);
  const { messages } = conversation;

  logger.debug({ format: conversation.format, messages: messages.length }, `Found ${messages.length} messages`);
  messages.slice(0, DEBUG_PREVIEW_COUNT).forEach((message, i) => {
    logger.debug(`${i + 1}: ${message.role} - ${preview(message)}`);
  });
  if (messages.length > DEBUG_PREVIEW_COUNT) {
    logger.debug(`... and ${messages.length - DEBUG_PREVIEW_COUNT} more`);
  }

  const { markdown, references } = toMarkdown(messages, {
    title: options.title ?? conversation.title ?? options.defaultTitle ?? DEFAULT_TITLE,
    snippetMaxChars: options.snippetMaxChars,
  });

  return {
    markdown,
    format: conversation.format,
    messageCount: messages.length,
    referenceCount: references,
  };
}

/**
 * Write result information
 */
export interface WriteMarkdownResult extends ConversionResult {
  inputPath: string;
  outputPath: string;
  bytesWritten: number;
}

/**
 * Convert one export file and write the Markdown to `outputPath`
 */
export async function convertFile(
  inputPath: string,
  outputPath: string,
  options: ConvertOptions = {}
): Promise<WriteMarkdownResult> {
  const raw = await readFile(inputPath, 'utf-8');
  const result = convertToMarkdown(raw, options);

  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, result.markdown, 'utf-8');

  return {
    ...result,
    inputPath,
    outputPath,
    bytesWritten: Buffer.byteLength(result.markdown, 'utf-8'),
  };
}

/**
 * Batch write result
 */
export interface BatchConvertResult {
  written: WriteMarkdownResult[];
  errors: Array<{ inputPath: string; error: string }>;
}

/**
 * Convert every `*.json` file in a directory to a sibling `.md` file.
 * A file that fails is reported and the rest still convert.
 */
export async function convertDirectory(dir: string, options: ConvertOptions = {}): Promise<BatchConvertResult> {
  const logger = options.logger ?? silentLogger();
  const entries = await readdir(dir, { withFileTypes: true });
  const inputs = entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.json'))
    .map((entry) => entry.name)
    .sort();

  const written: WriteMarkdownResult[] = [];
  const errors: Array<{ inputPath: string; error: string }> = [];

  for (const name of inputs) {
    const inputPath = join(dir, name);
    const outputPath = join(dir, name.replace(/\.json$/i, '.md'));
    try {
      written.push(await convertFile(inputPath, outputPath, options));
      logger.info({ inputPath, outputPath }, 'Converted');
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.error({ inputPath, error }, 'Conversion failed');
      errors.push({ inputPath, error });
    }
  }

  return { written, errors };
}
