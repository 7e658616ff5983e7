/**
 * CLI tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { getDefaultConfig, resetConfig, setConfig } from '../config/index.js';
import { resetLogger } from '../utils/logger.js';
import { runBatch, runConvert } from './commands/index.js';
import { createProgram } from './index.js';

const sample = JSON.stringify([
  { role: 'user', content: 'Hello' },
  { role: 'assistant', content: 'Hi there' },
]);

describe('CLI', () => {
  it('should create program with correct name and description', () => {
    const program = createProgram();

    expect(program.name()).toBe('chatmd');
    expect(program.description()).toBe('Convert ChatGPT conversation JSON (including Canvas) to Markdown');
  });

  it('should have version set', () => {
    const program = createProgram();

    expect(program.version()).toBe('0.1.0');
  });

  it('should register convert and batch commands', () => {
    const program = createProgram();
    const commands = program.commands.map((cmd) => cmd.name());

    expect(commands).toEqual(['convert', 'batch']);
  });

  it('should register convert options', () => {
    const program = createProgram();
    const convert = program.commands.find((cmd) => cmd.name() === 'convert');
    const flags = convert?.options.map((opt) => opt.long);

    expect(flags).toEqual(['--output', '--title', '--debug']);
  });
});

describe('CLI commands', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `chatmd-cli-test-${Date.now()}`);
    await mkdir(testDir, { recursive: true });
    setConfig({ ...getDefaultConfig(), logLevel: 'silent', logFormat: 'json' });
    resetLogger();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    resetConfig();
    resetLogger();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should write the document to the output path', async () => {
    const inputPath = join(testDir, 'chat.json');
    const outputPath = join(testDir, 'docs', 'chat.md');
    await writeFile(inputPath, sample, 'utf-8');

    await runConvert(inputPath, { output: outputPath, title: 'Greeting' });

    expect(await readFile(outputPath, 'utf-8')).toBe('# Greeting\n\n## User\n\nHello\n\n## Assistant\n\nHi there\n');
    expect(process.exitCode).toBeUndefined();
  });

  it('should print the document to stdout without an output path', async () => {
    const inputPath = join(testDir, 'chat.json');
    await writeFile(inputPath, sample, 'utf-8');
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await runConvert(inputPath, {});

    expect(write).toHaveBeenCalledWith('# ChatGPT Conversation\n\n## User\n\nHello\n\n## Assistant\n\nHi there\n');
  });

  it('should report invalid JSON and set a failing exit code', async () => {
    const inputPath = join(testDir, 'bad.json');
    await writeFile(inputPath, '{ nope', 'utf-8');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await runConvert(inputPath, { output: join(testDir, 'bad.md') });

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toMatch(/^\[ERROR\] Invalid JSON: /);
    expect(process.exitCode).toBe(1);
  });

  it('should report a missing input file', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await runConvert(join(testDir, 'missing.json'), {});

    expect(error.mock.calls[0][0]).toMatch(/^\[ERROR\] ENOENT/);
    expect(process.exitCode).toBe(1);
  });

  it('should run convert as the default command', async () => {
    const inputPath = join(testDir, 'chat.json');
    const outputPath = join(testDir, 'default.md');
    await writeFile(inputPath, sample, 'utf-8');

    await createProgram().parseAsync(['node', 'chatmd', inputPath, '-o', outputPath, '-t', 'Default']);

    expect(await readFile(outputPath, 'utf-8')).toMatch(/^# Default\n/);
  });

  it('should convert a directory in batch mode', async () => {
    await writeFile(join(testDir, 'one.json'), sample, 'utf-8');
    await writeFile(join(testDir, 'two.json'), '[]', 'utf-8');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await runBatch(testDir, {});

    expect(log).toHaveBeenCalledWith('Converted 2 file(s)');
    expect(await readFile(join(testDir, 'two.md'), 'utf-8')).toBe('# ChatGPT Conversation\n');
    expect(process.exitCode).toBeUndefined();
  });

  it('should fail the batch when a file does not convert', async () => {
    await writeFile(join(testDir, 'bad.json'), '{"unknown": true}', 'utf-8');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await runBatch(testDir, {});

    expect(log).toHaveBeenCalledWith('Converted 0 file(s)');
    expect(log).toHaveBeenCalledWith('\nErrors (1):');
    expect(process.exitCode).toBe(1);
  });
});
