#!/usr/bin/env node

// picklesmith CLI
// - One root command: `picklesmith [output]` writes a single sample to a
//   file or to stdout ("-"), or `--samples` files into `--dir`.
// - Options come from an optional JSON configuration file, then flags.
// - Errors go through ErrorPresenter and exit with the error's code.

import { Command } from 'commander';
import fs from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  ErrorPresenter,
  Generate,
  GenerateBatch,
  InternalError,
  OutputError,
  isErr,
  isPicklesmithError,
  normalizeSeed,
  randomSeed,
  type GenerateOutput,
  type GenerateRequest,
  type PicklesmithError,
} from '@picklesmith/core';
import { renderCLIView } from './render.js';
import {
  DEFAULT_SAMPLES,
  buildGeneratorOptions,
  loadConfig,
  parseSamples,
  resolveProtocol,
  type CliOptions,
} from './flags.js';

const STDOUT = '-';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('picklesmith')
    .description('Generate structurally valid pickle streams for fuzzing')
    .version('0.1.0')
    .argument('[output]', 'Output file, or - for stdout', STDOUT)
    .option('-p, --protocol <version>', 'Protocol version 0-5 (default: seed % 6)')
    .option('-s, --seed <seed>', 'Decimal or 0x-prefixed 64-bit seed')
    .option('--min-opcodes <n>', 'Lower bound on body instructions')
    .option('--max-opcodes <n>', 'Upper bound on body instructions')
    .option('--size-hint <bytes>', 'Stop the body once output reaches this size')
    .option('-m, --mutators <list>', 'Comma-separated mutators, or "all"')
    .option('--mutation-rate <rate>', 'Per-decision mutation probability')
    .option('--unsafe-mutations', 'Allow mutations that may break structure')
    .option('--allow-ext', 'Emit extension registry opcodes')
    .option('--allow-buffer', 'Emit out-of-band buffer opcodes')
    .option('-c, --config <file>', 'JSON configuration file')
    .option('-d, --dir <directory>', 'Write samples into this directory')
    .option(
      '-n, --samples <count>',
      `Number of samples written with --dir (default: ${DEFAULT_SAMPLES})`
    )
    .option('--print-metrics', 'Print generation metrics as JSON to stderr')
    .option('-q, --quiet', 'Suppress the summary line on stderr')
    .action(async (output: string, options: CliOptions) => {
      try {
        await run(output, options);
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  return program;
}

async function run(output: string, options: CliOptions): Promise<void> {
  const loaded =
    options.config === undefined ? undefined : await loadConfig(options.config);
  const generatorOptions = buildGeneratorOptions(options, loaded?.options);

  // the reported seed also decides the protocol
  const seed =
    generatorOptions.seed === undefined
      ? randomSeed()
      : normalizeSeed(generatorOptions.seed);
  const version = resolveProtocol(options.protocol, loaded?.version, seed);
  const request: GenerateRequest = { ...generatorOptions, seed, version };

  if (options.dir === undefined) {
    if (options.samples !== undefined) {
      throw new ConfigError({
        message: '--samples needs --dir',
        context: { setting: 'samples', value: options.samples },
      });
    }
    const result = Generate(request);
    if (isErr(result)) throw result.error;
    await writeSample(output, result.value);
    report(options, result.value, output === STDOUT ? 'stdout' : output);
    return;
  }

  const count = parseSamples(options.samples);
  const result = GenerateBatch(request, count);
  if (isErr(result)) throw result.error;
  await createDirectory(options.dir);
  for (const [index, sample] of result.value.entries()) {
    const file = path.join(options.dir, `${index}.pkl`);
    await writeSample(file, sample);
    report(options, sample, file);
  }
}

async function createDirectory(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new OutputError({
      message: `cannot create directory ${dir}`,
      path: dir,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

async function writeSample(target: string, sample: GenerateOutput): Promise<void> {
  if (target === STDOUT) {
    process.stdout.write(sample.bytes);
    return;
  }
  try {
    await writeFile(target, sample.bytes);
  } catch (error) {
    throw new OutputError({
      message: `cannot write ${target}`,
      path: target,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

function report(options: CliOptions, sample: GenerateOutput, target: string): void {
  if (options.quiet !== true) {
    const seed = sample.seed === undefined ? '' : `, seed ${sample.seed}`;
    process.stderr.write(
      `[picklesmith] wrote ${sample.bytes.length} bytes (protocol ${sample.version}${seed}) to ${target}\n`
    );
  }
  if (options.printMetrics === true) {
    process.stderr.write(
      `[picklesmith] metrics: ${JSON.stringify(sample.metrics)}\n`
    );
  }
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: PicklesmithError;
  if (isPicklesmithError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError({
      message: message || 'Unexpected error',
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export const program = createProgram();

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
