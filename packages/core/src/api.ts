import { normalizeSeed } from './entropy/seed.js';
import { PickleGenerator } from './generator/pickle-generator.js';
import type { ProtocolVersion } from './protocol/version.js';
import { InternalError, isPicklesmithError, type PicklesmithError } from './types/errors.js';
import type { GeneratorOptions } from './types/options.js';
import { err, ok, type Result } from './types/result.js';
import type { MetricsSnapshot } from './util/metrics.js';

// Non-throwing facades over PickleGenerator. Callers that prefer exceptions
// use the class directly.

export interface GenerateRequest extends GeneratorOptions {
  /** Protocol version, 0 to 5. */
  version: number;
}

export interface GenerateOutput {
  bytes: Uint8Array;
  version: ProtocolVersion;
  /** Seed that reproduces the sample; absent for byte-driven passes. */
  seed?: bigint;
  /** True when the body sits in a length-prefixed frame. */
  framed: boolean;
  metrics: MetricsSnapshot;
}

/**
 * Generate — one pseudorandom sample.
 *
 * Uses the request's seed when present, otherwise a seed drawn from process
 * entropy, which is reported back in `seed`.
 */
export function Generate(
  request: GenerateRequest
): Result<GenerateOutput, PicklesmithError> {
  return attempt(() => {
    const generator = createGenerator(request);
    const bytes = generator.generate();
    return collect(generator, bytes);
  });
}

/**
 * GenerateFromBytes — one sample driven by a fuzz engine's input buffer.
 * Fully deterministic in `data`.
 */
export function GenerateFromBytes(
  data: Uint8Array,
  request: GenerateRequest
): Result<GenerateOutput, PicklesmithError> {
  return attempt(() => {
    const generator = createGenerator(request);
    const bytes = generator.generateFromBytes(data);
    return collect(generator, bytes);
  });
}

/**
 * GenerateBatch — `count` independent samples. With a seed, sample `i`
 * uses `seed + i` (wrapping at 2^64), so any single sample can be
 * regenerated alone.
 */
export function GenerateBatch(
  request: GenerateRequest,
  count: number
): Result<GenerateOutput[], PicklesmithError> {
  return attempt(() => {
    const generator = createGenerator(request);
    const base =
      request.seed === undefined ? undefined : normalizeSeed(request.seed);
    const out: GenerateOutput[] = [];
    for (let i = 0; i < count; i++) {
      if (base !== undefined) {
        generator.withSeed(BigInt.asUintN(64, base + BigInt(i)));
      }
      out.push(collect(generator, generator.generate()));
    }
    return out;
  });
}

function createGenerator(request: GenerateRequest): PickleGenerator {
  const { version, ...options } = request;
  return new PickleGenerator(version, options);
}

function collect(generator: PickleGenerator, bytes: Uint8Array): GenerateOutput {
  const output: GenerateOutput = {
    bytes,
    version: generator.version,
    framed: generator.framed,
    metrics: generator.getMetrics('ci'),
  };
  if (generator.lastSeed !== undefined) output.seed = generator.lastSeed;
  return output;
}

function attempt<T>(run: () => T): Result<T, PicklesmithError> {
  try {
    return ok(run());
  } catch (error) {
    if (isPicklesmithError(error)) return err(error);
    return err(
      new InternalError({
        message: error instanceof Error ? error.message : String(error),
        cause: error instanceof Error ? error : undefined,
      })
    );
  }
}
