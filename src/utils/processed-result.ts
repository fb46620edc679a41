import { ProcessingError } from './errors.js';
import type { PartialResult, ProcessedResult } from '../types/pipeline.types.js';

/**
 * Merge the two partial results of a round into one immutable record
 *
 * @throws ProcessingError if neither partial carries an output
 */
export function mergeResults(
  fast: PartialResult | undefined,
  reference: PartialResult | undefined
): ProcessedResult {
  if (!fast && !reference) {
    throw new ProcessingError('Cannot merge a round with no processed output');
  }
  if (fast && fast.path !== 'fast') {
    throw new ProcessingError(`Expected a fast partial result, got ${fast.path}`);
  }
  if (reference && reference.path !== 'reference') {
    throw new ProcessingError(`Expected a reference partial result, got ${reference.path}`);
  }

  return Object.freeze({
    fastOutput: fast?.output,
    referenceOutput: reference?.output,
    fastDurationNanos: fast?.durationNanos ?? 0,
    referenceDurationNanos: reference?.durationNanos ?? 0,
    originalSizeBytes: fast?.originalSizeBytes ?? reference?.originalSizeBytes ?? 0,
  });
}

/**
 * Reference time over fast time; 1.0 unless both are positive
 */
export function speedupOf(result: ProcessedResult): number {
  if (result.fastDurationNanos <= 0 || result.referenceDurationNanos <= 0) {
    return 1.0;
  }
  return result.referenceDurationNanos / result.fastDurationNanos;
}

/**
 * Fast output when present, otherwise the reference output
 */
export function primaryOutput(result: ProcessedResult): Buffer {
  const output = result.fastOutput ?? result.referenceOutput;
  if (!output) {
    throw new ProcessingError('Processed result carries no output');
  }
  return output;
}
