import type { ReadonlyChunk, SignalChunk } from '../../types/signal';
import { ValidationError } from '../node-error';

/**
 * Creates a chunk filled with `fill`
 */
export function createChunk(channelCount: number, sampleCount: number, fill = 0): SignalChunk {
  if (!Number.isInteger(channelCount) || channelCount < 0) {
    throw new RangeError(`Channel count must be a non-negative integer, got ${channelCount}`);
  }
  if (!Number.isInteger(sampleCount) || sampleCount < 0) {
    throw new RangeError(`Sample count must be a non-negative integer, got ${sampleCount}`);
  }
  const data = new Float64Array(channelCount * sampleCount);
  if (fill !== 0) {
    data.fill(fill);
  }
  return { channelCount, sampleCount, data };
}

/**
 * Builds a chunk from one array of samples per channel
 */
export function chunkFromRows(rows: readonly (readonly number[])[]): SignalChunk {
  const sampleCount = rows.length > 0 ? rows[0].length : 0;
  const chunk = createChunk(rows.length, sampleCount);
  rows.forEach((row, channel) => {
    if (row.length !== sampleCount) {
      throw new ValidationError(
        `Row ${channel} has ${row.length} samples, expected ${sampleCount}`,
        'chunk'
      );
    }
    chunk.data.set(row, channel * sampleCount);
  });
  return chunk;
}

export function chunkToRows(chunk: ReadonlyChunk): number[][] {
  const rows: number[][] = [];
  for (let channel = 0; channel < chunk.channelCount; channel++) {
    const start = channel * chunk.sampleCount;
    rows.push(Array.from(chunk.data.subarray(start, start + chunk.sampleCount)));
  }
  return rows;
}

export function getSample(chunk: ReadonlyChunk, channel: number, sample: number): number {
  if (channel < 0 || channel >= chunk.channelCount || sample < 0 || sample >= chunk.sampleCount) {
    throw new RangeError(
      `Sample (${channel}, ${sample}) is outside a ${chunk.channelCount}x${chunk.sampleCount} chunk`
    );
  }
  return chunk.data[channel * chunk.sampleCount + sample];
}

/**
 * Copies a chunk so it can outlive the producer's next update
 */
export function cloneChunk(chunk: ReadonlyChunk): SignalChunk {
  return {
    channelCount: chunk.channelCount,
    sampleCount: chunk.sampleCount,
    data: Float64Array.from(chunk.data),
  };
}

/**
 * Element-wise transform into a new chunk of the same shape
 */
export function mapChunk(
  chunk: ReadonlyChunk,
  fn: (value: number, channel: number, sample: number) => number
): SignalChunk {
  const result = createChunk(chunk.channelCount, chunk.sampleCount);
  for (let channel = 0; channel < chunk.channelCount; channel++) {
    const offset = channel * chunk.sampleCount;
    for (let sample = 0; sample < chunk.sampleCount; sample++) {
      result.data[offset + sample] = fn(chunk.data[offset + sample], channel, sample);
    }
  }
  return result;
}

/**
 * Most recent value of every channel
 */
export function lastSample(chunk: ReadonlyChunk): number[] {
  if (chunk.sampleCount === 0) {
    throw new RangeError('Chunk has no samples');
  }
  const values: number[] = [];
  for (let channel = 0; channel < chunk.channelCount; channel++) {
    values.push(chunk.data[(channel + 1) * chunk.sampleCount - 1]);
  }
  return values;
}

/**
 * Absent chunks and chunks without channels or samples carry nothing to process
 */
export function isEmptyChunk(chunk: ReadonlyChunk | null | undefined): boolean {
  return !chunk || chunk.channelCount === 0 || chunk.sampleCount === 0;
}
