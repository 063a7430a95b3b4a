/**
 * Signal data exchanged between nodes.
 *
 * Chunks are laid out channels × time, channel-major: sample `t` of channel
 * `c` lives at `data[c * sampleCount + t]`. The convention is fixed for the
 * whole process.
 */

/**
 * Two-dimensional block of samples
 */
export interface SignalChunk {
  readonly channelCount: number;
  readonly sampleCount: number;
  readonly data: Float64Array;
}

/**
 * What a node hands to its listeners. Valid until the producing node's next
 * update; consumers copy whatever they keep longer.
 */
export interface ReadonlyChunk {
  readonly channelCount: number;
  readonly sampleCount: number;
  readonly data: Readonly<Float64Array>;
}

/**
 * Sensor kinds a channel can carry
 */
export type ChannelType = 'eeg' | 'mag' | 'grad' | 'misc' | 'stim';

/**
 * Channel kinds that carry brain data. A source must provide at least one.
 */
export const DATA_CHANNEL_TYPES: readonly ChannelType[] = ['eeg', 'mag', 'grad'];

/**
 * Channel and sampling metadata produced by a source during initialization
 */
export interface ChannelInfo {
  readonly channelNames: readonly string[];
  readonly channelTypes: readonly ChannelType[];
  /** Samples per second */
  readonly samplingRate: number;
  /** Names of channels marked as bad */
  readonly bads: readonly string[];
}
