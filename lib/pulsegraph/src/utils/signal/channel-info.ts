import { ChannelInfo, ChannelType, DATA_CHANNEL_TYPES } from '../../types/signal';
import { ValidationError } from '../node-error';

export interface ChannelInfoOptions {
  channelTypes?: readonly ChannelType[];
  bads?: readonly string[];
}

/**
 * Builds a frozen channel descriptor. Channels default to EEG.
 */
export function createChannelInfo(
  channelNames: readonly string[],
  samplingRate: number,
  options: ChannelInfoOptions = {}
): ChannelInfo {
  return Object.freeze({
    channelNames: Object.freeze([...channelNames]),
    channelTypes: Object.freeze(
      options.channelTypes ? [...options.channelTypes] : channelNames.map((): ChannelType => 'eeg')
    ),
    samplingRate,
    bads: Object.freeze([...(options.bads ?? [])]),
  });
}

/**
 * Rejects descriptors that downstream nodes cannot rely on
 * @param info Descriptor produced by a source
 * @param nodeId Node reported in the error
 */
export function validateChannelInfo(
  info: ChannelInfo | null | undefined,
  nodeId: string
): asserts info is ChannelInfo {
  const hint = ' Check the initialization of the source.';

  if (!info) {
    throw new ValidationError(`Node ${nodeId} has no channel info.${hint}`, nodeId, 'channelInfo');
  }

  const channelCount = info.channelNames.length;
  if (channelCount === 0) {
    throw new ValidationError(`Node ${nodeId} has 0 channels.${hint}`, nodeId, 'channelInfo');
  }

  if (!Number.isFinite(info.samplingRate) || info.samplingRate <= 0) {
    throw new ValidationError(
      `Node ${nodeId} has invalid sampling rate ${info.samplingRate}`,
      nodeId,
      'channelInfo'
    );
  }

  if (info.channelTypes.length !== channelCount) {
    throw new ValidationError(
      `Channel info of node ${nodeId} is not self-consistent: ${channelCount} names, ${info.channelTypes.length} types`,
      nodeId,
      'channelInfo'
    );
  }

  const names = new Set(info.channelNames);
  if (names.size !== channelCount) {
    throw new ValidationError(
      `Channel info of node ${nodeId} is not self-consistent: duplicate channel names`,
      nodeId,
      'channelInfo'
    );
  }

  const unknownBad = info.bads.find(bad => !names.has(bad));
  if (unknownBad !== undefined) {
    throw new ValidationError(
      `Channel info of node ${nodeId} is not self-consistent: bad channel '${unknownBad}' is not a channel`,
      nodeId,
      'channelInfo'
    );
  }

  if (!info.channelTypes.some(type => DATA_CHANNEL_TYPES.includes(type))) {
    throw new ValidationError(
      `Node ${nodeId} has no channels of types ${DATA_CHANNEL_TYPES.join(', ')}.${hint}`,
      nodeId,
      'channelInfo'
    );
  }
}

/**
 * Reduces a descriptor to what label-dependent nodes care about
 */
export function channelLabelsSnapshot(info: unknown): readonly string[][] {
  const descriptor = asChannelInfo(info);
  return [[...descriptor.channelNames], [...descriptor.bads]];
}

/**
 * Reduces a descriptor to its channel count
 */
export function channelCountSnapshot(info: unknown): readonly number[] {
  return [asChannelInfo(info).channelNames.length];
}

export function isChannelInfo(value: unknown): value is ChannelInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'channelNames' in value &&
    Array.isArray(value.channelNames) &&
    'channelTypes' in value &&
    Array.isArray(value.channelTypes) &&
    'samplingRate' in value &&
    typeof value.samplingRate === 'number' &&
    'bads' in value &&
    Array.isArray(value.bads)
  );
}

function asChannelInfo(value: unknown): ChannelInfo {
  if (!isChannelInfo(value)) {
    throw new TypeError('Expected channel info');
  }
  return value;
}
