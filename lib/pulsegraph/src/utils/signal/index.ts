export {
  createChunk,
  chunkFromRows,
  chunkToRows,
  getSample,
  cloneChunk,
  mapChunk,
  lastSample,
  isEmptyChunk,
} from './chunk';
export {
  createChannelInfo,
  validateChannelInfo,
  channelLabelsSnapshot,
  channelCountSnapshot,
  isChannelInfo,
} from './channel-info';
export type { ChannelInfoOptions } from './channel-info';
export { isSnapshotValue, snapshotsEqual } from './snapshot';
