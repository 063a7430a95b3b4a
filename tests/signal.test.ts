import {
  channelCountSnapshot,
  channelLabelsSnapshot,
  chunkFromRows,
  chunkToRows,
  cloneChunk,
  createChannelInfo,
  createChunk,
  getSample,
  isChannelInfo,
  isEmptyChunk,
  isSnapshotValue,
  lastSample,
  mapChunk,
  snapshotsEqual,
  validateChannelInfo,
} from '../lib/pulsegraph/src/utils/signal';
import { ValidationError } from '../lib/pulsegraph/src/utils/node-error';
import type { ChannelInfo } from '../lib/pulsegraph/src/types/signal';

describe('Signal chunks', () => {
  it('should allocate channel-major buffers', () => {
    const chunk = createChunk(2, 3);

    expect(chunk.channelCount).toBe(2);
    expect(chunk.sampleCount).toBe(3);
    expect(Array.from(chunk.data)).toEqual([0, 0, 0, 0, 0, 0]);
    expect(Array.from(createChunk(1, 2, 5).data)).toEqual([5, 5]);
  });

  it('should reject invalid dimensions', () => {
    expect(() => createChunk(-1, 2)).toThrow(
      new RangeError('Channel count must be a non-negative integer, got -1')
    );
    expect(() => createChunk(1, 1.5)).toThrow(
      new RangeError('Sample count must be a non-negative integer, got 1.5')
    );
  });

  it('should convert between rows and chunks', () => {
    const chunk = chunkFromRows([
      [1, 2, 3],
      [4, 5, 6],
    ]);

    expect(Array.from(chunk.data)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(getSample(chunk, 1, 0)).toBe(4);
    expect(chunkToRows(chunk)).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });

  it('should reject ragged rows', () => {
    expect(() => chunkFromRows([[1, 2, 3], [4, 5]])).toThrow(ValidationError);
    expect(() => chunkFromRows([[1, 2, 3], [4, 5]])).toThrow('Row 1 has 2 samples, expected 3');
  });

  it('should reject samples outside the chunk', () => {
    const chunk = createChunk(2, 3);

    expect(() => getSample(chunk, 2, 0)).toThrow('Sample (2, 0) is outside a 2x3 chunk');
  });

  it('should copy buffers', () => {
    const original = chunkFromRows([[1, 2]]);
    const copy = cloneChunk(original);
    copy.data[0] = 10;

    expect(original.data[0]).toBe(1);
    expect(copy.data).not.toBe(original.data);
  });

  it('should map values with their position', () => {
    const chunk = chunkFromRows([
      [1, 1],
      [1, 1],
    ]);

    const mapped = mapChunk(chunk, (value, channel, sample) => value + channel * 10 + sample);

    expect(chunkToRows(mapped)).toEqual([
      [1, 2],
      [11, 12],
    ]);
  });

  it('should read the most recent sample of every channel', () => {
    const chunk = chunkFromRows([
      [1, 2, 3],
      [4, 5, 6],
    ]);

    expect(lastSample(chunk)).toEqual([3, 6]);
    expect(() => lastSample(createChunk(2, 0))).toThrow('Chunk has no samples');
  });

  it('should recognise empty chunks', () => {
    expect(isEmptyChunk(null)).toBe(true);
    expect(isEmptyChunk(createChunk(0, 5))).toBe(true);
    expect(isEmptyChunk(createChunk(2, 0))).toBe(true);
    expect(isEmptyChunk(chunkFromRows([[1]]))).toBe(false);
  });
});

describe('Channel info', () => {
  const expectInvalid = (info: ChannelInfo | null, message: string): void => {
    let caught: unknown;
    try {
      validateChannelInfo(info, 'src');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ message, nodeId: 'src', attribute: 'channelInfo' });
  };

  it('should default channel types to EEG', () => {
    const info = createChannelInfo(['Fz', 'Cz'], 250);

    expect(info.channelTypes).toEqual(['eeg', 'eeg']);
    expect(info.bads).toEqual([]);
    expect(info.samplingRate).toBe(250);
    expect(Object.isFrozen(info)).toBe(true);
    expect(Object.isFrozen(info.channelNames)).toBe(true);
  });

  it('should accept consistent descriptors', () => {
    const info = createChannelInfo(['Fz', 'STI'], 250, {
      channelTypes: ['eeg', 'stim'],
      bads: ['Fz'],
    });

    expect(() => validateChannelInfo(info, 'src')).not.toThrow();
  });

  it('should reject a missing descriptor', () => {
    expectInvalid(null, 'Node src has no channel info. Check the initialization of the source.');
  });

  it('should reject descriptors without channels', () => {
    expectInvalid(
      createChannelInfo([], 250),
      'Node src has 0 channels. Check the initialization of the source.'
    );
  });

  it('should reject invalid sampling rates', () => {
    expectInvalid(createChannelInfo(['Fz'], 0), 'Node src has invalid sampling rate 0');
  });

  it('should reject inconsistent descriptors', () => {
    expectInvalid(
      createChannelInfo(['Fz'], 250, { channelTypes: ['eeg', 'eeg'] }),
      'Channel info of node src is not self-consistent: 1 names, 2 types'
    );
    expectInvalid(
      createChannelInfo(['Fz', 'Fz'], 250),
      'Channel info of node src is not self-consistent: duplicate channel names'
    );
    expectInvalid(
      createChannelInfo(['Fz'], 250, { bads: ['Oz'] }),
      "Channel info of node src is not self-consistent: bad channel 'Oz' is not a channel"
    );
  });

  it('should require at least one data channel', () => {
    expectInvalid(
      createChannelInfo(['STI'], 250, { channelTypes: ['stim'] }),
      'Node src has no channels of types eeg, mag, grad. Check the initialization of the source.'
    );
  });

  it('should reduce descriptors to comparable snapshots', () => {
    const info = createChannelInfo(['Fz', 'Cz'], 250, { bads: ['Cz'] });

    expect(channelLabelsSnapshot(info)).toEqual([['Fz', 'Cz'], ['Cz']]);
    expect(channelCountSnapshot(info)).toEqual([2]);
    expect(() => channelCountSnapshot({ channels: 2 })).toThrow('Expected channel info');
  });

  it('should recognise descriptors', () => {
    expect(isChannelInfo(createChannelInfo(['Fz'], 250))).toBe(true);
    expect(isChannelInfo({ channelNames: ['Fz'] })).toBe(false);
    expect(isChannelInfo(null)).toBe(false);
  });
});

describe('Snapshots', () => {
  it('should only accept primitives and nested arrays of them', () => {
    expect(isSnapshotValue(1)).toBe(true);
    expect(isSnapshotValue('Fz')).toBe(true);
    expect(isSnapshotValue(null)).toBe(true);
    expect(isSnapshotValue([1, [2, 'x']])).toBe(true);
    expect(isSnapshotValue({ a: 1 })).toBe(false);
    expect(isSnapshotValue(new Float64Array(2))).toBe(false);
    expect(isSnapshotValue([1, { a: 1 }])).toBe(false);
  });

  it('should compare structurally', () => {
    expect(snapshotsEqual([1, [2]], [1, [2]])).toBe(true);
    expect(snapshotsEqual([1], [1, 2])).toBe(false);
    expect(snapshotsEqual(1, [1])).toBe(false);
    expect(snapshotsEqual(NaN, NaN)).toBe(true);
    expect(snapshotsEqual('Fz', 'Cz')).toBe(false);
  });
});
