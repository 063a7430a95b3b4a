import {
  ChannelStatistics,
  ChunkRecorder,
  ChunkSource,
  EnvelopeExtractor,
  LinearProjection,
  Message,
  Pipeline,
  StreamOutput,
  TransformProcessor,
  ValidationError,
  chunkFromRows,
  chunkToRows,
  mapChunk,
} from 'pulsegraph';
import type {
  ChannelInfo,
  NodeLifecycleEvent,
  ProjectionOperator,
  ProjectionSettings,
  ReadonlyChunk,
} from 'pulsegraph';

describe('Concrete nodes', () => {
  let pipeline: Pipeline;
  let source: ChunkSource;

  beforeEach(() => {
    pipeline = new Pipeline({ pipelineId: 'nodes' });
    source = new ChunkSource({ channelNames: ['Fz', 'Cz'], samplingRate: 10 }, { id: 'src' });
    pipeline.setSource(source);
  });

  describe('ChunkSource', () => {
    it('should stay alive until closed and drained', () => {
      pipeline.initializeAll();
      source.push(chunkFromRows([[1], [2]]));
      source.close();

      expect(source.isAlive).toBe(true);
      expect(source.pendingChunks).toBe(1);

      pipeline.tick();

      expect(source.isAlive).toBe(false);
      expect(() => source.push(chunkFromRows([[1], [2]]))).toThrow("Source 'src' has been closed");
    });

    it('should emit nothing when no chunk is queued', () => {
      pipeline.initializeAll();
      pipeline.tick();

      expect(source.output).toBeNull();
    });

    it('should reject chunks that do not match the channel layout', () => {
      pipeline.initializeAll();
      source.push(chunkFromRows([[1], [2], [3]]));

      expect(() => pipeline.tick()).toThrow(
        "Source 'src' received a chunk with 3 channels, expected 2"
      );
    });

    it('should validate the sampling rate', () => {
      expect(() => new ChunkSource({ channelNames: ['Fz'], samplingRate: 0 })).toThrow(
        'Sampling rate must be a positive number, got 0'
      );
      expect(() => source.set('samplingRate', -5)).toThrow(ValidationError);
      expect(source.get('samplingRate')).toBe(10);
    });

    it('should rebuild its channel info when channel metadata changes', () => {
      pipeline.initializeAll();

      source.set('bads', ['Cz']);
      pipeline.tick();

      expect(source.channelInfo?.bads).toEqual(['Cz']);
    });
  });

  describe('TransformProcessor', () => {
    it('should apply the transform with the upstream channel info', () => {
      const transform = new TransformProcessor((chunk, info) =>
        mapChunk(chunk, value => value * info.samplingRate)
      );
      pipeline.addProcessor(transform);
      pipeline.initializeAll();
      source.push(chunkFromRows([[1, 2], [3, 4]]));

      pipeline.tick();

      const output = transform.output;
      expect(output && chunkToRows(output)).toEqual([
        [10, 20],
        [30, 40],
      ]);
    });

    it('should treat a new transform as a local change', () => {
      const transform = new TransformProcessor();
      const recorder = new ChunkRecorder();
      pipeline.addProcessor(transform);
      pipeline.addOutput(recorder);
      pipeline.initializeAll();
      source.push(chunkFromRows([[1], [2]]), chunkFromRows([[3], [4]]), chunkFromRows([[5], [6]]));
      pipeline.tick();

      transform.set('transform', chunk => mapChunk(chunk, value => -value));
      pipeline.tick();
      pipeline.tick();

      expect(recorder.chunks.map(chunkToRows)).toEqual([
        [[1], [2]],
        [[-5], [-6]],
      ]);
      expect(recorder.historyBreaks).toBe(0);
    });

    it('should see channel metadata changes that keep the channel count', () => {
      const seenBads: string[][] = [];
      const transform = new TransformProcessor((chunk, info) => {
        seenBads.push([...info.bads]);
        return chunk;
      });
      pipeline.addProcessor(transform);
      pipeline.initializeAll();
      source.push(chunkFromRows([[1], [2]]), chunkFromRows([[3], [4]]), chunkFromRows([[5], [6]]));
      pipeline.tick();

      source.set('bads', ['Cz']);
      pipeline.tick();
      pipeline.tick();
      pipeline.tick();

      expect(source.channelInfo?.bads).toEqual(['Cz']);
      expect(seenBads).toEqual([[], ['Cz']]);
      expect(transform.lifecycleState).toBe('initialized');
    });
  });

  describe('EnvelopeExtractor', () => {
    let envelope: EnvelopeExtractor;

    beforeEach(() => {
      envelope = new EnvelopeExtractor({ factor: 0.5 }, { id: 'envelope' });
      pipeline.addProcessor(envelope);
      pipeline.initializeAll();
    });

    it('should smooth the rectified signal', () => {
      source.push(chunkFromRows([[2, -4], [0, 8]]), chunkFromRows([[0], [0]]));

      pipeline.tick();
      const output = envelope.output;
      expect(output && chunkToRows(output)).toEqual([
        [1, 2.5],
        [0, 4],
      ]);

      pipeline.tick();
      expect(envelope.currentEnvelope).toEqual([1.25, 2]);
    });

    it('should forget the envelope when input history is invalidated', () => {
      source.push(chunkFromRows([[2], [4]]), chunkFromRows([[2], [4]]), chunkFromRows([[2], [4]]));
      pipeline.tick();
      expect(envelope.currentEnvelope).toEqual([1, 2]);

      envelope.receiveMessage(new Message(false, true));
      pipeline.tick();
      expect(envelope.currentEnvelope).toEqual([0, 0]);

      pipeline.tick();
      expect(envelope.currentEnvelope).toEqual([1, 2]);
    });

    it('should validate the factor', () => {
      expect(() => new EnvelopeExtractor({ factor: 1 })).toThrow(
        'Factor must be a number between 0 and 1, got 1'
      );
      expect(() => envelope.set('factor', 0)).toThrow(ValidationError);
      expect(envelope.get('factor')).toBe(0.5);
      expect(envelope.pendingFlags.reset).toBe(false);
    });

    it('should rebuild when the factor changes', () => {
      const events: NodeLifecycleEvent['type'][] = [];
      envelope.lifecycle$.subscribe(event => events.push(event.type));
      source.push(chunkFromRows([[2], [4]]), chunkFromRows([[2], [4]]));
      pipeline.tick();

      envelope.set('factor', 0.75);
      pipeline.tick();

      expect(events).toEqual(['reset-scheduled', 'initialized']);
      expect(envelope.currentEnvelope).toEqual([0, 0]);
    });

    it('should reinitialize when the channel count changes upstream', () => {
      source.set('channelNames', ['Fz', 'Cz', 'Pz']);
      source.push(chunkFromRows([[1], [1], [1]]));

      pipeline.tick();
      pipeline.tick();

      expect(envelope.currentEnvelope).toEqual([0, 0, 0]);
    });
  });

  describe('ChannelStatistics', () => {
    let statistics: ChannelStatistics;
    let recorder: ChunkRecorder;

    beforeEach(() => {
      source = new ChunkSource({ channelNames: ['Fz'], samplingRate: 4 });
      pipeline.setSource(source);
      statistics = new ChannelStatistics({ collectForSeconds: 1 });
      recorder = new ChunkRecorder();
      pipeline.addProcessor(statistics);
      pipeline.addOutput(recorder);
      pipeline.initializeAll();
    });

    it('should pass data through while collecting', () => {
      const chunk = chunkFromRows([[1, 2]]);
      source.push(chunk);

      pipeline.tick();

      expect(statistics.output).toBe(chunk);
      expect(statistics.samplesCollected).toBe(2);
      expect(statistics.standardDeviations).toBeNull();
    });

    it('should compute standard deviations once enough samples arrived', () => {
      source.push(chunkFromRows([[1, 2]]), chunkFromRows([[3, 4]]));

      pipeline.tick();
      pipeline.tick();

      expect(statistics.samplesCollected).toBe(4);
      const deviations = statistics.standardDeviations;
      expect(deviations).toHaveLength(1);
      expect(deviations?.[0]).toBeCloseTo(Math.sqrt(5 / 3), 10);
    });

    it('should start over and invalidate history on reset', () => {
      source.push(chunkFromRows([[1, 2, 3, 4]]), chunkFromRows([[5]]), chunkFromRows([[6]]));
      pipeline.tick();

      statistics.set('collectForSeconds', 2);
      pipeline.tick();

      expect(statistics.samplesCollected).toBe(0);
      expect(statistics.standardDeviations).toBeNull();

      pipeline.tick();
      expect(recorder.historyBreaks).toBe(1);
    });

    it('should validate the calibration period', () => {
      expect(() => new ChannelStatistics({ collectForSeconds: 0 })).toThrow(
        'collectForSeconds must be a positive number, got 0'
      );
    });
  });

  describe('LinearProjection', () => {
    const summingOperator = (info: ChannelInfo): ProjectionOperator => ({
      rowCount: 1,
      columnCount: info.channelNames.length,
      data: new Float64Array(info.channelNames.length).fill(1),
    });

    it('should project channels through the operator', () => {
      const factory = jest.fn(
        (info: ChannelInfo, _settings: ProjectionSettings): ProjectionOperator =>
          summingOperator(info)
      );
      const projection = new LinearProjection({ operatorFactory: factory }, { id: 'proj' });
      pipeline.addProcessor(projection);
      pipeline.initializeAll();
      source.push(chunkFromRows([[1, 2], [3, 4]]));

      pipeline.tick();

      expect(factory).toHaveBeenCalledWith(source.channelInfo, { snr: 3, method: 'MNE' });
      const output = projection.output;
      expect(output && chunkToRows(output)).toEqual([[4, 6]]);
    });

    it('should expose its own channel info downstream', () => {
      const projection = new LinearProjection({ operatorFactory: summingOperator });
      const seen: string[][] = [];
      const after = new TransformProcessor((chunk: ReadonlyChunk, info: ChannelInfo) => {
        seen.push([...info.channelNames]);
        return chunk;
      });
      pipeline.addProcessor(projection);
      pipeline.addProcessor(after);
      pipeline.initializeAll();
      source.push(chunkFromRows([[1], [1]]));

      pipeline.tick();

      expect(projection.channelInfo).toMatchObject({
        channelNames: ['vertex #1'],
        channelTypes: ['misc'],
        samplingRate: 10,
      });
      expect(seen).toEqual([['vertex #1']]);
    });

    it('should reject operators that do not fit the channels', () => {
      const projection = new LinearProjection(
        {
          operatorFactory: () => ({ rowCount: 1, columnCount: 3, data: new Float64Array(3) }),
        },
        { id: 'proj' }
      );
      pipeline.addProcessor(projection);

      expect(() => pipeline.initializeAll()).toThrow(
        "Operator of LinearProjection 'proj' has 3 columns for 2 channels"
      );
      expect(projection.initialized).toBe(false);
    });

    it('should rebuild the operator when the method changes', () => {
      const factory = jest.fn(summingOperator);
      const projection = new LinearProjection({ operatorFactory: factory, snr: 2 });
      pipeline.addProcessor(projection);
      pipeline.initializeAll();
      source.push(chunkFromRows([[1], [1]]));

      projection.set('method', 'dSPM');
      pipeline.tick();

      expect(factory).toHaveBeenCalledTimes(2);
      expect(factory).toHaveBeenLastCalledWith(source.channelInfo, { snr: 2, method: 'dSPM' });
      expect(projection.lambda2).toBe(0.25);
    });

    it('should validate the signal-to-noise ratio', () => {
      expect(
        () => new LinearProjection({ operatorFactory: summingOperator, snr: -1 })
      ).toThrow('snr must be a positive number, got -1');
    });
  });

  describe('ChunkRecorder', () => {
    it('should keep copies of the most recent chunks', () => {
      const recorder = new ChunkRecorder({ maxChunks: 2 });
      pipeline.addOutput(recorder);
      pipeline.initializeAll();
      const first = chunkFromRows([[1], [1]]);
      source.push(first, chunkFromRows([[2], [2]]), chunkFromRows([[3], [3]]));

      pipeline.tick();
      first.data[0] = 99;
      expect(recorder.last?.data[0]).toBe(1);

      pipeline.tick();
      pipeline.tick();
      expect(recorder.chunks.map(chunkToRows)).toEqual([
        [[2], [2]],
        [[3], [3]],
      ]);
    });

    it('should drop recordings on reset', () => {
      const recorder = new ChunkRecorder({ maxChunks: 2 });
      pipeline.addOutput(recorder);
      pipeline.initializeAll();
      source.push(chunkFromRows([[1], [1]]), chunkFromRows([[2], [2]]));
      pipeline.tick();

      recorder.set('maxChunks', 5);
      pipeline.tick();

      expect(recorder.chunks).toEqual([]);
      expect(recorder.get('maxChunks')).toBe(5);
    });

    it('should validate the capacity', () => {
      expect(() => new ChunkRecorder({ maxChunks: 0 })).toThrow(
        'maxChunks must be a positive integer, got 0'
      );
    });
  });

  describe('StreamOutput', () => {
    it('should emit copies of received chunks', () => {
      const stream = new StreamOutput();
      const received: ReadonlyChunk[] = [];
      stream.chunks$.subscribe(chunk => received.push(chunk));
      pipeline.addOutput(stream);
      pipeline.initializeAll();
      const chunk = chunkFromRows([[1, 2], [3, 4]]);
      source.push(chunk);

      pipeline.tick();

      expect(received).toHaveLength(1);
      expect(received[0]).not.toBe(chunk);
      expect(chunkToRows(received[0])).toEqual([
        [1, 2],
        [3, 4],
      ]);
    });

    it('should complete its stream', () => {
      const stream = new StreamOutput();
      const complete = jest.fn();
      stream.chunks$.subscribe({ complete });

      stream.complete();

      expect(complete).toHaveBeenCalledTimes(1);
    });
  });
});
