import { ProcessorNode } from '../engine/roles';
import type { INodeOptions, UpstreamDependency } from '../types/node-api';
import { ValidationError } from '../utils/node-error';
import { channelLabelsSnapshot } from '../utils/signal/channel-info';

export interface ChannelStatisticsParams {
  /** Length of the calibration period */
  collectForSeconds: number;
}

/**
 * Collects per-channel mean and variance over a calibration period and
 * passes data through unchanged.
 *
 * Running means are kept in float64; the recursive formula drifts otherwise.
 */
export class ChannelStatistics extends ProcessorNode<ChannelStatisticsParams> {
  readonly resetTriggers = ['collectForSeconds'] as const;
  readonly upstreamDependencies: readonly UpstreamDependency[] = [
    { attribute: 'channelInfo', snapshot: channelLabelsSnapshot },
  ];

  private samplesToCollect = 0;
  private collected = 0;
  private means = new Float64Array(0);
  private meanSquares = new Float64Array(0);
  private deviations: readonly number[] | null = null;

  constructor(params: Partial<ChannelStatisticsParams> = {}, options?: INodeOptions) {
    super({ collectForSeconds: params.collectForSeconds ?? 60 }, options);
  }

  get samplesCollected(): number {
    return this.collected;
  }

  /**
   * Sample standard deviation of every channel, null until the calibration
   * period is over
   */
  get standardDeviations(): readonly number[] | null {
    return this.deviations;
  }

  protected override validateParams(params: Readonly<ChannelStatisticsParams>): void {
    if (!Number.isFinite(params.collectForSeconds) || params.collectForSeconds <= 0) {
      throw new ValidationError(
        `collectForSeconds must be a positive number, got ${params.collectForSeconds}`,
        this.id,
        'collectForSeconds'
      );
    }
  }

  protected onInitialize(): void {
    const info = this.upstreamChannelInfo();
    this.samplesToCollect = Math.ceil(this.params.collectForSeconds * info.samplingRate);
    this.resetStatistics(info.channelNames.length);
  }

  protected onUpdate(): void {
    const input = this.requireInput();
    if (this.collected < this.samplesToCollect) {
      this.accumulate(input.data, input.channelCount, input.sampleCount);
      if (this.collected >= this.samplesToCollect) {
        this.deviations = this.computeDeviations();
        this.logger.logEvent('statistics', 'collected', {
          nodeId: this.id,
          samples: this.collected,
        });
      }
    }
    this.setOutput(input);
  }

  protected onReset(): boolean {
    const info = this.upstreamChannelInfo();
    this.samplesToCollect = Math.ceil(this.params.collectForSeconds * info.samplingRate);
    this.resetStatistics(this.means.length);
    return true;
  }

  protected onInputHistoryInvalidation(): void {
    this.resetStatistics(this.means.length);
  }

  private resetStatistics(channelCount: number): void {
    this.collected = 0;
    this.means = new Float64Array(channelCount);
    this.meanSquares = new Float64Array(channelCount);
    this.deviations = null;
  }

  private accumulate(data: Readonly<Float64Array>, channelCount: number, sampleCount: number): void {
    if (channelCount !== this.means.length) {
      throw new ValidationError(
        `${this.type} '${this.id}' expects ${this.means.length} channels, got ${channelCount}`,
        this.id
      );
    }
    const n = this.collected;
    const m = sampleCount;
    for (let channel = 0; channel < channelCount; channel++) {
      let sum = 0;
      let sumOfSquares = 0;
      const offset = channel * sampleCount;
      for (let sample = 0; sample < sampleCount; sample++) {
        const value = data[offset + sample];
        sum += value;
        sumOfSquares += value * value;
      }
      this.means[channel] = (this.means[channel] * n + sum) / (n + m);
      this.meanSquares[channel] = (this.meanSquares[channel] * n + sumOfSquares) / (n + m);
    }
    this.collected = n + m;
  }

  private computeDeviations(): readonly number[] {
    const n = this.collected;
    if (n < 2) {
      return Array.from(this.means, () => 0);
    }
    return Array.from(this.means, (mean, channel) =>
      Math.sqrt((n / (n - 1)) * Math.max(0, this.meanSquares[channel] - mean * mean))
    );
  }
}
