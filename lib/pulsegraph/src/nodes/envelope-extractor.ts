import { ProcessorNode } from '../engine/roles';
import type { INodeOptions, UpstreamDependency } from '../types/node-api';
import { ValidationError } from '../utils/node-error';
import { channelCountSnapshot } from '../utils/signal/channel-info';
import { createChunk } from '../utils/signal/chunk';

export const ENVELOPE_METHODS = ['Exponential smoothing'] as const;

export type EnvelopeMethod = (typeof ENVELOPE_METHODS)[number];

export interface EnvelopeExtractorParams {
  /** Weight of the previous envelope value, strictly between 0 and 1 */
  factor: number;
  method: EnvelopeMethod;
}

/**
 * Amplitude envelope per channel: `y[t] = factor * y[t-1] + (1 - factor) * |x[t]|`
 */
export class EnvelopeExtractor extends ProcessorNode<EnvelopeExtractorParams> {
  readonly resetTriggers = ['factor', 'method'] as const;
  readonly upstreamDependencies: readonly UpstreamDependency[] = [
    { attribute: 'channelInfo', snapshot: channelCountSnapshot },
  ];

  private envelope: Float64Array = new Float64Array(0);

  constructor(params: Partial<EnvelopeExtractorParams> = {}, options?: INodeOptions) {
    super(
      {
        factor: params.factor ?? 0.9,
        method: params.method ?? 'Exponential smoothing',
      },
      options
    );
  }

  /**
   * Last envelope value of every channel
   */
  get currentEnvelope(): readonly number[] {
    return Array.from(this.envelope);
  }

  protected override validateParams(params: Readonly<EnvelopeExtractorParams>): void {
    if (!(params.factor > 0 && params.factor < 1)) {
      throw new ValidationError(
        `Factor must be a number between 0 and 1, got ${params.factor}`,
        this.id,
        'factor'
      );
    }
    if (!ENVELOPE_METHODS.includes(params.method)) {
      throw new ValidationError(
        `Method ${String(params.method)} is not supported. Use one of: ${ENVELOPE_METHODS.join(', ')}`,
        this.id,
        'method'
      );
    }
  }

  protected onInitialize(): void {
    this.envelope = new Float64Array(this.upstreamChannelInfo().channelNames.length);
  }

  protected onUpdate(): void {
    const input = this.requireInput();
    if (input.channelCount !== this.envelope.length) {
      throw new ValidationError(
        `${this.type} '${this.id}' expects ${this.envelope.length} channels, got ${input.channelCount}`,
        this.id
      );
    }

    const { factor } = this.params;
    const output = createChunk(input.channelCount, input.sampleCount);
    for (let channel = 0; channel < input.channelCount; channel++) {
      const offset = channel * input.sampleCount;
      let value = this.envelope[channel];
      for (let sample = 0; sample < input.sampleCount; sample++) {
        value = factor * value + (1 - factor) * Math.abs(input.data[offset + sample]);
        output.data[offset + sample] = value;
      }
      this.envelope[channel] = value;
    }
    this.setOutput(output);
  }

  protected onReset(): boolean {
    return this.rebuild();
  }

  protected onInputHistoryInvalidation(): void {
    this.envelope.fill(0);
  }
}
