import { ProcessorNode } from '../engine/roles';
import type { AttributeLookup, INodeOptions, UpstreamDependency } from '../types/node-api';
import type { ChannelInfo, ChannelType } from '../types/signal';
import { ValidationError } from '../utils/node-error';
import { channelLabelsSnapshot, createChannelInfo } from '../utils/signal/channel-info';
import { createChunk } from '../utils/signal/chunk';

export const PROJECTION_METHODS = ['MNE', 'dSPM', 'sLORETA'] as const;

export type ProjectionMethod = (typeof PROJECTION_METHODS)[number];

/**
 * Row-major matrix mapping `columnCount` channels onto `rowCount` outputs
 */
export interface ProjectionOperator {
  readonly rowCount: number;
  readonly columnCount: number;
  readonly data: Float64Array;
}

export interface ProjectionSettings {
  readonly snr: number;
  readonly method: ProjectionMethod;
}

/**
 * Builds the operator for the current channel layout, usually by delegating
 * to an inverse-modelling library
 */
export type OperatorFactory = (
  channelInfo: ChannelInfo,
  settings: ProjectionSettings
) => ProjectionOperator;

export interface LinearProjectionParams {
  /** Signal-to-noise ratio, strictly positive */
  snr: number;
  method: ProjectionMethod;
  operatorFactory: OperatorFactory;
}

/**
 * Projects channel data through an operator matrix, e.g. onto cortical
 * vertices. Nodes below see the projection's own channel info.
 */
export class LinearProjection extends ProcessorNode<LinearProjectionParams> {
  readonly resetTriggers = ['snr', 'method', 'operatorFactory'] as const;
  readonly upstreamDependencies: readonly UpstreamDependency[] = [
    { attribute: 'channelInfo', snapshot: channelLabelsSnapshot },
  ];

  private operator: ProjectionOperator | null = null;
  private projectedInfo: ChannelInfo | null = null;

  constructor(
    params: Pick<LinearProjectionParams, 'operatorFactory'> & Partial<LinearProjectionParams>,
    options?: INodeOptions
  ) {
    super(
      {
        snr: params.snr ?? 3,
        method: params.method ?? 'MNE',
        operatorFactory: params.operatorFactory,
      },
      options
    );
  }

  /**
   * Regularization parameter derived from `snr`
   */
  get lambda2(): number {
    return 1 / this.params.snr ** 2;
  }

  get channelInfo(): ChannelInfo | null {
    return this.projectedInfo;
  }

  override readAttribute(name: string): AttributeLookup {
    if (name === 'channelInfo') {
      return { found: true, value: this.projectedInfo };
    }
    return super.readAttribute(name);
  }

  protected override validateParams(params: Readonly<LinearProjectionParams>): void {
    if (!Number.isFinite(params.snr) || params.snr <= 0) {
      throw new ValidationError(
        `snr must be a positive number, got ${params.snr}`,
        this.id,
        'snr'
      );
    }
    if (!PROJECTION_METHODS.includes(params.method)) {
      throw new ValidationError(
        `Method ${String(params.method)} is not supported. Use one of: ${PROJECTION_METHODS.join(', ')}`,
        this.id,
        'method'
      );
    }
  }

  protected onInitialize(): void {
    this.operator = null;
    this.projectedInfo = null;

    const upstreamInfo = this.upstreamChannelInfo();
    const { snr, method } = this.params;
    const operator = this.params.operatorFactory(upstreamInfo, { snr, method });

    const channelCount = upstreamInfo.channelNames.length;
    if (operator.columnCount !== channelCount) {
      throw new ValidationError(
        `Operator of ${this.type} '${this.id}' has ${operator.columnCount} columns for ${channelCount} channels`,
        this.id,
        'operatorFactory'
      );
    }
    if (operator.data.length !== operator.rowCount * operator.columnCount) {
      throw new ValidationError(
        `Operator of ${this.type} '${this.id}' is not a ${operator.rowCount}x${operator.columnCount} matrix`,
        this.id,
        'operatorFactory'
      );
    }

    const labels = Array.from({ length: operator.rowCount }, (_, row) => `vertex #${row + 1}`);
    this.operator = operator;
    this.projectedInfo = createChannelInfo(labels, upstreamInfo.samplingRate, {
      channelTypes: labels.map((): ChannelType => 'misc'),
    });
  }

  protected onUpdate(): void {
    const input = this.requireInput();
    const operator = this.requireOperator();
    if (input.channelCount !== operator.columnCount) {
      throw new ValidationError(
        `${this.type} '${this.id}' expects ${operator.columnCount} channels, got ${input.channelCount}`,
        this.id
      );
    }

    const output = createChunk(operator.rowCount, input.sampleCount);
    for (let row = 0; row < operator.rowCount; row++) {
      for (let column = 0; column < operator.columnCount; column++) {
        const weight = operator.data[row * operator.columnCount + column];
        if (weight === 0) {
          continue;
        }
        const inOffset = column * input.sampleCount;
        const outOffset = row * input.sampleCount;
        for (let sample = 0; sample < input.sampleCount; sample++) {
          output.data[outOffset + sample] += weight * input.data[inOffset + sample];
        }
      }
    }
    this.setOutput(output);
  }

  protected onReset(): boolean {
    return this.rebuild();
  }

  protected onInputHistoryInvalidation(): void {
    // memoryless
  }

  private requireOperator(): ProjectionOperator {
    if (!this.operator) {
      throw new ValidationError(`${this.type} '${this.id}' has no operator`, this.id);
    }
    return this.operator;
  }
}
