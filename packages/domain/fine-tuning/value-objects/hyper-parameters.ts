import { ValueObject } from '../../shared/value-object';

interface HyperParameterProps extends Record<string, unknown> {
  epochCount: number;
  batchSize: number;
  learningRate: number;
}

/**
 * ファインチューニングのハイパーパラメータ
 *
 * Bedrock API にはすべて文字列で渡す
 */
export class HyperParameters extends ValueObject<HyperParameterProps> {
  static readonly DEFAULT_EPOCHS = 3;
  static readonly DEFAULT_BATCH_SIZE = 8;
  static readonly DEFAULT_LEARNING_RATE = 0.0001;

  private constructor(props: HyperParameterProps) {
    super(props);
  }

  get epochCount(): number {
    return this.props.epochCount;
  }

  get batchSize(): number {
    return this.props.batchSize;
  }

  get learningRate(): number {
    return this.props.learningRate;
  }

  static create(props: Partial<HyperParameterProps> = {}): HyperParameters {
    const epochCount = props.epochCount ?? HyperParameters.DEFAULT_EPOCHS;
    const batchSize = props.batchSize ?? HyperParameters.DEFAULT_BATCH_SIZE;
    const learningRate = props.learningRate ?? HyperParameters.DEFAULT_LEARNING_RATE;

    if (!Number.isInteger(epochCount) || epochCount < 1) {
      throw new InvalidHyperParametersError('epochCount', epochCount);
    }
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new InvalidHyperParametersError('batchSize', batchSize);
    }
    if (!Number.isFinite(learningRate) || learningRate <= 0) {
      throw new InvalidHyperParametersError('learningRate', learningRate);
    }

    return new HyperParameters({ epochCount, batchSize, learningRate });
  }

  toRequest(): Record<string, string> {
    return {
      epochCount: String(this.props.epochCount),
      batchSize: String(this.props.batchSize),
      learningRate: String(this.props.learningRate),
    };
  }
}

export class InvalidHyperParametersError extends Error {
  constructor(
    public readonly parameter: string,
    public readonly value: number
  ) {
    super(`Invalid hyperparameter ${parameter}: ${value}`);
    this.name = 'InvalidHyperParametersError';
  }
}
