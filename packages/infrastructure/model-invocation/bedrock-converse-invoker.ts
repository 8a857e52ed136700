/**
 * Bedrock Converse API によるモデル呼び出し
 */
import {
  BedrockRuntimeClient,
  ConverseCommand,
  type ConverseCommandInput,
} from '@aws-sdk/client-bedrock-runtime';
import { roundTo } from '../../domain/evaluation/evaluation-run';
import { awsErrorCode, awsErrorMessage, isAwsServiceError } from '../aws/aws-error';
import type { InvocationOutcome, InvokeModelOptions, ModelInvoker } from './model-invoker';

export const EVALUATION_TEMPERATURE = 0.1;

export interface BedrockConverseInvokerConfig {
  region?: string;
  /** ミリ秒単位の単調時計 */
  clock?: () => number;
}

export function toConverseInput(options: InvokeModelOptions): ConverseCommandInput {
  return {
    modelId: options.modelId,
    messages: [{ role: 'user', content: [{ text: options.prompt }] }],
    inferenceConfig: {
      maxTokens: options.maxTokens,
      temperature: EVALUATION_TEMPERATURE,
    },
    ...(options.systemPrompt ? { system: [{ text: options.systemPrompt }] } : {}),
  };
}

export class BedrockConverseInvoker implements ModelInvoker {
  private readonly client: BedrockRuntimeClient;
  private readonly clock: () => number;

  constructor(config: BedrockConverseInvokerConfig = {}) {
    this.client = new BedrockRuntimeClient({ region: config.region });
    this.clock = config.clock ?? (() => performance.now());
  }

  async invoke(options: InvokeModelOptions): Promise<InvocationOutcome> {
    const startedAt = this.clock();
    const elapsedSeconds = () => roundTo((this.clock() - startedAt) / 1000, 3);

    try {
      const response = await this.client.send(new ConverseCommand(toConverseInput(options)));

      const text = (response.output?.message?.content ?? [])
        .map((block) => ('text' in block ? block.text ?? '' : ''))
        .join('');

      return {
        ok: true,
        invocation: {
          response: text,
          latencySeconds: elapsedSeconds(),
          inputTokens: response.usage?.inputTokens ?? 0,
          outputTokens: response.usage?.outputTokens ?? 0,
          stopReason: response.stopReason ?? 'unknown',
        },
      };
    } catch (error) {
      if (!isAwsServiceError(error)) {
        throw error;
      }
      return {
        ok: false,
        failure: {
          error: `${awsErrorCode(error)}: ${awsErrorMessage(error)}`,
          latencySeconds: elapsedSeconds(),
        },
      };
    }
  }
}
