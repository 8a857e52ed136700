/**
 * Bedrock モデルカスタマイズ アダプター
 *
 * CreateModelCustomizationJob / GetModelCustomizationJob
 * SDK の例外はそのまま呼び出し元へ伝播する（リトライは SDK 標準のみ）
 */
import {
  BedrockClient,
  CreateModelCustomizationJobCommand,
  GetModelCustomizationJobCommand,
  type CreateModelCustomizationJobCommandInput,
  type GetModelCustomizationJobCommandOutput,
} from '@aws-sdk/client-bedrock';
import { CUSTOMIZATION_TYPE, type FineTuningJobRequest } from '../../domain/fine-tuning/job-request';
import type { FineTuningJobSnapshot } from '../../domain/fine-tuning/job-status';
import type { ModelCustomizationGateway, SubmittedJob } from './model-customization-gateway';

export interface BedrockModelCustomizationConfig {
  region?: string;
}

export function toCreateJobInput(request: FineTuningJobRequest): CreateModelCustomizationJobCommandInput {
  return {
    jobName: request.jobName,
    customModelName: request.customModelName,
    roleArn: request.roleArn,
    baseModelIdentifier: request.baseModelIdentifier,
    customizationType: CUSTOMIZATION_TYPE,
    trainingDataConfig: { s3Uri: request.trainingDataUri },
    outputDataConfig: { s3Uri: request.outputDataUri },
    hyperParameters: request.hyperParameters.toRequest(),
    ...(request.validationDataUri
      ? { validationDataConfig: { validators: [{ s3Uri: request.validationDataUri }] } }
      : {}),
  };
}

export function toJobSnapshot(output: GetModelCustomizationJobCommandOutput): FineTuningJobSnapshot {
  return {
    jobName: output.jobName,
    jobArn: output.jobArn,
    status: output.status ?? 'Unknown',
    baseModelIdentifier: output.baseModelArn,
    outputModelName: output.outputModelName,
    outputModelArn: output.outputModelArn,
    creationTime: output.creationTime,
    endTime: output.endTime,
    hyperParameters: output.hyperParameters ?? {},
    trainingDataUri: output.trainingDataConfig?.s3Uri,
    validationDataUris: (output.validationDataConfig?.validators ?? [])
      .map((validator) => validator.s3Uri)
      .filter((uri): uri is string => typeof uri === 'string'),
    outputDataUri: output.outputDataConfig?.s3Uri,
    trainingLoss: output.trainingMetrics?.trainingLoss,
    validationLosses: (output.validationMetrics ?? [])
      .map((metric) => metric.validationLoss)
      .filter((loss): loss is number => typeof loss === 'number'),
    failureMessage: output.failureMessage,
  };
}

export class BedrockModelCustomizationGateway implements ModelCustomizationGateway {
  private readonly client: BedrockClient;

  constructor(config: BedrockModelCustomizationConfig = {}) {
    this.client = new BedrockClient({ region: config.region });
  }

  async createJob(request: FineTuningJobRequest): Promise<SubmittedJob> {
    const response = await this.client.send(
      new CreateModelCustomizationJobCommand(toCreateJobInput(request))
    );
    if (!response.jobArn) {
      throw new Error(`CreateModelCustomizationJob returned no jobArn for ${request.jobName}`);
    }
    return { jobArn: response.jobArn };
  }

  async getJob(jobIdentifier: string, signal?: AbortSignal): Promise<FineTuningJobSnapshot> {
    const response = await this.client.send(
      new GetModelCustomizationJobCommand({ jobIdentifier }),
      { abortSignal: signal }
    );
    return toJobSnapshot(response);
  }
}
