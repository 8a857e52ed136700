/**
 * StartFineTuningJob Command
 *
 * CQRS: ファインチューニングジョブ投入コマンド
 *
 * 1. 学習/検証データを S3 URI に解決（ローカルなら検証 + アップロード）
 * 2. 出力先と IAM ロールを決定
 * 3. CreateModelCustomizationJob を呼び出す
 */
import {
  dataPrefixFor,
  outputUriFor,
  type FineTuningJobRequest,
} from '../../../domain/fine-tuning/job-request';
import type { HyperParameters } from '../../../domain/fine-tuning/value-objects/hyper-parameters';
import { findFineTuningRole, type RoleDirectory } from '../../../infrastructure/iam/role-directory';
import type {
  ModelCustomizationGateway,
  SubmittedJob,
} from '../../../infrastructure/model-customization/model-customization-gateway';
import type { DatasetStore } from '../../../infrastructure/storage/dataset-store';
import { Command, type CommandHandler, type CommandMetadata, type ProgressListener } from '../command';
import { resolveDataUri, type DatasetEvent } from './resolve-data-uri';
import type { JsonlFileReader } from './validate-training-dataset';

export interface StartFineTuningJobPayload {
  baseModelIdentifier: string;
  trainingData: string;
  validationData?: string;
  bucket?: string;
  jobName: string;
  customModelName: string;
  roleArn?: string;
  hyperParameters: HyperParameters;
}

export class StartFineTuningJobCommand extends Command<StartFineTuningJobPayload> {
  constructor(payload: StartFineTuningJobPayload, metadata?: Partial<CommandMetadata>) {
    super(payload, metadata);
  }
}

export type JobSubmissionEvent =
  | DatasetEvent
  | { type: 'training-data-resolved'; uri: string }
  | { type: 'validation-data-resolved'; uri: string }
  | { type: 'output-resolved'; uri: string }
  | { type: 'role-resolved'; roleArn: string; detected: boolean }
  | { type: 'submitting' };

export interface StartFineTuningJobResult extends SubmittedJob {
  request: FineTuningJobRequest;
}

export interface StartFineTuningJobDeps {
  gateway: ModelCustomizationGateway;
  datasetStore: DatasetStore;
  roleDirectory: RoleDirectory;
  readJsonl?: JsonlFileReader;
  onProgress?: ProgressListener<JobSubmissionEvent>;
}

/**
 * StartFineTuningJob Handler
 */
export class StartFineTuningJobHandler
  implements CommandHandler<StartFineTuningJobCommand, StartFineTuningJobResult>
{
  constructor(private readonly deps: StartFineTuningJobDeps) {}

  async execute(command: StartFineTuningJobCommand): Promise<StartFineTuningJobResult> {
    const { payload } = command;
    const { gateway, datasetStore, roleDirectory, readJsonl, onProgress } = this.deps;
    const prefix = dataPrefixFor(payload.jobName);
    const datasetDeps = { datasetStore, readJsonl, onProgress };

    const trainingDataUri = await resolveDataUri(payload.trainingData, payload.bucket, prefix, datasetDeps);
    if (!trainingDataUri) {
      throw new Error('Training data is required');
    }
    onProgress?.({ type: 'training-data-resolved', uri: trainingDataUri });

    const validationDataUri = await resolveDataUri(payload.validationData, payload.bucket, prefix, datasetDeps);
    if (validationDataUri) {
      onProgress?.({ type: 'validation-data-resolved', uri: validationDataUri });
    }

    const outputDataUri = outputUriFor(prefix, trainingDataUri, payload.bucket);
    onProgress?.({ type: 'output-resolved', uri: outputDataUri });

    let roleArn = payload.roleArn;
    if (roleArn) {
      onProgress?.({ type: 'role-resolved', roleArn, detected: false });
    } else {
      roleArn = await findFineTuningRole(roleDirectory);
      if (!roleArn) {
        throw new FineTuningRoleNotFoundError();
      }
      onProgress?.({ type: 'role-resolved', roleArn, detected: true });
    }

    const request: FineTuningJobRequest = {
      jobName: payload.jobName,
      customModelName: payload.customModelName,
      roleArn,
      baseModelIdentifier: payload.baseModelIdentifier,
      trainingDataUri,
      validationDataUri,
      outputDataUri,
      hyperParameters: payload.hyperParameters,
    };

    onProgress?.({ type: 'submitting' });
    const submitted = await gateway.createJob(request);

    return { ...submitted, request };
  }
}

export class FineTuningRoleNotFoundError extends Error {
  constructor() {
    super('No --role-arn provided and could not auto-detect a Bedrock fine-tuning role.');
    this.name = 'FineTuningRoleNotFoundError';
  }
}
