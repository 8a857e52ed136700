/**
 * Fine-Tuning Service
 *
 * 責務:
 * - ファインチューニングジョブの投入・監視
 * - ファインチューニング済みモデルの評価
 *
 * CQRS Command/Query を統合するファサード。
 * AWS クライアントは必要になった時点で生成する（CLI ごとに使う API が異なるため）。
 */
import {
  EvaluateModelCommand,
  EvaluateModelHandler,
  type EvaluateModelPayload,
  type EvaluateModelResult,
  type EvaluationEvent,
} from '../../application/commands/evaluation/evaluate-model.command';
import {
  StartFineTuningJobCommand,
  StartFineTuningJobHandler,
  type JobSubmissionEvent,
  type StartFineTuningJobPayload,
  type StartFineTuningJobResult,
} from '../../application/commands/fine-tuning/start-fine-tuning-job.command';
import type { ProgressListener } from '../../application/commands/command';
import { GetJobStatusHandler, GetJobStatusQuery } from '../../application/queries/fine-tuning/get-job-status.query';
import { watchJob, type Sleep, type WatchJobOutcome } from '../../application/queries/fine-tuning/watch-job';
import type { FineTuningJobSnapshot } from '../../domain/fine-tuning/job-status';
import { IamRoleDirectory } from '../../infrastructure/iam/iam-role-directory';
import type { RoleDirectory } from '../../infrastructure/iam/role-directory';
import { BedrockModelCustomizationGateway } from '../../infrastructure/model-customization/bedrock-model-customization-gateway';
import type { ModelCustomizationGateway } from '../../infrastructure/model-customization/model-customization-gateway';
import { BedrockConverseInvoker } from '../../infrastructure/model-invocation/bedrock-converse-invoker';
import type { ModelInvoker } from '../../infrastructure/model-invocation/model-invoker';
import { createLogger, type Logger } from '../../infrastructure/observability/logger';
import type { DatasetStore } from '../../infrastructure/storage/dataset-store';
import { S3DatasetStore } from '../../infrastructure/storage/s3-dataset-store';

export interface FineTuningServiceConfig {
  region?: string;
  logger?: Logger;
  gateway?: ModelCustomizationGateway;
  datasetStore?: DatasetStore;
  roleDirectory?: RoleDirectory;
  invoker?: ModelInvoker;
}

export interface WatchOptions {
  intervalSeconds: number;
  sleep: Sleep;
  signal?: AbortSignal;
  onSnapshot?: (snapshot: FineTuningJobSnapshot, pollCount: number) => void;
  onWaiting?: (intervalSeconds: number) => void;
}

/**
 * Fine-Tuning Service Facade
 */
export class FineTuningService {
  private readonly logger: Logger;
  private gatewayInstance?: ModelCustomizationGateway;
  private datasetStoreInstance?: DatasetStore;
  private roleDirectoryInstance?: RoleDirectory;
  private invokerInstance?: ModelInvoker;

  constructor(private readonly config: FineTuningServiceConfig = {}) {
    this.logger = config.logger ?? createLogger('fine-tuning-service', { defaultLevel: 'WARN' });
    this.gatewayInstance = config.gateway;
    this.datasetStoreInstance = config.datasetStore;
    this.roleDirectoryInstance = config.roleDirectory;
    this.invokerInstance = config.invoker;
  }

  private get gateway(): ModelCustomizationGateway {
    return (this.gatewayInstance ??= new BedrockModelCustomizationGateway({ region: this.config.region }));
  }

  private get datasetStore(): DatasetStore {
    return (this.datasetStoreInstance ??= new S3DatasetStore({ region: this.config.region }));
  }

  private get roleDirectory(): RoleDirectory {
    return (this.roleDirectoryInstance ??= new IamRoleDirectory({
      region: this.config.region,
      logger: this.logger,
    }));
  }

  private get invoker(): ModelInvoker {
    return (this.invokerInstance ??= new BedrockConverseInvoker({ region: this.config.region }));
  }

  // === Commands ===

  async startJob(
    payload: StartFineTuningJobPayload,
    onProgress?: ProgressListener<JobSubmissionEvent>
  ): Promise<StartFineTuningJobResult> {
    const handler = new StartFineTuningJobHandler({
      gateway: this.gateway,
      datasetStore: this.datasetStore,
      roleDirectory: this.roleDirectory,
      onProgress,
    });
    const command = new StartFineTuningJobCommand(payload, { region: this.config.region });
    this.logger.info('StartFineTuningJob', {
      commandId: command.commandId,
      jobName: payload.jobName,
      baseModel: payload.baseModelIdentifier,
    });
    const result = await handler.execute(command);
    this.logger.info('StartFineTuningJob completed', { commandId: command.commandId, jobArn: result.jobArn });
    return result;
  }

  async evaluate(
    payload: EvaluateModelPayload,
    onProgress?: ProgressListener<EvaluationEvent>
  ): Promise<EvaluateModelResult> {
    const handler = new EvaluateModelHandler({ invoker: this.invoker, onProgress });
    const command = new EvaluateModelCommand(payload, { region: this.config.region });
    this.logger.info('EvaluateModel', {
      commandId: command.commandId,
      modelId: payload.modelId,
      testData: payload.testDataPath,
    });
    return handler.execute(command);
  }

  // === Queries ===

  async getJob(jobIdentifier: string): Promise<FineTuningJobSnapshot> {
    const query = new GetJobStatusQuery(jobIdentifier);
    this.logger.debug('GetJobStatus', { queryId: query.queryId, jobIdentifier });
    return new GetJobStatusHandler(this.gateway).execute(query);
  }

  async watchJob(jobIdentifier: string, options: WatchOptions): Promise<WatchJobOutcome> {
    this.logger.info('WatchJob', { jobIdentifier, intervalSeconds: options.intervalSeconds });
    return watchJob({
      jobIdentifier,
      handler: new GetJobStatusHandler(this.gateway),
      ...options,
    });
  }
}

export * from '../../application/commands/fine-tuning/start-fine-tuning-job.command';
export * from '../../application/commands/evaluation/evaluate-model.command';
export * from '../../application/queries/fine-tuning/get-job-status.query';
export * from '../../application/queries/fine-tuning/watch-job';
