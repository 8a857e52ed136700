/**
 * GetJobStatus Query
 *
 * CQRS: ジョブ状態取得クエリ
 */
import type { FineTuningJobSnapshot } from '../../../domain/fine-tuning/job-status';
import type { ModelCustomizationGateway } from '../../../infrastructure/model-customization/model-customization-gateway';
import { Query, type QueryHandler } from '../query';

export class GetJobStatusQuery extends Query<FineTuningJobSnapshot> {
  constructor(
    public readonly jobIdentifier: string,
    public readonly signal?: AbortSignal
  ) {
    super();
  }
}

/**
 * GetJobStatus Handler
 */
export class GetJobStatusHandler implements QueryHandler<GetJobStatusQuery, FineTuningJobSnapshot> {
  constructor(private readonly gateway: ModelCustomizationGateway) {}

  async execute(query: GetJobStatusQuery): Promise<FineTuningJobSnapshot> {
    return this.gateway.getJob(query.jobIdentifier, query.signal);
  }
}
