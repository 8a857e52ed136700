/**
 * GetAccountStatus Query
 *
 * CQRS: 口座ステータス取得（アクショングループ用）
 */
import type { GetItemCommandOutput } from '@aws-sdk/client-dynamodb';
import type { AccountStatusRepository } from '../../../infrastructure/account/account-status-repository';
import { Query, type QueryHandler } from '../query';

export class GetAccountStatusQuery extends Query<GetItemCommandOutput> {
  constructor(public readonly accountId: string) {
    super();
  }
}

/**
 * GetAccountStatus Handler
 */
export class GetAccountStatusHandler implements QueryHandler<GetAccountStatusQuery, GetItemCommandOutput> {
  constructor(private readonly repository: AccountStatusRepository) {}

  async execute(query: GetAccountStatusQuery): Promise<GetItemCommandOutput> {
    return this.repository.getByAccountId(query.accountId);
  }
}
