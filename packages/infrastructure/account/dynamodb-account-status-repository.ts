/**
 * DynamoDB 口座ステータス アダプター
 *
 * テーブル設計:
 * - PK: AccountID (Number)
 */
import { DynamoDBClient, GetItemCommand, type GetItemCommandOutput } from '@aws-sdk/client-dynamodb';
import type { AccountStatusRepository } from './account-status-repository';

export interface DynamoDBAccountStatusConfig {
  tableName: string;
  region?: string;
  endpoint?: string; // ローカル開発用
}

export class DynamoDBAccountStatusRepository implements AccountStatusRepository {
  private readonly client: DynamoDBClient;
  private readonly tableName: string;

  constructor(config: DynamoDBAccountStatusConfig) {
    this.tableName = config.tableName;
    this.client = new DynamoDBClient({
      region: config.region,
      endpoint: config.endpoint,
    });
  }

  async getByAccountId(accountId: string): Promise<GetItemCommandOutput> {
    // Number 型でも値は文字列で渡す
    return this.client.send(
      new GetItemCommand({
        TableName: this.tableName,
        Key: { AccountID: { N: accountId } },
      })
    );
  }
}
