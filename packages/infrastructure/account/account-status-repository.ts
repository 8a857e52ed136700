/**
 * 口座ステータス参照 ポート
 */
import type { GetItemCommandOutput } from '@aws-sdk/client-dynamodb';

export interface AccountStatusRepository {
  /**
   * 口座IDで1件取得。エージェントには GetItem の応答をそのまま返す
   */
  getByAccountId(accountId: string): Promise<GetItemCommandOutput>;
}
