/**
 * Query 基底クラス
 *
 * CQRS: 読み取り操作（ジョブ状態・口座ステータス）の抽象化
 */
import { randomUUID } from 'crypto';

export abstract class Query<TResult> {
  public readonly queryId: string;
  public readonly queryType: string;

  constructor() {
    this.queryId = randomUUID();
    this.queryType = this.constructor.name;
  }

  // TypeScript用の型ヒント
  declare readonly _resultType: TResult;
}

/**
 * Query Handler インターフェース
 */
export interface QueryHandler<TQuery extends Query<TResult>, TResult> {
  execute(query: TQuery): Promise<TResult>;
}
