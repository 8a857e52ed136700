/**
 * Command 基底クラス
 *
 * CQRS: 書き込み操作（ジョブ投入・評価実行）の抽象化
 */
import { randomUUID } from 'crypto';

export interface CommandMetadata {
  correlationId: string;
  timestamp: Date;
  region?: string;
}

export abstract class Command<TPayload = unknown> {
  public readonly commandId: string;
  public readonly commandType: string;
  public readonly payload: TPayload;
  public readonly metadata: CommandMetadata;

  constructor(payload: TPayload, metadata?: Partial<CommandMetadata>) {
    this.commandId = randomUUID();
    this.commandType = this.constructor.name;
    this.payload = payload;
    this.metadata = {
      correlationId: metadata?.correlationId ?? this.commandId,
      timestamp: metadata?.timestamp ?? new Date(),
      region: metadata?.region,
    };
  }
}

/**
 * Command Handler インターフェース
 */
export interface CommandHandler<TCommand extends Command, TResult = void> {
  execute(command: TCommand): Promise<TResult>;
}

/**
 * 進捗通知（CLI 側で表示）
 */
export type ProgressListener<TEvent> = (event: TEvent) => void;
