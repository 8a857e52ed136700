/**
 * モデル呼び出し ポート
 */
import type { InvocationFailure, ModelInvocation } from '../../domain/evaluation/evaluation-run';

export interface InvokeModelOptions {
  modelId: string;
  prompt: string;
  systemPrompt?: string;
  maxTokens: number;
}

/**
 * サービスエラーは例外ではなく失敗結果として返す（評価ループを止めない）
 */
export type InvocationOutcome =
  | { ok: true; invocation: ModelInvocation }
  | { ok: false; failure: InvocationFailure };

export interface ModelInvoker {
  invoke(options: InvokeModelOptions): Promise<InvocationOutcome>;
}
