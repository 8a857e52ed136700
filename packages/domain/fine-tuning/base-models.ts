/**
 * ファインチューニング対応として把握しているベースモデル
 *
 * 一覧にないモデルは警告のみ（最終判断は API 側）
 */
export const SUPPORTED_BASE_MODELS = [
  'amazon.nova-micro-v1:0',
  'amazon.nova-lite-v1:0',
  'amazon.nova-pro-v1:0',
  'amazon.titan-text-express-v1',
  'anthropic.claude-3-haiku-20240307-v1:0',
  'meta.llama3-1-8b-instruct-v1:0',
  'meta.llama3-1-70b-instruct-v1:0',
  'cohere.command-r-v1:0',
] as const;

export type SupportedBaseModel = (typeof SUPPORTED_BASE_MODELS)[number];

const SUPPORTED_MODEL_IDS: ReadonlySet<string> = new Set(SUPPORTED_BASE_MODELS);

export function isSupportedBaseModel(modelId: string): modelId is SupportedBaseModel {
  return SUPPORTED_MODEL_IDS.has(modelId);
}
