/**
 * 実行時設定
 *
 * - 環境変数 + コード内デフォルト
 * - CLI フラグは常に環境変数より優先
 * - リージョン未指定時は AWS SDK のデフォルトプロバイダチェーンに任せる
 */
import type { LogLevel } from '../observability/logger';

export interface ToolEnvironment {
  region?: string;
  logLevel?: LogLevel;
  accountStatusTable: string;
}

export const DEFAULT_ACCOUNT_STATUS_TABLE = 'CustomerAccountStatus';

const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const upper = value.toUpperCase();
  return LOG_LEVELS.find((level) => level === upper);
}

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): ToolEnvironment {
  return {
    region: env.AWS_REGION || env.AWS_DEFAULT_REGION || undefined,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    accountStatusTable: env.ACCOUNT_STATUS_TABLE || DEFAULT_ACCOUNT_STATUS_TABLE,
  };
}

/**
 * --region > AWS_REGION > AWS_DEFAULT_REGION
 */
export function resolveRegion(flag: string | undefined, env: NodeJS.ProcessEnv = process.env): string | undefined {
  return flag || loadEnvironment(env).region;
}
