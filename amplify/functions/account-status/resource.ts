import { defineFunction } from '@aws-amplify/backend';

/**
 * 口座ステータス照会 Lambda
 *
 * Bedrock Agents のアクショングループから呼び出される
 */
export const accountStatusFunction = defineFunction({
  name: 'account-status',
  entry: './handler.ts',
  timeoutSeconds: 30,
  memoryMB: 256,
  environment: {
    LOG_LEVEL: 'INFO',
    // ACCOUNT_STATUS_TABLE は backend.ts でテーブル名を設定
  },
  runtime: 20, // Node.js 20.x
});
