/**
 * 口座ID抽出
 *
 * 直接呼び出し（Lambda コンソール）と Bedrock Agents アクショングループの
 * 両方のペイロード形式に対応する。探索順序は固定:
 *   1. event.account_id
 *   2. event.AccountID
 *   3. event.parameters（配列: name/value の組 / オブジェクト: キー→値 or {value}）
 */

const ACCOUNT_ID_KEYS: readonly string[] = ['account_id', 'AccountID'];

export type ActionGroupEvent = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fromParameters(parameters: unknown): unknown {
  if (Array.isArray(parameters)) {
    const match = parameters.find(
      (p): p is Record<string, unknown> =>
        isPlainObject(p) && typeof p.name === 'string' && ACCOUNT_ID_KEYS.includes(p.name)
    );
    return match?.value;
  }

  if (isPlainObject(parameters)) {
    const value = parameters.account_id || parameters.AccountID;
    return isPlainObject(value) ? value.value : value;
  }

  return undefined;
}

/**
 * イベントから口座IDを取り出す（DynamoDB の数値キー用に文字列化）
 */
export function extractAccountId(event: ActionGroupEvent): string {
  let accountId: unknown = event.account_id ?? event.AccountID;

  if (accountId === undefined || accountId === null) {
    accountId = fromParameters(event.parameters || {});
  }

  if (accountId === undefined || accountId === null || String(accountId).trim() === '') {
    throw new AccountIdMissingError(Object.keys(event));
  }

  return String(accountId);
}

export class AccountIdMissingError extends Error {
  constructor(public readonly eventKeys: string[]) {
    super(`AccountID is missing. Event keys: [${eventKeys.map((key) => `'${key}'`).join(', ')}]`);
    this.name = 'AccountIdMissingError';
  }
}
