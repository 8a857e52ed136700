import type { Handler } from 'aws-lambda';
import { GetAccountStatusHandler, GetAccountStatusQuery } from '../../../packages/application/queries/account/get-account-status.query';
import { extractAccountId, type ActionGroupEvent } from '../../../packages/domain/account/account-id';
import type { AccountStatusRepository } from '../../../packages/infrastructure/account/account-status-repository';
import { DynamoDBAccountStatusRepository } from '../../../packages/infrastructure/account/dynamodb-account-status-repository';
import { loadEnvironment } from '../../../packages/infrastructure/config/environment';
import { createLogger, type Logger } from '../../../packages/infrastructure/observability/logger';

/**
 * Bedrock Agents アクショングループ: 口座ステータス照会
 *
 * DynamoDB GetItem の結果をそのまま JSON 文字列にして返す
 */

export const DEFAULT_ACTION_GROUP = 'CustomerAccountStatus';
export const DEFAULT_API_PATH = '/getAccountStatus';
export const DEFAULT_HTTP_METHOD = 'POST';

export interface ActionGroupResponse {
  messageVersion: '1.0';
  response: {
    actionGroup: unknown;
    apiPath: unknown;
    httpMethod: unknown;
    httpStatusCode: 200;
    responseBody: {
      'application/json': { body: string };
    };
  };
  sessionAttributes: unknown;
  promptSessionAttributes: unknown;
}

/**
 * キーが存在すれば値をそのまま（null でも）使う
 */
function eventField(event: ActionGroupEvent, key: string, fallback: unknown): unknown {
  return Object.hasOwn(event, key) ? event[key] : fallback;
}

export function buildActionResponse(event: ActionGroupEvent, output: unknown): ActionGroupResponse {
  return {
    messageVersion: '1.0',
    response: {
      actionGroup: eventField(event, 'actionGroup', DEFAULT_ACTION_GROUP),
      apiPath: eventField(event, 'apiPath', DEFAULT_API_PATH),
      httpMethod: eventField(event, 'httpMethod', DEFAULT_HTTP_METHOD),
      httpStatusCode: 200,
      responseBody: {
        'application/json': {
          body: JSON.stringify(output),
        },
      },
    },
    sessionAttributes: eventField(event, 'sessionAttributes', {}),
    promptSessionAttributes: eventField(event, 'promptSessionAttributes', {}),
  };
}

export interface AccountStatusFunctionDeps {
  repository: AccountStatusRepository;
  logger: Logger;
}

export function createAccountStatusHandler(
  deps: AccountStatusFunctionDeps
): (event: ActionGroupEvent) => Promise<ActionGroupResponse> {
  const queryHandler = new GetAccountStatusHandler(deps.repository);

  return async (event) => {
    deps.logger.info('Action group invocation', { event });

    const accountId = extractAccountId(event);
    const output = await queryHandler.execute(new GetAccountStatusQuery(accountId));

    deps.logger.info('Account status fetched', { accountId, found: output.Item !== undefined });
    return buildActionResponse(event, output);
  };
}

const env = loadEnvironment();

const handleEvent = createAccountStatusHandler({
  repository: new DynamoDBAccountStatusRepository({
    tableName: env.accountStatusTable,
    region: env.region,
  }),
  logger: createLogger('account-status'),
});

export const handler: Handler<ActionGroupEvent, ActionGroupResponse> = async (event) => handleEvent(event);
