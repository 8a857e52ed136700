/**
 * account-status Lambda ユニットテスト
 */
import type { GetItemCommandOutput } from '@aws-sdk/client-dynamodb';
import { describe, expect, it, vi } from 'vitest';

vi.mock('@aws-sdk/client-dynamodb', () => ({
  DynamoDBClient: class {
    send = vi.fn();
  },
  GetItemCommand: class {
    constructor(public readonly input: unknown) {}
  },
}));

import { AccountIdMissingError } from '../../../../packages/domain/account/account-id';
import type { AccountStatusRepository } from '../../../../packages/infrastructure/account/account-status-repository';
import type { Logger } from '../../../../packages/infrastructure/observability/logger';
import { buildActionResponse, createAccountStatusHandler } from '../handler';

function fakeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function repositoryReturning(output: GetItemCommandOutput) {
  const requested: string[] = [];
  const repository: AccountStatusRepository = {
    getByAccountId: async (accountId) => {
      requested.push(accountId);
      return output;
    },
  };
  return { repository, requested };
}

describe('buildActionResponse', () => {
  it('should fill in defaults for a direct invocation', () => {
    const response = buildActionResponse({ account_id: 1 }, { Item: { Status: { S: 'ACTIVE' } } });

    expect(response).toEqual({
      messageVersion: '1.0',
      response: {
        actionGroup: 'CustomerAccountStatus',
        apiPath: '/getAccountStatus',
        httpMethod: 'POST',
        httpStatusCode: 200,
        responseBody: {
          'application/json': { body: '{"Item":{"Status":{"S":"ACTIVE"}}}' },
        },
      },
      sessionAttributes: {},
      promptSessionAttributes: {},
    });
  });

  it('should echo event fields including explicit nulls', () => {
    const response = buildActionResponse(
      {
        actionGroup: 'AccountLookup',
        apiPath: '/status',
        httpMethod: 'GET',
        sessionAttributes: { tier: 'gold' },
        promptSessionAttributes: null,
      },
      {}
    );

    expect(response.response.actionGroup).toBe('AccountLookup');
    expect(response.response.apiPath).toBe('/status');
    expect(response.response.httpMethod).toBe('GET');
    expect(response.sessionAttributes).toEqual({ tier: 'gold' });
    expect(response.promptSessionAttributes).toBeNull();
  });
});

describe('createAccountStatusHandler', () => {
  const found: GetItemCommandOutput = {
    Item: { AccountID: { N: '1001' }, Status: { S: 'SUSPENDED' } },
    $metadata: { httpStatusCode: 200 },
  };

  it('should look up the account from agent parameters', async () => {
    const { repository, requested } = repositoryReturning(found);
    const logger = fakeLogger();
    const handle = createAccountStatusHandler({ repository, logger });

    const response = await handle({
      actionGroup: 'CustomerAccountStatus',
      apiPath: '/getAccountStatus',
      httpMethod: 'POST',
      parameters: [{ name: 'AccountID', type: 'number', value: '1001' }],
    });

    expect(requested).toEqual(['1001']);
    expect(JSON.parse(response.response.responseBody['application/json'].body)).toEqual({
      Item: { AccountID: { N: '1001' }, Status: { S: 'SUSPENDED' } },
      $metadata: { httpStatusCode: 200 },
    });
    expect(logger.info).toHaveBeenCalledWith('Account status fetched', { accountId: '1001', found: true });
  });

  it('should return the empty lookup result when the account is unknown', async () => {
    const { repository } = repositoryReturning({ $metadata: {} });
    const handle = createAccountStatusHandler({ repository, logger: fakeLogger() });

    const response = await handle({ AccountID: 9999 });

    expect(response.response.responseBody['application/json'].body).toBe('{"$metadata":{}}');
  });

  it('should fail when no account id is present', async () => {
    const { repository, requested } = repositoryReturning(found);
    const handle = createAccountStatusHandler({ repository, logger: fakeLogger() });

    await expect(handle({ inputText: 'status?' })).rejects.toBeInstanceOf(AccountIdMissingError);
    expect(requested).toEqual([]);
  });

  it('should propagate repository failures', async () => {
    const repository: AccountStatusRepository = {
      getByAccountId: vi.fn().mockRejectedValue(new Error('ResourceNotFoundException')),
    };
    const handle = createAccountStatusHandler({ repository, logger: fakeLogger() });

    await expect(handle({ account_id: '1001' })).rejects.toThrow('ResourceNotFoundException');
  });
});
