import { defineBackend } from '@aws-amplify/backend';
import { RemovalPolicy, Stack } from 'aws-cdk-lib';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import { Effect, PolicyStatement, ServicePrincipal } from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import { DEFAULT_ACCOUNT_STATUS_TABLE } from '../packages/infrastructure/config/environment';
import { accountStatusFunction } from './functions/account-status/resource';

/**
 * Backend Definition
 *
 * Amplify Gen2 構成
 * - Functions: Bedrock Agents アクショングループ（口座ステータス照会）
 * - Data: 口座ステータステーブル（DynamoDB）
 */
const backend = defineBackend({
  accountStatusFunction,
});

// =============================================================================
// DynamoDB Table
// =============================================================================

const accountStatusTable = new dynamodb.Table(
  backend.createStack('AccountStatusStack'),
  'CustomerAccountStatusTable',
  {
    tableName: DEFAULT_ACCOUNT_STATUS_TABLE,
    partitionKey: { name: 'AccountID', type: dynamodb.AttributeType.NUMBER },
    billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
    removalPolicy: RemovalPolicy.RETAIN,
  }
);

// =============================================================================
// Lambda Environment Variables
// =============================================================================

const accountStatusLambda = backend.accountStatusFunction.resources.lambda;
const underlyingLambda = accountStatusLambda.node.defaultChild;
if (!(underlyingLambda instanceof lambda.CfnFunction)) {
  throw new Error('account-status function has no underlying CfnFunction');
}
underlyingLambda.addPropertyOverride('Environment.Variables.ACCOUNT_STATUS_TABLE', accountStatusTable.tableName);

// =============================================================================
// IAM Policies
// =============================================================================

// DynamoDB 読み取り権限（GetItem のみ）
accountStatusLambda.addToRolePolicy(
  new PolicyStatement({
    effect: Effect.ALLOW,
    actions: ['dynamodb:GetItem'],
    resources: [accountStatusTable.tableArn],
  })
);

// Bedrock Agents からの呼び出しを許可
accountStatusLambda.addPermission('BedrockAgentInvoke', {
  principal: new ServicePrincipal('bedrock.amazonaws.com'),
  action: 'lambda:InvokeFunction',
  sourceAccount: Stack.of(accountStatusLambda).account,
});

export default backend;
