/**
 * IAM GetRole アダプター
 */
import { GetRoleCommand, IAMClient } from '@aws-sdk/client-iam';
import { awsErrorCode, isAwsServiceError } from '../aws/aws-error';
import type { Logger } from '../observability/logger';
import type { RoleDirectory } from './role-directory';

export interface IamRoleDirectoryConfig {
  region?: string;
  logger?: Logger;
}

export class IamRoleDirectory implements RoleDirectory {
  private readonly client: IAMClient;
  private readonly logger?: Logger;

  constructor(config: IamRoleDirectoryConfig = {}) {
    this.client = new IAMClient({ region: config.region });
    this.logger = config.logger;
  }

  async findRoleArn(roleName: string): Promise<string | undefined> {
    try {
      const response = await this.client.send(new GetRoleCommand({ RoleName: roleName }));
      return response.Role?.Arn;
    } catch (error) {
      if (!isAwsServiceError(error)) {
        throw error;
      }
      // NoSuchEntity / AccessDenied いずれも次の候補へ
      this.logger?.debug('Role lookup failed', { roleName, code: awsErrorCode(error) });
      return undefined;
    }
  }
}
