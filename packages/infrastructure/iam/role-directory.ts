/**
 * IAM ロール参照 ポート
 */
export interface RoleDirectory {
  /**
   * ロール名から ARN を取得（存在しない・参照できない場合は undefined）
   */
  findRoleArn(roleName: string): Promise<string | undefined>;
}

/**
 * ファインチューニング用ロールの自動検出候補（この順で探す）
 */
export const FINE_TUNING_ROLE_CANDIDATES: readonly string[] = [
  'BedrockFineTuningRole',
  'AmazonBedrockFineTuningRole',
  'bedrock-finetuning-role',
];

export async function findFineTuningRole(
  directory: RoleDirectory,
  candidates: readonly string[] = FINE_TUNING_ROLE_CANDIDATES
): Promise<string | undefined> {
  for (const roleName of candidates) {
    const arn = await directory.findRoleArn(roleName);
    if (arn) {
      return arn;
    }
  }
  return undefined;
}
