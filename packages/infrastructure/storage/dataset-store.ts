/**
 * データセット保存先 ポート
 */
export interface DatasetStore {
  /**
   * ローカルファイルをアップロードし、s3:// URI を返す
   */
  upload(localPath: string, bucket: string, key: string): Promise<string>;
}
