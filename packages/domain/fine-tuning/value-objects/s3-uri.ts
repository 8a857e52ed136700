import { ValueObject } from '../../shared/value-object';

const SCHEME = 's3://';

/**
 * S3 URI 値オブジェクト（s3://bucket/key）
 */
export class S3Uri extends ValueObject<{ bucket: string; key: string }> {
  private constructor(bucket: string, key: string) {
    super({ bucket, key });
  }

  get bucket(): string {
    return this.props.bucket;
  }

  get key(): string {
    return this.props.key;
  }

  static isS3Uri(value: string): boolean {
    return value.startsWith(SCHEME);
  }

  /**
   * 文字列から作成（バケット名は必須、キーは空でも可）
   */
  static parse(value: string): S3Uri {
    if (!S3Uri.isS3Uri(value)) {
      throw new InvalidS3UriError(value);
    }
    const rest = value.slice(SCHEME.length);
    const slash = rest.indexOf('/');
    const bucket = slash === -1 ? rest : rest.slice(0, slash);
    if (bucket.length === 0) {
      throw new InvalidS3UriError(value);
    }
    return new S3Uri(bucket, slash === -1 ? '' : rest.slice(slash + 1));
  }

  static of(bucket: string, key: string): S3Uri {
    if (bucket.length === 0) {
      throw new InvalidS3UriError(`${SCHEME}/${key}`);
    }
    return new S3Uri(bucket, key);
  }

  toString(): string {
    return `${SCHEME}${this.props.bucket}/${this.props.key}`;
  }
}

export class InvalidS3UriError extends Error {
  constructor(value: string) {
    super(`Invalid S3 URI: ${value}`);
    this.name = 'InvalidS3UriError';
  }
}
