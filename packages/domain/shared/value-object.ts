/**
 * 値オブジェクト基底クラス
 *
 * 特徴:
 * - 不変（イミュータブル）
 * - 属性ごとの等価性
 */
export abstract class ValueObject<T extends Record<string, unknown>> {
  protected readonly props: Readonly<T>;

  protected constructor(props: T) {
    this.props = Object.freeze({ ...props });
  }

  /**
   * 同じ型で全属性が一致すれば等価
   */
  equals(other: ValueObject<T> | null | undefined): boolean {
    if (other === null || other === undefined) {
      return false;
    }
    if (other.constructor !== this.constructor) {
      return false;
    }
    const keys = Object.keys(this.props);
    if (keys.length !== Object.keys(other.props).length) {
      return false;
    }
    return keys.every((key) => Object.is(this.props[key], other.props[key]));
  }

  toJSON(): T {
    return { ...this.props };
  }
}
