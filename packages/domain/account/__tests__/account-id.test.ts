/**
 * 口座ID抽出 ユニットテスト
 *
 * 直接呼び出し / アクショングループ（配列・オブジェクト）の各ペイロード形式
 */
import { describe, it, expect } from 'vitest';
import { AccountIdMissingError, extractAccountId } from '../account-id';

describe('extractAccountId', () => {
  describe('direct invocation payloads', () => {
    it('should read account_id', () => {
      expect(extractAccountId({ account_id: 12345 })).toBe('12345');
    });

    it('should read AccountID when account_id is absent', () => {
      expect(extractAccountId({ AccountID: '987' })).toBe('987');
    });

    it('should fall back to AccountID when account_id is null', () => {
      expect(extractAccountId({ account_id: null, AccountID: 5 })).toBe('5');
    });

    it('should keep a zero account id', () => {
      expect(extractAccountId({ account_id: 0 })).toBe('0');
    });

    it('should prefer top-level keys over parameters', () => {
      const event = {
        account_id: 1,
        parameters: [{ name: 'account_id', type: 'number', value: '2' }],
      };
      expect(extractAccountId(event)).toBe('1');
    });
  });

  describe('action group parameter lists', () => {
    it('should use the first matching name/value entry', () => {
      const event = {
        actionGroup: 'CustomerAccountStatus',
        parameters: [
          { name: 'branch', type: 'string', value: 'main' },
          { name: 'AccountID', type: 'number', value: '4242' },
          { name: 'account_id', type: 'number', value: '5151' },
        ],
      };
      expect(extractAccountId(event)).toBe('4242');
    });

    it('should throw when no entry matches', () => {
      const event = { parameters: [{ name: 'branch', value: 'main' }] };
      expect(() => extractAccountId(event)).toThrow(AccountIdMissingError);
    });
  });

  describe('action group parameter objects', () => {
    it('should read a plain value', () => {
      expect(extractAccountId({ parameters: { account_id: '77' } })).toBe('77');
    });

    it('should read the value of a nested object', () => {
      expect(extractAccountId({ parameters: { AccountID: { value: '88' } } })).toBe('88');
    });

    it('should skip a falsy account_id in favour of AccountID', () => {
      expect(extractAccountId({ parameters: { account_id: '', AccountID: '99' } })).toBe('99');
    });
  });

  describe('missing account id', () => {
    it('should list the event keys in the error message', () => {
      const event = { actionGroup: 'CustomerAccountStatus', apiPath: '/getAccountStatus' };
      expect(() => extractAccountId(event)).toThrow(
        "AccountID is missing. Event keys: ['actionGroup', 'apiPath']"
      );
    });

    it('should reject a blank value', () => {
      expect(() => extractAccountId({ account_id: '   ' })).toThrow(AccountIdMissingError);
    });

    it('should reject an empty event', () => {
      expect(() => extractAccountId({})).toThrow('AccountID is missing. Event keys: []');
    });

    it('should treat null parameters as empty', () => {
      expect(() => extractAccountId({ parameters: null })).toThrow(AccountIdMissingError);
    });
  });
});
