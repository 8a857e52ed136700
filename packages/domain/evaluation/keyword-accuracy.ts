import stopwordList from './stopwords.json';

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);
const MIN_KEYWORD_LENGTH = 4;
const KEYWORD_CHAR = /[\p{L}\p{N}-]/u;

/**
 * テキストからキーワード集合を抽出
 *
 * 空白区切り → 小文字化 → 英数字と '-' 以外を除去 → 4文字以上かつストップワード以外
 */
export function extractKeywords(text: string): Set<string> {
  const keywords = new Set<string>();
  for (const word of text.toLowerCase().split(/\s+/)) {
    const chars = Array.from(word).filter((c) => KEYWORD_CHAR.test(c));
    if (chars.length >= MIN_KEYWORD_LENGTH) {
      const cleaned = chars.join('');
      if (!STOPWORDS.has(cleaned)) {
        keywords.add(cleaned);
      }
    }
  }
  return keywords;
}

/**
 * 期待応答のキーワードが実応答にどれだけ含まれるか（0.0〜1.0）
 *
 * - どちらかが空: 0.0
 * - 期待応答にキーワードがない: 1.0
 */
export function computeKeywordAccuracy(
  expected: string | null | undefined,
  actual: string | null | undefined
): number {
  if (!expected || !actual) {
    return 0.0;
  }

  const expectedKeywords = extractKeywords(expected);
  if (expectedKeywords.size === 0) {
    return 1.0;
  }

  const actualKeywords = extractKeywords(actual);
  let matched = 0;
  for (const keyword of expectedKeywords) {
    if (actualKeywords.has(keyword)) {
      matched++;
    }
  }
  return matched / expectedKeywords.size;
}
