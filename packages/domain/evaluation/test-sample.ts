/**
 * テストサンプル（JSONL 1行分）
 *
 * 対応形式:
 * 1. {"prompt": "...", "completion": "..."}
 * 2. {"system": "...", "messages": [{"role": "user", "content": "..."}, {"role": "assistant", "content": "..."}]}
 *
 * content / system は文字列または [{"text": "..."}] ブロック配列
 */
export type TestSampleRecord = Record<string, unknown>;

export interface PromptAndExpected {
  prompt: string;
  expected: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 文字列、またはテキストブロック配列を文字列化
 */
export function textOf(content: unknown): string | undefined {
  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    const texts = content
      .filter(isRecord)
      .map((block) => block.text)
      .filter((text): text is string => typeof text === 'string');
    return texts.length > 0 ? texts.join('') : undefined;
  }
  return undefined;
}

/**
 * プロンプトと期待応答を抽出（プロンプトがなければ null）
 *
 * prompt キーが messages より優先。同じロールが複数ある場合は最後のものを使う。
 */
export function extractPromptAndExpected(record: unknown): PromptAndExpected | null {
  if (!isRecord(record)) {
    return null;
  }

  if ('prompt' in record) {
    const prompt = textOf(record.prompt);
    if (prompt === undefined) {
      return null;
    }
    return { prompt, expected: textOf(record.completion) ?? '' };
  }

  if ('messages' in record) {
    let userMessage: string | undefined;
    let assistantMessage: string | undefined;
    const messages = Array.isArray(record.messages) ? record.messages : [];
    for (const message of messages.filter(isRecord)) {
      if (message.role === 'user') {
        userMessage = textOf(message.content);
      } else if (message.role === 'assistant') {
        assistantMessage = textOf(message.content);
      }
    }
    if (userMessage === undefined) {
      return null;
    }
    return { prompt: userMessage, expected: assistantMessage || '' };
  }

  return null;
}

/**
 * システムプロンプト（空なら undefined）
 */
export function extractSystemPrompt(record: unknown): string | undefined {
  if (!isRecord(record)) {
    return undefined;
  }
  return textOf(record.system) || undefined;
}
