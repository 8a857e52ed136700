/**
 * オペレーター向け出力
 *
 * バナーや表は logger ではなく Terminal に書く（logger は JSON 行専用）
 */

export interface Terminal {
  /** 1行出力（改行付き） */
  print(line?: string): void;
  /** 改行なしで出力（進捗表示用） */
  write(text: string): void;
  /** 診断メッセージ */
  error(line?: string): void;
}

export const processTerminal: Terminal = {
  print: (line = '') => {
    process.stdout.write(`${line}\n`);
  },
  write: (text) => {
    process.stdout.write(text);
  },
  error: (line = '') => {
    process.stderr.write(`${line}\n`);
  },
};

export const RULE_WIDTH = 65;

export function rule(width: number = RULE_WIDTH): string {
  return '='.repeat(width);
}
