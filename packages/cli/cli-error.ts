/**
 * CLI で表示して終了すべき失敗
 *
 * lines は stderr にそのまま出力する診断メッセージ
 */
export class CliError extends Error {
  constructor(
    public readonly lines: string[],
    public readonly exitCode: number = 1
  ) {
    super(lines.find((line) => line.trim() !== '') ?? 'CLI error');
    this.name = 'CliError';
  }
}

export function reportCliError(error: CliError, print: (line?: string) => void): number {
  for (const line of error.lines) {
    print(line);
  }
  return error.exitCode;
}
