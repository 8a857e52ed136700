/**
 * JSON Lines 読み込み
 *
 * 空行は無視し、壊れた行は issue として記録して読み込みを続ける
 */
import { readFile } from 'fs/promises';

export interface JsonlLine {
  lineNumber: number;
  record: unknown;
}

export interface JsonlIssue {
  lineNumber: number;
  message: string;
}

export interface JsonlParseResult {
  lines: JsonlLine[];
  issues: JsonlIssue[];
}

export function parseJsonl(content: string): JsonlParseResult {
  const lines: JsonlLine[] = [];
  const issues: JsonlIssue[] = [];

  content.split(/\r?\n/).forEach((raw, index) => {
    const text = raw.trim();
    if (!text) return;
    const lineNumber = index + 1;
    try {
      lines.push({ lineNumber, record: JSON.parse(text) });
    } catch (error) {
      issues.push({
        lineNumber,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  });

  return { lines, issues };
}

export async function readJsonlFile(filePath: string): Promise<JsonlParseResult> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new DatasetFileNotFoundError(filePath);
    }
    throw error;
  }
  return parseJsonl(content);
}

export class DatasetFileNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = 'DatasetFileNotFoundError';
  }
}
