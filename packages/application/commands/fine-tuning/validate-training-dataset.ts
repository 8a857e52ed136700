/**
 * 学習データ（JSONL）の形式チェック
 *
 * Bedrock の学習レコードは prompt / messages / system のいずれかを持つ
 */
import { isRecord } from '../../../domain/evaluation/test-sample';
import { readJsonlFile, type JsonlParseResult } from '../../../infrastructure/dataset/jsonl-reader';

export interface DatasetValidationReport {
  filePath: string;
  recordCount: number;
  issues: string[];
}

export type JsonlFileReader = (filePath: string) => Promise<JsonlParseResult>;

const REQUIRED_FIELDS = ['prompt', 'messages', 'system'];

export function collectDatasetIssues(parsed: JsonlParseResult): string[] {
  const issues: Array<{ lineNumber: number; text: string }> = parsed.issues.map((issue) => ({
    lineNumber: issue.lineNumber,
    text: `Line ${issue.lineNumber}: Invalid JSON - ${issue.message}`,
  }));

  for (const line of parsed.lines) {
    const record = line.record;
    if (!isRecord(record) || !REQUIRED_FIELDS.some((field) => field in record)) {
      issues.push({
        lineNumber: line.lineNumber,
        text: `Line ${line.lineNumber}: Missing 'prompt' or 'messages' field.`,
      });
    }
  }

  return issues.sort((a, b) => a.lineNumber - b.lineNumber).map((issue) => issue.text);
}

/**
 * 検証レポートを返す。有効な JSON 行が1件もなければ EmptyDatasetError
 */
export async function validateTrainingDataset(
  filePath: string,
  readJsonl: JsonlFileReader = readJsonlFile
): Promise<DatasetValidationReport> {
  const parsed = await readJsonl(filePath);
  const report: DatasetValidationReport = {
    filePath,
    recordCount: parsed.lines.length,
    issues: collectDatasetIssues(parsed),
  };

  if (report.recordCount === 0) {
    throw new EmptyDatasetError(report);
  }
  return report;
}

export class EmptyDatasetError extends Error {
  constructor(public readonly report: DatasetValidationReport) {
    super(`No valid JSONL records found in ${report.filePath}`);
    this.name = 'EmptyDatasetError';
  }
}
