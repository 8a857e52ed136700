/**
 * 評価用テストデータ読み込み
 *
 * 壊れた行は警告として返し、読み込みは中断しない
 */
import { readJsonlFile, type JsonlIssue } from '../../../infrastructure/dataset/jsonl-reader';
import type { JsonlFileReader } from '../fine-tuning/validate-training-dataset';

export interface LoadedTestData {
  samples: unknown[];
  skipped: JsonlIssue[];
}

/**
 * maxSamples が 0 / 未指定なら全件
 */
export async function loadTestData(
  filePath: string,
  maxSamples?: number,
  readJsonl: JsonlFileReader = readJsonlFile
): Promise<LoadedTestData> {
  const parsed = await readJsonl(filePath);
  let samples = parsed.lines.map((line) => line.record);
  if (maxSamples) {
    samples = samples.slice(0, maxSamples);
  }
  return { samples, skipped: parsed.issues };
}
