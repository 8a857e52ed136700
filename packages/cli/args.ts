/**
 * 最小限の CLI 引数パーサー
 *
 * 各ツールのフラグは数個なので commander/yargs は使わない。
 * `--flag value` と `--flag=value` を受け付け、未知のフラグはエラーにする。
 */

export type ParsedOk<T> = { ok: true; help: false; options: T; helpText: string };
export type ParsedHelp = { ok: true; help: true; helpText: string };
export type ParsedErr = { ok: false; error: string };
export type ParseResult<T> = ParsedOk<T> | ParsedHelp | ParsedErr;

export interface FlagSpec {
  /** 値を取るフラグ（-- なし） */
  values: readonly string[];
  /** 値を取らないフラグ */
  switches?: readonly string[];
  required?: readonly string[];
}

export type RawFlags = ReadonlyMap<string, string | true>;

type ScanResult = { ok: true; help: boolean; flags: RawFlags } | ParsedErr;

function usageError(message: string, helpText: string): ParsedErr {
  return { ok: false, error: `${message}\n\n${helpText}` };
}

/**
 * argv（process.argv.slice(2) 相当）をフラグ表に分解する
 */
export function scanFlags(args: readonly string[], spec: FlagSpec, helpText: string): ScanResult {
  const valueFlags = new Set(spec.values);
  const switchFlags = new Set(spec.switches ?? []);
  const flags = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-h' || arg === '--help') {
      return { ok: true, help: true, flags };
    }
    if (!arg.startsWith('--')) {
      return usageError(`Unexpected arg: ${arg}`, helpText);
    }

    const eq = arg.indexOf('=');
    const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (switchFlags.has(key)) {
      if (eq !== -1) {
        return usageError(`Option --${key} does not take a value`, helpText);
      }
      flags.set(key, true);
      continue;
    }
    if (!valueFlags.has(key)) {
      return usageError(`Unknown option: --${key}`, helpText);
    }

    if (eq !== -1) {
      flags.set(key, arg.slice(eq + 1));
      continue;
    }
    const next = args[i + 1];
    if (next === undefined || next.startsWith('--')) {
      return usageError(`Missing value for --${key}`, helpText);
    }
    flags.set(key, next);
    i++;
  }

  const missing = (spec.required ?? []).filter((name) => !flags.has(name));
  if (missing.length > 0) {
    const list = missing.map((name) => `--${name}`).join(', ');
    return usageError(`The following arguments are required: ${list}`, helpText);
  }

  return { ok: true, help: false, flags };
}

export function stringFlag(flags: RawFlags, name: string): string | undefined {
  const value = flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

export function switchFlag(flags: RawFlags, name: string): boolean {
  return flags.get(name) === true;
}

/**
 * 数値フラグの解釈結果。エラー時は ParsedErr をそのまま返せる形にする
 */
export type NumberFlag = { ok: true; value: number | undefined } | ParsedErr;

const INTEGER_PATTERN = /^[+-]?\d+$/;

export function integerFlag(flags: RawFlags, name: string, helpText: string): NumberFlag {
  const raw = stringFlag(flags, name);
  if (raw === undefined) return { ok: true, value: undefined };
  if (!INTEGER_PATTERN.test(raw.trim())) {
    return usageError(`Invalid integer value for --${name}: '${raw}'`, helpText);
  }
  return { ok: true, value: Number.parseInt(raw, 10) };
}

export function floatFlag(flags: RawFlags, name: string, helpText: string): NumberFlag {
  const raw = stringFlag(flags, name);
  if (raw === undefined) return { ok: true, value: undefined };
  const value = Number(raw.trim());
  if (raw.trim() === '' || Number.isNaN(value)) {
    return usageError(`Invalid float value for --${name}: '${raw}'`, helpText);
  }
  return { ok: true, value };
}

export function invalidOption(message: string, helpText: string): ParsedErr {
  return usageError(message, helpText);
}
