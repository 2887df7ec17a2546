#!/usr/bin/env node
/**
 * @file cargo-precommit の単一実行ポイント。ルート探索→実行ディレクトリ解決→アクション実行を順に行う。
 * 備考: pre-commit から変更ファイル名を位置引数で受け取る
 * - 第1引数でアクション（fmt / check / clippy）を選ぶ
 * - 修飾子は対応するアクションでのみ受け付け、それ以外は利用方法エラーとする
 * - 利用方法エラーはディレクトリ処理の前に検出し終了コード 2 で返す
 * - いずれかのディレクトリで失敗すれば終了コード 1 を返す
 * - 対象ファイルが無ければ何も実行せず 0 を返す
 * - ルート探索の読み取り失敗は握り潰さず呼び出し元へ伝播させる
 * - 依存（探索・実行器・出力先）は差し替え可能にしてテストから駆動する
 */
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { type Action, ACTION_NAMES, isActionName } from '../../qualities/cargo-actions.ts';
import { loadConfig } from './config.ts';
import { type CommandRunner, dispatchAction } from './dispatcher.ts';
import { UsageError } from './errors.ts';
import { createLogger, type LineSink, LOG_TAG } from './logger.ts';
import { findCargoRootDirs } from './root-locator.ts';
import { resolveRunDirs } from './run-dirs.ts';

/** 終了コード: 成功 */
export const EXIT_OK = 0;
/** 終了コード: いずれかのコマンドが失敗 */
export const EXIT_FAILED = 1;
/** 終了コード: 利用方法の誤り */
export const EXIT_USAGE = 2;

/** ヘルプ本文 */
export const HELP_TEXT = [
  'Usage: cargo-precommit <fmt|check|clippy> [options] [files...]',
  '',
  'Run cargo fmt/check/clippy in every cargo project that contains a changed file.',
  '',
  'Actions:',
  '  fmt      Run the rustfmt (cargo fmt) hook',
  '  check    Run the cargo check hook',
  '  clippy   Run the cargo clippy hook (warnings are errors)',
  '',
  'Options:',
  '  --config <pairs>     fmt: comma-separated key=value config pairs for rustfmt',
  '  --features <list>    check: comma-separated list of features to check',
  '  --all-features       check: activate all available features',
  '  --verbose            print debug output',
  '  -h, --help           show this help',
  '',
].join('\n');

/**
 * 引数解析結果
 */
export type ParsedCli =
  | Readonly<{ kind: 'help' }>
  | Readonly<{ kind: 'run'; action: Action; files: ReadonlyArray<string>; verbose: boolean }>;

/**
 * runCli の差し替え可能な依存
 */
export type CliDeps = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  findRoots?: (baseDir: string) => string[];
  runner?: CommandRunner;
  stdout?: LineSink;
  stderr?: LineSink;
};

/**
 * 解析済みオプションからアクションを組み立てる
 * @param name アクション名（未検証）
 * @param values 解析済みオプション
 * @returns 実行アクション
 */
function toAction(
  name: string,
  values: { config?: string; features?: string; 'all-features'?: boolean }
): Action {
  // 未知のアクションは利用方法エラーとする
  if (!isActionName(name)) {
    throw new UsageError(`invalid action "${name}", expected one of: ${ACTION_NAMES.join(', ')}`);
  }

  const allFeatures = values['all-features'] ?? false;
  // fmt 以外での --config を拒否する
  if (values.config !== undefined && name !== 'fmt') {
    throw new UsageError(`--config is only accepted by fmt, not ${name}`);
  }

  // check 以外での features 指定を拒否する
  if ((values.features !== undefined || allFeatures) && name !== 'check') {
    throw new UsageError(`--features and --all-features are only accepted by check, not ${name}`);
  }

  switch (name) {
    case 'fmt':
      return values.config !== undefined ? { name, config: values.config } : { name };
    case 'check':
      return values.features !== undefined ? { name, features: values.features, allFeatures } : { name, allFeatures };
    case 'clippy':
      return { name };
  }
}

/** 受け付けるオプション */
const CLI_OPTIONS = {
  config: { type: 'string' },
  features: { type: 'string' },
  'all-features': { type: 'boolean' },
  verbose: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

/**
 * 引数を字句解析する。未知オプションや値欠落は利用方法エラーへ変換する。
 * @param argv 引数
 * @returns parseArgs の結果
 */
function tokenize(argv: readonly string[]) {
  // parseArgs の例外は利用方法エラーとして送出し直す
  try {
    return parseArgs({ args: [...argv], allowPositionals: true, strict: true, options: CLI_OPTIONS });
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new UsageError(msg);
  }
}

/**
 * コマンドライン引数を解析する
 * @param argv process.argv.slice(2) 相当の引数
 * @returns 解析結果
 */
export function parseCliArgs(argv: readonly string[]): ParsedCli {
  const parsed = tokenize(argv);
  const { values, positionals } = parsed;
  // ヘルプ指定は他の検証より優先する
  if (values.help) return { kind: 'help' };
  const [name, ...files] = positionals;
  // アクション未指定は利用方法エラーとする
  if (name === undefined) throw new UsageError('missing action');
  return { kind: 'run', action: toAction(name, values), files, verbose: values.verbose ?? false };
}

/**
 * CLI 本体。終了コードを返し、プロセスの終了は呼び出し側に委ねる。
 * @param argv process.argv.slice(2) 相当の引数
 * @param deps 差し替え可能な依存
 * @returns 終了コード
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const config = loadConfig(deps.env ?? process.env);
  const stdout: LineSink = deps.stdout ?? ((line) => { process.stdout.write(line); });
  const stderr: LineSink = deps.stderr ?? ((line) => { process.stderr.write(line); });
  let parsed: ParsedCli;
  // 利用方法エラーはヘルプを添えて標準エラーへ出す
  try {
    parsed = parseCliArgs(argv);
  } catch (e) {
    // 想定外の例外はそのまま伝播させる
    if (!(e instanceof UsageError)) throw e;
    stderr(`${LOG_TAG} error: ${e.message}\n\n`);
    stderr(HELP_TEXT);
    return EXIT_USAGE;
  }

  // ヘルプは標準出力へ出して正常終了する
  if (parsed.kind === 'help') {
    stdout(HELP_TEXT);
    return EXIT_OK;
  }

  const logger = createLogger({ debug: config.debug || parsed.verbose, stdout, stderr });
  const findRoots = deps.findRoots ?? findCargoRootDirs;
  const rootDirs = findRoots(cwd);
  logger.debug(`found ${String(rootDirs.length)} cargo project(s) under ${cwd}`);
  const runDirs = resolveRunDirs(rootDirs, parsed.files, { baseDir: cwd, logger });
  logger.debug(`run directories: ${runDirs.size > 0 ? Array.from(runDirs).sort().join(', ') : '(none)'}`);
  const result = await dispatchAction(parsed.action, runDirs, {
    cargoBin: config.cargoBin,
    baseDir: cwd,
    logger,
    ...(deps.runner ? { runner: deps.runner } : {}),
  });
  // 1件でも失敗があれば件数を示して失敗終了する
  if (!result.ok) {
    logger.error(`${String(result.failures.length)} checks failed`);
    return EXIT_FAILED;
  }

  return EXIT_OK;
}

/** このファイルが直接起動されたかの判定（ユニットテストからの import を除外） */
const isMain = (() => {
  const arg1 = typeof process.argv[1] === 'string' ? process.argv[1] : null;
  // 呼び出しパスが不明な場合は直接起動ではないと判定する
  if (!arg1) return false;
  return import.meta.url === pathToFileURL(path.resolve(arg1)).href;
})();

// 直接起動されたときのみ実行し、終了コードを設定する
if (isMain) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      // 想定外の失敗は理由を標準エラーへ出して非0で終了する
      const msg = e instanceof Error ? e.message : String(e);
      process.stderr.write(`${LOG_TAG} error: ${msg}\n`);
      process.exitCode = EXIT_FAILED;
    }
  );
}
