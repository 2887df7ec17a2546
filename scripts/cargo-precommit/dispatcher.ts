/**
 * @file 実行ディレクトリごとに cargo アクションを順次実行する
 * 備考: 1ディレクトリの失敗で中断せず、全件を試行して結果を集約する
 * - コマンドは引数配列のまま起動し、シェルを介さない
 * - 標準入出力は継承し、cargo 自身の出力をそのまま見せる
 * - 起動失敗（実行ファイル不在）とシグナル終了は失敗として数える
 * - ディレクトリは辞書順で直列に処理し、並列化しない
 * - 実行器は差し替え可能とし、テストでは子プロセスを起動しない
 * - 集約結果は ok / invoked / failures の3項目で返す
 */
import { spawn } from 'node:child_process';
import path from 'node:path';
import {
  type Action,
  buildActionCommand,
  type CommandSpec,
  failureMessageFor,
  formatCommand,
} from '../../qualities/cargo-actions.ts';
import { createLogger, type Logger } from './logger.ts';

/** 起動できなかったコマンドに割り当てる終了コード */
export const LAUNCH_FAILURE_CODE = -1;

/**
 * 1コマンドを実行して終了コードを返す関数
 */
export type CommandRunner = (spec: CommandSpec, cwd: string) => Promise<number>;

/**
 * ディレクトリ単位の失敗記録
 */
export type DirFailure = Readonly<{
  dir: string;
  code: number;
  message: string;
}>;

/**
 * 集約結果
 */
export type DispatchResult = Readonly<{
  ok: boolean;
  invoked: number;
  failures: ReadonlyArray<DirFailure>;
}>;

/**
 * 実行オプション
 */
export type DispatchOptions = {
  cargoBin: string;
  /** 相対の実行ディレクトリを解決する起点（既定はカレントディレクトリ） */
  baseDir?: string;
  runner?: CommandRunner;
  logger?: Logger;
};

/**
 * 子プロセスでコマンドを実行（stdio 継承）。非0終了/シグナル/起動失敗は非0で resolve する。
 * @param spec 実行コマンド
 * @param cwd 作業ディレクトリ
 * @returns 終了コード（シグナル終了は 1、起動失敗は -1）
 */
export function runCommand(spec: CommandSpec, cwd: string): Promise<number> {
  return new Promise((resolve) => {
    const child = spawn(spec.command, [...spec.args], { cwd, stdio: 'inherit', shell: false });
    child.on('error', (error) => {
      process.stderr.write(`[cargo-precommit] error: failed to launch ${spec.command} :: ${error.message}\n`);
      resolve(LAUNCH_FAILURE_CODE);
    });
    child.on('exit', (code, signal) => {
      // シグナル終了は失敗として扱う
      if (signal) return resolve(1);
      resolve(code ?? 1);
    });
  });
}

/**
 * 実行ディレクトリ集合に対してアクションを1回ずつ実行する
 * @param action 実行アクション
 * @param runDirs 実行ディレクトリ集合
 * @param opts 実行オプション
 * @returns 集約結果
 */
export async function dispatchAction(
  action: Action,
  runDirs: Iterable<string>,
  opts: DispatchOptions
): Promise<DispatchResult> {
  const runner = opts.runner ?? runCommand;
  const baseDir = opts.baseDir ?? process.cwd();
  const logger = opts.logger ?? createLogger();
  const dirs = Array.from(new Set(runDirs)).sort();
  const failures: DirFailure[] = [];
  // 対象が無ければ何もせず成功とする
  if (dirs.length === 0) {
    logger.debug('no cargo project touched by the changed files; nothing to run');
    return { ok: true, invoked: 0, failures };
  }

  const spec = buildActionCommand(action, opts.cargoBin);
  // 前段の結果に関わらず全ディレクトリで順に実行する
  for (const dir of dirs) {
    logger.debug(`running "${formatCommand(spec)}" in ${dir}`);
    const code = await runner(spec, path.resolve(baseDir, dir));
    // 非0は失敗として記録し、次のディレクトリへ進む
    if (code !== 0) {
      const message = failureMessageFor(action.name);
      logger.error(`${dir}: ${message} (exit code ${String(code)})`);
      failures.push({ dir, code, message });
    }
  }

  return { ok: failures.length === 0, invoked: dirs.length, failures };
}
