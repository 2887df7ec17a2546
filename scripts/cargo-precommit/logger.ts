/**
 * @file タグ付き行ログの出力
 * 備考: ログ基盤は持たず、標準ストリームへ1行ずつ書き出す
 * - 形式は `[cargo-precommit] <level>: <message>` に統一する
 * - debug は有効化された場合のみ出力する
 * - info は標準出力、warn/error/debug は標準エラーへ出す
 * - 出力先はテスト用に差し替え可能とする
 * - ロガーは実行ごとの値として生成し、共有状態を持たない
 */

/** ログ行の接頭辞 */
export const LOG_TAG = '[cargo-precommit]';

/**
 * 1行を書き出す関数
 */
export type LineSink = (line: string) => void;

/**
 * ロガー
 */
export type Logger = Readonly<{
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}>;

/**
 * ロガー生成オプション
 */
export type LoggerOptions = {
  debug?: boolean;
  stdout?: LineSink;
  stderr?: LineSink;
};

/**
 * ロガーを生成する
 * @param opts 出力先とデバッグ有効化
 * @returns ロガー
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const out: LineSink = opts.stdout ?? ((line) => { process.stdout.write(line); });
  const err: LineSink = opts.stderr ?? ((line) => { process.stderr.write(line); });
  const debugEnabled = opts.debug ?? false;
  const fmt = (level: string, message: string): string => `${LOG_TAG} ${level}: ${message}\n`;
  return {
    debug: (message) => {
      // 無効時は何も出さない
      if (!debugEnabled) return;
      err(fmt('debug', message));
    },
    info: (message) => out(fmt('info', message)),
    warn: (message) => err(fmt('warn', message)),
    error: (message) => err(fmt('error', message)),
  };
}
