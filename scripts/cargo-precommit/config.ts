/**
 * @file 環境変数からの実行設定の読み込み
 * - CARGO_PRECOMMIT_CARGO: cargo 実行ファイル（既定 cargo）
 * - CARGO_PRECOMMIT_DEBUG: 1/true でデバッグログを有効化
 * - 空文字は未指定と同じく既定値へ戻す
 * - 実行ごとに1回だけ読み、値として受け渡す
 */

/** 既定の cargo 実行ファイル名 */
export const DEFAULT_CARGO_BIN = 'cargo';

/**
 * 実行設定
 */
export type PrecommitConfig = Readonly<{
  cargoBin: string;
  debug: boolean;
}>;

/**
 * 真偽値として解釈できる環境変数値かを判定する
 * @param raw 環境変数の値
 * @returns 有効指定なら true
 */
function isTruthy(raw: string | undefined): boolean {
  // 未指定は無効とする
  if (raw === undefined) return false;
  const v = raw.trim().toLowerCase();
  return v === '1' || v === 'true';
}

/**
 * 環境変数から設定を読み込む
 * @param env 参照する環境変数（既定は process.env）
 * @returns 実行設定
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PrecommitConfig {
  const cargoBin = env.CARGO_PRECOMMIT_CARGO?.trim();
  return {
    cargoBin: cargoBin ? cargoBin : DEFAULT_CARGO_BIN,
    debug: isTruthy(env.CARGO_PRECOMMIT_DEBUG),
  };
}
