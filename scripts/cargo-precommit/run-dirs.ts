/**
 * @file 変更ファイルから実行ディレクトリを解決する
 * 備考: 例外は送出せず、該当しないファイルは除外して debug ログのみ残す
 * - 対象は拡張子 .rs と Cargo.toml / Cargo.lock のみ
 * - 祖先判定はパス区切り単位で行い、文字列前方一致では判定しない
 * - 祖先が複数ある場合は最も深い（区切り数が最大の）ものを選ぶ
 * - 同じ深さの祖先が並ぶ退化ケースは辞書順で最小のものを選ぶ
 * - 深さは実行ごとのキャッシュ値で記憶し、モジュール状態を持たない
 * - 相対パスは起点ディレクトリで絶対化してから比較する
 * - 結果はルート探索が返した表記のまま集合へ入れる
 */
import path from 'node:path';
import type { Logger } from './logger.ts';

/** Rust ソースの拡張子 */
export const RUST_SOURCE_EXT = '.rs';
/** ソース扱いするマニフェスト/ロックファイル名 */
export const CARGO_MARKER_FILES: ReadonlySet<string> = new Set(['Cargo.toml', 'Cargo.lock']);

/**
 * パス深さのキャッシュ（実行ごとに生成して受け渡す）
 */
export type DepthCache = Map<string, number>;

/**
 * 解決オプション
 */
export type ResolveOptions = {
  /** 相対パスを絶対化する起点（既定はカレントディレクトリ） */
  baseDir?: string;
  /** 深さキャッシュ（省略時は呼び出しごとに新規作成） */
  depthCache?: DepthCache;
  /** 除外したファイルを debug 出力するロガー */
  logger?: Logger;
};

/**
 * 空の深さキャッシュを生成する
 * @returns 新しいキャッシュ
 */
export function createDepthCache(): DepthCache {
  return new Map();
}

/**
 * 変更ファイルが cargo の対象か（.rs / Cargo.toml / Cargo.lock）を判定する
 * @param filePath 変更ファイルのパス
 * @returns 対象なら true
 */
export function isCargoSourceFile(filePath: string): boolean {
  // 拡張子一致を先に判定する
  if (path.extname(filePath) === RUST_SOURCE_EXT) return true;
  return CARGO_MARKER_FILES.has(path.basename(filePath));
}

/**
 * 絶対パスの区切り数（深さ）を返す。結果はキャッシュへ記憶する。
 * @param absPath 正規化済みの絶対パス
 * @param cache 深さキャッシュ
 * @returns ルートからのセグメント数
 */
export function pathDepth(absPath: string, cache: DepthCache): number {
  const hit = cache.get(absPath);
  // 既知のパスはキャッシュから返す
  if (hit !== undefined) return hit;
  const depth = absPath.split(path.sep).filter((s) => s.length > 0).length;
  cache.set(absPath, depth);
  return depth;
}

/**
 * ancestor が target 自身または祖先ディレクトリかを判定する
 * @param ancestor 絶対パス
 * @param target 絶対パス
 * @returns 祖先なら true
 */
export function isAncestorPath(ancestor: string, target: string): boolean {
  const rel = path.relative(ancestor, target);
  // 同一パスは祖先として扱う
  if (rel === '') return true;
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * 深さ比較の勝者を決める（深い方、同じなら辞書順で小さい方）
 * @param a 候補（表記と深さ）
 * @param b 候補（表記と深さ）
 * @returns 選ばれた候補
 */
function pickDeeper(
  a: { root: string; depth: number },
  b: { root: string; depth: number }
): { root: string; depth: number } {
  // 深さが異なれば深い方を選ぶ
  if (a.depth !== b.depth) return a.depth > b.depth ? a : b;
  return a.root <= b.root ? a : b;
}

/**
 * 変更ファイルの集合から実行ディレクトリ集合を解決する
 * @param rootDirs ルートディレクトリ一覧（探索結果の表記）
 * @param changedFiles 変更ファイル一覧
 * @param opts 解決オプション
 * @returns 実行ディレクトリ集合（rootDirs の表記）
 */
export function resolveRunDirs(
  rootDirs: Iterable<string>,
  changedFiles: Iterable<string>,
  opts: ResolveOptions = {}
): Set<string> {
  const baseDir = opts.baseDir ?? process.cwd();
  const cache = opts.depthCache ?? createDepthCache();
  const roots = Array.from(new Set(rootDirs), (root) => ({ root, abs: path.resolve(baseDir, root) }));
  const runDirs = new Set<string>();
  // 変更ファイルごとに最深の祖先ルートを求める
  for (const file of changedFiles) {
    // cargo 対象外のファイルは除外する
    if (!isCargoSourceFile(file)) continue;
    const absFile = path.resolve(baseDir, file);
    let best: { root: string; depth: number } | undefined;
    // 全ルートを候補として比較する
    for (const r of roots) {
      // 祖先でないルートは候補にしない
      if (!isAncestorPath(r.abs, absFile)) continue;
      const cand = { root: r.root, depth: pathDepth(r.abs, cache) };
      best = best ? pickDeeper(best, cand) : cand;
    }

    // どのプロジェクトにも属さないファイルはエラーにせず除外する
    if (!best) {
      opts.logger?.debug(`skip ${file}: not inside any cargo project`);
      continue;
    }

    runDirs.add(best.root);
  }

  return runDirs;
}
