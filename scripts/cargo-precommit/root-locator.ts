/**
 * @file Cargo プロジェクトのルートディレクトリ探索
 * 備考: 読み取り失敗は握り潰さず呼び出し側へ伝播させる
 * - 起点から再帰的に走査し Cargo.toml を直接含むディレクトリを集める
 * - 名前がドットで始まるディレクトリ（.git/.cargo 等）には入らない
 * - ディレクトリへのシンボリックリンクは辿らないが、リンクされたマニフェストは数える
 * - 結果は起点からの相対パス（起点自身は "."）で返す
 * - 順序に意味はないが、ログを安定させるため整列して返す
 * - 走査は深さ優先の明示スタックで行い再帰の深さに依存しない
 */
import fs from 'node:fs';
import path from 'node:path';

/** プロジェクトを表すマニフェストのファイル名 */
export const CARGO_MANIFEST = 'Cargo.toml';

/**
 * ディレクトリ名が走査対象外（隠しディレクトリ）かを判定する
 * @param name ディレクトリ名
 * @returns 走査しない場合 true
 */
function isHiddenDir(name: string): boolean {
  return name.startsWith('.');
}

/**
 * 起点以下で Cargo.toml を直接含むディレクトリを列挙する
 * @param baseDir 走査の起点（既定はカレントディレクトリ）
 * @returns 起点からの相対ディレクトリ配列（起点自身は "."）
 */
export function findCargoRootDirs(baseDir: string = process.cwd()): string[] {
  const roots: string[] = [];
  const stack: string[] = [''];
  // 未訪問ディレクトリが尽きるまで深さ優先で辿る
  while (stack.length > 0) {
    const rel = stack.pop();
    // 取り出し失敗時は走査を終える
    if (rel === undefined) break;
    const entries = fs.readdirSync(path.join(baseDir, rel), { withFileTypes: true });
    // 子要素を順に評価する
    for (const entry of entries) {
      // サブディレクトリは後で辿る
      if (entry.isDirectory()) {
        // 隠しディレクトリには入らない
        if (!isHiddenDir(entry.name)) stack.push(rel === '' ? entry.name : path.join(rel, entry.name));
      // マニフェストを直接含むディレクトリを記録する
      } else if (entry.name === CARGO_MANIFEST && (entry.isFile() || entry.isSymbolicLink())) {
        roots.push(rel === '' ? '.' : rel);
      }
    }
  }

  return roots.sort();
}
