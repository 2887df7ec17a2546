/**
 * @file 実行ディレクトリ解決の単体テスト
 * - 最深の祖先ルートが選ばれることを確認する
 * - 対象外の拡張子とどのルートにも属さないファイルの除外を確認する
 * - 区切り単位の祖先判定と退化ケースの辞書順選択を確認する
 */
import { describe, expect, it } from 'vitest';
import { createLogger } from '../../scripts/cargo-precommit/logger.ts';
import {
  createDepthCache,
  isAncestorPath,
  isCargoSourceFile,
  pathDepth,
  resolveRunDirs,
} from '../../scripts/cargo-precommit/run-dirs.ts';

// 概要: 変更ファイルの種別判定
describe('isCargoSourceFile', () => {
  const cases: [file: string, expected: boolean][] = [
    ['src/main.rs', true],
    ['Cargo.toml', true],
    ['crates/a/Cargo.lock', true],
    ['README.md', false],
    ['Cargo.toml.bak', false],
    ['src/lib.rs.orig', false],
    ['cargo.toml', false],
  ];

  it.each(cases)('%s -> %s', (file, expected) => {
    expect(isCargoSourceFile(file)).toBe(expected);
  });
});

// 概要: 祖先判定と深さ計算
describe('path helpers', () => {
  it('treats ancestors by path segment, not string prefix', () => {
    expect(isAncestorPath('/proj', '/proj/src/lib.rs')).toBe(true);
    expect(isAncestorPath('/proj', '/proj')).toBe(true);
    expect(isAncestorPath('/proj', '/proj-b/src/lib.rs')).toBe(false);
    expect(isAncestorPath('/proj/sub', '/proj/lib.rs')).toBe(false);
  });

  it('counts segments and remembers them in the cache', () => {
    const cache = createDepthCache();
    expect(pathDepth('/a/b/c', cache)).toBe(3);
    expect(pathDepth('/', cache)).toBe(0);
    expect(cache.get('/a/b/c')).toBe(3);
  });
});

// 概要: 実行ディレクトリ集合の解決
describe('resolveRunDirs', () => {
  const abs = { baseDir: '/' };

  it('picks the nested root and drops files with other extensions', () => {
    const dirs = resolveRunDirs(['/proj', '/proj/sub'], ['/proj/sub/lib.rs', '/proj/README.md'], abs);
    expect([...dirs]).toEqual(['/proj/sub']);
  });

  it('returns the only enclosing root', () => {
    const dirs = resolveRunDirs(['/a', '/b'], ['/b/src/main.rs'], abs);
    expect([...dirs]).toEqual(['/b']);
  });

  it('prefers the deeper root regardless of root order', () => {
    const dirs = resolveRunDirs(['/proj/sub', '/proj'], ['/proj/sub/src/lib.rs'], abs);
    expect([...dirs]).toEqual(['/proj/sub']);
  });

  it('returns an empty set for files under no root', () => {
    const dirs = resolveRunDirs(['/proj'], ['/proj-b/src/lib.rs', '/elsewhere/main.rs'], abs);
    expect(dirs.size).toBe(0);
  });

  it('writes a debug line for each file outside every project', () => {
    const err: string[] = [];
    const logger = createLogger({ debug: true, stdout: () => undefined, stderr: (l) => err.push(l) });
    const dirs = resolveRunDirs(['/proj'], ['/proj/lib.rs', '/elsewhere/main.rs', '/elsewhere/notes.md'], {
      baseDir: '/',
      logger,
    });
    expect([...dirs]).toEqual(['/proj']);
    expect(err).toEqual(['[cargo-precommit] debug: skip /elsewhere/main.rs: not inside any cargo project\n']);
  });

  it('returns an empty set for an empty file list', () => {
    expect(resolveRunDirs(['/proj'], [], abs).size).toBe(0);
  });

  it('maps manifest and lock files to their own root', () => {
    const dirs = resolveRunDirs(['/proj', '/proj/sub'], ['/proj/sub/Cargo.lock', '/proj/Cargo.toml'], abs);
    expect([...dirs].sort()).toEqual(['/proj', '/proj/sub']);
  });

  it('resolves relative paths against the base directory and keeps the root notation', () => {
    const dirs = resolveRunDirs(['.', 'crates/a'], ['crates/a/src/lib.rs', 'build.rs'], { baseDir: '/repo' });
    expect([...dirs].sort()).toEqual(['.', 'crates/a']);
  });

  it('inserts each run directory once', () => {
    const dirs = resolveRunDirs(['/proj'], ['/proj/a.rs', '/proj/b.rs', '/proj/src/c.rs'], abs);
    expect([...dirs]).toEqual(['/proj']);
  });

  it('breaks a depth tie with the lexicographically smallest root', () => {
    const dirs = resolveRunDirs(['/proj/b/..', '/proj'], ['/proj/src/lib.rs'], abs);
    expect([...dirs]).toEqual(['/proj']);
  });

  it('is idempotent for the same inputs', () => {
    const roots = ['/proj', '/proj/sub', '/other'];
    const files = ['/proj/sub/lib.rs', '/other/Cargo.toml', '/proj/main.rs'];
    const first = resolveRunDirs(roots, files, abs);
    const second = resolveRunDirs(roots, files, abs);
    expect(second).toEqual(first);
  });

  it('fills a caller-supplied depth cache', () => {
    const depthCache = createDepthCache();
    resolveRunDirs(['/proj', '/proj/sub'], ['/proj/sub/lib.rs'], { baseDir: '/', depthCache });
    expect(depthCache.get('/proj')).toBe(1);
    expect(depthCache.get('/proj/sub')).toBe(2);
  });
});
