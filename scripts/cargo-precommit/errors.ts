/**
 * @file CLI 利用方法エラーの型定義
 * - 引数の不足や未知のアクションを表す
 * - ディレクトリ処理の開始前に送出される
 * - 呼び出し側で終了コード 2 とヘルプ表示へ変換する
 */

/**
 * 利用方法の誤り（未知のアクション・不正なオプション等）
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
