/**
 * @file cargo アクション定義と引数配列の組み立て
 * 備考: シェル文字列は組み立てず、常に離散した引数配列として返す
 * - アクションは fmt / check / clippy の判別共用体で表現する
 * - 修飾子は指定されたものだけを末尾へ追加する
 * - check は all-features 指定時に features を無視する
 * - clippy は警告を常にエラーとして扱う
 * - 失敗時の要約文はアクションごとに固定する
 * - cargo 実行ファイル名は呼び出し側の設定から受け取る
 * - 副作用を持たない純粋関数のみで構成する
 * - 値は定数へ集約し、表記の揺れを防ぐ
 */

/** 受け付けるアクション名（CLI の第1引数） */
export const ACTION_NAMES = ['fmt', 'check', 'clippy'] as const;

/**
 * アクション名の型
 */
export type ActionName = (typeof ACTION_NAMES)[number];

/** rustfmt 実行アクション */
export type FmtAction = Readonly<{ name: 'fmt'; config?: string }>;
/** cargo check 実行アクション */
export type CheckAction = Readonly<{ name: 'check'; features?: string; allFeatures: boolean }>;
/** cargo clippy 実行アクション */
export type ClippyAction = Readonly<{ name: 'clippy' }>;

/**
 * 実行アクション（修飾子込み）
 */
export type Action = FmtAction | CheckAction | ClippyAction;

/**
 * 実行コマンドの構造化表現。[command, args] を名前付きで保持する。
 */
export type CommandSpec = Readonly<{
  command: string;
  args: ReadonlyArray<string>;
}>;

/** 失敗時の要約文（ディレクトリ単位） */
const FAILURE_MESSAGES: Readonly<Record<ActionName, string>> = {
  fmt: 'cargo fmt modified files',
  check: 'cargo check failed',
  clippy: 'cargo clippy failed',
};

/**
 * 文字列がアクション名かを判定する
 * @param value 判定対象
 * @returns アクション名なら true
 */
export function isActionName(value: string): value is ActionName {
  return (ACTION_NAMES as ReadonlyArray<string>).includes(value);
}

/**
 * アクションから cargo の引数配列を組み立てる
 * @param action 実行アクション
 * @param cargoBin cargo 実行ファイル（名前またはパス）
 * @returns 構造化されたコマンド
 */
export function buildActionCommand(action: Action, cargoBin: string): CommandSpec {
  switch (action.name) {
    case 'fmt': {
      const args = ['fmt', '--'];
      // 設定文字列は rustfmt 側へそのまま渡す
      if (action.config !== undefined) args.push('--config', action.config);
      return { command: cargoBin, args };
    }
    case 'check': {
      const args = ['check'];
      // all-features が優先され、features は無視する
      if (action.allFeatures) {
        args.push('--all-features');
      } else if (action.features !== undefined) {
        args.push('--features', action.features);
      }

      return { command: cargoBin, args };
    }
    case 'clippy':
      return { command: cargoBin, args: ['clippy', '--', '-D', 'warnings'] };
  }
}

/**
 * アクションの失敗要約文を返す
 * @param name アクション名
 * @returns 要約文
 */
export function failureMessageFor(name: ActionName): string {
  return FAILURE_MESSAGES[name];
}

/**
 * ログ表示用にコマンドを1行へ整形する（実行には使わない）
 * @param spec コマンド
 * @returns 空白区切りの表示文字列
 */
export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].map((a) => (/[\s"']/.test(a) ? JSON.stringify(a) : a)).join(' ');
}
