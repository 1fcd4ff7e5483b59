import type { Action } from '@/models/action.model';

/** 画面名 (遷移のキー) */
export type PageName = 'menu' | 'station' | 'volume_settings';

export const ROOT_PAGE: PageName = 'menu';

/**
 * 画面の共通インターフェース
 * render → readInput → act の順に呼ばれる
 */
export interface Page<TInput = unknown> {
  readonly name: PageName;
  /** 入力前に表示するテキスト */
  render(): string;
  /** 入力を1つ取得 (不正な入力はここで再入力させる) */
  readInput(): Promise<TInput>;
  /** 入力を解釈してアクションを返す */
  act(input: TInput): Action;
}
