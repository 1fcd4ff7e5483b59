/**
 * 局情報
 * 起動時に局一覧から一度だけ生成され、以後変更されない
 */
export interface Station {
  /** 局ID (一覧ページの data-id) */
  readonly id: number;
  /** 表示名 */
  readonly title: string;
  /** ストリームURL */
  readonly streamLocator: string;
}

/** 凍結済みの Station を生成 */
export function createStation(id: number, title: string, streamLocator: string): Station {
  return Object.freeze({ id, title, streamLocator });
}
