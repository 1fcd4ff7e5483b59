/** 音量画面で扱うキー。それ以外はキー名のまま */
export type KeyName = 'up' | 'down' | 'enter' | (string & {});

/**
 * 端末入出力
 * 入力が閉じられた場合 (EOF / Ctrl+C) は InputClosedError で reject する
 */
export interface Terminal {
  write(text: string): void;
  /** 1行入力 */
  readLine(prompt: string): Promise<string>;
  /** 1キー入力 (エコーなし) */
  readKey(): Promise<KeyName>;
  close(): void;
}
