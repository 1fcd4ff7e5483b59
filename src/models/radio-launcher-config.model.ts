/**
 * radio-launcher 動作時の設定パラメータ
 * Controller で生成し各 Service に受け渡す不変構造
 */
export interface RadioLauncherConfig {
  /** 局一覧ページのURL */
  catalogUrl: string;
  /** 局一覧取得のタイムアウト (ms) */
  requestTimeoutMs: number;
  /** 局一覧取得時の User-Agent */
  userAgent: string;
  /** 再生に使う VLC のコマンド */
  playerCommand: string;
  /** 再生開始時の音量 (0〜100) */
  defaultVolume: number;
  /** 表示言語 ('en', 'ja') */
  language: string;
  /** ログレベル */
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  /** ログファイル (APP_ROOT からの相対パスも可) */
  logFile: string;
  /** debug ログを info として出力 */
  forceDebug: boolean;
}

export const DEFAULT_RADIO_LAUNCHER_CONFIG: RadioLauncherConfig = {
  catalogUrl: 'https://radiopotok.ru/rock',
  requestTimeoutMs: 10000,
  userAgent: 'Mozilla/5.0 (X11; Linux x86_64) radio-launcher/1.0',
  playerCommand: 'cvlc',
  defaultVolume: 100,
  language: 'en',
  logLevel: 'info',
  logFile: 'logs/radio-launcher.log',
  forceDebug: false
};
