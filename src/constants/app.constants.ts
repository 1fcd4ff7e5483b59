import fs from 'fs-extra';
import path from 'path';

/** サービス名 (ログのタグに使用) */
export const SERVICE_NAME = 'radio_launcher';

/** 設定ファイルの場所を上書きする環境変数 */
export const CONFIG_PATH_ENV = 'RADIO_LAUNCHER_CONFIG';

/**
 * プロジェクトのルートディレクトリを解決
 * src/constants から実行時は 2 階層上、dist/src/constants から実行時は 3 階層上
 */
function resolveAppRoot(): string {
  const candidate = path.resolve(__dirname, '..', '..');
  return fs.existsSync(path.join(candidate, 'package.json')) ? candidate : path.resolve(candidate, '..');
}

export const APP_ROOT: string = resolveAppRoot();

/** 既定の設定ファイル */
export const DEFAULT_CONFIG_FILE: string = path.join(APP_ROOT, 'config.json');

/** i18n ディレクトリ */
export const I18N_DIR: string = path.join(APP_ROOT, 'i18n');

/** 音量の範囲 */
export const VOLUME_MIN = 0;
export const VOLUME_MAX = 100;

/** 音量バーの目盛り数 (1目盛り = 5%) */
export const VOLUME_BAR_SEGMENTS = 20;
