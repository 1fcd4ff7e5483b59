/**
 * エラー種別
 * Controller / Dispatcher はこのコードで致命的かどうかを判断する
 */
export type RadioLauncherErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'PARSE_ERROR'
  | 'INVALID_SELECTION'
  | 'NO_STATION_SELECTED'
  | 'UNKNOWN_PAGE'
  | 'PLAYBACK_ENGINE_ERROR'
  | 'INPUT_CLOSED';

/**
 * radio-launcher の例外の基底クラス
 */
export class RadioLauncherError extends Error {
  public readonly code: RadioLauncherErrorCode;

  constructor(code: RadioLauncherErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** 局一覧ページが取得できない (起動時のみ、致命的) */
export class SourceUnavailableError extends RadioLauncherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', message, options);
  }
}

/** 局一覧ページの構造が想定と違う (起動時のみ、致命的) */
export class ParseError extends RadioLauncherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSE_ERROR', message, options);
  }
}

/** 範囲外の局番号 (再入力) */
export class InvalidSelectionError extends RadioLauncherError {
  public readonly selection: number;

  constructor(selection: number) {
    super('INVALID_SELECTION', `Invalid selection: ${selection}`);
    this.selection = selection;
  }
}

/** 局を選ばずに再生しようとした (再入力) */
export class NoStationSelectedError extends RadioLauncherError {
  constructor() {
    super('NO_STATION_SELECTED', 'No station selected');
  }
}

/** 登録されていない画面への遷移 (プログラムの誤り、致命的) */
export class UnknownPageError extends RadioLauncherError {
  public readonly pageName: string;

  constructor(pageName: string) {
    super('UNKNOWN_PAGE', `Unknown page: ${pageName}`);
    this.pageName = pageName;
  }
}

/** 再生エンジンのエラー (表示して続行) */
export class PlaybackEngineError extends RadioLauncherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PLAYBACK_ENGINE_ERROR', message, options);
  }
}

/** 標準入力が閉じられた / Ctrl+C */
export class InputClosedError extends RadioLauncherError {
  constructor(reason: string) {
    super('INPUT_CLOSED', reason);
  }
}

/** 例外から表示用メッセージを取り出す */
export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
