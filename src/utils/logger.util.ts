import path from 'path';
import winston from 'winston';

import { APP_ROOT } from '@/constants/app.constants';
import type { RadioLauncherConfig } from '@/models/radio-launcher-config.model';
import { messageHelper, MessageParam } from '@/utils/message-helper.util';

/**
 * ログレベルの型定義
 */
type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * LoggerEx がラップする出力先
 * winston.Logger はこの形を満たす
 */
export interface BaseLogger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
}

/**
 * LoggerEx
 * ----------
 * 出力先 Logger をラップし、メッセージIDとパラメータを使った
 * 多言語対応ログ出力を提供するクラス
 *
 * 特徴:
 * - messageHelper と連携して i18n メッセージを出力
 * - Error オブジェクトを単独で渡すと {errorMessage} {errorStack} に展開
 * - 可変長引数で配列/単値/オブジェクトを柔軟に置換
 *   - 単値 → {0}
 *   - 複数引数 → {0},{1},...
 *   - オブジェクト → 名前付き置換
 */
export class LoggerEx {
  /** 出力先 Logger */
  private readonly logger: BaseLogger;
  /** サービス名の表示(初期値:null) */
  private serviceName: string | null = null;
  /** debug を info に昇格するフラグ */
  private forceDebug = false;

  constructor(baseLogger: BaseLogger, serviceName?: string) {
    this.logger = baseLogger;
    if (serviceName !== undefined) {
      this.serviceName = serviceName;
    }
  }

  /** debug を強制的に info として出力させる */
  public enableForceDebug(enable = true): void {
    this.forceDebug = enable;
  }

  /**
   * debug ログ出力
   * 可変長引数に対応
   */
  public debug(msgId: string, ...params: MessageParam[]): void {
    this.log('debug', msgId, ...params);
  }

  /** info ログ出力 */
  public info(msgId: string, ...params: MessageParam[]): void {
    this.log('info', msgId, ...params);
  }

  /** warn ログ出力 */
  public warn(msgId: string, ...params: MessageParam[]): void {
    this.log('warn', msgId, ...params);
  }

  /** error ログ出力 */
  public error(msgId: string, ...params: MessageParam[]): void {
    this.log('error', msgId, ...params);
  }

  /**
   * 内部ログ処理
   */
  private log(level: LogLevel, msgId: string, ...params: MessageParam[]): void {
    // messageHelper から i18n メッセージ取得
    const message = messageHelper.get(msgId, ...params);

    // タイムスタンプ生成
    const timestamp = new Date().toISOString();

    // 出力フォーマット
    const tag = this.forceDebug && level === 'debug' ? 'DEBUG-FORCED' : level.toUpperCase();
    const serviceTag = this.serviceName ? `[${this.serviceName}] ` : '';
    const formatted = `[${timestamp}] ${serviceTag}[${tag}] [${msgId}] ${message}`;

    // ログレベルに応じて出力
    switch (level) {
      case 'info':
        this.logger.info(formatted);
        break;
      case 'warn':
        this.logger.warn(formatted);
        break;
      case 'error':
        this.logger.error(formatted);
        break;
      case 'debug':
        // 強制 debug → info 扱い
        if (this.forceDebug) {
          this.logger.info(formatted);
        } else {
          this.logger.debug(formatted);
        }
        break;
    }
  }
}

/**
 * ファイル出力の winston Logger を生成
 * 画面は標準出力を使うのでログはファイルにだけ書く
 */
export function createFileLogger(config: Pick<RadioLauncherConfig, 'logFile' | 'logLevel'>): winston.Logger {
  const filename = path.isAbsolute(config.logFile) ? config.logFile : path.join(APP_ROOT, config.logFile);

  return winston.createLogger({
    level: config.logLevel,
    // タイムスタンプ等は LoggerEx 側で付与済み
    format: winston.format.printf((info) => String(info.message)),
    transports: [new winston.transports.File({ filename })]
  });
}
