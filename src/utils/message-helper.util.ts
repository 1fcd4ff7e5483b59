import fs from 'fs-extra';
import ini from 'ini';
import path from 'path';

import { I18N_DIR } from '@/constants/app.constants';

/** プレースホルダ置換用パラメータ */
export type MessageParams = Record<string, unknown>;

/** get() に渡せる値 */
export type MessageParam = string | number | MessageParams | Error;

/** メッセージファイルの種類 (ログ用 / 画面表示用) */
const MESSAGE_FILES = ['log_messages', 'ui_texts'] as const;

function isMessageParams(value: MessageParam | undefined): value is MessageParams {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * MessageHelper
 * -------------------
 * ini ファイルからメッセージをロードし、多言語対応文字列を取得
 */
export class MessageHelper {
  /** メッセージ格納 */
  private messages: Record<string, string> = {};
  /** 現在の言語 */
  private lang: string = 'en';
  /** i18n ディレクトリ */
  private readonly baseDir: string;

  constructor(lang: string = 'en', baseDir: string = I18N_DIR) {
    this.baseDir = baseDir;
    this.setLanguage(lang);
  }

  /** 現在の言語 */
  public get language(): string {
    return this.lang;
  }

  /** 言語を切替 */
  public setLanguage(lang: string): void {
    this.lang = lang;
    this.loadMessages();
  }

  /** ini ファイルからメッセージをロード */
  private loadMessages(): void {
    this.messages = {};

    for (const kind of MESSAGE_FILES) {
      const filePath = path.join(this.baseDir, `${kind}.${this.lang}.ini`);
      if (!fs.existsSync(filePath)) {
        continue;
      }

      try {
        const parsed: Record<string, unknown> = ini.parse(fs.readFileSync(filePath, 'utf-8'));
        for (const [key, value] of Object.entries(parsed)) {
          if (typeof value === 'string') {
            this.messages[key] = value;
          }
        }
      } catch (error: unknown) {
        // Logger 自体がこのクラスに依存しているので console に出す
        console.error(`[MessageHelper] Failed to load ${filePath}`, error);
      }
    }
  }

  /**
   * メッセージ取得
   * @param messageId メッセージID
   * @param params 可変長引数またはオブジェクト、Errorも対応
   */
  public get(messageId: string, ...params: MessageParam[]): string {
    const template = this.messages[messageId];
    if (template === undefined) {
      return `[Unknown message ID: ${messageId}]`;
    }

    // Error オブジェクト対応
    const first = params[0];
    if (params.length === 1 && first instanceof Error) {
      params = [{ errorMessage: first.message, errorStack: first.stack ?? '' }];
    }

    // 名前付き置換 {key}
    const named = params[0];
    if (params.length === 1 && isMessageParams(named) && /\{[^\d]+\}/.test(template)) {
      return template.replace(/\{(\w+)\}/g, (match: string, key: string) =>
        named[key] !== undefined ? String(named[key]) : match
      );
    }

    // 数字インデックス置換 {0}, {1}, ...
    return template.replace(/\{(\d+)\}/g, (match: string, index: string) => {
      const val = params[parseInt(index, 10)];
      if (val === undefined) {
        return match;
      }
      if (val instanceof Error) {
        return val.message;
      }
      if (typeof val === 'object') {
        return JSON.stringify(val);
      }
      return String(val);
    });
  }
}

/** シングルトンインスタンス */
export const messageHelper = new MessageHelper();
