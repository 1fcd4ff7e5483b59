// 定数のインポート
import { SERVICE_NAME } from '@/constants/app.constants';

import {
  errorMessageOf, InputClosedError, ParseError, SourceUnavailableError
} from '@/errors/radio-launcher.error';

// Modelのインポート
import type { PlaybackEngine } from '@/models/playback-engine.model';
import type { RadioLauncherConfig } from '@/models/radio-launcher-config.model';
import type { Station } from '@/models/station.model';
import type { Terminal } from '@/models/terminal.model';

// Logicのインポート
import { PageDispatcher } from '@/logic/page-dispatcher.logic';
import { VlcEngine } from '@/logic/vlc-engine.logic';

// Pageのインポート
import { MenuPage } from '@/pages/menu.page';
import { StationPickerPage } from '@/pages/station-picker.page';
import { VolumeSettingsPage } from '@/pages/volume-settings.page';

// Serviceのインポート
import PlaybackSession from '@/service/playback-session';
import StationCatalog, { FetchCatalogPage } from '@/service/station-catalog';

// Utilsのインポート
import { loadConfig, reportConfig, resolveConfigPath } from '@/utils/config.util';
import { BaseLogger, createFileLogger, LoggerEx } from '@/utils/logger.util';
import { messageHelper } from '@/utils/message-helper.util';
import { StdioTerminal } from '@/utils/terminal.util';

/** 外部とのつなぎ目 (テストで差し替える) */
export interface RadioLauncherControllerOptions {
  configFile?: string;
  terminal?: Terminal;
  baseLogger?: BaseLogger;
  engine?: PlaybackEngine;
  fetchPage?: FetchCatalogPage;
}

/**
 * radio-launcher 本体
 * 起動 (設定・局一覧・画面の構築) → メインループ → 終了処理
 */
export default class RadioLauncherController {
  private readonly options: RadioLauncherControllerOptions;
  private readonly terminal: Terminal;

  private logger: LoggerEx | null = null;
  private session: PlaybackSession | null = null;
  private dispatcher: PageDispatcher | null = null;

  constructor(options: RadioLauncherControllerOptions = {}) {
    this.options = options;
    this.terminal = options.terminal ?? new StdioTerminal();
  }

  /**
   * 起動してメインループを回し、終了コードを返す
   * 0: ユーザー操作による終了 / 1: 起動失敗・致命的エラー
   */
  public async run(): Promise<number> {
    let exitCode = 0;

    try {
      await this.init();
    } catch (error: unknown) {
      const messageId = error instanceof SourceUnavailableError || error instanceof ParseError
        ? 'UI_STARTUP_FAILED'
        : 'UI_FATAL_ERROR';
      this.terminal.write(`${messageHelper.get(messageId, errorMessageOf(error))}\n`);
      this.logError('RLNCH01CE0001', error);
      this.shutdown(1);
      return 1;
    }

    try {
      await this.mainloop();
      this.logger?.info('RLNCH01CI0003');
      this.terminal.write(`${messageHelper.get('UI_BYE')}\n`);
    } catch (error: unknown) {
      if (error instanceof InputClosedError) {
        // Ctrl+C / EOF は終了要求として扱う
        this.logger?.info('RLNCH01CI0004', error.message);
        this.terminal.write(`\n${messageHelper.get('UI_BYE')}\n`);
      } else {
        this.terminal.write(`${messageHelper.get('UI_FATAL_ERROR', errorMessageOf(error))}\n`);
        this.logError('RLNCH01CE0002', error);
        exitCode = 1;
      }
    }

    this.shutdown(exitCode);
    return exitCode;
  }

  /**
   * 設定・ログ・局一覧・画面を準備
   * @throws SourceUnavailableError / ParseError 局一覧が使えない
   */
  public async init(): Promise<void> {
    const configFile = this.options.configFile ?? resolveConfigPath();
    const loaded = loadConfig(configFile);
    const config: RadioLauncherConfig = loaded.config;

    // ログ・画面テキストの言語
    messageHelper.setLanguage(config.language);

    const logger = new LoggerEx(this.options.baseLogger ?? createFileLogger(config), SERVICE_NAME);
    logger.enableForceDebug(config.forceDebug);
    this.logger = logger;
    logger.info('RLNCH01CI0001', configFile);
    reportConfig(loaded, logger);

    const catalog = new StationCatalog(config, logger, this.options.fetchPage);
    const stations: Station[] = await catalog.fetch();
    logger.info('RLNCH01CI0002', stations.length);

    const session = new PlaybackSession(this.options.engine ?? new VlcEngine(config.playerCommand, logger), logger, {
      defaultVolume: config.defaultVolume,
      onNowPlaying: (station: Station) => {
        this.terminal.write(`${messageHelper.get('UI_NOW_PLAYING', station.title)}\n\n`);
      }
    });
    this.session = session;

    const dispatcher = new PageDispatcher(this.terminal, session, logger);
    dispatcher.register(new MenuPage(this.terminal, session));
    dispatcher.register(new StationPickerPage(this.terminal, stations, logger));
    dispatcher.register(new VolumeSettingsPage(this.terminal, session));
    dispatcher.start();
    this.dispatcher = dispatcher;
  }

  /** 入力 → 実行 を exit まで繰り返す */
  public async mainloop(): Promise<void> {
    const dispatcher = this.dispatcher;
    if (dispatcher === null) {
      throw new Error('Controller not initialized');
    }

    while (await dispatcher.dispatch(await dispatcher.getInput()) !== 'exit') {
      // 次の入力へ
    }
  }

  /** 再生を止めて端末を戻す */
  public shutdown(exitCode: number): void {
    this.session?.dispose();
    this.terminal.close();
    this.logger?.info('RLNCH01CI0005', exitCode);
  }

  private logError(messageId: string, error: unknown): void {
    this.logger?.error(messageId, error instanceof Error ? error : new Error(String(error)));
  }
}
