import { NoStationSelectedError, PlaybackEngineError, UnknownPageError } from '@/errors/radio-launcher.error';
import type { Action } from '@/models/action.model';
import { ROOT_PAGE, Page, PageName } from '@/models/page.model';
import type { Station } from '@/models/station.model';
import type { Terminal } from '@/models/terminal.model';
import PlaybackSession from '@/service/playback-session';
import { NavigationStack, PageActivator } from '@/logic/navigation-stack.logic';
import { LoggerEx } from '@/utils/logger.util';
import { messageHelper } from '@/utils/message-helper.util';

/**
 * 画面から受け取った入力
 * 入力元の画面の act で解釈する
 */
export interface PageInput {
  readonly pageName: PageName;
  interpret(): Action;
}

/** dispatch の結果 */
export type DispatchResult = 'continue' | 'exit';

/** 登録済みの画面 (入力の型を隠して保持) */
interface PageEntry {
  readonly name: PageName;
  render(): string;
  collect(): Promise<PageInput>;
}

/**
 * 画面の登録と入力の振り分け
 * 有効な画面は常に1つで、遷移は NavigationStack 経由で行う
 */
export class PageDispatcher implements PageActivator {
  private readonly pages = new Map<PageName, PageEntry>();
  private activeEntry: PageEntry | null = null;

  private readonly terminal: Terminal;
  private readonly session: PlaybackSession;
  private readonly logger: LoggerEx;
  public readonly navigation: NavigationStack;

  constructor(terminal: Terminal, session: PlaybackSession, logger: LoggerEx) {
    this.terminal = terminal;
    this.session = session;
    this.logger = logger;
    this.navigation = new NavigationStack(this, logger);
  }

  /** 画面を登録 */
  public register<TInput>(page: Page<TInput>): void {
    this.pages.set(page.name, {
      name: page.name,
      render: () => page.render(),
      collect: async () => {
        const value = await page.readInput();
        return { pageName: page.name, interpret: () => page.act(value) };
      }
    });
  }

  public has(name: PageName): boolean {
    return this.pages.has(name);
  }

  /** 有効な画面の名前 (未開始なら null) */
  public get active(): PageName | null {
    return this.activeEntry?.name ?? null;
  }

  /**
   * 画面を有効化
   * @throws UnknownPageError 未登録
   */
  public activate(name: PageName): void {
    const entry = this.pages.get(name);
    if (entry === undefined) {
      this.logger.error('RLNCH05LE0001', name);
      throw new UnknownPageError(name);
    }
    this.activeEntry = entry;
  }

  /** ルート画面 (メニュー) から開始 */
  public start(): void {
    this.activate(ROOT_PAGE);
  }

  /** 有効な画面を表示して入力を1つ受け取る */
  public getInput(): Promise<PageInput> {
    const entry = this.requireActive();
    this.terminal.write(`${entry.render()}\n`);
    return entry.collect();
  }

  /** 入力を解釈し、結果のアクションを実行 */
  public async dispatch(input: PageInput): Promise<DispatchResult> {
    const action = input.interpret();
    this.logger.debug('RLNCH06LD0001', action.type, input.pageName);

    switch (action.type) {
      case 'navigate':
        this.navigation.forward(action.target);
        return 'continue';
      case 'back':
        this.navigation.back();
        return 'continue';
      case 'exit':
        return 'exit';
      case 'playSelectedStation':
        await this.playStation(action.station);
        return 'continue';
      case 'adjustVolume':
        this.session.adjustVolume(action.delta);
        return 'continue';
      case 'noop':
        if (action.notice !== undefined) {
          this.notify(action.notice);
        }
        return 'continue';
    }
  }

  /**
   * 局を選択して再生し、再生できたら前の画面へ戻る
   * 再生できなければ同じ画面のまま
   */
  private async playStation(station: Station): Promise<void> {
    this.session.select(station);
    try {
      await this.session.play();
    } catch (error: unknown) {
      if (error instanceof NoStationSelectedError) {
        this.notify(messageHelper.get('UI_NO_STATION_SELECTED'));
        return;
      }
      if (error instanceof PlaybackEngineError) {
        this.notify(messageHelper.get('UI_PLAYBACK_FAILED', error.message));
        return;
      }
      throw error;
    }
    this.navigation.back();
  }

  private notify(text: string): void {
    this.logger.warn('RLNCH06LW0001', text);
    this.terminal.write(`${text}\n`);
  }

  private requireActive(): PageEntry {
    if (this.activeEntry === null) {
      throw new UnknownPageError(ROOT_PAGE);
    }
    return this.activeEntry;
  }
}
