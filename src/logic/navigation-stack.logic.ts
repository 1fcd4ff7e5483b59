import { ROOT_PAGE, PageName } from '@/models/page.model';
import { LoggerEx } from '@/utils/logger.util';

/** 画面を有効化する側 (PageDispatcher) */
export interface PageActivator {
  /** @throws UnknownPageError 未登録の画面 */
  activate(name: PageName): void;
}

/**
 * 画面遷移の履歴
 * 先頭は常に 'menu' で、これより前には戻らない
 */
export class NavigationStack {
  private readonly memory: PageName[] = [ROOT_PAGE];
  private readonly activator: PageActivator;
  private readonly logger: LoggerEx;

  constructor(activator: PageActivator, logger: LoggerEx) {
    this.activator = activator;
    this.logger = logger;
  }

  /** 履歴 (古い順) */
  public get history(): readonly PageName[] {
    return [...this.memory];
  }

  /** 現在の画面 */
  public get current(): PageName {
    return this.memory[this.memory.length - 1];
  }

  /**
   * 画面を進める
   * 未登録の画面なら履歴は変えずに UnknownPageError
   */
  public forward(name: PageName): void {
    this.activator.activate(name);
    this.memory.push(name);
    this.logger.debug('RLNCH05LD0001', name, this.memory.join(' > '));
  }

  /**
   * 一つ前の画面へ戻る
   * ルートでは何もせずルートを有効化し直す
   */
  public back(): void {
    if (this.memory.length > 1) {
      this.memory.pop();
    }
    this.activator.activate(this.current);
    this.logger.debug('RLNCH05LD0002', this.current, this.memory.join(' > '));
  }
}
