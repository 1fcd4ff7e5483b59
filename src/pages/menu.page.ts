import { Actions, Action } from '@/models/action.model';
import type { Page, PageName } from '@/models/page.model';
import type { Terminal } from '@/models/terminal.model';
import PlaybackSession from '@/service/playback-session';
import { readInteger } from '@/utils/input.util';
import { messageHelper } from '@/utils/message-helper.util';

/**
 * メインメニュー
 * 0: 終了 / 1: 局選択 / 2: 音量設定
 */
export class MenuPage implements Page<number> {
  public readonly name: PageName = 'menu';

  private readonly terminal: Terminal;
  private readonly session: PlaybackSession;

  constructor(terminal: Terminal, session: PlaybackSession) {
    this.terminal = terminal;
    this.session = session;
  }

  public render(): string {
    const { currentStation, handle } = this.session.state;
    const nowPlaying = currentStation !== null && handle !== null
      ? `${messageHelper.get('UI_MENU_NOW_PLAYING', currentStation.title)}\n\n`
      : '';
    return nowPlaying + messageHelper.get('UI_MENU');
  }

  public readInput(): Promise<number> {
    return readInteger(this.terminal, 'UI_MENU_PROMPT');
  }

  public act(input: number): Action {
    switch (input) {
      case 0:
        return Actions.exit();
      case 1:
        return Actions.navigate('station');
      case 2:
        return Actions.navigate('volume_settings');
      default:
        return Actions.noop(messageHelper.get('UI_MENU_UNKNOWN_CHOICE', input));
    }
  }
}
