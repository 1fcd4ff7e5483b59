import { Actions, Action } from '@/models/action.model';
import type { Page, PageName } from '@/models/page.model';
import type { KeyName, Terminal } from '@/models/terminal.model';
import PlaybackSession from '@/service/playback-session';
import { messageHelper } from '@/utils/message-helper.util';
import { formatVolumeBar } from '@/utils/volume-bar.util';

/**
 * 音量設定画面
 * ↑/↓ で 1 ずつ増減、Enter で前の画面へ戻る
 * 1回の readInput の中で Enter が押されるまでキー入力を繰り返す
 */
export class VolumeSettingsPage implements Page<KeyName> {
  public readonly name: PageName = 'volume_settings';

  private readonly terminal: Terminal;
  private readonly session: PlaybackSession;

  constructor(terminal: Terminal, session: PlaybackSession) {
    this.terminal = terminal;
    this.session = session;
  }

  public render(): string {
    return messageHelper.get('UI_VOLUME_HELP');
  }

  /** 音量バー (再生前は案内文) */
  public volumeScale(): string {
    const volume = this.session.getVolume();
    return volume === null ? messageHelper.get('UI_VOLUME_UNAVAILABLE') : formatVolumeBar(volume);
  }

  public async readInput(): Promise<KeyName> {
    this.writeVolumeLine();

    for (;;) {
      const key = await this.terminal.readKey();
      const action = this.act(key);

      if (action.type === 'back') {
        this.terminal.write('\n\n');
        return key;
      }
      if (action.type === 'adjustVolume') {
        this.session.adjustVolume(action.delta);
      }
      // それ以外のキーは無視して再描画
      this.writeVolumeLine();
    }
  }

  public act(input: KeyName): Action {
    switch (input) {
      case 'up':
        return Actions.adjustVolume(+1);
      case 'down':
        return Actions.adjustVolume(-1);
      case 'enter':
        return Actions.back();
      default:
        return Actions.noop();
    }
  }

  private writeVolumeLine(): void {
    this.terminal.write(`\r${messageHelper.get('UI_VOLUME_LINE', this.volumeScale())}`);
  }
}
