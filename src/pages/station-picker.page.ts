import { InvalidSelectionError } from '@/errors/radio-launcher.error';
import { Actions, Action } from '@/models/action.model';
import type { Page, PageName } from '@/models/page.model';
import type { Station } from '@/models/station.model';
import type { Terminal } from '@/models/terminal.model';
import { readInteger } from '@/utils/input.util';
import { LoggerEx } from '@/utils/logger.util';
import { messageHelper } from '@/utils/message-helper.util';

/** 番号欄の幅 ("12." + 空白) */
const NUMBER_WIDTH = 4;
/** 左列の幅 */
const COLUMN_WIDTH = 40;

function formatCell(number: number, station: Station): string {
  return `${`${number}.`.padEnd(NUMBER_WIDTH)} ${station.title}`;
}

/**
 * 局一覧を2列で整形
 * 1行に2局ずつ、奇数個の場合は最後の局だけの行になる
 */
export function formatStationColumns(stations: readonly Station[]): string[] {
  const rows: string[] = [];
  for (let i = 0; i < stations.length; i += 2) {
    const left = formatCell(i + 1, stations[i]);
    const right = i + 1 < stations.length ? formatCell(i + 2, stations[i + 1]) : '';
    rows.push(right === '' ? left : left.padEnd(COLUMN_WIDTH) + right);
  }
  return rows;
}

/**
 * 局選択画面
 * 1〜N の番号で局を選び、再生アクションを返す
 */
export class StationPickerPage implements Page<number> {
  public readonly name: PageName = 'station';

  private readonly terminal: Terminal;
  private readonly stations: readonly Station[];
  private readonly logger: LoggerEx;

  constructor(terminal: Terminal, stations: readonly Station[], logger: LoggerEx) {
    this.terminal = terminal;
    this.stations = stations;
    this.logger = logger;
  }

  public render(): string {
    return [messageHelper.get('UI_STATION_TITLE'), ...formatStationColumns(this.stations), ''].join('\n');
  }

  public readInput(): Promise<number> {
    return readInteger(this.terminal, 'UI_STATION_PROMPT');
  }

  public act(input: number): Action {
    try {
      return Actions.playSelectedStation(this.stationAt(input));
    } catch (error: unknown) {
      if (error instanceof InvalidSelectionError) {
        this.logger.warn('RLNCH07PW0001', error.selection);
        return Actions.noop(messageHelper.get('UI_STATION_INVALID', error.selection));
      }
      throw error;
    }
  }

  /**
   * 1 始まりの番号で局を取得
   * @throws InvalidSelectionError 範囲外
   */
  public stationAt(number: number): Station {
    if (!Number.isInteger(number) || number < 1 || number > this.stations.length) {
      throw new InvalidSelectionError(number);
    }
    return this.stations[number - 1];
  }
}
