import { InvalidSelectionError } from '@/errors/radio-launcher.error';
import { formatStationColumns, StationPickerPage } from '@/pages/station-picker.page';

import { FakeTerminal } from '../helpers/fake-terminal';
import { CLASSIC, JAZZ, ROCK_FM } from '../helpers/stations';
import { createTestLogger } from '../helpers/test-logger';

describe('formatStationColumns', () => {
  test('Success0001_2局ずつ並べ、奇数個なら最後は1局', () => {
    // Assert
    expect(formatStationColumns([ROCK_FM, JAZZ, CLASSIC])).toEqual([
      `1.   Rock FM${' '.repeat(28)}2.   Jazz`,
      '3.   Classic'
    ]);
  });

  test('Success0002_局がなければ行もない', () => {
    // Assert
    expect(formatStationColumns([])).toEqual([]);
  });
});

describe('StationPickerPage', () => {
  let page: StationPickerPage;
  let base: ReturnType<typeof createTestLogger>['base'];

  beforeEach(() => {
    const testLogger = createTestLogger();
    base = testLogger.base;
    page = new StationPickerPage(new FakeTerminal(['3']), [ROCK_FM, JAZZ, CLASSIC], testLogger.logger);
  });

  test('Success0001_見出しと局一覧を表示', () => {
    // Assert
    expect(page.name).toBe('station');
    expect(page.render()).toBe(`Select station:\n1.   Rock FM${' '.repeat(28)}2.   Jazz\n3.   Classic\n`);
  });

  test('Success0002_番号の局を再生するアクションを返す', () => {
    // Assert
    expect(page.act(2)).toEqual({ type: 'playSelectedStation', station: JAZZ });
    expect(page.act(3)).toEqual({ type: 'playSelectedStation', station: CLASSIC });
  });

  test('Success0003_番号を入力で受け取る', async () => {
    // Assert
    expect(await page.readInput()).toBe(3);
  });

  test('Error0001_範囲外の番号は通知付きのnoop', () => {
    // Assert
    expect(page.act(0)).toEqual({ type: 'noop', notice: 'There is no station number 0.' });
    expect(page.act(4)).toEqual({ type: 'noop', notice: 'There is no station number 4.' });
    expect(base.warn).toHaveBeenCalledTimes(2);
  });

  test('Error0002_stationAtは範囲外でInvalidSelectionError', () => {
    // Assert
    expect(page.stationAt(1)).toBe(ROCK_FM);
    expect(() => page.stationAt(-1)).toThrow(new InvalidSelectionError(-1));
  });
});
