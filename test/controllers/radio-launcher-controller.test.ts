import path from 'path';

import RadioLauncherController from '@/controllers/radio-launcher-controller';
import type { KeyName } from '@/models/terminal.model';
import type { CatalogResponse, FetchCatalogPage } from '@/service/station-catalog';

import { FakeEngine } from '../helpers/fake-engine';
import { FakeTerminal } from '../helpers/fake-terminal';
import { TWO_STATIONS_HTML } from '../helpers/stations';
import { createTestLogger } from '../helpers/test-logger';

const CONFIG_FILE = path.resolve(__dirname, '..', 'fixtures', 'config', 'controller-config.json');

/** 行入力が I/O エラーになる端末 */
class BrokenTerminal extends FakeTerminal {
  public readLine(_prompt: string): Promise<string> {
    return Promise.reject(new Error('EIO'));
  }
}

describe('RadioLauncherController', () => {
  let engine: FakeEngine;
  let base: ReturnType<typeof createTestLogger>['base'];

  beforeEach(() => {
    engine = new FakeEngine();
    base = createTestLogger().base;
  });

  function createController(terminal: FakeTerminal, response: CatalogResponse = { statusCode: 200, body: TWO_STATIONS_HTML }): RadioLauncherController {
    const fetchPage: FetchCatalogPage = () => Promise.resolve(response);
    return new RadioLauncherController({ configFile: CONFIG_FILE, terminal, baseLogger: base, engine, fetchPage });
  }

  test('Success0001_局を選んで再生し、0で終了する', async () => {
    const terminal = new FakeTerminal(['1', '2', '0']);

    const exitCode = await createController(terminal).run();

    // Assert
    expect(exitCode).toBe(0);
    expect(terminal.text).toContain('Now playing "Jazz"\n\n');
    expect(terminal.text).toContain('Now playing: Jazz\n\nMENU:');
    expect(terminal.output[terminal.output.length - 1]).toBe('Bye!\n');
    expect(engine.players).toHaveLength(1);
    expect(engine.players[0].media).toEqual({ locator: 'http://b' });
    // 終了時に再生を止める
    expect(engine.activePlayers).toHaveLength(0);
    expect(terminal.closed).toBe(true);
  });

  test('Success0002_再生中に音量を下げる', async () => {
    const keys: KeyName[] = ['down', 'down', 'down', 'down', 'down', 'enter'];
    const terminal = new FakeTerminal(['1', '1', '2', '0'], keys);

    const exitCode = await createController(terminal).run();

    // Assert
    expect(exitCode).toBe(0);
    expect(engine.players[0].volume).toBe(95);
    expect(terminal.output).toContain('\rVolume | ███████████████████  |  95%');
  });

  test('Success0003_入力が閉じられたら正常終了', async () => {
    const terminal = new FakeTerminal([]);

    const exitCode = await createController(terminal).run();

    // Assert
    expect(exitCode).toBe(0);
    expect(terminal.output[terminal.output.length - 1]).toBe('\nBye!\n');
    expect(terminal.closed).toBe(true);
  });

  test('Success0004_設定ファイルがなければ既定値で起動し警告を残す', async () => {
    const terminal = new FakeTerminal(['0']);
    const fetchPage: FetchCatalogPage = () => Promise.resolve({ statusCode: 200, body: TWO_STATIONS_HTML });
    const controller = new RadioLauncherController({
      configFile: '/nonexistent/radio-launcher.json', terminal, baseLogger: base, engine, fetchPage
    });

    const exitCode = await controller.run();

    // Assert
    expect(exitCode).toBe(0);
    expect(base.warn.mock.calls[0][0]).toMatch(/\[RLNCH08UW0001\] Config file not found, using defaults: \/nonexistent\/radio-launcher\.json$/);
  });

  test('Error0001_局一覧が取得できなければ終了コード1', async () => {
    const terminal = new FakeTerminal(['1']);

    const exitCode = await createController(terminal, { statusCode: 500, body: '' }).run();

    // Assert
    expect(exitCode).toBe(1);
    expect(terminal.output).toEqual(['Failed to load the station list: https://radio.example.test/rock: HTTP 500\n']);
    expect(base.error.mock.calls[0][0]).toMatch(/\[RLNCH02SE0001\] Station catalog request failed: https:\/\/radio\.example\.test\/rock HTTP 500$/);
    expect(base.error.mock.calls[1][0]).toMatch(/\[RLNCH01CE0001\] Startup failed: https:\/\/radio\.example\.test\/rock: HTTP 500$/);
    expect(terminal.closed).toBe(true);
  });

  test('Error0002_局カードがなければ終了コード1', async () => {
    const terminal = new FakeTerminal([]);

    const exitCode = await createController(terminal, { statusCode: 200, body: '<html><body></body></html>' }).run();

    // Assert
    expect(exitCode).toBe(1);
    expect(terminal.output).toEqual(['Failed to load the station list: No <button class="radio-card"> found\n']);
  });

  test('Error0003_想定外のエラーは終了コード1', async () => {
    const terminal = new BrokenTerminal();

    const exitCode = await createController(terminal).run();

    // Assert
    expect(exitCode).toBe(1);
    expect(terminal.output[terminal.output.length - 1]).toBe('Fatal error: EIO\n');
  });
});
