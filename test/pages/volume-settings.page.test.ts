import type { KeyName } from '@/models/terminal.model';
import { VolumeSettingsPage } from '@/pages/volume-settings.page';
import PlaybackSession from '@/service/playback-session';

import { FakeEngine } from '../helpers/fake-engine';
import { FakeTerminal } from '../helpers/fake-terminal';
import { ROCK_FM } from '../helpers/stations';
import { createTestLogger } from '../helpers/test-logger';

/** 音量行 (filled 個の目盛り) */
function volumeLine(filled: number, volume: number): string {
  return `\rVolume | ${'█'.repeat(filled)}${' '.repeat(20 - filled)} | ${String(volume).padStart(3)}%`;
}

describe('VolumeSettingsPage', () => {
  let terminal: FakeTerminal;
  let session: PlaybackSession;

  function createPage(keys: KeyName[], defaultVolume: number): VolumeSettingsPage {
    terminal = new FakeTerminal([], keys);
    session = new PlaybackSession(new FakeEngine(), createTestLogger().logger, {
      defaultVolume,
      onNowPlaying: () => undefined
    });
    return new VolumeSettingsPage(terminal, session);
  }

  test('Success0001_操作説明を表示', () => {
    const page = createPage([], 100);

    // Assert
    expect(page.name).toBe('volume_settings');
    expect(page.render()).toBe('Use ↑ and ↓ to adjust the volume.\nPress Enter to exit.');
  });

  test('Success0002_↓で1ずつ下げ、Enterで終わる', async () => {
    const page = createPage(['down', 'down', 'down', 'down', 'down', 'enter'], 50);
    session.select(ROCK_FM);
    await session.play();

    const key = await page.readInput();

    // Assert
    expect(key).toBe('enter');
    expect(session.getVolume()).toBe(45);
    expect(terminal.output).toEqual([
      volumeLine(10, 50),
      volumeLine(10, 49),
      volumeLine(10, 48),
      volumeLine(9, 47),
      volumeLine(9, 46),
      volumeLine(9, 45),
      '\n\n'
    ]);
    expect(terminal.output[5]).toBe('\rVolume | █████████            |  45%');
  });

  test('Success0003_100より上には上がらない', async () => {
    const page = createPage(['up', 'up', 'enter'], 100);
    session.select(ROCK_FM);
    await session.play();

    await page.readInput();

    // Assert
    expect(session.getVolume()).toBe(100);
    expect(terminal.output[terminal.output.length - 2]).toBe(volumeLine(20, 100));
  });

  test('Success0004_他のキーは無視する', async () => {
    const page = createPage(['x', 'enter'], 30);
    session.select(ROCK_FM);
    await session.play();

    await page.readInput();

    // Assert
    expect(session.getVolume()).toBe(30);
    expect(terminal.output).toEqual([volumeLine(6, 30), volumeLine(6, 30), '\n\n']);
  });

  test('Success0005_再生前は案内を表示し、音量は次の再生に持ち越す', async () => {
    const page = createPage(['up', 'enter'], 50);

    await page.readInput();

    // Assert
    expect(terminal.output).toEqual([
      '\rVolume select a station first.',
      '\rVolume select a station first.',
      '\n\n'
    ]);
    expect(session.state.volume).toBe(51);
  });

  test('Success0006_キーをアクションに変換する', () => {
    const page = createPage([], 100);

    // Assert
    expect(page.act('up')).toEqual({ type: 'adjustVolume', delta: 1 });
    expect(page.act('down')).toEqual({ type: 'adjustVolume', delta: -1 });
    expect(page.act('enter')).toEqual({ type: 'back' });
    expect(page.act('q')).toEqual({ type: 'noop' });
  });

  test('Error0001_キー入力が閉じられたらInputClosedError', async () => {
    const page = createPage([], 100);

    // Assert
    await expect(page.readInput()).rejects.toThrow('stdin closed');
  });
});
