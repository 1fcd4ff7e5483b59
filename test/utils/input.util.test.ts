import { parseInteger, readInteger } from '@/utils/input.util';
import { toKeyName } from '@/utils/terminal.util';

import { FakeTerminal } from '../helpers/fake-terminal';

describe('parseInteger', () => {
  test('Success0001_整数の文字列を数値にする', () => {
    // Assert
    expect(parseInteger('1')).toBe(1);
    expect(parseInteger(' 12 ')).toBe(12);
    expect(parseInteger('-3')).toBe(-3);
    expect(parseInteger('+4')).toBe(4);
  });

  test('Error0001_整数でなければnull', () => {
    // Assert
    expect(parseInteger('')).toBeNull();
    expect(parseInteger('abc')).toBeNull();
    expect(parseInteger('1.5')).toBeNull();
    expect(parseInteger('2x')).toBeNull();
  });
});

describe('readInteger', () => {
  test('Success0001_数値が入力されるまで再入力させる', async () => {
    const terminal = new FakeTerminal(['abc', '', '7']);

    const value = await readInteger(terminal, 'UI_MENU_PROMPT');

    // Assert
    expect(value).toBe(7);
    expect(terminal.output).toEqual([
      'Enter line number: ',
      'You need to enter a number!\n',
      'Enter line number: ',
      'You need to enter a number!\n',
      'Enter line number: '
    ]);
  });

  test('Error0001_入力が閉じられたらInputClosedError', async () => {
    const terminal = new FakeTerminal([]);

    // Assert
    await expect(readInteger(terminal, 'UI_MENU_PROMPT')).rejects.toThrow('stdin closed');
  });
});

describe('toKeyName', () => {
  test('Success0001_矢印キーとEnterを名前にする', () => {
    // Assert
    expect(toKeyName({ name: 'up', sequence: '\u001b[A' })).toBe('up');
    expect(toKeyName({ name: 'down', sequence: '\u001b[B' })).toBe('down');
    expect(toKeyName({ name: 'return', sequence: '\r' })).toBe('enter');
    expect(toKeyName({ name: 'enter', sequence: '\n' })).toBe('enter');
  });

  test('Success0002_その他のキーは入力された文字列', () => {
    // Assert
    expect(toKeyName({ name: 'a', sequence: 'a' })).toBe('a');
    expect(toKeyName(undefined)).toBe('');
  });
});
