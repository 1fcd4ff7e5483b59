import { PassThrough, Writable } from 'stream';

import { InputClosedError } from '@/errors/radio-launcher.error';
import { StdioTerminal } from '@/utils/terminal.util';

describe('StdioTerminal', () => {
  let input: PassThrough;
  let written: string[];
  let terminal: StdioTerminal;

  beforeEach(() => {
    input = new PassThrough();
    written = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        written.push(chunk.toString());
        callback();
      }
    });
    terminal = new StdioTerminal(input, output);
  });

  test('Success0001_まとめて届いた行を1行ずつ返すこと', async () => {
    input.end('1\n2\n0\n');

    // Assert
    expect(await terminal.readLine('> ')).toBe('1');
    expect(await terminal.readLine('> ')).toBe('2');
    expect(await terminal.readLine('> ')).toBe('0');
    expect(written).toEqual(['> ', '> ', '> ']);
    await expect(terminal.readLine('> ')).rejects.toThrow(new InputClosedError('stdin closed'));
  });

  test('Success0002_行入力とキー入力を交互に扱えること', async () => {
    input.write('1\n');
    // Assert
    expect(await terminal.readLine('> ')).toBe('1');

    const key = terminal.readKey();
    input.write('\u001b[A');
    // Assert
    expect(await key).toBe('up');

    input.write('2\n');
    // Assert
    expect(await terminal.readLine('> ')).toBe('2');
  });

  test('Success0003_Enterはenterとして返すこと', async () => {
    const key = terminal.readKey();
    input.write('\r');

    // Assert
    expect(await key).toBe('enter');
  });

  test('Error0001_キー入力中のCtrl+Cは中断として扱うこと', async () => {
    const key = terminal.readKey();
    input.write('\u0003');

    // Assert
    await expect(key).rejects.toThrow(new InputClosedError('interrupted'));
    await expect(terminal.readLine('> ')).rejects.toThrow('interrupted');
  });

  test('Error0002_入力が空で終わったらInputClosedError', async () => {
    input.end();

    // Assert
    await expect(terminal.readLine('> ')).rejects.toThrow('stdin closed');
  });
});
