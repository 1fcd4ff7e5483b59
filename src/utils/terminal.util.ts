import readline from 'readline';
import type { Readable, Writable } from 'stream';

import { InputClosedError } from '@/errors/radio-launcher.error';
import type { KeyName, Terminal } from '@/models/terminal.model';

/** 入力側 (process.stdin の場合は TTY として raw モードに切り替える) */
export type TerminalInput = Readable & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/** readLine の待ち */
interface PendingLine {
  resolve(line: string): void;
  reject(error: InputClosedError): void;
}

/**
 * process.stdin / stdout を使う Terminal
 * 行入力は1つの readline を使い回し、先に届いた行は順に返す
 * キー入力の間は readline を閉じ、raw モードの keypress イベントで取得する
 */
export class StdioTerminal implements Terminal {
  private readonly input: TerminalInput;
  private readonly output: Writable;

  private lineReader: readline.Interface | null = null;
  private readonly bufferedLines: string[] = [];
  private pending: PendingLine | null = null;
  private keypressReady = false;
  /** 入力終了の理由 (終了していなければ null) */
  private closedReason: string | null = null;

  constructor(input: TerminalInput = process.stdin, output: Writable = process.stdout) {
    this.input = input;
    this.output = output;
  }

  public write(text: string): void {
    this.output.write(text);
  }

  public readLine(prompt: string): Promise<string> {
    const buffered = this.bufferedLines.shift();
    if (buffered !== undefined) {
      this.output.write(prompt);
      return Promise.resolve(buffered);
    }
    if (this.lineReader === null && this.input.readableEnded) {
      this.finish('stdin closed');
    }
    if (this.closedReason !== null) {
      return Promise.reject(new InputClosedError(this.closedReason));
    }

    const lineReader = this.openLineReader();
    return new Promise<string>((resolve, reject) => {
      this.pending = { resolve, reject };
      lineReader.setPrompt(prompt);
      lineReader.prompt();
    });
  }

  public readKey(): Promise<KeyName> {
    if (this.input.readableEnded) {
      this.finish('stdin closed');
    }
    if (this.closedReason !== null) {
      return Promise.reject(new InputClosedError(this.closedReason));
    }

    // 行入力と keypress が同じ入力を取り合わないように
    this.closeLineReader();
    if (!this.keypressReady) {
      readline.emitKeypressEvents(this.input);
      this.keypressReady = true;
    }

    return new Promise<KeyName>((resolve, reject) => {
      const cleanup = (): void => {
        this.input.off('keypress', onKeypress);
        this.input.off('end', onEnd);
        this.setRawMode(false);
        this.input.pause();
      };

      const onKeypress = (_chunk: string | undefined, key: readline.Key | undefined): void => {
        cleanup();
        // raw モードでは Ctrl+C がシグナルにならないのでここで扱う
        if (key?.ctrl === true && key.name === 'c') {
          this.finish('interrupted');
          reject(new InputClosedError('interrupted'));
          return;
        }
        resolve(toKeyName(key));
      };

      const onEnd = (): void => {
        cleanup();
        this.finish('stdin closed');
        reject(new InputClosedError('stdin closed'));
      };

      this.input.on('keypress', onKeypress);
      this.input.once('end', onEnd);
      this.setRawMode(true);
      this.input.resume();
    });
  }

  public close(): void {
    this.closeLineReader();
    this.setRawMode(false);
    this.input.pause();
  }

  private openLineReader(): readline.Interface {
    if (this.lineReader !== null) {
      return this.lineReader;
    }

    const lineReader = readline.createInterface({
      input: this.input,
      output: this.output,
      terminal: this.input.isTTY === true
    });

    lineReader.on('line', (line: string) => {
      const pending = this.pending;
      if (pending === null) {
        this.bufferedLines.push(line);
        return;
      }
      this.pending = null;
      pending.resolve(line);
    });
    lineReader.on('SIGINT', () => {
      this.finish('interrupted');
      this.closeLineReader();
    });
    lineReader.on('close', () => {
      // closeLineReader() で閉じた場合は入力終了ではない
      if (this.lineReader !== lineReader) {
        return;
      }
      this.lineReader = null;
      this.finish('stdin closed');
    });

    this.lineReader = lineReader;
    return lineReader;
  }

  private closeLineReader(): void {
    const lineReader = this.lineReader;
    if (lineReader === null) {
      return;
    }
    this.lineReader = null;
    lineReader.close();
  }

  /** 入力終了を記録し、待っている readLine を reject */
  private finish(reason: string): void {
    this.closedReason ??= reason;
    const pending = this.pending;
    if (pending !== null) {
      this.pending = null;
      pending.reject(new InputClosedError(this.closedReason));
    }
  }

  private setRawMode(raw: boolean): void {
    if (this.input.isTTY === true) {
      this.input.setRawMode?.(raw);
    }
  }
}

/**
 * readline のキー情報を KeyName に変換
 * Enter は端末により 'return' / 'enter' のどちらでも届く
 */
export function toKeyName(key: readline.Key | undefined): KeyName {
  switch (key?.name) {
    case 'up':
      return 'up';
    case 'down':
      return 'down';
    case 'return':
    case 'enter':
      return 'enter';
    default:
      return key?.sequence ?? '';
  }
}
