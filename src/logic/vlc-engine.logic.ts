import { spawn, ChildProcess, SpawnOptions } from 'child_process';

import { VOLUME_MAX } from '@/constants/app.constants';
import { errorMessageOf, PlaybackEngineError } from '@/errors/radio-launcher.error';
import type { EngineInstance, EngineMedia, EnginePlayer, PlaybackEngine } from '@/models/playback-engine.model';
import { LoggerEx } from '@/utils/logger.util';
import { clampVolume } from '@/utils/volume-bar.util';

/** child_process.spawn と同じ形 (テストで差し替える) */
export type SpawnProcess = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

/** VLC の rc インターフェースでの 100% */
const VLC_VOLUME_UNITY = 256;

/** 0〜100 を VLC の音量値 (256 = 100%) に変換 */
export function toVlcVolume(volume: number): number {
  return Math.round((clampVolume(volume) * VLC_VOLUME_UNITY) / VOLUME_MAX);
}

/**
 * VLC (rc インターフェース) による再生エンジン
 * 1 プレーヤー = 1 プロセス。操作は標準入力へのコマンドで行う
 */
export class VlcEngine implements PlaybackEngine {
  private readonly command: string;
  private readonly logger: LoggerEx;
  private readonly spawnProcess: SpawnProcess;

  constructor(command: string, logger: LoggerEx, spawnProcess: SpawnProcess = spawn) {
    this.command = command;
    this.logger = logger;
    this.spawnProcess = spawnProcess;
  }

  public createInstance(flags: readonly string[]): EngineInstance {
    return new VlcInstance(this.command, flags, this.logger, this.spawnProcess);
  }
}

class VlcInstance implements EngineInstance {
  private readonly command: string;
  private readonly flags: readonly string[];
  private readonly logger: LoggerEx;
  private readonly spawnProcess: SpawnProcess;

  constructor(command: string, flags: readonly string[], logger: LoggerEx, spawnProcess: SpawnProcess) {
    this.command = command;
    this.flags = flags;
    this.logger = logger;
    this.spawnProcess = spawnProcess;
  }

  public newMedia(locator: string): EngineMedia {
    return { locator };
  }

  public newPlayer(): EnginePlayer {
    return new VlcPlayer(this.command, this.flags, this.logger, this.spawnProcess);
  }
}

export class VlcPlayer implements EnginePlayer {
  private media: EngineMedia | null = null;
  private child: ChildProcess | null = null;
  private volume: number = VOLUME_MAX;
  private readonly endedListeners: ((exitCode: number | null) => void)[] = [];
  private readonly command: string;
  private readonly flags: readonly string[];
  private readonly logger: LoggerEx;
  private readonly spawnProcess: SpawnProcess;

  constructor(command: string, flags: readonly string[], logger: LoggerEx, spawnProcess: SpawnProcess) {
    this.command = command;
    this.flags = flags;
    this.logger = logger;
    this.spawnProcess = spawnProcess;
  }

  public setMedia(media: EngineMedia): void {
    this.media = media;
  }

  /** VLC の起動引数 */
  public buildArgs(media: EngineMedia): string[] {
    return ['-I', 'rc', '--no-video', ...this.flags, media.locator];
  }

  public async play(): Promise<void> {
    if (this.media === null) {
      throw new PlaybackEngineError('No media set');
    }
    if (this.child !== null) {
      return;
    }

    const args = this.buildArgs(this.media);
    this.logger.info('RLNCH04LI0001', this.command, args.join(' '));

    let child: ChildProcess;
    try {
      child = this.spawnProcess(this.command, args, { stdio: ['pipe', 'ignore', 'ignore'] });
    } catch (error: unknown) {
      throw new PlaybackEngineError(`${this.command}: ${errorMessageOf(error)}`, { cause: error });
    }

    // 起動完了 (spawn) または失敗 (error) を待つ
    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error): void => {
        child.off('spawn', onSpawn);
        reject(new PlaybackEngineError(`${this.command}: ${error.message}`, { cause: error }));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    this.child = child;
    child.on('error', (error: Error) => {
      this.logger.error('RLNCH03SE0001', error.message);
    });
    child.stdin?.on('error', (error: Error) => {
      this.logger.warn('RLNCH04LW0001', error.message);
    });
    child.once('exit', (code: number | null) => {
      // stop() 済みなら通知しない
      if (this.child !== child) {
        return;
      }
      this.child = null;
      for (const listener of this.endedListeners) {
        listener(code);
      }
    });

    this.send(`volume ${toVlcVolume(this.volume)}`);
  }

  public stop(): void {
    const child = this.child;
    if (child === null) {
      return;
    }
    this.child = null;
    this.send('quit', child);
    child.kill();
  }

  public pause(): void {
    this.send('pause');
  }

  public getVolume(): number {
    return this.volume;
  }

  public setVolume(volume: number): void {
    this.volume = clampVolume(volume);
    this.send(`volume ${toVlcVolume(this.volume)}`);
  }

  public onEnded(listener: (exitCode: number | null) => void): void {
    this.endedListeners.push(listener);
  }

  /** 再生中のプロセスへ rc コマンドを送る */
  private send(command: string, child: ChildProcess | null = this.child): void {
    if (child === null || child.stdin === null || !child.stdin.writable) {
      return;
    }
    this.logger.debug('RLNCH04LD0001', command);
    child.stdin.write(`${command}\n`);
  }
}
