// Modelのインポート
import type { PlaybackEngine } from '@/models/playback-engine.model';
import type { PlaybackHandle, PlaybackState } from '@/models/playback-state.model';
import type { Station } from '@/models/station.model';

import { errorMessageOf, NoStationSelectedError, PlaybackEngineError } from '@/errors/radio-launcher.error';

// Utilsのインポート
import { LoggerEx } from '@/utils/logger.util';
import { clampVolume } from '@/utils/volume-bar.util';

/** 無限リピート (ストリームが切れても再接続)、全画面はエンジンの既定どおり */
export const ENGINE_FLAGS: readonly string[] = ['--input-repeat=-1', '--fullscreen'];

export interface PlaybackSessionOptions {
  /** 再生開始前の音量 (エンジンの既定値) */
  defaultVolume: number;
  /** 再生開始の通知 ("Now playing ...") */
  onNowPlaying: (station: Station) => void;
}

/**
 * 再生セッション
 * 選択中の局と再生中のハンドル (最大1つ) を管理する
 */
export default class PlaybackSession {
  private readonly engine: PlaybackEngine;
  private readonly logger: LoggerEx;
  private readonly onNowPlaying: (station: Station) => void;

  private currentStation: Station | null = null;
  private handle: PlaybackHandle | null = null;
  private volume: number;

  constructor(engine: PlaybackEngine, logger: LoggerEx, options: PlaybackSessionOptions) {
    this.engine = engine;
    this.logger = logger;
    this.onNowPlaying = options.onNowPlaying;
    this.volume = clampVolume(options.defaultVolume);
  }

  /** 現在の状態 (読み取り専用のコピー) */
  public get state(): Readonly<PlaybackState> {
    return {
      currentStation: this.currentStation,
      handle: this.handle,
      volume: this.volume
    };
  }

  /** 局を選択 (再生はしない) */
  public select(station: Station): void {
    this.currentStation = station;
    this.logger.info('RLNCH03SI0001', station.title, station.id);
  }

  /**
   * 選択中の局を再生
   * 再生中のハンドルがあれば先に止める
   * @throws NoStationSelectedError 局が未選択
   * @throws PlaybackEngineError エンジンが起動できない
   */
  public async play(): Promise<void> {
    const station = this.currentStation;
    if (station === null) {
      this.logger.warn('RLNCH03SW0001');
      throw new NoStationSelectedError();
    }

    this.stop();

    let player: PlaybackHandle;
    try {
      const instance = this.engine.createInstance(ENGINE_FLAGS);
      const media = instance.newMedia(station.streamLocator);
      player = instance.newPlayer();
      player.setMedia(media);
      player.setVolume(this.volume);
      await player.play();
    } catch (error: unknown) {
      this.handle = null;
      this.logger.error('RLNCH03SE0001', errorMessageOf(error));
      throw error instanceof PlaybackEngineError
        ? error
        : new PlaybackEngineError(errorMessageOf(error), { cause: error });
    }

    // プレーヤーが勝手に終わった場合はハンドルを外す
    player.onEnded((exitCode: number | null) => {
      if (this.handle !== player) {
        return;
      }
      this.handle = null;
      this.logger.warn('RLNCH03SW0002', station.title, String(exitCode));
    });

    this.handle = player;
    this.logger.info('RLNCH03SI0002', station.title, station.streamLocator);
    this.onNowPlaying(station);
  }

  /** 再生停止 (ハンドルがなければ何もしない) */
  public stop(): void {
    if (this.handle === null) {
      return;
    }
    this.handle.stop();
    this.handle = null;
    this.logger.info('RLNCH03SI0003', this.currentStation?.title ?? '');
  }

  /** 一時停止/再開 (ハンドルがなければ何もしない) */
  public pause(): void {
    if (this.handle === null) {
      return;
    }
    this.handle.pause();
    this.logger.info('RLNCH03SI0004', this.currentStation?.title ?? '');
  }

  /**
   * 音量設定 (0〜100 に丸める)
   * ハンドルがない場合も値は保持し、次の再生開始時に反映する
   */
  public setVolume(value: number): void {
    this.volume = clampVolume(value);
    this.handle?.setVolume(this.volume);
    this.logger.debug('RLNCH03SD0001', this.volume);
  }

  /** 現在の音量から delta だけ増減 */
  public adjustVolume(delta: number): void {
    this.setVolume(this.volume + delta);
  }

  /** 再生中の音量。ハンドルがなければ null */
  public getVolume(): number | null {
    return this.handle === null ? null : this.handle.getVolume();
  }

  /** 終了時の後始末 */
  public dispose(): void {
    this.stop();
  }
}
