/**
 * 外部の再生エンジン
 * createInstance → newMedia / newPlayer → setMedia → play の順に使う
 */
export interface PlaybackEngine {
  createInstance(flags: readonly string[]): EngineInstance;
}

export interface EngineInstance {
  newMedia(locator: string): EngineMedia;
  newPlayer(): EnginePlayer;
}

export interface EngineMedia {
  readonly locator: string;
}

export interface EnginePlayer {
  setMedia(media: EngineMedia): void;
  /** 再生開始。エンジンが起動できなければ reject */
  play(): Promise<void>;
  stop(): void;
  /** 一時停止/再開の切替 */
  pause(): void;
  /** 0〜100 */
  getVolume(): number;
  setVolume(volume: number): void;
  /** stop() 以外で再生が終わったときに呼ばれる */
  onEnded(listener: (exitCode: number | null) => void): void;
}
