import type { EnginePlayer } from '@/models/playback-engine.model';
import type { Station } from '@/models/station.model';

/** 再生中のストリームのハンドル */
export type PlaybackHandle = EnginePlayer;

/**
 * 再生状態
 * handle は最後の stop 以降に再生した場合のみ存在する
 */
export interface PlaybackState {
  currentStation: Station | null;
  handle: PlaybackHandle | null;
  /** 0〜100 */
  volume: number;
}
