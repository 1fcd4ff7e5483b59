import type { PageName } from '@/models/page.model';
import type { Station } from '@/models/station.model';

export interface NavigateAction {
  readonly type: 'navigate';
  readonly target: PageName;
}

/** 一つ前の画面へ戻る */
export interface BackAction {
  readonly type: 'back';
}

export interface ExitAction {
  readonly type: 'exit';
}

export interface PlaySelectedStationAction {
  readonly type: 'playSelectedStation';
  readonly station: Station;
}

export interface AdjustVolumeAction {
  readonly type: 'adjustVolume';
  readonly delta: number;
}

/** 何もしない (同じ画面で再入力)。notice があれば表示する */
export interface NoOpAction {
  readonly type: 'noop';
  readonly notice?: string;
}

export type Action =
  | NavigateAction
  | BackAction
  | ExitAction
  | PlaySelectedStationAction
  | AdjustVolumeAction
  | NoOpAction;

export const Actions = {
  navigate: (target: PageName): NavigateAction => ({ type: 'navigate', target }),
  back: (): BackAction => ({ type: 'back' }),
  exit: (): ExitAction => ({ type: 'exit' }),
  playSelectedStation: (station: Station): PlaySelectedStationAction => ({ type: 'playSelectedStation', station }),
  adjustVolume: (delta: number): AdjustVolumeAction => ({ type: 'adjustVolume', delta }),
  noop: (notice?: string): NoOpAction => (notice === undefined ? { type: 'noop' } : { type: 'noop', notice }),
} as const;
