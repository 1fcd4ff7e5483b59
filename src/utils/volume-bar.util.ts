import { VOLUME_BAR_SEGMENTS, VOLUME_MAX, VOLUME_MIN } from '@/constants/app.constants';

const FILLED_SEGMENT = '█';

/** 音量を 0〜100 の整数に丸める */
export function clampVolume(value: number): number {
  if (Number.isNaN(value)) {
    return VOLUME_MIN;
  }
  return Math.min(VOLUME_MAX, Math.max(VOLUME_MIN, Math.round(value)));
}

/** 塗りつぶす目盛り数 (1目盛り = 5%) */
export function filledSegments(volume: number): number {
  return Math.round(clampVolume(volume) / (VOLUME_MAX / VOLUME_BAR_SEGMENTS));
}

/**
 * 音量バー
 * 例: 45 → "| █████████            |  45%"
 */
export function formatVolumeBar(volume: number): string {
  const clamped = clampVolume(volume);
  const bar = FILLED_SEGMENT.repeat(filledSegments(clamped)).padEnd(VOLUME_BAR_SEGMENTS);
  return `| ${bar} | ${String(clamped).padStart(3)}%`;
}
