/// <reference path="../types/v-conf.d.ts" />
import fs from 'fs-extra';
import VConf from 'v-conf';

import { CONFIG_PATH_ENV, DEFAULT_CONFIG_FILE, VOLUME_MAX, VOLUME_MIN } from '@/constants/app.constants';
import { DEFAULT_RADIO_LAUNCHER_CONFIG, RadioLauncherConfig } from '@/models/radio-launcher-config.model';
import type { LoggerEx } from '@/utils/logger.util';

const LOG_LEVELS: readonly RadioLauncherConfig['logLevel'][] = ['error', 'warn', 'info', 'debug'];

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function asNumber(value: unknown): number | undefined {
  const num = typeof value === 'string' ? Number(value) : value;
  return typeof num === 'number' && Number.isFinite(num) ? num : undefined;
}

function asBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function asLogLevel(value: unknown): RadioLauncherConfig['logLevel'] | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

/** 使用する設定ファイルのパス (環境変数で上書き可) */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return asString(env[CONFIG_PATH_ENV]) ?? DEFAULT_CONFIG_FILE;
}

/** loadConfig の結果 */
export interface LoadedConfig {
  config: RadioLauncherConfig;
  /** 読み込んだ (または見つからなかった) ファイル */
  configFile: string;
  /** ファイルがなく既定値を使った */
  usedDefaults: boolean;
}

/**
 * 設定ファイルを読み込み RadioLauncherConfig を生成
 * ファイルがない、または項目がない場合は既定値
 * ログ出力先は設定で決まるので、ログは reportConfig で後から出す
 * @param configFile v-conf 形式の JSON ファイル
 */
export function loadConfig(configFile: string): LoadedConfig {
  const defaults = DEFAULT_RADIO_LAUNCHER_CONFIG;

  if (!fs.existsSync(configFile)) {
    return { config: { ...defaults }, configFile, usedDefaults: true };
  }

  const config = new VConf();
  config.loadFile(configFile);

  const defaultVolume = asNumber(config.get('defaultVolume')) ?? defaults.defaultVolume;

  const radioLauncherConfig: RadioLauncherConfig = {
    catalogUrl: asString(config.get('catalogUrl')) ?? defaults.catalogUrl,
    requestTimeoutMs: asNumber(config.get('requestTimeoutMs')) ?? defaults.requestTimeoutMs,
    userAgent: asString(config.get('userAgent')) ?? defaults.userAgent,
    playerCommand: asString(config.get('playerCommand')) ?? defaults.playerCommand,
    // 範囲外は丸める
    defaultVolume: Math.min(VOLUME_MAX, Math.max(VOLUME_MIN, Math.round(defaultVolume))),
    language: asString(config.get('language')) ?? defaults.language,
    logLevel: asLogLevel(config.get('logLevel')) ?? defaults.logLevel,
    logFile: asString(config.get('logFile')) ?? defaults.logFile,
    forceDebug: asBoolean(config.get('forceDebug')) ?? defaults.forceDebug
  };

  return { config: radioLauncherConfig, configFile, usedDefaults: false };
}

/** 設定の読み込み結果をログ出力 */
export function reportConfig(loaded: LoadedConfig, logger: LoggerEx): void {
  if (loaded.usedDefaults) {
    logger.warn('RLNCH08UW0001', loaded.configFile);
  } else {
    logger.info('RLNCH08UI0001', loaded.configFile);
  }
}
