import got from 'got';

// Modelのインポート
import type { Station } from '@/models/station.model';
import type { RadioLauncherConfig } from '@/models/radio-launcher-config.model';

import { errorMessageOf, ParseError, SourceUnavailableError } from '@/errors/radio-launcher.error';

// Utilsのインポート
import { LoggerEx } from '@/utils/logger.util';
import { parseStationHtml } from '@/utils/station-html-parser.util';

/** HTTP 応答のうち局一覧で使う部分 */
export interface CatalogResponse {
  statusCode: number;
  body: string;
}

export interface CatalogRequestOptions {
  userAgent: string;
  timeoutMs: number;
}

/** 局一覧ページの取得関数 */
export type FetchCatalogPage = (url: string, options: CatalogRequestOptions) => Promise<CatalogResponse>;

/**
 * got による取得 (リトライなし)
 */
export const fetchCatalogPageWithGot: FetchCatalogPage = async (url, options) => {
  const response = await got(url, {
    headers: { 'user-agent': options.userAgent },
    timeout: options.timeoutMs,
    retry: 0,
    // ステータス判定は呼び出し側で行う
    throwHttpErrors: false
  });
  return { statusCode: response.statusCode, body: response.body };
};

/**
 * 局一覧ページから局情報を取得する
 * 取得は1回のみ (リトライなし)
 */
export default class StationCatalog {
  private readonly logger: LoggerEx;
  private readonly config: Pick<RadioLauncherConfig, 'catalogUrl' | 'requestTimeoutMs' | 'userAgent'>;

  private readonly fetchPage: FetchCatalogPage;

  constructor(
    config: Pick<RadioLauncherConfig, 'catalogUrl' | 'requestTimeoutMs' | 'userAgent'>,
    logger: LoggerEx,
    fetchPage: FetchCatalogPage = fetchCatalogPageWithGot
  ) {
    this.config = config;
    this.logger = logger;
    this.fetchPage = fetchPage;
  }

  /**
   * 局一覧を取得
   * @throws SourceUnavailableError 取得失敗 / ステータスが 200 以外
   * @throws ParseError 局カードの構造が想定と違う
   */
  public async fetch(): Promise<Station[]> {
    const url = this.config.catalogUrl;
    this.logger.info('RLNCH02SI0001', url);
    const startTime = Date.now();

    let body: string;
    try {
      const response = await this.fetchPage(url, {
        userAgent: this.config.userAgent,
        timeoutMs: this.config.requestTimeoutMs
      });

      if (response.statusCode !== 200) {
        throw new Error(`HTTP ${response.statusCode}`);
      }
      body = response.body;
    } catch (error: unknown) {
      this.logger.error('RLNCH02SE0001', url, errorMessageOf(error));
      throw new SourceUnavailableError(`${url}: ${errorMessageOf(error)}`, { cause: error });
    }

    let stations: Station[];
    try {
      stations = parseStationHtml(body);
    } catch (error: unknown) {
      this.logger.error('RLNCH02SE0002', errorMessageOf(error));
      throw error instanceof ParseError ? error : new ParseError(errorMessageOf(error), { cause: error });
    }

    // ID の重複は警告のみ (番号は位置で決まる)
    const seen = new Set<number>();
    for (const station of stations) {
      if (seen.has(station.id)) {
        this.logger.warn('RLNCH02SW0001', station.id, station.title);
      }
      seen.add(station.id);
    }

    this.logger.info('RLNCH02SI0002', stations.length, Date.now() - startTime);
    return stations;
  }
}
