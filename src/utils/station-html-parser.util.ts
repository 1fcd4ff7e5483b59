import type { Element } from 'domhandler';
import { DomUtils, parseDocument } from 'htmlparser2';

// 定数のインポート
import { STATION_HTML_MARKERS, STATION_HTML_PARSER_OPTIONS } from '@/constants/station-html.constants';

// Modelのインポート
import { createStation, Station } from '@/models/station.model';

import { ParseError } from '@/errors/radio-launcher.error';

function attributeOf(element: Element, name: string): string | undefined {
  return DomUtils.getAttributeValue(element, name);
}

function isStationCard(element: Element): boolean {
  if (element.name !== STATION_HTML_MARKERS.cardTag) {
    return false;
  }
  const classNames = attributeOf(element, STATION_HTML_MARKERS.classAttr)?.split(/\s+/) ?? [];
  return classNames.includes(STATION_HTML_MARKERS.cardClass);
}

/**
 * 局IDを取得 (整数のみ)
 */
function parseStationId(card: Element, index: number): number {
  const raw = attributeOf(card, STATION_HTML_MARKERS.idAttr)?.trim();
  if (raw === undefined || !/^[+-]?\d+$/.test(raw)) {
    throw new ParseError(`Card #${index + 1}: invalid ${STATION_HTML_MARKERS.idAttr} "${raw ?? ''}"`);
  }
  return parseInt(raw, 10);
}

/**
 * 表示名を取得
 * aria-label の先頭の単語 ("Радио" 等) を除いた残り
 */
function parseStationTitle(card: Element, index: number): string {
  const label = attributeOf(card, STATION_HTML_MARKERS.labelAttr) ?? '';
  const match = /^\s*\S+\s+(\S[\s\S]*)$/.exec(label);
  if (match === null) {
    throw new ParseError(`Card #${index + 1}: invalid ${STATION_HTML_MARKERS.labelAttr} "${label}"`);
  }
  return match[1].trim();
}

/**
 * スクリプト断片からストリームURLを取り出す
 * 例: player.init({"file":"https:\/\/stream.example\/rock"}) → https://stream.example/rock
 * キーの後ろを " で区切った 3 番目がURL
 */
export function extractStreamLocator(scriptText: string): string | undefined {
  const text = scriptText.trim();
  const keyIndex = text.indexOf(STATION_HTML_MARKERS.locatorKey);
  if (keyIndex < 0) {
    return undefined;
  }

  const parts = text.slice(keyIndex + STATION_HTML_MARKERS.locatorKey.length).split('"');
  // 閉じの " がなければ不正
  if (parts.length < 4) {
    return undefined;
  }

  const locator = parts[2].replace(/\\/g, '');
  return locator === '' ? undefined : locator;
}

function parseStreamLocator(card: Element, index: number): string {
  const script = DomUtils.findOne((element: Element) => element.name === STATION_HTML_MARKERS.scriptTag, card.children);
  if (script === null) {
    throw new ParseError(`Card #${index + 1}: <${STATION_HTML_MARKERS.scriptTag}> not found`);
  }

  const locator = extractStreamLocator(DomUtils.textContent(script));
  if (locator === undefined) {
    throw new ParseError(`Card #${index + 1}: stream locator not found`);
  }
  return locator;
}

/**
 * 局一覧 HTML を Station[] に変換
 * 並び順は文書中の出現順
 * @param html 局一覧ページの HTML
 */
export function parseStationHtml(html: string): Station[] {
  const document = parseDocument(html, STATION_HTML_PARSER_OPTIONS);

  const cards = DomUtils.findAll(isStationCard, document.children);
  if (cards.length === 0) {
    throw new ParseError(`No <${STATION_HTML_MARKERS.cardTag} class="${STATION_HTML_MARKERS.cardClass}"> found`);
  }

  return cards.map((card, index) =>
    createStation(parseStationId(card, index), parseStationTitle(card, index), parseStreamLocator(card, index))
  );
}
