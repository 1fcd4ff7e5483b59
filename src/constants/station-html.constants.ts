/**
 * 局一覧ページ (HTML) パーサ設定
 * htmlparser2 用。script / style の中身は生テキストとして扱われる
 */
export const STATION_HTML_PARSER_OPTIONS = {
  // &amp; などの HTML エンティティ
  decodeEntities: true,
  lowerCaseTags: true,
  lowerCaseAttributeNames: true,
} as const;

/**
 * 局カードの構造
 * <button class="radio-card" data-id="12" aria-label="Радио Rock FM">
 *   <script>... {"file":"https:\/\/stream.example\/rock"} ...</script>
 * </button>
 */
export const STATION_HTML_MARKERS = {
  // カード要素
  cardTag: 'button',
  // カードの class
  classAttr: 'class',
  cardClass: 'radio-card',
  // 局ID属性
  idAttr: 'data-id',
  // 表示名属性 (先頭の単語は捨てる)
  labelAttr: 'aria-label',
  // ストリームURLを含むスクリプト
  scriptTag: 'script',
  // ストリームURLの直前にあるキー
  locatorKey: 'file',
} as const;
