// v-conf は型定義を同梱していないため、使用する API のみ宣言
declare module 'v-conf' {
  class VConf {
    constructor();
    /** { "key": { "type": ..., "value": ... } } 形式の JSON を読み込む */
    loadFile(file: string): void;
    /** ドット区切りのキーで value を取得 (なければ def) */
    get(key: string, def?: unknown): unknown;
  }
  export = VConf;
}
