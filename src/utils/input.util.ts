import type { Terminal } from '@/models/terminal.model';
import { messageHelper } from '@/utils/message-helper.util';

/** 整数として解釈できる入力のみ数値にする ("1", " 2 ", "-3") */
export function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  return /^[+-]?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

/**
 * 整数が入力されるまで繰り返し1行入力
 * @param promptId プロンプトのメッセージID
 */
export async function readInteger(terminal: Terminal, promptId: string): Promise<number> {
  for (;;) {
    const value = parseInteger(await terminal.readLine(messageHelper.get(promptId)));
    if (value !== null) {
      return value;
    }
    terminal.write(`${messageHelper.get('UI_NUMBER_REQUIRED')}\n`);
  }
}
