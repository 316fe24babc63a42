import type TelegramBot from "node-telegram-bot-api";
import { OPTION_LABELS } from "../domain/types.js";

export const EMPTY_KEYBOARD: TelegramBot.InlineKeyboardMarkup = {
  inline_keyboard: [],
};

export function countKeyboard(
  choices: readonly number[],
  defaultCount: number,
  perRow: number = 3
): TelegramBot.InlineKeyboardMarkup {
  const buttons: TelegramBot.InlineKeyboardButton[] = choices.map((n) => ({
    text: n === defaultCount ? `${n} ★` : String(n),
    callback_data: `cnt:${n}`,
  }));
  const rows: TelegramBot.InlineKeyboardButton[][] = [];
  for (let i = 0; i < buttons.length; i += perRow) {
    rows.push(buttons.slice(i, i + perRow));
  }
  return { inline_keyboard: rows };
}

export function optionsKeyboard(
  sessionId: string,
  position: number
): TelegramBot.InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      OPTION_LABELS.map((label) => ({
        text: label.toUpperCase(),
        callback_data: `ans:${sessionId}:${position}:${label}`,
      })),
    ],
  };
}

export function resultKeyboard(
  sessionId: string
): TelegramBot.InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [
        { text: "🔁 Try again", callback_data: `retry:${sessionId}` },
        { text: "🚪 Exit", callback_data: `exit:${sessionId}` },
      ],
    ],
  };
}
