import { OPTION_LABELS, type Question } from "../domain/types.js";

// Escape for Telegram MarkdownV2 (NOT legacy)
// Special set: _ * [ ] ( ) ~ ` > # + - = | { } . ! and backslash itself.
export function escapeMdV2(s: string): string {
  return s.replace(/([_*\[\]()~`>#+\-=|{}.!\\])/g, "\\$1");
}

export function renderProgressBar(
  done: number,
  total: number,
  width: number = 10
): string {
  if (total <= 0) return "▱".repeat(width);
  const filled: number = Math.round((Math.min(done, total) / total) * width);
  return "▰".repeat(filled) + "▱".repeat(width - filled);
}

export function renderQuestionHeader(position: number, total: number): string {
  return `*Question ${position + 1} of ${total}*  ${renderProgressBar(
    position,
    total
  )}`;
}

/**
 * Full MarkdownV2 body for one question: header, statement, citation and the
 * four lettered options.
 */
export function renderQuestion(
  q: Question,
  position: number,
  total: number
): string {
  const source: string = q.source.trim()
    ? `\n\n_Source: ${escapeMdV2(q.source.trim())}_`
    : "";
  const options: string = OPTION_LABELS.map(
    (label) => `*${label.toUpperCase()}\\)* ${escapeMdV2(q.options[label])}`
  ).join("\n");

  return `${renderQuestionHeader(position, total)}\n\n${escapeMdV2(
    q.statement
  )}${source}\n\n${options}`;
}

export function renderEntryScreen(greeting?: string): string {
  const intro: string = greeting ? `${greeting}\n\n` : "";
  return `${intro}Choose how many questions you want:`;
}
