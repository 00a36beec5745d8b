import TelegramBot from 'node-telegram-bot-api';

import { LeaderboardRow } from '../persistence/quiz-persistence';
import { TopicSummary } from '../quiz/question.types';
import { AnswerOutcome, RenderDirective, SessionFinished } from '../quiz/session-engine.types';

// Telegram caps callback_data at 64 bytes, so buttons carry indices, never option or topic text.
export const CALLBACK = {
  topic: 'topic::',
  single: 'ans::',
  toggle: 'multi::',
  confirm: 'confirm::multi',
} as const;

export interface OutgoingMessage {
  text: string;
  options?: TelegramBot.SendMessageOptions;
}

export const HELP_TEXT =
  '📚 Commands:\n' +
  '/topics — available topics\n' +
  '/test — take a quiz (or /test topic=Geometry n=10 time=8)\n' +
  '/score — your points\n' +
  '/leaderboard — top players (or /leaderboard topic=Geometry)\n' +
  '/help — this message';

function formatClock(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

/** `<position>:<index>`; the position lets a stale button be told apart from the current question. */
function buttonRef(position: number, index: number): string {
  return `${position}:${index}`;
}

export function multiKeyboard(
  position: number,
  options: readonly string[],
  selected: readonly string[],
): TelegramBot.InlineKeyboardMarkup {
  const rows: TelegramBot.InlineKeyboardButton[][] = options.map((option, index) => [
    {
      text: (selected.includes(option) ? '✅ ' : '') + option,
      callback_data: CALLBACK.toggle + buttonRef(position, index),
    },
  ]);
  rows.push([{ text: 'Confirm', callback_data: CALLBACK.confirm }]);
  return { inline_keyboard: rows };
}

export function renderQuestion(directive: RenderDirective): OutgoingMessage {
  let text = `📝 Question ${directive.position}/${directive.total}`;
  if (directive.secondsLeft !== undefined) {
    text += `\n⏳ Time left: ${formatClock(directive.secondsLeft)}`;
  }
  text += `\n\n${directive.prompt}`;

  switch (directive.archetype) {
    case 'single':
      return {
        text,
        options: {
          reply_markup: {
            inline_keyboard: directive.payload.options.map((option, index) => [
              { text: option, callback_data: CALLBACK.single + buttonRef(directive.position, index) },
            ]),
          },
        },
      };
    case 'multi':
      return {
        text: `${text}\n\nSelect every correct option, then press Confirm.`,
        options: {
          reply_markup: multiKeyboard(directive.position, directive.payload.options, directive.payload.selected),
        },
      };
    case 'match': {
      const left = directive.payload.left.map((item) => `${item.label}) ${item.text}`).join('\n');
      const right = directive.payload.right.map((item) => `${item.label}) ${item.text}`).join('\n');
      return { text: `${text}\n\n${left}\n\n${right}\n\nReply like: A-2,B-1,C-3` };
    }
  }
}

export function renderOutcome(outcome: AnswerOutcome): string {
  let text = outcome.correct ? '🟩 Correct!' : '🟥 Wrong.';
  text += `\nCorrect answer: ${outcome.expected}`;
  if (outcome.explanation) text += `\n\n${outcome.explanation}`;
  return text;
}

export function renderFinished(result: SessionFinished): string {
  const percentage = result.total > 0 ? Math.round((result.score / result.total) * 100) : 0;
  return (
    `🏁 Quiz finished!${result.expired ? ' ⏰ Time is up.' : ''}\n\n` +
    `📊 Result: ${result.score}/${result.total} (${percentage}%)\n\n` +
    'Start again with /test'
  );
}

export function renderStarted(topic: string, total: number, timerMinutes: number): string {
  return `🚀 Starting "${topic}" (${total} questions)${timerMinutes > 0 ? `, ${timerMinutes} min` : ''}. Good luck!`;
}

export function renderTopics(topics: readonly TopicSummary[]): string {
  if (topics.length === 0) {
    return '⚠️ No topics found. Add question files to the bank directory.';
  }
  return 'Available topics:\n' + topics.map(({ topic, count }) => `• ${topic} — ${count} questions`).join('\n');
}

export function topicKeyboard(topics: readonly TopicSummary[]): TelegramBot.InlineKeyboardMarkup {
  return {
    inline_keyboard: topics.map(({ topic }, index) => [{ text: topic, callback_data: CALLBACK.topic + index }]),
  };
}

export function renderLeaderboard(rows: readonly LeaderboardRow[], topic?: string): string {
  if (rows.length === 0) {
    return 'No results yet.';
  }
  const title = '🏆 Leaderboard' + (topic ? ` — ${topic}` : '');
  const lines = rows.map((row, index) => `${index + 1}. ${row.fullName || 'unknown'} — ${row.points}`);
  return `${title}:\n${lines.join('\n')}`;
}

export type CallbackAction =
  | { kind: 'topic'; index: number }
  | { kind: 'option'; position: number; index: number }
  | { kind: 'toggle'; position: number; index: number }
  | { kind: 'confirm' };

const INDEX_PATTERN = /^\d+$/;
const BUTTON_REF_PATTERN = /^(\d+):(\d+)$/;

function parseButtonRef(ref: string): { position: number; index: number } | null {
  const match = BUTTON_REF_PATTERN.exec(ref);
  return match ? { position: Number(match[1]), index: Number(match[2]) } : null;
}

export function parseCallbackData(data: string): CallbackAction | null {
  if (data === CALLBACK.confirm) return { kind: 'confirm' };

  if (data.startsWith(CALLBACK.topic)) {
    const index = data.slice(CALLBACK.topic.length);
    return INDEX_PATTERN.test(index) ? { kind: 'topic', index: Number(index) } : null;
  }
  if (data.startsWith(CALLBACK.single)) {
    const ref = parseButtonRef(data.slice(CALLBACK.single.length));
    return ref && { kind: 'option', ...ref };
  }
  if (data.startsWith(CALLBACK.toggle)) {
    const ref = parseButtonRef(data.slice(CALLBACK.toggle.length));
    return ref && { kind: 'toggle', ...ref };
  }
  return null;
}
