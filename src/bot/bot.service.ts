import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import TelegramBot from 'node-telegram-bot-api';

import { AppConfig } from '../config/app.config';
import { QUIZ_PERSISTENCE, QuizPersistence } from '../persistence/quiz-persistence';
import { QuestionBankService } from '../quiz/question-bank.service';
import { SessionEngineService } from '../quiz/session-engine.service';
import { AnswerInput, SessionStep, SubmitResult } from '../quiz/session-engine.types';
import {
  HELP_TEXT,
  multiKeyboard,
  parseCallbackData,
  renderFinished,
  renderLeaderboard,
  renderOutcome,
  renderQuestion,
  renderStarted,
  renderTopics,
  topicKeyboard,
} from './bot.render';
import { intArg, parseCommand } from './command-args';

const NOT_APPROVED_TEXT = '⛔ Your access has not been approved by an administrator yet.';
const AWAITING_APPROVAL_TEXT = '👋 Thanks! Please wait until an administrator approves your access.';
const ASK_NAME_TEXT = '👋 Hi! Please send your first name and surname in one message (for example: Jane Doe).';
const NAME_AGAIN_TEXT = '✍️ Please send your first name and surname (two words).';

function fullNameOf(from?: TelegramBot.User): string {
  return [from?.first_name, from?.last_name].filter(Boolean).join(' ');
}

@Injectable()
export class BotService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(BotService.name);
  private bot?: TelegramBot;
  // per-user tail of pending work; updates of one user run strictly in order
  private readonly queues = new Map<number, Promise<void>>();
  // users asked for their name by /start; their next plain text is taken as it
  private readonly awaitingName = new Set<number>();
  private readonly defaultCount: number;
  private readonly leaderboardLimit: number;

  constructor(
    private readonly engine: SessionEngineService,
    private readonly bank: QuestionBankService,
    @Inject(QUIZ_PERSISTENCE) private readonly persistence: QuizPersistence,
    private readonly config: ConfigService<AppConfig, true>,
  ) {
    this.defaultCount = this.config.get('QUIZ_DEFAULT_COUNT', { infer: true });
    this.leaderboardLimit = this.config.get('LEADERBOARD_LIMIT', { infer: true });
  }

  onModuleInit() {
    const token = this.config.get('BOT_TOKEN', { infer: true });
    if (!token) {
      this.logger.error('❌ BOT_TOKEN not found in config!');
      return;
    }

    this.logger.log(`✅ Initializing bot with token: ${token.substring(0, 10)}...`);

    const polling = this.config.get('BOT_POLLING', { infer: true });
    const bot = new TelegramBot(token, { polling });
    this.bot = bot;

    bot.on('message', (msg: TelegramBot.Message) =>
      this.dispatch(msg.from?.id ?? msg.chat.id, msg.chat.id, () => this.handleMessage(msg)),
    );
    bot.on('callback_query', (query: TelegramBot.CallbackQuery) =>
      this.dispatch(query.from.id, query.message?.chat.id, () => this.handleCallback(query)),
    );
    bot.on('polling_error', (error: Error) => {
      this.logger.error(`❌ Polling error: ${error.message}`);
    });

    this.logger.log(polling ? '✅ Bot polling started successfully.' : '✅ Bot ready (polling disabled).');
  }

  async onModuleDestroy() {
    if (this.bot?.isPolling()) {
      await this.bot.stopPolling();
    }
  }

  private dispatch(userId: number, chatId: number | undefined, handle: () => Promise<void>): void {
    const previous = this.queues.get(userId) ?? Promise.resolve();
    const next = previous.then(handle).catch((error: unknown) => this.reportFailure(chatId, error));
    this.queues.set(userId, next);
    void next.then(() => {
      if (this.queues.get(userId) === next) this.queues.delete(userId);
    });
  }

  private async reportFailure(chatId: number | undefined, error: unknown): Promise<void> {
    this.logger.error('❌ Failed to handle update', error instanceof Error ? error.stack : String(error));
    if (chatId === undefined) return;
    try {
      await this.send(chatId, '❌ Something went wrong. Please try again later.');
    } catch (sendError) {
      this.logger.error(`❌ Could not notify chat ${chatId}: ${String(sendError)}`);
    }
  }

  private async handleMessage(msg: TelegramBot.Message) {
    const chatId = msg.chat.id;
    const userId = msg.from?.id ?? chatId;
    const text = msg.text?.trim();

    this.logger.debug(`📩 Message from ${userId}: "${text}"`);

    if (!text) return;

    const command = parseCommand(text);
    if (!command) {
      await this.handleAnswerText(chatId, userId, text);
      return;
    }

    switch (command.command) {
      case 'start':
        await this.handleStart(chatId, userId, msg.from);
        return;
      case 'help':
        await this.send(chatId, HELP_TEXT);
        return;
      case 'topics':
        await this.send(chatId, renderTopics(this.bank.listTopics()));
        return;
      case 'test':
        await this.handleTest(chatId, userId, msg.from, command.args);
        return;
      case 'score': {
        const points = await this.persistence.getUserPoints(userId);
        await this.send(chatId, `📊 Your points: ${points}`);
        return;
      }
      case 'leaderboard': {
        const topic = command.args.topic;
        const rows = await this.persistence.topScores(this.leaderboardLimit, topic);
        await this.send(chatId, renderLeaderboard(rows, topic));
        return;
      }
      default:
        await this.send(chatId, `Unknown command. ${HELP_TEXT}`);
    }
  }

  private async handleStart(chatId: number, userId: number, from?: TelegramBot.User) {
    const user = await this.persistence.ensureUser(userId, fullNameOf(from));
    if (!user.fullName) {
      this.awaitingName.add(userId);
      await this.send(chatId, ASK_NAME_TEXT);
      return;
    }
    await this.greet(chatId, user.approved);
  }

  private async handleName(chatId: number, userId: number, text: string) {
    const name = text.split(/\s+/).join(' ');
    if (name.split(' ').length < 2) {
      await this.send(chatId, NAME_AGAIN_TEXT);
      return;
    }

    await this.persistence.setUserName(userId, name);
    this.awaitingName.delete(userId);
    this.logger.log(`User ${userId} registered as "${name}"`);
    await this.greet(chatId, await this.persistence.getUserApproval(userId));
  }

  private async greet(chatId: number, approved: boolean) {
    await this.send(chatId, approved ? `👋 Welcome to the quiz bot!\n\n${HELP_TEXT}` : AWAITING_APPROVAL_TEXT);
  }

  private async handleTest(
    chatId: number,
    userId: number,
    from: TelegramBot.User | undefined,
    args: Record<string, string>,
  ) {
    const user = await this.persistence.ensureUser(userId, fullNameOf(from));
    if (!user.approved) {
      await this.send(chatId, NOT_APPROVED_TEXT);
      return;
    }

    const topics = this.bank.listTopics();
    if (topics.length === 0) {
      await this.send(chatId, renderTopics(topics));
      return;
    }

    let topic = args.topic;
    if (!topic) {
      if (topics.length > 1) {
        await this.send(chatId, 'Choose a topic:', { reply_markup: topicKeyboard(topics) });
        return;
      }
      topic = topics[0].topic;
    }
    if (!topics.some((summary) => summary.topic === topic)) {
      await this.send(chatId, `⚠️ Topic "${topic}" not found. Try /topics`);
      return;
    }

    await this.startQuiz(chatId, userId, topic, intArg(args, 'n', this.defaultCount), intArg(args, 'time', 0));
  }

  private async startQuiz(chatId: number, userId: number, topic: string, n: number, minutes: number) {
    const result = await this.engine.startSession(userId, topic, n, minutes);
    switch (result.kind) {
      case 'not-approved':
        await this.send(chatId, NOT_APPROVED_TEXT);
        return;
      case 'no-questions':
        await this.send(chatId, '⚠️ There are no questions in this topic.');
        return;
      case 'started':
        await this.send(chatId, renderStarted(result.topic, result.total, result.timerMinutes));
        await this.sendStep(chatId, result.step);
        return;
    }
  }

  private async handleAnswerText(chatId: number, userId: number, text: string) {
    if (this.awaitingName.has(userId) && !this.engine.hasActiveSession(userId)) {
      await this.handleName(chatId, userId, text);
      return;
    }

    const result = await this.engine.submitAnswer(userId, { kind: 'text', text });
    if (result.kind === 'no-session') {
      await this.send(chatId, '⚠️ No active quiz. Start one with /test');
      return;
    }
    if (result.kind === 'ignored') {
      const step = await this.engine.currentStep(userId);
      if (step.kind === 'no-session') return;
      await this.send(chatId, '👇 Please answer with the buttons.');
      await this.sendStep(chatId, step);
      return;
    }
    await this.sendResult(chatId, result);
  }

  private async handleCallback(query: TelegramBot.CallbackQuery) {
    await this.client().answerCallbackQuery(query.id);

    const chatId = query.message?.chat.id;
    const userId = query.from.id;
    const action = parseCallbackData(query.data ?? '');
    if (chatId === undefined || !action) {
      this.logger.warn(`Ignoring callback "${query.data}" from ${userId}`);
      return;
    }

    switch (action.kind) {
      case 'topic': {
        const user = await this.persistence.ensureUser(userId, fullNameOf(query.from));
        if (!user.approved) {
          await this.send(chatId, NOT_APPROVED_TEXT);
          return;
        }
        const summary = this.bank.listTopics()[action.index];
        if (!summary) {
          await this.send(chatId, '⚠️ This topic is no longer available. Try /test');
          return;
        }
        await this.startQuiz(chatId, userId, summary.topic, this.defaultCount, 0);
        return;
      }
      case 'confirm':
        await this.sendResult(chatId, await this.engine.submitAnswer(userId, { kind: 'confirm' }), query.message);
        return;
      case 'option':
      case 'toggle': {
        const option = this.engine.optionAt(userId, action.position, action.index);
        if (option === undefined) {
          this.logger.debug(`Stale button "${query.data}" from ${userId}`);
          return;
        }
        const input: AnswerInput =
          action.kind === 'option' ? { kind: 'option', option } : { kind: 'toggle', option };
        await this.sendResult(chatId, await this.engine.submitAnswer(userId, input), query.message);
        return;
      }
    }
  }

  private async sendResult(chatId: number, result: SubmitResult, source?: TelegramBot.Message) {
    switch (result.kind) {
      case 'no-session':
      case 'ignored':
        return;
      case 'retry':
        await this.send(chatId, `⚠️ Could not read your answer: ${result.reason}.\nFormat: A-1,B-3,C-2`);
        return;
      case 'selection': {
        const { position, payload } = result.directive;
        if (source) {
          await this.client().editMessageReplyMarkup(multiKeyboard(position, payload.options, payload.selected), {
            chat_id: chatId,
            message_id: source.message_id,
          });
        } else {
          await this.sendStep(chatId, { kind: 'question', directive: result.directive });
        }
        return;
      }
      case 'answered':
        await this.send(chatId, renderOutcome(result.outcome));
        await this.sendStep(chatId, result.next);
        return;
      case 'finished':
        await this.sendStep(chatId, result);
        return;
    }
  }

  private async sendStep(chatId: number, step: SessionStep) {
    if (step.kind === 'finished') {
      await this.send(chatId, renderFinished(step));
      return;
    }
    const message = renderQuestion(step.directive);
    await this.send(chatId, message.text, message.options);
  }

  private async send(chatId: number, text: string, options?: TelegramBot.SendMessageOptions) {
    await this.client().sendMessage(chatId, text, options);
  }

  private client(): TelegramBot {
    if (!this.bot) {
      throw new Error('Telegram bot is not initialised');
    }
    return this.bot;
  }
}
