import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { AppConfig } from '../config/app.config';
import { BankLoadError } from './quiz.errors';
import { DEFAULT_TOPIC, QuestionRecord, TopicSummary } from './question.types';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const optionalTextList = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? []);

// A question with nothing to press or pair can never be answered.
const answerableList = optionalTextList.refine((value) => value.length > 0, 'must not be empty');

const pairIndex = z.number().int().nonnegative();

const baseRecordSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  topic: z.string().nullish(),
  type: z.enum(['single', 'multi', 'match']).nullish().transform((value) => value ?? 'single'),
  question: optionalText,
  explanation: optionalText,
});

const singleFieldsSchema = z.object({
  options: answerableList,
  answer: optionalText,
});

const multiFieldsSchema = z.object({
  options: answerableList,
  answers: optionalTextList,
});

const matchFieldsSchema = z.object({
  match_left: answerableList,
  match_right: answerableList,
  pairs: z
    .array(z.tuple([pairIndex, pairIndex]))
    .nullish()
    .transform((value) => value ?? []),
});

// A file is either a flat list of records or { "<topic>": [records...] }.
const bankFileSchema = z.union([z.array(z.unknown()), z.record(z.array(z.unknown()))]);

type RecordParseResult = { ok: true; question: QuestionRecord } | { ok: false; reason: string };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseQuestionRecord(
  raw: unknown,
  fallbackId: string,
  fallbackTopic?: string,
): RecordParseResult {
  const base = baseRecordSchema.safeParse(raw);
  if (!base.success) {
    return { ok: false, reason: describeIssues(base.error) };
  }

  const common = {
    id: base.data.id === null || base.data.id === undefined ? fallbackId : String(base.data.id),
    topic: base.data.topic || fallbackTopic || DEFAULT_TOPIC,
    question: base.data.question,
    explanation: base.data.explanation,
  };

  switch (base.data.type) {
    case 'single': {
      const fields = singleFieldsSchema.safeParse(raw);
      if (!fields.success) return { ok: false, reason: describeIssues(fields.error) };
      return { ok: true, question: { ...common, type: 'single', ...fields.data } };
    }
    case 'multi': {
      const fields = multiFieldsSchema.safeParse(raw);
      if (!fields.success) return { ok: false, reason: describeIssues(fields.error) };
      return { ok: true, question: { ...common, type: 'multi', ...fields.data } };
    }
    case 'match': {
      const fields = matchFieldsSchema.safeParse(raw);
      if (!fields.success) return { ok: false, reason: describeIssues(fields.error) };
      return {
        ok: true,
        question: {
          ...common,
          type: 'match',
          matchLeft: fields.data.match_left,
          matchRight: fields.data.match_right,
          pairs: fields.data.pairs,
        },
      };
    }
  }
}

/**
 * Question records read from every `*.json` file in `QUIZ_BANK_DIR`.
 *
 * The directory is re-read on each call, so files dropped in while the bot is
 * running show up on the next `/topics` or `/test`.
 */
@Injectable()
export class QuestionBankService {
  private readonly logger = new Logger(QuestionBankService.name);
  private readonly bankDir: string;

  constructor(config: ConfigService<AppConfig, true>) {
    this.bankDir = path.resolve(process.cwd(), config.get('QUIZ_BANK_DIR', { infer: true }));
  }

  load(topic?: string): QuestionRecord[] {
    const questions = this.readAll();
    return topic === undefined ? questions : questions.filter((q) => q.topic === topic);
  }

  /** Question count per topic, ordered by topic name ignoring case. */
  listTopics(): TopicSummary[] {
    const counts = new Map<string, number>();
    for (const question of this.readAll()) {
      counts.set(question.topic, (counts.get(question.topic) ?? 0) + 1);
    }

    return [...counts.entries()]
      .map(([topic, count]) => ({ topic, count }))
      .sort((a, b) => {
        const left = a.topic.toLowerCase();
        const right = b.topic.toLowerCase();
        return left < right ? -1 : left > right ? 1 : 0;
      });
  }

  private readAll(): QuestionRecord[] {
    let files: string[];
    try {
      files = fs
        .readdirSync(this.bankDir)
        .filter((file) => file.toLowerCase().endsWith('.json'))
        .sort();
    } catch (error) {
      this.logger.warn(`Question bank directory is not readable: ${this.bankDir} (${String(error)})`);
      return [];
    }

    const questions: QuestionRecord[] = [];
    for (const file of files) {
      try {
        questions.push(...this.readFile(file));
      } catch (error) {
        if (!(error instanceof BankLoadError)) throw error;
        this.logger.warn(error.message);
      }
    }

    this.logger.debug(`Loaded ${questions.length} questions from ${files.length} files`);
    return questions;
  }

  private readFile(file: string): QuestionRecord[] {
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(path.join(this.bankDir, file), 'utf-8'));
    } catch (error) {
      throw new BankLoadError(file, error instanceof Error ? error.message : String(error));
    }

    const parsed = bankFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new BankLoadError(file, 'expected an array of questions or an object of topic -> questions');
    }

    const groups: Array<[string | undefined, unknown[]]> = Array.isArray(parsed.data)
      ? [[undefined, parsed.data]]
      : Object.entries(parsed.data);

    const questions: QuestionRecord[] = [];
    let index = 0;
    for (const [topic, records] of groups) {
      for (const raw of records) {
        const result = parseQuestionRecord(raw, `${file}#${index}`, topic);
        if (result.ok) {
          questions.push(result.question);
        } else {
          this.logger.warn(`Skipping record ${index} in ${file}: ${result.reason}`);
        }
        index++;
      }
    }
    return questions;
  }
}
