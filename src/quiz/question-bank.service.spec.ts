import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { AppConfig, validateConfig } from '../config/app.config';
import { parseQuestionRecord, QuestionBankService } from './question-bank.service';

function bankFor(dir: string): QuestionBankService {
  return new QuestionBankService(new ConfigService<AppConfig, true>(validateConfig({ QUIZ_BANK_DIR: dir })));
}

describe('QuestionBankService', () => {
  let tempDir: string;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'question-bank-test-'));
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    fs.writeFileSync(
      path.join(tempDir, 'algebra.json'),
      JSON.stringify([
        { id: 1, topic: 'Algebra', type: 'single', question: '2 + 2?', options: ['3', '4'], answer: '4' },
        { id: 'a2', topic: 'Algebra', type: 'multi', question: 'Even numbers?', options: ['1', '2', '4'], answers: ['2', '4'] },
        { topic: 'Algebra', type: 'essay', question: 'Explain algebra' },
        { question: 'Untitled?', options: ['Yes', 'No'] },
        { id: 'empty', topic: 'Algebra', question: 'Nothing to pick?', options: [] },
      ]),
    );
    fs.writeFileSync(path.join(tempDir, 'broken.json'), '{ not json');
    fs.writeFileSync(
      path.join(tempDir, 'by-topic.json'),
      JSON.stringify({
        geometry: [{ id: 'g1', question: 'Sides of a triangle?', options: ['3', '4'], answer: '3' }],
        Zoology: [
          {
            id: 'z1',
            type: 'match',
            question: 'Match the sound',
            explanation: 'Dogs bark.',
            match_left: ['Dog'],
            match_right: ['Woof'],
            pairs: [[0, 0]],
          },
        ],
      }),
    );
    fs.writeFileSync(path.join(tempDir, 'scalar.json'), '42');
    fs.writeFileSync(path.join(tempDir, 'notes.txt'), 'not a bank file');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });

  describe('load', () => {
    it('should load every valid record and skip broken files', () => {
      const questions = bankFor(tempDir).load();

      expect(questions.map((q) => q.id)).toEqual(['1', 'a2', 'algebra.json#3', 'g1', 'z1']);
      expect(warn).toHaveBeenCalledWith(expect.stringContaining('Cannot load question bank file broken.json'));
      expect(warn).toHaveBeenCalledWith(
        'Cannot load question bank file scalar.json: expected an array of questions or an object of topic -> questions',
      );
      expect(warn).toHaveBeenCalledWith(expect.stringContaining('Skipping record 2 in algebra.json'));
      expect(warn).toHaveBeenCalledWith('Skipping record 4 in algebra.json: options: must not be empty');
    });

    it('should filter by topic', () => {
      expect(bankFor(tempDir).load('Algebra').map((q) => q.id)).toEqual(['1', 'a2']);
    });

    it('should fill missing optional fields with empty values', () => {
      const [untitled] = bankFor(tempDir).load('No topic');

      expect(untitled).toEqual({
        id: 'algebra.json#3',
        topic: 'No topic',
        type: 'single',
        question: 'Untitled?',
        explanation: '',
        options: ['Yes', 'No'],
        answer: '',
      });
    });

    it('should take the topic from the object key and map match fields', () => {
      const bank = bankFor(tempDir);

      expect(bank.load('geometry')).toEqual([
        {
          id: 'g1',
          topic: 'geometry',
          type: 'single',
          question: 'Sides of a triangle?',
          explanation: '',
          options: ['3', '4'],
          answer: '3',
        },
      ]);
      expect(bank.load('Zoology')).toEqual([
        {
          id: 'z1',
          topic: 'Zoology',
          type: 'match',
          question: 'Match the sound',
          explanation: 'Dogs bark.',
          matchLeft: ['Dog'],
          matchRight: ['Woof'],
          pairs: [[0, 0]],
        },
      ]);
    });

    it('should return an empty bank when the directory does not exist', () => {
      expect(bankFor(path.join(tempDir, 'missing')).load()).toEqual([]);
    });

    it('should pick up files added after construction', () => {
      const bank = bankFor(tempDir);
      fs.writeFileSync(
        path.join(tempDir, 'later.json'),
        JSON.stringify([{ id: 'l1', topic: 'Algebra', question: '1 + 1?', options: ['2'], answer: '2' }]),
      );

      expect(bank.load('Algebra').map((q) => q.id)).toEqual(['1', 'a2', 'l1']);
    });
  });

  describe('listTopics', () => {
    it('should count questions per topic ordered case-insensitively', () => {
      expect(bankFor(tempDir).listTopics()).toEqual([
        { topic: 'Algebra', count: 2 },
        { topic: 'geometry', count: 1 },
        { topic: 'No topic', count: 1 },
        { topic: 'Zoology', count: 1 },
      ]);
    });
  });

  describe('parseQuestionRecord', () => {
    it('should reject unknown question types', () => {
      expect(parseQuestionRecord({ type: 'essay' }, 'x#0')).toMatchObject({ ok: false });
    });

    it('should reject options that are not strings', () => {
      expect(parseQuestionRecord({ type: 'multi', options: ['a', 2] }, 'x#0')).toMatchObject({ ok: false });
    });

    it('should reject questions that cannot be answered', () => {
      expect(parseQuestionRecord({ type: 'single', question: 'Q' }, 'x#0')).toEqual({
        ok: false,
        reason: 'options: must not be empty',
      });
      expect(parseQuestionRecord({ type: 'multi', options: [], answers: [] }, 'x#0')).toEqual({
        ok: false,
        reason: 'options: must not be empty',
      });
      expect(
        parseQuestionRecord({ type: 'match', match_left: [], match_right: ['1'], pairs: [] }, 'x#0'),
      ).toEqual({ ok: false, reason: 'match_left: must not be empty' });
    });

    it('should stringify numeric ids', () => {
      expect(parseQuestionRecord({ id: 7, question: 'Q', options: ['a'] }, 'x#0')).toMatchObject({
        ok: true,
        question: { id: '7', topic: 'No topic', type: 'single' },
      });
    });
  });
});
