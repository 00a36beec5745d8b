import {
  buildMatchLookup,
  describeMatchPairs,
  evaluateMatch,
  evaluateMulti,
  evaluateSingle,
  parseMatchAnswer,
  toggleOption,
} from './answer-evaluator';
import { MatchQuestion, MultiQuestion, SingleQuestion } from './question.types';
import { MatchParseError } from './quiz.errors';

const single: SingleQuestion = {
  id: 's1',
  topic: 'Capitals',
  type: 'single',
  question: 'Capital of France?',
  explanation: '',
  options: ['Paris', 'Lyon', 'Nice'],
  answer: 'Paris',
};

const multi: MultiQuestion = {
  id: 'm1',
  topic: 'Numbers',
  type: 'multi',
  question: 'Pick the primes',
  explanation: '',
  options: ['2', '4', '5', '9'],
  answers: ['5', '2'],
};

const match: MatchQuestion = {
  id: 'x1',
  topic: 'Animals',
  type: 'match',
  question: 'Match the sounds',
  explanation: '',
  matchLeft: ['Dog', 'Cat', 'Cow'],
  matchRight: ['Meow', 'Moo', 'Woof'],
  pairs: [
    [0, 2],
    [1, 0],
    [2, 1],
  ],
};

describe('answer evaluator', () => {
  describe('evaluateSingle', () => {
    it('should accept the canonical answer', () => {
      expect(evaluateSingle(single, 'Paris')).toEqual({ correct: true, submitted: 'Paris', expected: 'Paris' });
    });

    it('should reject other options', () => {
      expect(evaluateSingle(single, 'Lyon').correct).toBe(false);
    });

    it('should compare without normalising case or whitespace', () => {
      expect(evaluateSingle(single, 'paris').correct).toBe(false);
      expect(evaluateSingle(single, 'Paris ').correct).toBe(false);
    });
  });

  describe('evaluateMulti', () => {
    it('should require the exact answer set', () => {
      expect(evaluateMulti(multi, new Set(['2', '5']))).toEqual({
        correct: true,
        submitted: ['2', '5'],
        expected: ['2', '5'],
      });
    });

    it('should reject a subset and a superset', () => {
      expect(evaluateMulti(multi, new Set(['2'])).correct).toBe(false);
      expect(evaluateMulti(multi, new Set(['2', '5', '9'])).correct).toBe(false);
      expect(evaluateMulti(multi, new Set()).correct).toBe(false);
    });
  });

  describe('toggleOption', () => {
    it('should add an unchosen option and remove a chosen one', () => {
      const selection = new Set<string>();

      toggleOption(selection, '4');
      expect([...selection]).toEqual(['4']);

      toggleOption(selection, '4');
      expect(selection.size).toBe(0);
    });
  });

  describe('buildMatchLookup', () => {
    it('should invert the display order', () => {
      expect(buildMatchLookup([2, 0, 1])).toEqual({
        displayToCanonical: [2, 0, 1],
        canonicalToDisplay: [1, 2, 0],
      });
    });
  });

  describe('parseMatchAnswer', () => {
    it('should parse letters and numbers into zero-based pairs', () => {
      expect(parseMatchAnswer(' a-2, B-1 ,c-3,', 3, 3)).toEqual({
        ok: true,
        pairs: [
          [0, 1],
          [1, 0],
          [2, 2],
        ],
      });
    });

    it.each([
      ['', 'No pairs given'],
      ['A2', '"A2" is not a letter-number pair'],
      ['A-Z', '"A-Z" uses an unknown letter or number'],
      ['D-1', '"D-1" uses an unknown letter or number'],
      ['A-4', '"A-4" uses an unknown letter or number'],
      ['A-1,A-2', 'A is paired more than once'],
    ])('should reject %j', (input, reason) => {
      const result = parseMatchAnswer(input, 3, 3);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(MatchParseError);
        expect(result.error.message).toBe(reason);
        expect(result.error.input).toBe(input);
      }
    });
  });

  describe('evaluateMatch', () => {
    // displayed right column: 1) Woof 2) Meow 3) Moo
    const lookup = buildMatchLookup([2, 0, 1]);

    it('should score pairs given in displayed positions', () => {
      expect(evaluateMatch(match, lookup, 'A-1,B-2,C-3')).toEqual({
        kind: 'scored',
        result: {
          correct: true,
          submitted: [
            [0, 2],
            [1, 0],
            [2, 1],
          ],
          expected: [
            [0, 2],
            [1, 0],
            [2, 1],
          ],
        },
      });
    });

    it('should mark missing or swapped pairs as wrong', () => {
      expect(evaluateMatch(match, lookup, 'A-1,B-2')).toMatchObject({ kind: 'scored', result: { correct: false } });
      expect(evaluateMatch(match, lookup, 'A-2,B-1,C-3')).toMatchObject({
        kind: 'scored',
        result: {
          correct: false,
          submitted: [
            [0, 0],
            [1, 2],
            [2, 1],
          ],
        },
      });
    });

    it('should ask for a retry on malformed input', () => {
      const result = evaluateMatch(match, lookup, 'A-1,B');

      expect(result.kind).toBe('retry');
    });
  });

  describe('describeMatchPairs', () => {
    it('should render canonical pairs with the labels the user saw', () => {
      expect(describeMatchPairs(match.pairs, buildMatchLookup([2, 0, 1]))).toBe('A-1, B-2, C-3');
    });
  });
});
