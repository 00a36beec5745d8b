import { validateConfig } from './app.config';

describe('validateConfig', () => {
  it('should apply defaults', () => {
    expect(validateConfig({})).toEqual({
      BOT_TOKEN: undefined,
      BOT_POLLING: true,
      QUIZ_BANK_DIR: 'bank',
      QUIZ_DEFAULT_COUNT: 10,
      APPROVED_USER_IDS: [],
      LEADERBOARD_LIMIT: 15,
      PORT: 3000,
    });
  });

  it('should coerce values from the environment', () => {
    const config = validateConfig({
      BOT_TOKEN: ' test-token ',
      BOT_POLLING: 'false',
      QUIZ_DEFAULT_COUNT: '5',
      APPROVED_USER_IDS: '12, 34,abc,,56',
    });

    expect(config).toMatchObject({
      BOT_TOKEN: 'test-token',
      BOT_POLLING: false,
      QUIZ_DEFAULT_COUNT: 5,
      APPROVED_USER_IDS: [12, 34, 56],
    });
  });

  it('should treat an empty token as missing', () => {
    expect(validateConfig({ BOT_TOKEN: '' }).BOT_TOKEN).toBeUndefined();
  });

  it('should reject invalid numbers', () => {
    expect(() => validateConfig({ QUIZ_DEFAULT_COUNT: 'ten' })).toThrow(
      /^Invalid configuration: QUIZ_DEFAULT_COUNT: /,
    );
  });
});
