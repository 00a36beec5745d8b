/** A bank source that could not be read or parsed. Logged and skipped. */
export class BankLoadError extends Error {
  constructor(
    readonly file: string,
    readonly reason: string,
  ) {
    super(`Cannot load question bank file ${file}: ${reason}`);
    this.name = 'BankLoadError';
  }
}

/** A match answer that is not a valid list of letter-number pairs. */
export class MatchParseError extends Error {
  constructor(
    readonly input: string,
    readonly reason: string,
  ) {
    super(reason);
    this.name = 'MatchParseError';
  }
}
