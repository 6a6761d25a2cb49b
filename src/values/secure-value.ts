/**
 * A secret string.
 *
 * The plain text is held in a private field and only leaves the object through
 * {@link SecureValue.reveal}. String conversion and JSON serialization yield a
 * fixed mask so a secret cannot end up in a log line or trace entry by
 * accident.
 */
export class SecureValue {
  readonly #plainText: string;

  constructor(plainText: string) {
    this.#plainText = plainText;
  }

  /** Returns the wrapped plain text. */
  reveal(): string {
    return this.#plainText;
  }

  toString(): string {
    return '[SecureValue]';
  }

  toJSON(): string {
    return '[SecureValue]';
  }
}
