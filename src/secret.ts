const REDACTED = '[redacted]';

/**
 * Opaque holder for credentials (device codes, OAuth tokens, Copilot tokens).
 *
 * Every implicit string form is redacted, so a secret that ends up in a log
 * line, a template literal or `JSON.stringify` never shows its value.
 * Call `reveal()` at the single place the raw value goes on the wire.
 */
export class Secret {
  readonly #value: string;

  constructor(value: string) {
    this.#value = value;
  }

  public reveal(): string {
    return this.#value;
  }

  public toString(): string {
    return REDACTED;
  }

  public toJSON(): string {
    return REDACTED;
  }

  public [Symbol.for('nodejs.util.inspect.custom')](): string {
    return `Secret(${REDACTED})`;
  }
}
