/**
 * Holds a secret (API token, password) so that string conversion and JSON
 * serialization never print it. Read the raw secret through `value`.
 */
export class Redacted<T> {
  public constructor(public readonly value: T) {}

  public toString(): string {
    return '[Redacted]';
  }

  // pino and JSON.stringify both go through here
  public toJSON(): string {
    return this.toString();
  }
}
