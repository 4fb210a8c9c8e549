/**
 * Raised when a grade / risk / onboarding string does not name exactly one
 * member of its scale. Thresholds are never coerced to a default.
 */
export class InvalidClassificationError extends Error {
  readonly kind: string;
  readonly input: string;

  constructor(kind: string, input: string, accepted: readonly string[]) {
    super(`Invalid ${kind}: "${input}" (expected one of ${accepted.join(', ')})`);
    this.name = 'InvalidClassificationError';
    this.kind = kind;
    this.input = input;
  }
}
