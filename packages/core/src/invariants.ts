export class InvariantError extends Error {
  readonly field: string;

  constructor(field: string, expectation: string) {
    super(`invalid ${field}: expected ${expectation}`);
    this.name = "InvariantError";
    this.field = field;
  }
}

export function assertNonEmptyString(value: unknown, field: string): asserts value is string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new InvariantError(field, "a non-blank string");
  }
}

export function assertPort(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new InvariantError(field, "an integer port between 0 and 65535");
  }
}
