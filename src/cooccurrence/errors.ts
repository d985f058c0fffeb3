/** Contract violation by the caller. Never transient; do not retry. */
export class InvalidArgumentError extends Error {
  readonly code = "INVALID_ARGUMENT";

  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export function checkArgument(condition: boolean, message: string): asserts condition {
  if (!condition) throw new InvalidArgumentError(message);
}
