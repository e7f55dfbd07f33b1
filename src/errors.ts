/**
 * Error that wraps a lower-level failure and keeps both stacks.
 */
export class RethrownError extends Error {
  readonly original: Error;

  constructor(message: string, error: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.original = error instanceof Error ? error : new Error(String(error));
    const messageLines = (this.message.match(/\n/g) ?? []).length + 1;
    this.stack =
      this.stack
        ?.split("\n")
        .slice(0, messageLines + 1)
        .join("\n") +
      "\n" +
      this.original.stack;
  }
}

/** Bad command-line input; reported without a stack. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
