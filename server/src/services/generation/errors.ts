import type { AppError } from "../../middleware/errorHandler";
import type { AttemptFailure } from "./types";

/**
 * Every tier of a summarization plan came back absent. The message names the
 * last attempt; `failures` lists all of them in attempt order.
 */
export class GenerationExhaustedError extends Error implements AppError {
  readonly statusCode = 502;
  readonly code = "GENERATION_FAILED";

  constructor(readonly failures: readonly AttemptFailure[]) {
    super(describeExhaustion(failures));
    this.name = "GenerationExhaustedError";
  }

  get details(): readonly AttemptFailure[] {
    return this.failures;
  }

  get lastFailure(): AttemptFailure | undefined {
    return this.failures[this.failures.length - 1];
  }
}

function describeExhaustion(failures: readonly AttemptFailure[]): string {
  const last = failures[failures.length - 1];
  if (!last) {
    return "All summarization methods failed (no provider tiers configured)";
  }
  return (
    `All summarization methods failed; last attempt ${last.tier} ` +
    `(${last.modelName}): ${last.reason}`
  );
}

/** A request that violates the non-empty content invariant. */
export class InvalidGenerationRequestError extends Error implements AppError {
  readonly statusCode = 400;
  readonly code = "VALIDATION_ERROR";

  constructor(
    readonly field: string,
    message: string
  ) {
    super(message);
    this.name = "InvalidGenerationRequestError";
  }

  get details(): Array<{ field: string; message: string }> {
    return [{ field: this.field, message: this.message }];
  }
}
