import type { AbortReason } from "./types";

export type LoopErrorCode = "IterationLimitExceeded" | "ModelFailure" | "Cancelled";

const REASONS: Record<LoopErrorCode, AbortReason> = {
  IterationLimitExceeded: "iteration-limit",
  ModelFailure: "fatal-error",
  Cancelled: "cancelled",
};

export class LoopError extends Error {
  constructor(
    readonly code: LoopErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "LoopError";
  }

  get reason(): AbortReason {
    return REASONS[this.code];
  }
}
