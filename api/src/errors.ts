// errors.ts
export type RotaErrorCode =
  | "invalid_schedule_row"
  | "rotation_state_corrupt"
  | "persistence_failed"
  | "invalid_request"
  | "duplicate_task"
  | "not_ready";

export class RotaError extends Error {
  constructor(
    public readonly code: RotaErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RotaError";
  }

  toJSON(): { error: RotaErrorCode; message: string } {
    return { error: this.code, message: this.message };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
