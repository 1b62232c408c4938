/**
 * Failure kinds raised by the editing engine.
 *
 * Everything except `InvariantViolation` is a user-recoverable precondition
 * failure. `InvariantViolation` means the model or a command is in a state
 * that should be impossible and is never caught internally.
 */
export type NetEditErrorCode =
  | "InvalidPrecondition"
  | "NetSignalMismatch"
  | "UnconnectedPad"
  | "NoNetSignal"
  | "NothingAtPosition"
  | "NotImplemented"
  | "InvariantViolation";

export class NetEditError extends Error {
  readonly code: NetEditErrorCode;

  constructor(code: NetEditErrorCode, message: string) {
    super(message);
    this.name = "NetEditError";
    this.code = code;
  }
}

export function isNetEditError(err: unknown, code?: NetEditErrorCode): err is NetEditError {
  return err instanceof NetEditError && (code === undefined || err.code === code);
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new NetEditError("InvariantViolation", message);
  }
}
