import { NetEditError, isNetEditError } from "../common/errors";

export type UndoCommandState = "created" | "executed" | "undone";

/**
 * One atomic, reversible mutation.
 *
 * Subclasses implement `performExecute()` and `performUndo()`. The default
 * `performRedo()` re-runs `performExecute()`; commands that validate in
 * execute usually override it to apply the known-good change directly.
 *
 * `performExecute()` must either apply the whole change or throw before
 * touching shared state.
 */
export abstract class UndoCommand {
  readonly text: string;

  private state: UndoCommandState = "created";
  private everExecuted = false;

  constructor(text: string) {
    this.text = text;
  }

  getText(): string {
    return this.text;
  }

  getState(): UndoCommandState {
    return this.state;
  }

  isExecuted(): boolean {
    return this.state === "executed";
  }

  /** True once `execute()` has been called, even if it failed. Locks the configuration. */
  wasEverExecuted(): boolean {
    return this.everExecuted;
  }

  /**
   * Apply the command.
   * @returns false if nothing changed; such commands are never pushed to a history.
   */
  execute(): boolean {
    if (this.everExecuted) {
      throw new NetEditError("InvariantViolation", `Command "${this.text}" was already executed.`);
    }
    this.everExecuted = true;
    const modified = this.performExecute();
    this.state = "executed";
    return modified;
  }

  undo(): void {
    if (this.state !== "executed") {
      throw new NetEditError("InvariantViolation", `Cannot undo command "${this.text}" in state "${this.state}".`);
    }
    this.reversing(() => this.performUndo());
    this.state = "undone";
  }

  redo(): void {
    if (this.state !== "undone") {
      throw new NetEditError("InvariantViolation", `Cannot redo command "${this.text}" in state "${this.state}".`);
    }
    this.reversing(() => this.performRedo());
    this.state = "executed";
  }

  /** Throws if a setter is called after the command was executed. */
  protected assertConfigurable(): void {
    if (this.everExecuted) {
      throw new NetEditError("InvariantViolation", `Command "${this.text}" cannot be modified after execution.`);
    }
  }

  /**
   * Undo and redo work on state this command produced itself, so any
   * precondition failure there means the model was changed behind its back.
   */
  private reversing(step: () => void): void {
    try {
      step();
    } catch (e) {
      if (isNetEditError(e) && e.code !== "InvariantViolation") {
        throw new NetEditError("InvariantViolation", `Command "${this.text}" cannot be reverted: ${e.message}`);
      }
      throw e;
    }
  }

  protected abstract performExecute(): boolean;

  protected abstract performUndo(): void;

  protected performRedo(): void {
    this.performExecute();
  }
}
