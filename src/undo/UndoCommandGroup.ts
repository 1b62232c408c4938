import { NetEditError } from "../common/errors";
import { ScopeGuard } from "../common/ScopeGuard";
import { UndoCommand } from "./UndoCommand";

/**
 * Ordered composite of commands executed and undone as one unit.
 *
 * Children are either appended up front with `appendChild()` or built
 * incrementally by a subclass calling `execNewChildCmd()` from its own
 * `performExecute()`. If anything throws during execution, all children that
 * already ran are undone in reverse order before the error propagates.
 */
export class UndoCommandGroup extends UndoCommand {
  private readonly children: UndoCommand[] = [];
  private executing = false;

  constructor(text: string) {
    super(text);
  }

  getChildren(): ReadonlyArray<UndoCommand> {
    return this.children;
  }

  getChildCount(): number {
    return this.children.length;
  }

  /** Add a child to be run by `execute()`. Only allowed before the first execution. */
  appendChild(cmd: UndoCommand): void {
    if (this.wasEverExecuted()) {
      throw new NetEditError("InvariantViolation", `Cannot append to command group "${this.text}" after execution.`);
    }
    this.children.push(cmd);
  }

  override execute(): boolean {
    this.executing = true;
    try {
      return super.execute();
    } finally {
      this.executing = false;
    }
  }

  /**
   * Execute `cmd` right away and keep it as a child if it changed anything.
   * Only valid while this group is executing.
   */
  protected execNewChildCmd(cmd: UndoCommand): boolean {
    if (!this.acceptsExecutedChildren()) {
      throw new NetEditError("InvariantViolation", `Command group "${this.text}" is not executing.`);
    }
    if (cmd.execute()) {
      this.children.push(cmd);
      return true;
    }
    return false;
  }

  protected acceptsExecutedChildren(): boolean {
    return this.executing;
  }

  protected performExecute(): boolean {
    const guard = new ScopeGuard(() => this.rollback());
    try {
      let modified = false;
      for (const child of this.children) {
        if (child.execute()) modified = true;
      }
      guard.dismiss();
      return modified;
    } finally {
      guard.close();
    }
  }

  protected performUndo(): void {
    for (let i = this.children.length - 1; i >= 0; i--) {
      this.children[i].undo();
    }
  }

  protected performRedo(): void {
    for (const child of this.children) {
      child.redo();
    }
  }

  /** Undo every child that is currently applied, newest first. */
  protected rollback(): void {
    for (let i = this.children.length - 1; i >= 0; i--) {
      const child = this.children[i];
      if (child.isExecuted()) child.undo();
    }
  }
}
