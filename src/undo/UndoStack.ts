import { NetEditError } from "../common/errors";
import { UndoCommand } from "./UndoCommand";
import { UndoCommandGroup } from "./UndoCommandGroup";

/**
 * Group behind `UndoStack.beginCmdGroup()`: it is executed empty when the
 * gesture starts and children are then executed one by one as they arrive.
 */
class GestureCommandGroup extends UndoCommandGroup {
  private open = false;

  begin(): void {
    this.execute();
    this.open = true;
  }

  append(cmd: UndoCommand): boolean {
    return this.execNewChildCmd(cmd);
  }

  finish(): void {
    this.open = false;
  }

  discard(): void {
    this.open = false;
    this.rollback();
  }

  protected override acceptsExecutedChildren(): boolean {
    return this.open || super.acceptsExecutedChildren();
  }
}

/**
 * Linear history of executed commands of one document.
 *
 * Not a singleton: each project owns one and passes it to every editing
 * operation.
 */
export class UndoStack {
  private commands: UndoCommand[] = [];
  private index = 0;
  private cleanIndex = 0;
  private commandActive = false;
  private activeGroup: GestureCommandGroup | null = null;
  private readonly listeners = new Set<() => void>();

  getCount(): number {
    return this.commands.length;
  }

  /** Number of applied commands; the next undo acts on `index - 1`. */
  getIndex(): number {
    return this.index;
  }

  getCommands(): ReadonlyArray<UndoCommand> {
    return this.commands;
  }

  canUndo(): boolean {
    return this.index > 0 && !this.commandActive;
  }

  canRedo(): boolean {
    return this.index < this.commands.length && !this.commandActive;
  }

  getUndoText(): string | null {
    return this.canUndo() ? this.commands[this.index - 1].getText() : null;
  }

  getRedoText(): string | null {
    return this.canRedo() ? this.commands[this.index].getText() : null;
  }

  isClean(): boolean {
    return this.index === this.cleanIndex;
  }

  /** Mark the current state as saved. */
  setClean(): void {
    if (this.cleanIndex === this.index) return;
    this.cleanIndex = this.index;
    this.notify();
  }

  /** True while a command executes or an interactive group is open. */
  isCommandActive(): boolean {
    return this.commandActive;
  }

  /**
   * Execute `cmd` and push it. Commands reporting no change are dropped.
   * @returns whether the command was pushed
   */
  execute(cmd: UndoCommand): boolean {
    this.assertIdle();
    this.commandActive = true;
    let modified: boolean;
    try {
      modified = cmd.execute();
    } finally {
      this.commandActive = false;
    }
    if (!modified) return false;
    this.push(cmd);
    return true;
  }

  undo(): void {
    this.assertIdle();
    if (this.index === 0) {
      throw new NetEditError("InvalidPrecondition", "Nothing to undo.");
    }
    this.commands[this.index - 1].undo();
    this.index--;
    this.notify();
  }

  redo(): void {
    this.assertIdle();
    if (this.index >= this.commands.length) {
      throw new NetEditError("InvalidPrecondition", "Nothing to redo.");
    }
    this.commands[this.index].redo();
    this.index++;
    this.notify();
  }

  /**
   * Open a group for an interactive gesture. Children are executed as they
   * are appended; the stack stays busy until commit or abort.
   */
  beginCmdGroup(text: string): void {
    this.assertIdle();
    const group = new GestureCommandGroup(text);
    group.begin();
    this.activeGroup = group;
    this.commandActive = true;
    this.notify();
  }

  /** Execute `cmd` inside the open group. A throwing command leaves the group as it was. */
  appendToCmdGroup(cmd: UndoCommand): boolean {
    return this.requireActiveGroup().append(cmd);
  }

  /** Push the open group. An empty group is dropped. */
  commitCmdGroup(): boolean {
    const group = this.requireActiveGroup();
    group.finish();
    this.activeGroup = null;
    this.commandActive = false;
    if (group.getChildCount() === 0) {
      this.notify();
      return false;
    }
    this.push(group);
    return true;
  }

  /** Undo everything appended to the open group and drop it. */
  abortCmdGroup(): void {
    const group = this.requireActiveGroup();
    this.activeGroup = null;
    this.commandActive = false;
    group.discard();
    this.notify();
  }

  /** Drop the whole history. */
  clear(): void {
    if (this.activeGroup) {
      this.abortCmdGroup();
    }
    this.cleanIndex = this.cleanIndex === this.index ? 0 : -1;
    this.commands = [];
    this.index = 0;
    this.notify();
  }

  /** Subscribe to any change of history, position or clean state. */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private push(cmd: UndoCommand): void {
    this.commands.splice(this.index);
    if (this.cleanIndex > this.index) {
      // the saved state was in the truncated redo tail
      this.cleanIndex = -1;
    }
    this.commands.push(cmd);
    this.index++;
    this.notify();
  }

  private assertIdle(): void {
    if (this.commandActive) {
      throw new NetEditError("InvalidPrecondition", "Another command is active at the moment.");
    }
  }

  private requireActiveGroup(): GestureCommandGroup {
    if (!this.activeGroup) {
      throw new NetEditError("InvalidPrecondition", "No command group is open.");
    }
    return this.activeGroup;
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener();
    }
  }
}
