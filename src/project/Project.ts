import { Circuit } from "../circuit/Circuit";
import { Board } from "../board/Board";
import { BoardOptions } from "../board/types";
import { UndoStack } from "../undo/UndoStack";
import { Config, getConfig } from "./config";

/** Where a save goes: the project files, or the backup written by autosave. */
export type SaveTarget = "original" | "backup";

/**
 * Persistence collaborator. File formats live outside this library; it only
 * decides when saving is safe.
 */
export interface ProjectStorage {
  save(project: Project, target: SaveTarget): void;
}

/** Options for Project constructor */
export interface ProjectOptions {
  name: string;
  storage: ProjectStorage;
  readOnly?: boolean;
  /** Set when the project was opened from an autosave backup */
  restored?: boolean;
  config?: Partial<Pick<Config, "autosaveIntervalSecs" | "autosaveRetrySecs">>;
}

/**
 * One open project: its circuit, its boards and the undo stack shared by
 * every editing operation on them.
 */
export class Project {
  readonly name: string;
  readonly circuit = new Circuit();
  readonly undoStack = new UndoStack();
  readonly readOnly: boolean;

  private readonly storage: ProjectStorage;
  private readonly autosaveIntervalSecs: number;
  private readonly autosaveRetrySecs: number;
  private boards: Board[] = [];
  private restored: boolean;
  private modified = false;
  private autosaveTimer: NodeJS.Timeout | null = null;
  private retryTimer: NodeJS.Timeout | null = null;

  constructor(options: ProjectOptions) {
    const config = getConfig();
    this.name = options.name;
    this.storage = options.storage;
    this.readOnly = options.readOnly ?? false;
    this.restored = options.restored ?? false;
    this.autosaveIntervalSecs = options.config?.autosaveIntervalSecs ?? config.autosaveIntervalSecs;
    this.autosaveRetrySecs = options.config?.autosaveRetrySecs ?? config.autosaveRetrySecs;
  }

  addBoard(options: BoardOptions): Board {
    const board = new Board(options);
    this.boards.push(board);
    this.setModified();
    return board;
  }

  getBoards(): ReadonlyArray<Board> {
    return this.boards;
  }

  /** Flag changes made outside the undo stack. */
  setModified(): void {
    this.modified = true;
  }

  /** True if there is anything a save would write. */
  hasUnsavedChanges(): boolean {
    return this.restored || this.modified || !this.undoStack.isClean();
  }

  /**
   * Save to the original files and mark the undo stack clean.
   * @returns false if saving is not possible right now or failed
   */
  save(): boolean {
    if (!this.write("original")) {
      console.error(`❌  Project "${this.name}" could not be saved.`);
      return false;
    }
    this.undoStack.setClean();
    this.modified = false;
    this.restored = false;
    console.log(`✅  Project "${this.name}" saved.`);
    return true;
  }

  /**
   * Write a backup. Skipped without changes; deferred while a command is
   * active so a half-done edit is never written.
   */
  autosave(): boolean {
    if (!this.hasUnsavedChanges()) return false;

    if (this.undoStack.isCommandActive()) {
      // the user is executing a command at the moment, try again a bit later
      this.scheduleRetry();
      return false;
    }

    console.log(`💾  Autosave project "${this.name}"...`);
    if (!this.write("backup")) {
      console.error(`❌  Autosave of project "${this.name}" failed.`);
      return false;
    }
    return true;
  }

  /** Start periodic autosave, if enabled and the project is writable. */
  startAutosave(): boolean {
    if (this.autosaveTimer || this.autosaveIntervalSecs <= 0 || this.readOnly) return false;
    this.autosaveTimer = setInterval(() => this.autosave(), this.autosaveIntervalSecs * 1000);
    return true;
  }

  stopAutosave(): void {
    if (this.autosaveTimer) clearInterval(this.autosaveTimer);
    if (this.retryTimer) clearTimeout(this.retryTimer);
    this.autosaveTimer = null;
    this.retryTimer = null;
  }

  /**
   * Stop timers and drop the undo history. Commands hold references into the
   * boards, so they go first.
   */
  close(): void {
    this.stopAutosave();
    this.undoStack.clear();
  }

  private scheduleRetry(): void {
    if (this.retryTimer) return;
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.autosave();
    }, this.autosaveRetrySecs * 1000);
  }

  private write(target: SaveTarget): boolean {
    if (this.readOnly) {
      console.warn(`⚠️  Project "${this.name}" was opened read-only.`);
      return false;
    }
    if (this.undoStack.isCommandActive()) {
      console.warn("⚠️  A command is active at the moment.");
      return false;
    }
    try {
      this.storage.save(this, target);
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`❌  Saving to ${target} failed: ${message}`);
      return false;
    }
  }
}
