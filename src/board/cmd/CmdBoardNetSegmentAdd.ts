import { invariant } from "../../common/errors";
import { NetSignal } from "../../circuit/NetSignal";
import { UndoCommand } from "../../undo/UndoCommand";
import { Board } from "../Board";
import { NetSegment } from "../NetSegment";

/** Adds a new, empty net segment to a board. */
export class CmdBoardNetSegmentAdd extends UndoCommand {
  readonly board: Board;
  readonly netSignal: NetSignal;
  private netSegment: NetSegment | null = null;

  constructor(board: Board, netSignal: NetSignal) {
    super("Add net segment");
    this.board = board;
    this.netSignal = netSignal;
  }

  /** The created segment; only available after execution. */
  getNetSegment(): NetSegment {
    invariant(this.netSegment, "Net segment is created on execution.");
    return this.netSegment;
  }

  protected performExecute(): boolean {
    this.netSegment = new NetSegment(this.board, this.netSignal);
    this.performRedo();
    return true;
  }

  protected performUndo(): void {
    this.board.removeNetSegment(this.getNetSegment());
  }

  protected performRedo(): void {
    this.board.addNetSegment(this.getNetSegment());
  }
}
