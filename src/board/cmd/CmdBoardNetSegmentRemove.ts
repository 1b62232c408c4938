import { UndoCommand } from "../../undo/UndoCommand";
import { NetSegment } from "../NetSegment";

/** Removes a net segment, with whatever it still contains, from its board. */
export class CmdBoardNetSegmentRemove extends UndoCommand {
  readonly netSegment: NetSegment;

  constructor(netSegment: NetSegment) {
    super("Remove net segment");
    this.netSegment = netSegment;
  }

  protected performExecute(): boolean {
    this.performRedo();
    return true;
  }

  protected performUndo(): void {
    this.netSegment.board.addNetSegment(this.netSegment);
  }

  protected performRedo(): void {
    this.netSegment.board.removeNetSegment(this.netSegment);
  }
}
