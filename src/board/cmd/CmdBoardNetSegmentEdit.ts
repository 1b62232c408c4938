import { NetSignal } from "../../circuit/NetSignal";
import { UndoCommand } from "../../undo/UndoCommand";
import { NetSegment } from "../NetSegment";

/** Changes the net signal of a net segment. */
export class CmdBoardNetSegmentEdit extends UndoCommand {
  readonly netSegment: NetSegment;
  private readonly oldNetSignal: NetSignal;
  private newNetSignal: NetSignal;

  constructor(netSegment: NetSegment) {
    super("Edit net segment");
    this.netSegment = netSegment;
    this.oldNetSignal = netSegment.netSignal;
    this.newNetSignal = netSegment.netSignal;
  }

  setNetSignal(netSignal: NetSignal): void {
    this.assertConfigurable();
    this.newNetSignal = netSignal;
  }

  protected performExecute(): boolean {
    this.performRedo();
    return this.newNetSignal !== this.oldNetSignal;
  }

  protected performUndo(): void {
    this.netSegment.setNetSignal(this.oldNetSignal);
  }

  protected performRedo(): void {
    this.netSegment.setNetSignal(this.newNetSignal);
  }
}
