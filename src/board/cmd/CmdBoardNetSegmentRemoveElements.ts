import { UndoCommand } from "../../undo/UndoCommand";
import { NetLine } from "../NetLine";
import { NetPoint } from "../NetPoint";
import { NetSegment } from "../NetSegment";

/** Removes a batch of net points and net lines from one segment. */
export class CmdBoardNetSegmentRemoveElements extends UndoCommand {
  readonly netSegment: NetSegment;
  private netPoints: NetPoint[] = [];
  private netLines: NetLine[] = [];

  constructor(netSegment: NetSegment) {
    super("Remove net segment elements");
    this.netSegment = netSegment;
  }

  removeNetPoint(netPoint: NetPoint): void {
    this.assertConfigurable();
    if (!this.netPoints.includes(netPoint)) this.netPoints.push(netPoint);
  }

  removeNetLine(netLine: NetLine): void {
    this.assertConfigurable();
    if (!this.netLines.includes(netLine)) this.netLines.push(netLine);
  }

  protected performExecute(): boolean {
    if (this.netPoints.length === 0 && this.netLines.length === 0) return false;
    this.performRedo();
    return true;
  }

  protected performUndo(): void {
    this.netSegment.addElements(this.netPoints, this.netLines);
  }

  protected performRedo(): void {
    this.netSegment.removeElements(this.netPoints, this.netLines);
  }
}
