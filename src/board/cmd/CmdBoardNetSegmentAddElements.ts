import { LayerName, Point } from "../../common/geometry";
import { UndoCommand } from "../../undo/UndoCommand";
import { FootprintPad } from "../FootprintPad";
import { NetLine } from "../NetLine";
import { NetPoint } from "../NetPoint";
import { NetSegment } from "../NetSegment";
import { Via } from "../Via";

/**
 * Adds a batch of net points and net lines to one segment.
 *
 * The `add*` methods create the elements right away so that later lines of
 * the same batch can reference new points; nothing reaches the segment
 * before `execute()`.
 */
export class CmdBoardNetSegmentAddElements extends UndoCommand {
  readonly netSegment: NetSegment;
  private netPoints: NetPoint[] = [];
  private netLines: NetLine[] = [];

  constructor(netSegment: NetSegment) {
    super("Add net segment elements");
    this.netSegment = netSegment;
  }

  addNetPoint(layer: LayerName, position: Point): NetPoint {
    return this.addExistingNetPoint(new NetPoint(layer, position));
  }

  addNetPointAtVia(layer: LayerName, via: Via): NetPoint {
    return this.addExistingNetPoint(new NetPoint(layer, { kind: "via", via }));
  }

  addNetPointAtPad(layer: LayerName, pad: FootprintPad): NetPoint {
    return this.addExistingNetPoint(new NetPoint(layer, { kind: "pad", pad }));
  }

  /** Re-add a point that was removed from a segment before. */
  addExistingNetPoint(netPoint: NetPoint): NetPoint {
    this.assertConfigurable();
    this.netPoints.push(netPoint);
    return netPoint;
  }

  addNetLine(startPoint: NetPoint, endPoint: NetPoint, width: number): NetLine {
    return this.addExistingNetLine(new NetLine(startPoint, endPoint, width));
  }

  addExistingNetLine(netLine: NetLine): NetLine {
    this.assertConfigurable();
    this.netLines.push(netLine);
    return netLine;
  }

  getNetPoints(): ReadonlyArray<NetPoint> {
    return this.netPoints;
  }

  getNetLines(): ReadonlyArray<NetLine> {
    return this.netLines;
  }

  protected performExecute(): boolean {
    if (this.netPoints.length === 0 && this.netLines.length === 0) return false;
    this.performRedo();
    return true;
  }

  protected performUndo(): void {
    this.netSegment.removeElements(this.netPoints, this.netLines);
  }

  protected performRedo(): void {
    this.netSegment.addElements(this.netPoints, this.netLines);
  }
}
