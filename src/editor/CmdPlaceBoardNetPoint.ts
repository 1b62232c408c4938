import { NetEditError, invariant } from "../common/errors";
import { LayerName, Point, formatPoint } from "../common/geometry";
import { ScopeGuard } from "../common/ScopeGuard";
import { NetSignal } from "../circuit/NetSignal";
import { Board } from "../board/Board";
import { CmdBoardNetSegmentAdd } from "../board/cmd/CmdBoardNetSegmentAdd";
import { CmdBoardNetSegmentAddElements } from "../board/cmd/CmdBoardNetSegmentAddElements";
import { FootprintPad } from "../board/FootprintPad";
import { NetPoint } from "../board/NetPoint";
import { NetSegment } from "../board/NetSegment";
import { Via } from "../board/Via";
import { UndoCommandGroup } from "../undo/UndoCommandGroup";
import { splitNetLine } from "./splitNetLine";

/**
 * Provides a net point at a board position, creating one only if needed.
 *
 * Lookup order:
 * 1. an existing net point on the layer
 * 2. a via (its net point of the layer, or a new one anchored to it)
 * 3. a pad (new segment with a point anchored to the pad)
 * 4. a trace, which gets split at the position
 *
 * Anything else fails. If a step fails after earlier child commands ran,
 * they are undone before the error propagates.
 */
export class CmdPlaceBoardNetPoint extends UndoCommandGroup {
  readonly board: Board;
  readonly position: Point;
  readonly layer: LayerName;

  private netPoint: NetPoint | null = null;

  constructor(board: Board, position: Point, layer: LayerName) {
    super("Place board net point");
    this.board = board;
    this.position = position;
    this.layer = layer;
  }

  /** The placed (or reused) net point; available after execution. */
  getNetPoint(): NetPoint {
    invariant(this.netPoint, "Net point is determined on execution.");
    return this.netPoint;
  }

  protected override performExecute(): boolean {
    // if an error occurs, undo all already executed child commands
    const guard = new ScopeGuard(() => this.rollback());
    try {
      const existing = this.board.getNetPointsAt(this.position, this.layer);
      if (existing.length > 1) {
        console.warn(
          `⚠️  ${existing.length} net points found at ${formatPoint(this.position)} on ${this.layer}, using the first one.`,
        );
      }
      this.netPoint = existing[0] ?? this.createNewNetPoint();

      guard.dismiss();
      return this.getChildCount() > 0;
    } finally {
      guard.close();
    }
  }

  private createNewNetPoint(): NetPoint {
    const vias = this.board.getViasAt(this.position, this.layer);
    if (vias.length === 0) {
      return this.createNewNetPointAtPad();
    }
    if (vias.length > 1) {
      throw new NetEditError("NotImplemented", `Sorry, ${vias.length} overlapping vias at ${formatPoint(this.position)} are not supported.`);
    }
    return this.getOrCreateNetPointAtVia(vias[0]);
  }

  private getOrCreateNetPointAtVia(via: Via): NetPoint {
    const netPoint = via.getNetPointOfLayer(this.layer);
    if (netPoint) return netPoint;

    if (!via.isOnLayer(this.layer)) {
      throw new NetEditError("InvalidPrecondition", `The via at ${formatPoint(via.position)} does not span layer ${this.layer}.`);
    }
    const netSignal = via.getNetSignal();
    if (!netSignal) {
      throw new NetEditError("NoNetSignal", `The via at ${formatPoint(via.position)} is not connected to any net.`);
    }

    // all net points of a via are one node, so join the segment of an existing one
    const sibling = via.getNetPoints()[0];
    let netSegment: NetSegment;
    if (sibling) {
      netSegment = sibling.getNetSegment();
      if (netSegment.netSignal !== netSignal) {
        throw new NetEditError(
          "NetSignalMismatch",
          `The via at ${formatPoint(via.position)} is assigned to "${netSignal.name}" but connected to "${netSegment.netSignal.name}".`,
        );
      }
    } else {
      netSegment = this.createNewNetSegment(netSignal);
    }

    const cmd = new CmdBoardNetSegmentAddElements(netSegment);
    const created = cmd.addNetPointAtVia(this.layer, via);
    this.execNewChildCmd(cmd);
    return created;
  }

  private createNewNetPointAtPad(): NetPoint {
    const pads = this.board.getPadsAt(this.position, this.layer);
    if (pads.length === 0) {
      return this.createNewNetPointInLine();
    }
    if (pads.length > 1) {
      throw new NetEditError("NotImplemented", `Sorry, ${pads.length} overlapping pads at ${formatPoint(this.position)} are not supported.`);
    }

    const pad: FootprintPad = pads[0];
    const netSignal = pad.getCompSigInstNetSignal();
    if (!netSignal) {
      throw new NetEditError("UnconnectedPad", `The pad ${pad} is not connected to any net.`);
    }
    if (pad.netPoint) {
      throw new NetEditError(
        "InvalidPrecondition",
        `The pad ${pad} is already connected on layer ${pad.netPoint.layer}.`,
      );
    }

    const netSegment = this.createNewNetSegment(netSignal);
    const cmd = new CmdBoardNetSegmentAddElements(netSegment);
    const created = cmd.addNetPointAtPad(this.layer, pad);
    this.execNewChildCmd(cmd);
    return created;
  }

  private createNewNetPointInLine(): NetPoint {
    const lines = this.board.getNetLinesAt(this.position, this.layer);
    if (lines.length === 0) {
      throw new NetEditError("NothingAtPosition", `No trace, via or pad at ${formatPoint(this.position)} on ${this.layer}.`);
    }
    if (lines.length > 1) {
      throw new NetEditError("NotImplemented", `Sorry, ${lines.length} overlapping traces at ${formatPoint(this.position)} are not supported.`);
    }
    return splitNetLine(lines[0], this.position, (cmd) => this.execNewChildCmd(cmd));
  }

  private createNewNetSegment(netSignal: NetSignal): NetSegment {
    const cmd = new CmdBoardNetSegmentAdd(this.board, netSignal);
    this.execNewChildCmd(cmd);
    return cmd.getNetSegment();
  }
}
