import { NetEditError } from "../common/errors";
import { ScopeGuard } from "../common/ScopeGuard";
import { CmdBoardNetSegmentAddElements } from "../board/cmd/CmdBoardNetSegmentAddElements";
import { CmdBoardNetSegmentRemove } from "../board/cmd/CmdBoardNetSegmentRemove";
import { CmdBoardNetSegmentRemoveElements } from "../board/cmd/CmdBoardNetSegmentRemoveElements";
import { NetPoint } from "../board/NetPoint";
import { NetSegment } from "../board/NetSegment";
import { UndoCommandGroup } from "../undo/UndoCommandGroup";
import { splitNetLine } from "./splitNetLine";

/**
 * Combines two board net segments: everything of `toBeRemoved` moves into
 * the segment of `junction`, then `toBeRemoved` is deleted.
 *
 * If `toBeRemoved` touches the junction (a point the board's locator finds
 * there, or a trace running through it), that spot is merged into the
 * junction point.
 *
 * @note Both net segments must have the same net signal!
 */
export class CmdCombineBoardNetSegments extends UndoCommandGroup {
  readonly netSegmentToBeRemoved: NetSegment;
  readonly junctionNetPoint: NetPoint;

  constructor(toBeRemoved: NetSegment, junction: NetPoint) {
    super("Combine board net segments");
    this.netSegmentToBeRemoved = toBeRemoved;
    this.junctionNetPoint = junction;
  }

  protected override performExecute(): boolean {
    const toBeRemoved = this.netSegmentToBeRemoved;
    const junction = this.junctionNetPoint;
    const survivor = junction.getNetSegment();

    // preconditions, checked before anything is modified
    if (survivor === toBeRemoved) {
      throw new NetEditError("InvalidPrecondition", "Cannot combine a net segment with itself.");
    }
    if (survivor.board !== toBeRemoved.board || !survivor.board.hasNetSegment(toBeRemoved) || !survivor.board.hasNetSegment(survivor)) {
      throw new NetEditError("InvalidPrecondition", "Only net segments of the same board can be combined.");
    }
    if (survivor.netSignal !== toBeRemoved.netSignal) {
      throw new NetEditError(
        "NetSignalMismatch",
        `Cannot combine net segments of different nets ("${survivor.netSignal.name}" and "${toBeRemoved.netSignal.name}").`,
      );
    }

    // if an error occurs, undo all already executed child commands
    const guard = new ScopeGuard(() => this.rollback());
    try {
      const folded = this.findOrCreateCounterpart();

      // take everything out of the old segment and delete it
      const cmdRemove = new CmdBoardNetSegmentRemoveElements(toBeRemoved);
      const points = toBeRemoved.getNetPoints();
      const lines = toBeRemoved.getNetLines();
      for (const line of lines) cmdRemove.removeNetLine(line);
      for (const np of points) cmdRemove.removeNetPoint(np);
      this.execNewChildCmd(cmdRemove);
      this.execNewChildCmd(new CmdBoardNetSegmentRemove(toBeRemoved));

      // ...and re-own it by the surviving segment
      const cmdAdd = new CmdBoardNetSegmentAddElements(survivor);
      for (const np of points) {
        if (np !== folded) cmdAdd.addExistingNetPoint(np);
      }
      for (const line of lines) {
        if (folded && (line.startPoint === folded || line.endPoint === folded)) {
          const start = line.startPoint === folded ? junction : line.startPoint;
          const end = line.endPoint === folded ? junction : line.endPoint;
          cmdAdd.addNetLine(start, end, line.width);
        } else {
          cmdAdd.addExistingNetLine(line);
        }
      }
      this.execNewChildCmd(cmdAdd);

      guard.dismiss();
      return true;
    } finally {
      guard.close();
    }
  }

  /**
   * The point of the removed segment at the junction, as the board's locator
   * sees it. A trace passing through the junction is split to provide one.
   */
  private findOrCreateCounterpart(): NetPoint | null {
    const junction = this.junctionNetPoint;
    const toBeRemoved = this.netSegmentToBeRemoved;
    const found = junction.getNetSegment().board.elementsAt(junction.position, junction.layer);

    const candidates = found.netPoints.filter((np) => toBeRemoved.hasNetPoint(np));
    if (candidates.length > 0) {
      // anchored points stay where they are, they cannot merge into another anchor
      return candidates.find((np) => !np.isAnchored()) ?? null;
    }

    const host = found.netLines.find((line) => toBeRemoved.hasNetLine(line));
    if (!host) return null;
    return splitNetLine(host, junction.position, (cmd) => this.execNewChildCmd(cmd));
  }
}
