import { LayerName, Point } from "../common/geometry";
import { Board } from "../board/Board";
import { NetPoint } from "../board/NetPoint";
import { NetSegment } from "../board/NetSegment";
import { UndoStack } from "../undo/UndoStack";
import { CmdCombineBoardNetSegments } from "./CmdCombineBoardNetSegments";
import { CmdPlaceBoardNetPoint } from "./CmdPlaceBoardNetPoint";

/**
 * Get or create the net point at `position` on `layer`.
 * Reusing an existing point leaves the undo stack untouched.
 */
export function placeNetPoint(undoStack: UndoStack, board: Board, position: Point, layer: LayerName): NetPoint {
  const cmd = new CmdPlaceBoardNetPoint(board, position, layer);
  undoStack.execute(cmd);
  return cmd.getNetPoint();
}

/** Merge `toBeRemoved` into the segment of `junction` as one undo step. */
export function combineNetSegments(undoStack: UndoStack, toBeRemoved: NetSegment, junction: NetPoint): void {
  undoStack.execute(new CmdCombineBoardNetSegments(toBeRemoved, junction));
}
