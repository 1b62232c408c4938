import { Point } from "../common/geometry";
import { CmdBoardNetSegmentAddElements } from "../board/cmd/CmdBoardNetSegmentAddElements";
import { CmdBoardNetSegmentRemoveElements } from "../board/cmd/CmdBoardNetSegmentRemoveElements";
import { NetLine } from "../board/NetLine";
import { NetPoint } from "../board/NetPoint";
import { UndoCommand } from "../undo/UndoCommand";

/**
 * Split `line` at `position`: add a free net point there plus two lines to
 * the old ends with the same width, then remove the old line. The segment
 * stays connected after each step.
 *
 * @param exec executes a child command inside the calling group
 */
export function splitNetLine(line: NetLine, position: Point, exec: (cmd: UndoCommand) => void): NetPoint {
  const netSegment = line.getNetSegment();

  const cmdAdd = new CmdBoardNetSegmentAddElements(netSegment);
  const netPoint = cmdAdd.addNetPoint(line.layer, position);
  cmdAdd.addNetLine(netPoint, line.startPoint, line.width);
  cmdAdd.addNetLine(netPoint, line.endPoint, line.width);
  exec(cmdAdd);

  const cmdRemove = new CmdBoardNetSegmentRemoveElements(netSegment);
  cmdRemove.removeNetLine(line);
  exec(cmdRemove);

  return netPoint;
}
