import { LayerName, Point } from "../common/geometry";
import { NetSignal } from "../circuit/NetSignal";
import { Board } from "../board/Board";
import { CmdBoardNetSegmentAdd } from "../board/cmd/CmdBoardNetSegmentAdd";
import { CmdBoardNetSegmentAddElements } from "../board/cmd/CmdBoardNetSegmentAddElements";
import { NetLine } from "../board/NetLine";
import { NetPoint } from "../board/NetPoint";
import { NetSegment } from "../board/NetSegment";

export interface Trace {
  segment: NetSegment;
  a: NetPoint;
  b: NetPoint;
  line: NetLine;
}

/** A new segment holding one straight trace between two free points. */
export function addTrace(board: Board, netSignal: NetSignal, from: Point, to: Point, width = 0.25, layer: LayerName = "F.Cu"): Trace {
  const cmdSegment = new CmdBoardNetSegmentAdd(board, netSignal);
  cmdSegment.execute();
  const segment = cmdSegment.getNetSegment();

  const cmd = new CmdBoardNetSegmentAddElements(segment);
  const a = cmd.addNetPoint(layer, from);
  const b = cmd.addNetPoint(layer, to);
  const line = cmd.addNetLine(a, b, width);
  cmd.execute();
  return { segment, a, b, line };
}

const byUuid = (x: { uuid: string }, y: { uuid: string }) => x.uuid.localeCompare(y.uuid);

/** Structural description of everything on the board, for before/after comparisons. */
export function snapshotBoard(board: Board) {
  return {
    segments: board
      .getNetSegments()
      .sort(byUuid)
      .map((segment) => ({
        uuid: segment.uuid,
        netSignal: segment.netSignal.name,
        points: segment
          .getNetPoints()
          .sort(byUuid)
          .map((np) => ({
            uuid: np.uuid,
            layer: np.layer,
            x: np.position.x,
            y: np.position.y,
            anchor: np.anchor ? `${np.anchor.kind}:${np.anchor.kind === "via" ? np.anchor.via.uuid : np.anchor.pad.uuid}` : null,
            lines: np.getLines().map((l) => l.uuid).sort(),
          })),
        lines: segment
          .getNetLines()
          .sort(byUuid)
          .map((line) => ({
            uuid: line.uuid,
            start: line.startPoint.uuid,
            end: line.endPoint.uuid,
            width: line.width,
            layer: line.layer,
          })),
      })),
    vias: board
      .getVias()
      .sort(byUuid)
      .map((via) => ({ uuid: via.uuid, netPoints: via.getNetPoints().map((np) => np.uuid).sort() })),
    pads: board
      .getFootprintPads()
      .sort(byUuid)
      .map((pad) => ({ uuid: pad.uuid, netPoint: pad.netPoint?.uuid ?? null })),
  };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}
