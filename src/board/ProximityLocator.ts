import { LayerName, Point, distance, distanceToSegment } from "../common/geometry";
import { getConfig } from "../project/config";
import type { Board } from "./Board";
import { BoardElementsAt, ElementLocator } from "./types";

/**
 * Default hit-testing: everything within `tolerance` of the position.
 *
 * Vias are matched on every layer, like the editor scene does; pads, points
 * and lines only on the requested layer. Results keep the board's
 * enumeration order.
 */
export class ProximityLocator implements ElementLocator {
  private readonly tolerance: number;

  constructor(tolerance: number = getConfig().hitTolerance) {
    this.tolerance = tolerance;
  }

  elementsAt(board: Board, position: Point, layer: LayerName): BoardElementsAt {
    const near = (p: Point) => distance(p, position) <= this.tolerance;

    return {
      netPoints: board.getNetPoints().filter((np) => np.layer === layer && near(np.position)),
      vias: board.getVias().filter((via) => near(via.position)),
      pads: board.getFootprintPads().filter((pad) => pad.isOnLayer(layer) && near(pad.position)),
      netLines: board
        .getNetLines()
        .filter(
          (line) =>
            line.layer === layer &&
            distanceToSegment(position, line.startPoint.position, line.endPoint.position) <= this.tolerance,
        ),
    };
  }
}
