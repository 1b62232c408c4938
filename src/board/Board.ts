import * as crypto from "crypto";
import { NetEditError, invariant } from "../common/errors";
import { LayerName, Point, formatPoint } from "../common/geometry";
import { FootprintPad } from "./FootprintPad";
import { NetLine } from "./NetLine";
import { NetPoint } from "./NetPoint";
import { NetSegment } from "./NetSegment";
import { ProximityLocator } from "./ProximityLocator";
import { BoardElementsAt, BoardOptions, ElementLocator, FootprintPadOptions, ViaOptions } from "./types";
import { Via } from "./Via";

/**
 * One board layout of a project: the vias and pads placed on it and the net
 * segments connecting them.
 *
 * The board owns its segments. Segments only come and go through board
 * commands so that every change can be undone.
 */
export class Board {
  readonly uuid: string;
  readonly name: string;

  private readonly locator: ElementLocator;
  private netSegments = new Map<string, NetSegment>();
  private vias = new Map<string, Via>();
  private pads = new Map<string, FootprintPad>();

  constructor(options: BoardOptions) {
    this.uuid = options.uuid ?? crypto.randomUUID();
    this.name = options.name;
    this.locator = options.locator ?? new ProximityLocator();
  }

  // Vias and pads are placed by other tools; these setters are not undoable.

  addVia(options: ViaOptions): Via {
    const via = new Via(options);
    this.vias.set(via.uuid, via);
    return via;
  }

  removeVia(via: Via): void {
    if (via.getNetPoints().length > 0) {
      throw new NetEditError("InvalidPrecondition", `The via at ${formatPoint(via.position)} is still connected.`);
    }
    invariant(this.vias.delete(via.uuid), "Via is not part of the board.");
  }

  addFootprintPad(options: FootprintPadOptions): FootprintPad {
    const pad = new FootprintPad(options);
    this.pads.set(pad.uuid, pad);
    return pad;
  }

  removeFootprintPad(pad: FootprintPad): void {
    if (pad.netPoint) {
      throw new NetEditError("InvalidPrecondition", `Pad ${pad} is still connected.`);
    }
    invariant(this.pads.delete(pad.uuid), `Pad ${pad} is not part of the board.`);
  }

  getVias(): Via[] {
    return [...this.vias.values()];
  }

  getFootprintPads(): FootprintPad[] {
    return [...this.pads.values()];
  }

  getNetSegments(): NetSegment[] {
    return [...this.netSegments.values()];
  }

  getNetSegment(uuid: string): NetSegment | undefined {
    return this.netSegments.get(uuid);
  }

  hasNetSegment(segment: NetSegment): boolean {
    return this.netSegments.get(segment.uuid) === segment;
  }

  getNetPoints(): NetPoint[] {
    return this.getNetSegments().flatMap((s) => s.getNetPoints());
  }

  getNetLines(): NetLine[] {
    return this.getNetSegments().flatMap((s) => s.getNetLines());
  }

  /** @internal Use CmdBoardNetSegmentAdd. */
  addNetSegment(segment: NetSegment): void {
    invariant(segment.board === this, "Net segment belongs to another board.");
    invariant(!this.netSegments.has(segment.uuid), "Net segment is already part of the board.");
    segment._addToBoard();
    this.netSegments.set(segment.uuid, segment);
  }

  /** @internal Use CmdBoardNetSegmentRemove. */
  removeNetSegment(segment: NetSegment): void {
    invariant(this.hasNetSegment(segment), "Net segment is not part of the board.");
    segment._removeFromBoard();
    this.netSegments.delete(segment.uuid);
  }

  elementsAt(position: Point, layer: LayerName): BoardElementsAt {
    return this.locator.elementsAt(this, position, layer);
  }

  getNetPointsAt(position: Point, layer: LayerName): NetPoint[] {
    return this.elementsAt(position, layer).netPoints;
  }

  getViasAt(position: Point, layer: LayerName): Via[] {
    return this.elementsAt(position, layer).vias;
  }

  getPadsAt(position: Point, layer: LayerName): FootprintPad[] {
    return this.elementsAt(position, layer).pads;
  }

  getNetLinesAt(position: Point, layer: LayerName): NetLine[] {
    return this.elementsAt(position, layer).netLines;
  }
}
