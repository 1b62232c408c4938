import * as crypto from "crypto";
import { NetEditError, invariant } from "../common/errors";
import { formatPoint } from "../common/geometry";
import { NetSignal } from "../circuit/NetSignal";
import type { Board } from "./Board";
import { NetLine } from "./NetLine";
import { NetPoint } from "./NetPoint";

/**
 * A connected group of net points and net lines on one board, all bound to
 * the same net signal.
 *
 * Elements are only added and removed in batches through `addElements()` and
 * `removeElements()`, which validate the whole batch before changing
 * anything.
 */
export class NetSegment {
  readonly uuid: string;
  readonly board: Board;

  private _netSignal: NetSignal;
  private netPoints = new Map<string, NetPoint>();
  private netLines = new Map<string, NetLine>();
  private addedToBoard = false;

  constructor(board: Board, netSignal: NetSignal, uuid: string = crypto.randomUUID()) {
    this.uuid = uuid;
    this.board = board;
    this._netSignal = netSignal;
  }

  get netSignal(): NetSignal {
    return this._netSignal;
  }

  setNetSignal(netSignal: NetSignal): void {
    if (netSignal === this._netSignal) return;
    for (const np of this.netPoints.values()) {
      if (np.anchor?.kind === "pad" && np.anchor.pad.getCompSigInstNetSignal() !== netSignal) {
        throw new NetEditError(
          "NetSignalMismatch",
          `Pad ${np.anchor.pad} is not connected to net "${netSignal.name}".`,
        );
      }
      if (np.anchor?.kind === "via") {
        const via = np.anchor.via;
        const assigned = via.getAssignedNetSignal();
        // points of the via on other layers may belong to other segments
        const foreign = via.getNetPoints().find((p) => p.getNetSegment() !== this && p.netSignal !== netSignal);
        if ((assigned && assigned !== netSignal) || foreign) {
          throw new NetEditError(
            "NetSignalMismatch",
            `The via at ${formatPoint(via.position)} is not on net "${netSignal.name}".`,
          );
        }
      }
    }
    this._netSignal = netSignal;
  }

  isAddedToBoard(): boolean {
    return this.addedToBoard;
  }

  getNetPoints(): NetPoint[] {
    return [...this.netPoints.values()];
  }

  getNetLines(): NetLine[] {
    return [...this.netLines.values()];
  }

  hasNetPoint(np: NetPoint): boolean {
    return this.netPoints.get(np.uuid) === np;
  }

  hasNetLine(line: NetLine): boolean {
    return this.netLines.get(line.uuid) === line;
  }

  isEmpty(): boolean {
    return this.netPoints.size === 0 && this.netLines.size === 0;
  }

  /** A segment without any line connects nothing and may be removed. */
  isDegenerate(): boolean {
    return this.netLines.size === 0;
  }

  /**
   * Add new (or previously removed) points and lines.
   * Lines may reference points of this segment or points of the same batch.
   */
  addElements(points: ReadonlyArray<NetPoint>, lines: ReadonlyArray<NetLine>): void {
    this.validateAdd(points, lines);

    for (const np of points) {
      np._setNetSegment(this);
      this.netPoints.set(np.uuid, np);
      if (this.addedToBoard) np._attachToAnchor();
    }
    for (const line of lines) {
      line._setNetSegment(this);
      this.netLines.set(line.uuid, line);
      line.startPoint._registerNetLine(line);
      line.endPoint._registerNetLine(line);
    }
  }

  /**
   * Remove points and lines. A point can only be removed together with all
   * lines connected to it.
   */
  removeElements(points: ReadonlyArray<NetPoint>, lines: ReadonlyArray<NetLine>): void {
    const removedLines = new Set(lines);
    for (const line of lines) {
      invariant(this.hasNetLine(line), "Net line is not part of this net segment.");
    }
    for (const np of points) {
      invariant(this.hasNetPoint(np), `Net point at ${formatPoint(np.position)} is not part of this net segment.`);
      invariant(
        np.getLines().every((l) => removedLines.has(l)),
        `Net point at ${formatPoint(np.position)} still has net lines attached.`,
      );
    }

    for (const line of lines) {
      line.startPoint._unregisterNetLine(line);
      line.endPoint._unregisterNetLine(line);
      this.netLines.delete(line.uuid);
      line._setNetSegment(null);
    }
    for (const np of points) {
      if (this.addedToBoard) np._detachFromAnchor();
      this.netPoints.delete(np.uuid);
      np._setNetSegment(null);
    }
  }

  /** @internal Called by the board when this segment is added to it. */
  _addToBoard(): void {
    invariant(!this.addedToBoard, "Net segment is already added to the board.");
    const attached: NetPoint[] = [];
    try {
      for (const np of this.netPoints.values()) {
        np._attachToAnchor();
        attached.push(np);
      }
    } catch (e) {
      for (const np of attached) np._detachFromAnchor();
      throw e;
    }
    this.addedToBoard = true;
  }

  /** @internal */
  _removeFromBoard(): void {
    invariant(this.addedToBoard, "Net segment is not added to the board.");
    for (const np of this.netPoints.values()) {
      np._detachFromAnchor();
    }
    this.addedToBoard = false;
  }

  private validateAdd(points: ReadonlyArray<NetPoint>, lines: ReadonlyArray<NetLine>): void {
    const batch = new Set<NetPoint>();
    const viaLayers = new Set<string>();
    const pads = new Set<string>();

    for (const np of points) {
      if (np.isAddedToSegment() || batch.has(np)) {
        throw new NetEditError("InvariantViolation", `Net point at ${formatPoint(np.position)} is already part of a net segment.`);
      }
      batch.add(np);

      if (np.anchor?.kind === "via") {
        const via = np.anchor.via;
        if (!via.isOnLayer(np.layer)) {
          throw new NetEditError("InvalidPrecondition", `The via at ${formatPoint(via.position)} does not span layer ${np.layer}.`);
        }
        const key = `${via.uuid}/${np.layer}`;
        if (viaLayers.has(key) || (this.addedToBoard && via.getNetPointOfLayer(np.layer))) {
          throw new NetEditError("InvalidPrecondition", `The via at ${formatPoint(via.position)} already has a net point on layer ${np.layer}.`);
        }
        viaLayers.add(key);
        const viaSignal = via.getNetSignal();
        if (viaSignal && viaSignal !== this._netSignal) {
          throw new NetEditError("NetSignalMismatch", `The via at ${formatPoint(via.position)} belongs to net "${viaSignal.name}", not "${this._netSignal.name}".`);
        }
      } else if (np.anchor?.kind === "pad") {
        const pad = np.anchor.pad;
        if (!pad.isOnLayer(np.layer)) {
          throw new NetEditError("InvalidPrecondition", `Pad ${pad} is not on layer ${np.layer}.`);
        }
        if (pads.has(pad.uuid) || (this.addedToBoard && pad.netPoint)) {
          throw new NetEditError("InvalidPrecondition", `Pad ${pad} already has a net point.`);
        }
        pads.add(pad.uuid);
        const padSignal = pad.getCompSigInstNetSignal();
        if (!padSignal) {
          throw new NetEditError("UnconnectedPad", `Pad ${pad} is not connected to any net.`);
        }
        if (padSignal !== this._netSignal) {
          throw new NetEditError("NetSignalMismatch", `Pad ${pad} belongs to net "${padSignal.name}", not "${this._netSignal.name}".`);
        }
      }
    }

    const batchLines = new Set<NetLine>();
    for (const line of lines) {
      if (line.isAddedToSegment() || batchLines.has(line)) {
        throw new NetEditError("InvariantViolation", "Net line is already part of a net segment.");
      }
      batchLines.add(line);
      for (const end of [line.startPoint, line.endPoint]) {
        if (!this.hasNetPoint(end) && !batch.has(end)) {
          throw new NetEditError("InvalidPrecondition", `Net line end at ${formatPoint(end.position)} is not part of this net segment.`);
        }
      }
      if (line.startPoint === line.endPoint) {
        throw new NetEditError("InvalidPrecondition", "A net line cannot start and end at the same net point.");
      }
      if (line.startPoint.layer !== line.endPoint.layer) {
        throw new NetEditError("InvalidPrecondition", "Both ends of a net line must be on the same layer.");
      }
      if (!(line.width > 0)) {
        throw new NetEditError("InvalidPrecondition", `Invalid net line width: ${line.width}.`);
      }
    }
  }
}
