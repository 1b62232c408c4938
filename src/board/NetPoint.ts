import * as crypto from "crypto";
import { invariant } from "../common/errors";
import { LayerName, Point, formatPoint } from "../common/geometry";
import { NetSignal } from "../circuit/NetSignal";
import type { NetLine } from "./NetLine";
import type { NetSegment } from "./NetSegment";
import { NetPointAnchor } from "./types";

/**
 * A node of the net segment graph on one copper layer.
 *
 * Anchored points sit on a via or pad and take their position from it;
 * free points keep their own position (e.g. a bend in the middle of a trace).
 */
export class NetPoint {
  readonly uuid: string;
  readonly layer: LayerName;
  readonly anchor: NetPointAnchor | null;

  private readonly _position: Point;
  private _netSegment: NetSegment | null = null;
  private lines = new Set<NetLine>();

  constructor(layer: LayerName, at: Point | NetPointAnchor, uuid: string = crypto.randomUUID()) {
    this.uuid = uuid;
    this.layer = layer;
    if ("kind" in at) {
      this.anchor = at;
      this._position = at.kind === "via" ? at.via.position : at.pad.position;
    } else {
      this.anchor = null;
      this._position = at;
    }
  }

  get position(): Point {
    return this._position;
  }

  isAnchored(): boolean {
    return this.anchor !== null;
  }

  isAddedToSegment(): boolean {
    return this._netSegment !== null;
  }

  getNetSegment(): NetSegment {
    invariant(this._netSegment, `Net point at ${formatPoint(this.position)} is not part of a net segment.`);
    return this._netSegment;
  }

  get netSignal(): NetSignal {
    return this.getNetSegment().netSignal;
  }

  /** Lines currently connected to this point. */
  getLines(): NetLine[] {
    return [...this.lines];
  }

  /** @internal */
  _setNetSegment(segment: NetSegment | null): void {
    this._netSegment = segment;
  }

  /** @internal */
  _registerNetLine(line: NetLine): void {
    invariant(!this.lines.has(line), "Net line is already registered at its net point.");
    this.lines.add(line);
  }

  /** @internal */
  _unregisterNetLine(line: NetLine): void {
    invariant(this.lines.delete(line), "Net line is not registered at its net point.");
  }

  /** @internal Register at the via or pad this point sits on. */
  _attachToAnchor(): void {
    if (this.anchor?.kind === "via") this.anchor.via._registerNetPoint(this);
    if (this.anchor?.kind === "pad") this.anchor.pad._registerNetPoint(this);
  }

  /** @internal */
  _detachFromAnchor(): void {
    if (this.anchor?.kind === "via") this.anchor.via._unregisterNetPoint(this);
    if (this.anchor?.kind === "pad") this.anchor.pad._unregisterNetPoint(this);
  }
}
