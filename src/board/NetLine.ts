import * as crypto from "crypto";
import { invariant } from "../common/errors";
import { LayerName } from "../common/geometry";
import type { NetPoint } from "./NetPoint";
import type { NetSegment } from "./NetSegment";

/** A trace between two net points of the same segment and layer. */
export class NetLine {
  readonly uuid: string;
  readonly startPoint: NetPoint;
  readonly endPoint: NetPoint;
  readonly width: number;

  private _netSegment: NetSegment | null = null;

  constructor(startPoint: NetPoint, endPoint: NetPoint, width: number, uuid: string = crypto.randomUUID()) {
    this.uuid = uuid;
    this.startPoint = startPoint;
    this.endPoint = endPoint;
    this.width = width;
  }

  get layer(): LayerName {
    return this.startPoint.layer;
  }

  isAddedToSegment(): boolean {
    return this._netSegment !== null;
  }

  getNetSegment(): NetSegment {
    invariant(this._netSegment, "Net line is not part of a net segment.");
    return this._netSegment;
  }

  getOtherPoint(np: NetPoint): NetPoint {
    if (np === this.startPoint) return this.endPoint;
    invariant(np === this.endPoint, "Net point is not an end of this net line.");
    return this.startPoint;
  }

  /** @internal */
  _setNetSegment(segment: NetSegment | null): void {
    this._netSegment = segment;
  }
}
