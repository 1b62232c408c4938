import * as crypto from "crypto";
import { NetEditError, invariant } from "../common/errors";
import { LayerName, Point, formatPoint } from "../common/geometry";
import { NetSignal } from "../circuit/NetSignal";
import type { NetPoint } from "./NetPoint";
import { ViaOptions } from "./types";

/**
 * A plated hole connecting several copper layers. Exposes at most one net
 * point per layer, all of them the same electrical node.
 */
export class Via {
  readonly uuid: string;
  readonly position: Point;
  readonly layers: ReadonlyArray<LayerName>;

  private _netSignal: NetSignal | null;
  private netPoints = new Map<LayerName, NetPoint>();

  constructor(options: ViaOptions) {
    this.uuid = options.uuid ?? crypto.randomUUID();
    this.position = options.position;
    this.layers = [...options.layers];
    this._netSignal = options.netSignal ?? null;
  }

  isOnLayer(layer: LayerName): boolean {
    return this.layers.includes(layer);
  }

  getNetPointOfLayer(layer: LayerName): NetPoint | undefined {
    return this.netPoints.get(layer);
  }

  getNetPoints(): NetPoint[] {
    return [...this.netPoints.values()];
  }

  /**
   * The explicitly assigned net, else the net of any attached segment,
   * else null.
   */
  getNetSignal(): NetSignal | null {
    if (this._netSignal) return this._netSignal;
    for (const np of this.netPoints.values()) {
      return np.getNetSegment().netSignal;
    }
    return null;
  }

  /** The explicitly assigned net, ignoring what is connected. */
  getAssignedNetSignal(): NetSignal | null {
    return this._netSignal;
  }

  /** Assign a net, or null to follow the connected segments. Must agree with them. */
  setNetSignal(netSignal: NetSignal | null): void {
    for (const np of this.netPoints.values()) {
      const connected = np.getNetSegment().netSignal;
      if (netSignal && netSignal !== connected) {
        throw new NetEditError(
          "NetSignalMismatch",
          `The via at ${formatPoint(this.position)} is connected to "${connected.name}", not "${netSignal.name}".`,
        );
      }
    }
    this._netSignal = netSignal;
  }

  /** @internal */
  _registerNetPoint(np: NetPoint): void {
    invariant(this.isOnLayer(np.layer), `Via does not span layer ${np.layer}.`);
    invariant(!this.netPoints.has(np.layer), `Via already has a net point on layer ${np.layer}.`);
    this.netPoints.set(np.layer, np);
  }

  /** @internal */
  _unregisterNetPoint(np: NetPoint): void {
    invariant(this.netPoints.get(np.layer) === np, `Net point is not registered at via on layer ${np.layer}.`);
    this.netPoints.delete(np.layer);
  }
}
