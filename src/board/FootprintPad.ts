import * as crypto from "crypto";
import { invariant } from "../common/errors";
import { LayerName, Point } from "../common/geometry";
import { ComponentSignalInstance } from "../circuit/ComponentSignalInstance";
import { NetSignal } from "../circuit/NetSignal";
import type { NetPoint } from "./NetPoint";
import { FootprintPadOptions } from "./types";

/** Represents a copper pad of a placed footprint */
export class FootprintPad {
  readonly uuid: string;
  /** Reference designator of the component, e.g. "U1" */
  readonly componentRef: string;
  /** The pad name (number or string) */
  readonly name: string;
  readonly position: Point;
  readonly layers: ReadonlyArray<LayerName>;
  /** The component signal this pad belongs to, if any */
  readonly signal: ComponentSignalInstance | null;

  private _netPoint: NetPoint | null = null;

  constructor(options: FootprintPadOptions) {
    this.uuid = options.uuid ?? crypto.randomUUID();
    this.componentRef = options.componentRef;
    this.name = options.name;
    this.position = options.position;
    this.layers = [...options.layers];
    this.signal = options.signal ?? null;
  }

  get netPoint(): NetPoint | null {
    return this._netPoint;
  }

  isOnLayer(layer: LayerName): boolean {
    return this.layers.includes(layer);
  }

  /** The net the component signal is bound to; null means the pad cannot be connected. */
  getCompSigInstNetSignal(): NetSignal | null {
    return this.signal?.netSignal ?? null;
  }

  toString(): string {
    return `${this.componentRef}.${this.name}`;
  }

  /** @internal */
  _registerNetPoint(np: NetPoint): void {
    invariant(this._netPoint === null, `Pad ${this} already has a net point.`);
    this._netPoint = np;
  }

  /** @internal */
  _unregisterNetPoint(np: NetPoint): void {
    invariant(this._netPoint === np, `Net point is not registered at pad ${this}.`);
    this._netPoint = null;
  }
}
