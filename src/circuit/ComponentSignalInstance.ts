import { NetSignal } from "./NetSignal";
import { ComponentSignalOptions } from "./types";

/**
 * A signal of a placed component (one per pin function), optionally bound to
 * a net signal. Footprint pads resolve their net through it.
 */
export class ComponentSignalInstance {
  readonly componentRef: string;
  readonly name: string;

  private _netSignal: NetSignal | null = null;

  constructor(options: ComponentSignalOptions) {
    this.componentRef = options.componentRef;
    this.name = options.name;
  }

  get netSignal(): NetSignal | null {
    return this._netSignal;
  }

  /** Bind to a net, or pass null to leave the signal unconnected. */
  setNetSignal(netSignal: NetSignal | null): this {
    this._netSignal = netSignal;
    return this;
  }

  toString(): string {
    return `${this.componentRef}.${this.name}`;
  }
}
