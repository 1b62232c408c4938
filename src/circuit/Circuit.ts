/**
 * Circuit
 *
 * Owns the net signals and component signals of one project.
 */

import { NetEditError } from "../common/errors";
import { ComponentSignalInstance } from "./ComponentSignalInstance";
import { NetSignal } from "./NetSignal";
import { ComponentSignalOptions, NetSignalOptions } from "./types";

export class Circuit {
  private netSignals = new Map<string, NetSignal>();
  private componentSignals: ComponentSignalInstance[] = [];

  /** Create and register a net signal. Names must be unique. */
  addNetSignal(options: NetSignalOptions): NetSignal {
    if (this.getNetSignalByName(options.name)) {
      throw new NetEditError("InvalidPrecondition", `A net signal named "${options.name}" already exists.`);
    }
    const netSignal = new NetSignal(options);
    this.netSignals.set(netSignal.uuid, netSignal);
    return netSignal;
  }

  removeNetSignal(netSignal: NetSignal): void {
    if (!this.netSignals.delete(netSignal.uuid)) {
      throw new NetEditError("InvariantViolation", `Net signal "${netSignal.name}" is not part of the circuit.`);
    }
    for (const sig of this.componentSignals) {
      if (sig.netSignal === netSignal) sig.setNetSignal(null);
    }
  }

  getNetSignal(uuid: string): NetSignal | undefined {
    return this.netSignals.get(uuid);
  }

  getNetSignalByName(name: string): NetSignal | undefined {
    for (const netSignal of this.netSignals.values()) {
      if (netSignal.name === name) return netSignal;
    }
    return undefined;
  }

  getNetSignals(): NetSignal[] {
    return [...this.netSignals.values()];
  }

  /** Register a component signal, optionally already bound to a net. */
  addComponentSignal(options: ComponentSignalOptions, netSignal: NetSignal | null = null): ComponentSignalInstance {
    if (netSignal && !this.netSignals.has(netSignal.uuid)) {
      throw new NetEditError("InvalidPrecondition", `Net signal "${netSignal.name}" is not part of the circuit.`);
    }
    const sig = new ComponentSignalInstance(options).setNetSignal(netSignal);
    this.componentSignals.push(sig);
    return sig;
  }

  getComponentSignals(): ReadonlyArray<ComponentSignalInstance> {
    return this.componentSignals;
  }
}
