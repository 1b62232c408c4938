import * as crypto from "crypto";
import { NetClass, NetSignalOptions } from "./types";

/**
 * A named electrical net of the circuit.
 *
 * Board net segments refer to a net signal; the circuit owns it.
 *
 * @example
 * ```ts
 * const vcc = circuit.addNetSignal({ name: "VCC_3V3", class: "Power" });
 * ```
 */
export class NetSignal {
  readonly uuid: string;
  readonly name: string;
  readonly class: NetClass;

  constructor(options: NetSignalOptions) {
    this.uuid = options.uuid ?? crypto.randomUUID();
    this.name = options.name;
    this.class = options.class ?? "Signal";
  }

  toString(): string {
    return this.name;
  }
}
