/** Net class categories */
export type NetClass = "Power" | "Signal" | "Data" | string;

/** Options for NetSignal constructor */
export interface NetSignalOptions {
  name: string;
  class?: NetClass;
  /** Fixed uuid, e.g. when restoring a saved circuit */
  uuid?: string;
}

/** Options for ComponentSignalInstance constructor */
export interface ComponentSignalOptions {
  /** Reference designator of the owning component, e.g. "R1" */
  componentRef: string;
  /** Signal name inside the component, e.g. "1" or "VCC" */
  name: string;
}
