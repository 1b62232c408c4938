import type { LayerName, Point } from "../common/geometry";
import type { ComponentSignalInstance } from "../circuit/ComponentSignalInstance";
import type { NetSignal } from "../circuit/NetSignal";
import type { Board } from "./Board";
import type { FootprintPad } from "./FootprintPad";
import type { NetLine } from "./NetLine";
import type { NetPoint } from "./NetPoint";
import type { Via } from "./Via";

/** What a net point is attached to; its position follows the anchor. */
export type NetPointAnchor =
  | { kind: "via"; via: Via }
  | { kind: "pad"; pad: FootprintPad };

/** Options for Via constructor */
export interface ViaOptions {
  position: Point;
  /** Copper layers the via connects */
  layers: LayerName[];
  /** Explicitly assigned net, if any */
  netSignal?: NetSignal | null;
  uuid?: string;
}

/** Options for FootprintPad constructor */
export interface FootprintPadOptions {
  componentRef: string;
  name: string;
  position: Point;
  /** One layer for SMD pads, all copper layers for THT pads */
  layers: LayerName[];
  signal?: ComponentSignalInstance | null;
  uuid?: string;
}

/** Board items found at one position, as reported by hit-testing. */
export interface BoardElementsAt {
  netPoints: NetPoint[];
  vias: Via[];
  pads: FootprintPad[];
  netLines: NetLine[];
}

/**
 * Hit-testing collaborator. The editing engine never decides itself what
 * lies under a position; it asks the locator.
 */
export interface ElementLocator {
  elementsAt(board: Board, position: Point, layer: LayerName): BoardElementsAt;
}

/** Options for Board constructor */
export interface BoardOptions {
  name: string;
  locator?: ElementLocator;
  uuid?: string;
}
