/**
 * PCB Net Editing Engine
 *
 * Undoable editing of board net topology: placing net points and combining
 * net segments, on top of a generic undo command framework.
 */

// Geometry and errors
export { point, distance, distanceToSegment, formatPoint } from "./common/geometry";
export type { Point, LayerName } from "./common/geometry";
export { NetEditError, isNetEditError } from "./common/errors";
export type { NetEditErrorCode } from "./common/errors";
export { ScopeGuard } from "./common/ScopeGuard";

// Undo framework
export { UndoCommand } from "./undo/UndoCommand";
export type { UndoCommandState } from "./undo/UndoCommand";
export { UndoCommandGroup } from "./undo/UndoCommandGroup";
export { UndoStack } from "./undo/UndoStack";

// Circuit
export { Circuit } from "./circuit/Circuit";
export { NetSignal } from "./circuit/NetSignal";
export { ComponentSignalInstance } from "./circuit/ComponentSignalInstance";
export type { NetClass, NetSignalOptions, ComponentSignalOptions } from "./circuit/types";

// Board topology
export { Board } from "./board/Board";
export { NetSegment } from "./board/NetSegment";
export { NetPoint } from "./board/NetPoint";
export { NetLine } from "./board/NetLine";
export { Via } from "./board/Via";
export { FootprintPad } from "./board/FootprintPad";
export { ProximityLocator } from "./board/ProximityLocator";
export type { BoardOptions, BoardElementsAt, ElementLocator, FootprintPadOptions, NetPointAnchor, ViaOptions } from "./board/types";

// Board commands
export { CmdBoardNetSegmentAdd } from "./board/cmd/CmdBoardNetSegmentAdd";
export { CmdBoardNetSegmentRemove } from "./board/cmd/CmdBoardNetSegmentRemove";
export { CmdBoardNetSegmentEdit } from "./board/cmd/CmdBoardNetSegmentEdit";
export { CmdBoardNetSegmentAddElements } from "./board/cmd/CmdBoardNetSegmentAddElements";
export { CmdBoardNetSegmentRemoveElements } from "./board/cmd/CmdBoardNetSegmentRemoveElements";

// Editor operations
export { CmdPlaceBoardNetPoint } from "./editor/CmdPlaceBoardNetPoint";
export { CmdCombineBoardNetSegments } from "./editor/CmdCombineBoardNetSegments";
export { splitNetLine } from "./editor/splitNetLine";
export { placeNetPoint, combineNetSegments } from "./editor/operations";

// Project session
export { Project } from "./project/Project";
export type { ProjectOptions, ProjectStorage, SaveTarget } from "./project/Project";
export { getConfig, resetConfig, loadSettings, parseSettings, DEFAULT_SETTINGS } from "./project/config";
export type { Config, SettingsFile } from "./project/config";
