import { describe, it, expect, beforeEach } from "vitest";
import { point } from "../common/geometry";
import { Circuit } from "../circuit/Circuit";
import { NetSignal } from "../circuit/NetSignal";
import { Board } from "../board/Board";
import { NetPoint } from "../board/NetPoint";
import { ProximityLocator } from "../board/ProximityLocator";
import { CmdBoardNetSegmentAdd } from "../board/cmd/CmdBoardNetSegmentAdd";
import { CmdBoardNetSegmentAddElements } from "../board/cmd/CmdBoardNetSegmentAddElements";
import { CmdBoardNetSegmentEdit } from "../board/cmd/CmdBoardNetSegmentEdit";
import { CmdBoardNetSegmentRemove } from "../board/cmd/CmdBoardNetSegmentRemove";
import { CmdBoardNetSegmentRemoveElements } from "../board/cmd/CmdBoardNetSegmentRemoveElements";
import { addTrace, captureError } from "./helpers";

describe("Board net segments", () => {
    let circuit: Circuit;
    let board: Board;
    let gnd: NetSignal;
    let vcc: NetSignal;

    beforeEach(() => {
        circuit = new Circuit();
        board = new Board({ name: "main" });
        gnd = circuit.addNetSignal({ name: "GND", class: "Power" });
        vcc = circuit.addNetSignal({ name: "VCC", class: "Power" });
    });

    function newSegment(netSignal: NetSignal) {
        const cmd = new CmdBoardNetSegmentAdd(board, netSignal);
        cmd.execute();
        return cmd.getNetSegment();
    }

    it("adds and removes a segment", () => {
        const cmd = new CmdBoardNetSegmentAdd(board, gnd);
        expect(cmd.execute()).toBe(true);
        const segment = cmd.getNetSegment();
        expect(board.getNetSegments()).toEqual([segment]);
        expect(segment.isAddedToBoard()).toBe(true);
        expect(segment.isEmpty()).toBe(true);

        cmd.undo();
        expect(board.getNetSegments()).toEqual([]);
        cmd.redo();
        expect(board.getNetSegment(segment.uuid)).toBe(segment);
    });

    it("adds a batch of points and lines", () => {
        const { segment, a, b, line } = addTrace(board, gnd, point(0, 0), point(10, 0), 0.3);
        expect(segment.getNetPoints()).toEqual([a, b]);
        expect(segment.getNetLines()).toEqual([line]);
        expect(a.getLines()).toEqual([line]);
        expect(b.getLines()).toEqual([line]);
        expect(line.getOtherPoint(a)).toBe(b);
        expect(line.layer).toBe("F.Cu");
        expect(a.netSignal).toBe(gnd);
        expect(segment.isDegenerate()).toBe(false);
    });

    it("reports an empty batch as no change", () => {
        const segment = newSegment(gnd);
        expect(new CmdBoardNetSegmentAddElements(segment).execute()).toBe(false);
        expect(new CmdBoardNetSegmentRemoveElements(segment).execute()).toBe(false);
    });

    it("rejects a line to a point of another segment without adding anything", () => {
        const other = addTrace(board, gnd, point(0, 5), point(10, 5));
        const segment = newSegment(gnd);
        const cmd = new CmdBoardNetSegmentAddElements(segment);
        const np = cmd.addNetPoint("F.Cu", point(0, 0));
        cmd.addNetLine(np, other.a, 0.25);

        expect(captureError(() => cmd.execute())).toMatchObject({ code: "InvalidPrecondition" });
        expect(segment.isEmpty()).toBe(true);
        expect(np.isAddedToSegment()).toBe(false);
        expect(other.a.getLines()).toEqual([other.line]);
    });

    it("rejects lines with invalid geometry", () => {
        const segment = newSegment(gnd);

        const zeroWidth = new CmdBoardNetSegmentAddElements(segment);
        zeroWidth.addNetLine(zeroWidth.addNetPoint("F.Cu", point(0, 0)), zeroWidth.addNetPoint("F.Cu", point(1, 0)), 0);
        expect(captureError(() => zeroWidth.execute())).toMatchObject({ code: "InvalidPrecondition" });

        const crossLayer = new CmdBoardNetSegmentAddElements(segment);
        crossLayer.addNetLine(crossLayer.addNetPoint("F.Cu", point(0, 0)), crossLayer.addNetPoint("B.Cu", point(1, 0)), 0.25);
        expect(captureError(() => crossLayer.execute())).toMatchObject({ code: "InvalidPrecondition" });

        const loop = new CmdBoardNetSegmentAddElements(segment);
        const np = loop.addNetPoint("F.Cu", point(0, 0));
        loop.addNetLine(np, np, 0.25);
        expect(captureError(() => loop.execute())).toMatchObject({ code: "InvalidPrecondition" });

        expect(segment.isEmpty()).toBe(true);
    });

    it("rejects a point that is already part of a segment", () => {
        const { a } = addTrace(board, gnd, point(0, 0), point(10, 0));
        const cmd = new CmdBoardNetSegmentAddElements(newSegment(gnd));
        cmd.addExistingNetPoint(a);
        expect(captureError(() => cmd.execute())).toMatchObject({ code: "InvariantViolation" });
    });

    it("refuses to remove a point that still has lines", () => {
        const { segment, a } = addTrace(board, gnd, point(0, 0), point(10, 0));
        const cmd = new CmdBoardNetSegmentRemoveElements(segment);
        cmd.removeNetPoint(a);
        expect(captureError(() => cmd.execute())).toMatchObject({ code: "InvariantViolation" });
        expect(segment.hasNetPoint(a)).toBe(true);
    });

    it("removes and restores elements", () => {
        const { segment, a, b, line } = addTrace(board, gnd, point(0, 0), point(10, 0));
        const cmd = new CmdBoardNetSegmentRemoveElements(segment);
        cmd.removeNetLine(line);
        cmd.removeNetLine(line);
        cmd.removeNetPoint(b);

        expect(cmd.execute()).toBe(true);
        expect(segment.getNetPoints()).toEqual([a]);
        expect(segment.getNetLines()).toEqual([]);
        expect(a.getLines()).toEqual([]);
        expect(b.isAddedToSegment()).toBe(false);

        cmd.undo();
        expect(segment.getNetPoints()).toEqual([a, b]);
        expect(a.getLines()).toEqual([line]);
    });

    it("checks pads against the segment's net", () => {
        const r1 = circuit.addComponentSignal({ componentRef: "R1", name: "1" }, vcc);
        const r2 = circuit.addComponentSignal({ componentRef: "R1", name: "2" });
        const vccPad = board.addFootprintPad({ componentRef: "R1", name: "1", position: point(0, 0), layers: ["F.Cu"], signal: r1 });
        const loosePad = board.addFootprintPad({ componentRef: "R1", name: "2", position: point(2, 0), layers: ["F.Cu"], signal: r2 });
        const segment = newSegment(gnd);

        const mismatch = new CmdBoardNetSegmentAddElements(segment);
        mismatch.addNetPointAtPad("F.Cu", vccPad);
        expect(captureError(() => mismatch.execute())).toMatchObject({ code: "NetSignalMismatch" });

        const unconnected = new CmdBoardNetSegmentAddElements(segment);
        unconnected.addNetPointAtPad("F.Cu", loosePad);
        expect(captureError(() => unconnected.execute())).toMatchObject({ code: "UnconnectedPad" });

        const wrongLayer = new CmdBoardNetSegmentAddElements(newSegment(vcc));
        wrongLayer.addNetPointAtPad("B.Cu", vccPad);
        expect(captureError(() => wrongLayer.execute())).toMatchObject({ code: "InvalidPrecondition" });

        expect(vccPad.netPoint).toBeNull();
    });

    it("registers anchored points at their via while the segment is on the board", () => {
        const via = board.addVia({ position: point(5, 5), layers: ["F.Cu", "B.Cu"] });
        const segment = newSegment(gnd);
        const cmd = new CmdBoardNetSegmentAddElements(segment);
        const np = cmd.addNetPointAtVia("F.Cu", via);
        cmd.execute();

        expect(np.position).toBe(via.position);
        expect(via.getNetPointOfLayer("F.Cu")).toBe(np);
        expect(via.getNetSignal()).toBe(gnd);

        const remove = new CmdBoardNetSegmentRemove(segment);
        remove.execute();
        expect(via.getNetPoints()).toEqual([]);
        expect(via.getNetSignal()).toBeNull();

        remove.undo();
        expect(via.getNetPointOfLayer("F.Cu")).toBe(np);

        cmd.undo();
        expect(via.getNetPoints()).toEqual([]);
    });

    it("rejects a second point on the same via layer", () => {
        const via = board.addVia({ position: point(5, 5), layers: ["F.Cu", "B.Cu"] });
        const segment = newSegment(gnd);
        const first = new CmdBoardNetSegmentAddElements(segment);
        first.addNetPointAtVia("F.Cu", via);
        first.execute();

        const second = new CmdBoardNetSegmentAddElements(newSegment(gnd));
        second.addNetPointAtVia("F.Cu", via);
        expect(captureError(() => second.execute())).toMatchObject({ code: "InvalidPrecondition" });
    });

    it("rejects a via assigned to another net", () => {
        const via = board.addVia({ position: point(5, 5), layers: ["F.Cu", "B.Cu"], netSignal: vcc });
        const cmd = new CmdBoardNetSegmentAddElements(newSegment(gnd));
        cmd.addNetPointAtVia("B.Cu", via);
        expect(captureError(() => cmd.execute())).toMatchObject({ code: "NetSignalMismatch" });
    });

    it("keeps a segment on a via on the via's net", () => {
        const via = board.addVia({ position: point(5, 5), layers: ["F.Cu", "B.Cu"], netSignal: gnd });
        const segment = newSegment(gnd);
        const add = new CmdBoardNetSegmentAddElements(segment);
        add.addNetPointAtVia("F.Cu", via);
        add.execute();

        const edit = new CmdBoardNetSegmentEdit(segment);
        edit.setNetSignal(vcc);
        expect(captureError(() => edit.execute())).toMatchObject({ code: "NetSignalMismatch" });
        expect(segment.netSignal).toBe(gnd);
        expect(via.getNetSignal()).toBe(gnd);
    });

    it("keeps segments sharing a via on one net", () => {
        const via = board.addVia({ position: point(5, 5), layers: ["F.Cu", "B.Cu"] });
        const front = newSegment(gnd);
        const addFront = new CmdBoardNetSegmentAddElements(front);
        addFront.addNetPointAtVia("F.Cu", via);
        addFront.execute();
        const back = newSegment(gnd);
        const addBack = new CmdBoardNetSegmentAddElements(back);
        addBack.addNetPointAtVia("B.Cu", via);
        addBack.execute();

        const edit = new CmdBoardNetSegmentEdit(front);
        edit.setNetSignal(vcc);
        expect(captureError(() => edit.execute())).toMatchObject({ code: "NetSignalMismatch" });
        expect(front.netSignal).toBe(gnd);
    });

    it("lets a via without assigned net follow its segment", () => {
        const via = board.addVia({ position: point(5, 5), layers: ["F.Cu", "B.Cu"] });
        const segment = newSegment(gnd);
        const add = new CmdBoardNetSegmentAddElements(segment);
        add.addNetPointAtVia("F.Cu", via);
        add.execute();

        const edit = new CmdBoardNetSegmentEdit(segment);
        edit.setNetSignal(vcc);
        expect(edit.execute()).toBe(true);
        expect(via.getNetSignal()).toBe(vcc);
    });

    it("refuses to assign a via a net other than the connected one", () => {
        const via = board.addVia({ position: point(5, 5), layers: ["F.Cu", "B.Cu"] });
        const add = new CmdBoardNetSegmentAddElements(newSegment(gnd));
        add.addNetPointAtVia("F.Cu", via);
        add.execute();

        expect(captureError(() => via.setNetSignal(vcc))).toMatchObject({ code: "NetSignalMismatch" });
        expect(via.getAssignedNetSignal()).toBeNull();

        via.setNetSignal(gnd);
        expect(via.getAssignedNetSignal()).toBe(gnd);
        via.setNetSignal(null);
        expect(via.getAssignedNetSignal()).toBeNull();
    });

    it("only removes unconnected vias and pads", () => {
        const via = board.addVia({ position: point(5, 5), layers: ["F.Cu", "B.Cu"] });
        const cmd = new CmdBoardNetSegmentAddElements(newSegment(gnd));
        cmd.addNetPointAtVia("F.Cu", via);
        cmd.execute();

        expect(captureError(() => board.removeVia(via))).toMatchObject({ code: "InvalidPrecondition" });
        cmd.undo();
        board.removeVia(via);
        expect(board.getVias()).toEqual([]);
    });
});

describe("CmdBoardNetSegmentEdit", () => {
    let circuit: Circuit;
    let board: Board;
    let gnd: NetSignal;
    let vcc: NetSignal;

    beforeEach(() => {
        circuit = new Circuit();
        board = new Board({ name: "main" });
        gnd = circuit.addNetSignal({ name: "GND" });
        vcc = circuit.addNetSignal({ name: "VCC" });
    });

    it("changes the net signal and reverts it", () => {
        const { segment } = addTrace(board, gnd, point(0, 0), point(10, 0));
        const cmd = new CmdBoardNetSegmentEdit(segment);
        cmd.setNetSignal(vcc);

        expect(cmd.execute()).toBe(true);
        expect(segment.netSignal).toBe(vcc);
        cmd.undo();
        expect(segment.netSignal).toBe(gnd);
        cmd.redo();
        expect(segment.netSignal).toBe(vcc);
    });

    it("reports no change for the same signal", () => {
        const { segment } = addTrace(board, gnd, point(0, 0), point(10, 0));
        const cmd = new CmdBoardNetSegmentEdit(segment);
        cmd.setNetSignal(gnd);
        expect(cmd.execute()).toBe(false);
    });

    it("cannot be configured after execution", () => {
        const { segment } = addTrace(board, gnd, point(0, 0), point(10, 0));
        const cmd = new CmdBoardNetSegmentEdit(segment);
        cmd.execute();
        expect(captureError(() => cmd.setNetSignal(vcc))).toMatchObject({ code: "InvariantViolation" });
    });

    it("refuses a net that the connected pads are not on", () => {
        const sig = circuit.addComponentSignal({ componentRef: "C1", name: "1" }, gnd);
        const pad = board.addFootprintPad({ componentRef: "C1", name: "1", position: point(0, 0), layers: ["F.Cu"], signal: sig });
        const segCmd = new CmdBoardNetSegmentAdd(board, gnd);
        segCmd.execute();
        const segment = segCmd.getNetSegment();
        const add = new CmdBoardNetSegmentAddElements(segment);
        add.addNetPointAtPad("F.Cu", pad);
        add.execute();

        const cmd = new CmdBoardNetSegmentEdit(segment);
        cmd.setNetSignal(vcc);
        expect(captureError(() => cmd.execute())).toMatchObject({ code: "NetSignalMismatch" });
        expect(segment.netSignal).toBe(gnd);
    });
});

describe("ProximityLocator", () => {
    it("finds elements within the tolerance", () => {
        const circuit = new Circuit();
        const gnd = circuit.addNetSignal({ name: "GND" });
        const sig = circuit.addComponentSignal({ componentRef: "U1", name: "3" }, gnd);
        const board = new Board({ name: "main", locator: new ProximityLocator(0.5) });
        const { a, line } = addTrace(board, gnd, point(0, 0), point(10, 0));
        const via = board.addVia({ position: point(0.2, 0.2), layers: ["F.Cu", "B.Cu"] });
        const pad = board.addFootprintPad({ componentRef: "U1", name: "3", position: point(0, 0.4), layers: ["F.Cu"], signal: sig });

        const front = board.elementsAt(point(0, 0), "F.Cu");
        expect(front.netPoints).toEqual([a]);
        expect(front.vias).toEqual([via]);
        expect(front.pads).toEqual([pad]);
        expect(front.netLines).toEqual([line]);

        const back = board.elementsAt(point(0, 0), "In1.Cu");
        expect(back.netPoints).toEqual([]);
        expect(back.vias).toEqual([via]);
        expect(back.pads).toEqual([]);
        expect(back.netLines).toEqual([]);

        expect(board.getNetLinesAt(point(5, 0.4), "F.Cu")).toEqual([line]);
        expect(board.getNetLinesAt(point(5, 0.6), "F.Cu")).toEqual([]);
    });
});

describe("Circuit", () => {
    it("keeps net names unique", () => {
        const circuit = new Circuit();
        circuit.addNetSignal({ name: "GND" });
        expect(captureError(() => circuit.addNetSignal({ name: "GND" }))).toMatchObject({ code: "InvalidPrecondition" });
    });

    it("unbinds component signals of a removed net", () => {
        const circuit = new Circuit();
        const vcc = circuit.addNetSignal({ name: "VCC" });
        const sig = circuit.addComponentSignal({ componentRef: "R1", name: "1" }, vcc);
        expect(sig.toString()).toBe("R1.1");

        circuit.removeNetSignal(vcc);
        expect(sig.netSignal).toBeNull();
        expect(circuit.getNetSignalByName("VCC")).toBeUndefined();
    });

    it("resolves pad nets through the component signal", () => {
        const circuit = new Circuit();
        const gnd = circuit.addNetSignal({ name: "GND" });
        const sig = circuit.addComponentSignal({ componentRef: "J1", name: "2" }, gnd);
        const board = new Board({ name: "main" });
        const pad = board.addFootprintPad({ componentRef: "J1", name: "2", position: point(1, 1), layers: ["F.Cu"], signal: sig });
        expect(pad.getCompSigInstNetSignal()).toBe(gnd);
        expect(new NetPoint("F.Cu", { kind: "pad", pad }).position).toBe(pad.position);
    });
});
