import assert from "node:assert";
import { describe, it } from "node:test";

import { buildLineCatalog } from "../lineCatalog.js";
import { buildNetworkGraph, graphEdges, hasStop, linesAt, neighbors } from "../networkGraph.js";
import { DOWNTOWN_LINES, line, PARK } from "./fixtures.js";

describe("buildNetworkGraph (clique)", () => {
    const catalog = buildLineCatalog(DOWNTOWN_LINES);
    const graph = buildNetworkGraph(catalog);

    it("joins every pair of stops on a line", () => {
        // C(7,2) for Red plus C(5,2) for each of the other three
        assert.strictEqual(graphEdges(graph).length, 21 + 10 + 10 + 10);
    });

    it("labels every edge with a line both endpoints belong to", () => {
        for (const e of graphEdges(graph)) {
            assert.ok(linesAt(graph, e.from).has(e.lineId), `${e.from} not on ${e.lineId}`);
            assert.ok(linesAt(graph, e.to).has(e.lineId), `${e.to} not on ${e.lineId}`);
        }
    });

    it("stores edges on both endpoints", () => {
        for (const e of graphEdges(graph)) {
            assert.ok(neighbors(graph, e.to).some(n => n.stopId === e.from && n.lineId === e.lineId));
        }
    });

    it("lists neighbours in line order then stop order", () => {
        assert.deepStrictEqual(neighbors(graph, PARK.id).map(n => `${n.lineId}:${n.stopId}`), [
            "Red:place-alewife",
            "Red:place-davis",
            "Red:place-porter",
            "Red:place-harvard",
            "Red:place-downtown",
            "Red:place-south",
            "Green:place-lechmere",
            "Green:place-government",
            "Green:place-boylston",
            "Green:place-copley",
        ]);
    });

    it("exposes the membership index", () => {
        assert.deepStrictEqual(linesAt(graph, PARK.id), new Set(["Red", "Green"]));
    });
});

describe("buildNetworkGraph (adjacent)", () => {
    it("labels every edge with a line both endpoints belong to", () => {
        const graph = buildNetworkGraph(buildLineCatalog(DOWNTOWN_LINES), { topology: "adjacent" });
        const edges = graphEdges(graph);
        // one edge per consecutive pair: 6 on Red, 4 on each of the others
        assert.strictEqual(edges.length, 6 + 4 + 4 + 4);
        for (const e of edges) {
            assert.ok(linesAt(graph, e.from).has(e.lineId), `${e.from} not on ${e.lineId}`);
            assert.ok(linesAt(graph, e.to).has(e.lineId), `${e.to} not on ${e.lineId}`);
        }
    });

    it("only joins consecutive stops", () => {
        const graph = buildNetworkGraph(buildLineCatalog([line("A", ["a", "b", "c", "d"])]), { topology: "adjacent" });
        assert.strictEqual(graph.topology, "adjacent");
        assert.deepStrictEqual(graphEdges(graph), [
            { from: "a", to: "b", lineId: "A" },
            { from: "b", to: "c", lineId: "A" },
            { from: "c", to: "d", lineId: "A" },
        ]);
        assert.deepStrictEqual(neighbors(graph, "b").map(n => n.stopId), ["a", "c"]);
    });
});

describe("multigraph edges", () => {
    it("keeps one edge per shared line", () => {
        const graph = buildNetworkGraph(buildLineCatalog([line("L1", ["a", "b", "c"]), line("L2", ["a", "b"])]));
        assert.deepStrictEqual(neighbors(graph, "a"), [
            { stopId: "b", lineId: "L1" },
            { stopId: "c", lineId: "L1" },
            { stopId: "b", lineId: "L2" },
        ]);
    });

    it("does not double edges for a line id repeated across records", () => {
        const graph = buildNetworkGraph(buildLineCatalog([line("L1", ["a", "b"]), line("L1", ["b", "a"])]));
        assert.deepStrictEqual(neighbors(graph, "a"), [{ stopId: "b", lineId: "L1" }]);
    });
});

describe("isolated and unknown stops", () => {
    const graph = buildNetworkGraph(buildLineCatalog([line("A", ["a", "b"]), line("Solo", ["lonely"])]));

    it("keeps a stop with no neighbours as a node", () => {
        assert.strictEqual(hasStop(graph, "lonely"), true);
        assert.deepStrictEqual(neighbors(graph, "lonely"), []);
        assert.deepStrictEqual(linesAt(graph, "lonely"), new Set(["Solo"]));
    });

    it("answers lookups for stops it has never seen", () => {
        assert.strictEqual(hasStop(graph, "nowhere"), false);
        assert.deepStrictEqual(neighbors(graph, "nowhere"), []);
        assert.strictEqual(linesAt(graph, "nowhere").size, 0);
    });
});
