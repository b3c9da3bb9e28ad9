import { describe, expect, it } from "vitest";

import {
  GraphBuilder,
  type Instruction,
  interpretGraph,
  printGraph,
  printNodes,
  RegionBoundaryTracker,
  sequentialSplit,
  validateGraph,
} from "../src";
import { buildSingleRegion, buildTupleRegion, OPERATORS } from "./helpers/programs";

const byScope = () => new RegionBoundaryTracker("autocast").startsNewSegment;

describe("sequentialSplit", () => {
  it("cuts a graph at region boundaries", () => {
    const split = sequentialSplit(buildSingleRegion(), byScope());

    expect(printNodes(split)).toEqual([
      "%x = input",
      "%submod_0 = invoke submod_0(%x)",
      "%submod_1 = invoke submod_1(%submod_0)",
      "%submod_2 = invoke submod_2(%submod_1)",
      "return %submod_2",
    ]);
    expect(printNodes(split.requireChild("submod_1"))).toEqual([
      "%a = input",
      '%b = enter[autocast]("cpu", "f16", true)',
      "%c = call g(%a)",
      "%d = exit[autocast](%b)",
      "return %c",
    ]);
    expect(printNodes(split.requireChild("submod_2"))).toEqual([
      "%c = input",
      "%e = call h(%c)",
      "return %e",
    ]);
    expect(() => validateGraph(split)).not.toThrow();
  });

  it("returns several outputs as a tuple unpacked by getitem", () => {
    const split = sequentialSplit(buildTupleRegion(), byScope());

    expect(printNodes(split)).toEqual([
      "%x = input",
      "%submod_1 = invoke submod_1(%x)",
      "%getitem = getitem(%submod_1, 0)",
      "%getitem_1 = getitem(%submod_1, 1)",
      "%submod_2 = invoke submod_2(%getitem, %getitem_1)",
      "return %submod_2",
    ]);
    expect(printNodes(split.requireChild("submod_1"))).toEqual([
      "%x = input",
      '%b = enter[autocast]("cpu", "f16", true)',
      "%c = call g(%x)",
      "%d = call h(%x)",
      "%ex = exit[autocast](%b)",
      "return (%c, %d)",
    ]);
    expect(printNodes(split.requireChild("submod_2"))).toEqual([
      "%c = input",
      "%d = input",
      "%s = call add(%c, %d)",
      "return %s",
    ]);
    expect(split.findByName("getitem_1")?.meta.val).toEqual({ shape: [2], dtype: "f32" });
  });

  it("consults the callback for every instruction", () => {
    const seen: string[] = [];
    const b = new GraphBuilder();
    const x = b.input("x");
    b.output(b.call("f", [x], { name: "a" }));

    sequentialSplit(b.graph, (node: Instruction) => {
      seen.push(`${node.op}:${node.name}`);
      return false;
    });

    expect(seen).toEqual(["input:x", "call:a", "output:output"]);
  });

  it("gives a segment without readers no output", () => {
    const b = new GraphBuilder();
    const x = b.input("x");
    const a = b.call("f", [x], { name: "a" });
    b.call("h", [x], { name: "y" });
    b.output(a);

    const split = sequentialSplit(b.graph, (node) => node.op === "call");

    expect(printNodes(split)).toEqual([
      "%x = input",
      "%submod_1 = invoke submod_1(%x)",
      "%submod_2 = invoke submod_2(%x)",
      "return %submod_1",
    ]);
    expect(printNodes(split.requireChild("submod_2"))).toEqual([
      "%x = input",
      "%y = call h(%x)",
    ]);
  });

  it("copies child graphs of nested calls", () => {
    const inner = new GraphBuilder();
    const ix = inner.input("x");
    inner.output([ix, inner.call("f", [ix], { name: "y" })]);
    const b = new GraphBuilder();
    const x = b.input("x");
    const call = b.invoke("inner", inner.graph, [x]);
    b.output(b.getitem(call, 1));

    const split = sequentialSplit(b.graph, () => false);
    const segment = split.requireChild("submod_0");

    expect(printNodes(split)).toEqual([
      "%x = input",
      "%submod_0 = invoke submod_0(%x)",
      "return %submod_0",
    ]);
    expect(segment.childNames()).toEqual(["inner"]);
    expect(segment.requireChild("inner")).not.toBe(inner.graph);
    expect(printNodes(segment.requireChild("inner"))).toEqual(printNodes(inner.graph));
  });

  it("leaves the input graph untouched", () => {
    const graph = buildTupleRegion();
    const before = printGraph(graph);

    sequentialSplit(graph, byScope());

    expect(printGraph(graph)).toBe(before);
  });

  it("computes the same result as the unsplit graph", () => {
    const graph = buildSingleRegion();

    const split = sequentialSplit(graph, byScope());

    expect(interpretGraph(split, [1], { operators: OPERATORS })).toBe(5);
  });
});
