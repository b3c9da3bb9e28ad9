import { describe, expect, it } from "vitest";

import {
  activeScope,
  Graph,
  GraphBuilder,
  interpretGraph,
  InterpreterError,
} from "../src";
import { buildSingleRegion, F16_PARAMS, F32_PARAMS, OPERATORS } from "./helpers/programs";

const options = { operators: OPERATORS };

function roundingBody(): Graph {
  const body = new GraphBuilder();
  const x = body.input("x");
  body.output(body.call("g", [x], { name: "y" }));
  return body.graph;
}

describe("interpretGraph", () => {
  it("evaluates calls in order", () => {
    const b = new GraphBuilder();
    const x = b.input("x");
    const a = b.call("f", [x]);
    b.output(b.call("h", [a]));

    expect(interpretGraph(b.graph, [1], options)).toBe(4);
  });

  it("applies scope params to operators between enter and exit", () => {
    expect(interpretGraph(buildSingleRegion(), [1], options)).toBe(5);
  });

  it("runs a region body inside its scope", () => {
    const b = new GraphBuilder();
    const x = b.input("x");
    const body = b.subgraph("body", roundingBody());
    b.output(b.region("autocast", F16_PARAMS, body, [x]));

    // g(1) = 1.3, rounded to 1.5 under f16
    expect(interpretGraph(b.graph, [1], options)).toBe(1.5);
    expect(interpretGraph(roundingBody(), [1], options)).toBeCloseTo(1.3);
  });

  it("returns tuples as arrays and nothing as null", () => {
    const b = new GraphBuilder();
    const x = b.input("x");
    b.output([x, b.call("f", [x])]);
    const empty = new GraphBuilder();
    empty.input("x");
    empty.output();

    expect(interpretGraph(b.graph, [1], options)).toEqual([1, 2]);
    expect(interpretGraph(empty.graph, [1], options)).toBeNull();
  });

  it("reports unknown operators and missing inputs", () => {
    const b = new GraphBuilder();
    const x = b.input("x");
    b.output(b.call("nope", [x]));

    expect(() => interpretGraph(b.graph, [1], options)).toThrow(InterpreterError);
    expect(() => interpretGraph(b.graph, [1], options)).toThrow("unknown operator nope");
    expect(() => interpretGraph(b.graph, [], options)).toThrow("missing value for input x");
  });

  it("rejects a graph that leaves a scope open", () => {
    const b = new GraphBuilder();
    const x = b.input("x");
    b.enter(F16_PARAMS);
    b.output(x);

    expect(() => interpretGraph(b.graph, [1], options)).toThrow(
      "graph finished with 1 open scope(s)",
    );
  });

  it("rejects an exit of a different scope", () => {
    const b = new GraphBuilder();
    const x = b.input("x");
    const enter = b.enter(F16_PARAMS);
    b.exit(enter, { scope: "grad_mode" });
    b.output(x);

    expect(() => interpretGraph(b.graph, [1], options)).toThrow(
      "exit_grad_mode does not close the innermost scope",
    );
  });

  it("rejects a getitem past the end of a result", () => {
    const b = new GraphBuilder();
    const x = b.input("x");
    b.output(b.getitem(x, 0));

    expect(() => interpretGraph(b.graph, [1], options)).toThrow(
      "getitem: no result at index 0",
    );
  });
});

describe("activeScope", () => {
  it("returns the innermost frame of a scope", () => {
    const ctx = {
      scopes: [
        { scope: "autocast", params: F16_PARAMS, token: 1 },
        { scope: "grad_mode", params: [false], token: 2 },
        { scope: "autocast", params: F32_PARAMS, token: 3 },
      ],
    };

    expect(activeScope(ctx, "autocast")?.token).toBe(3);
    expect(activeScope(ctx, "grad_mode")?.token).toBe(2);
    expect(activeScope(ctx, "other")).toBeUndefined();
  });
});
