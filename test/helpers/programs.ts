import {
  activeScope,
  type Graph,
  GraphBuilder,
  type Instruction,
  type Operator,
  type RuntimeValue,
} from "../../src";

export const F16_PARAMS = ["cpu", "f16", true];
export const F32_PARAMS = ["cpu", "f32", true];

function num(value: RuntimeValue): number {
  if (typeof value !== "number") {
    throw new Error(`expected a number, got ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * Operators for interpreter tests. `g` is precision-sensitive: under an
 * active f16 autocast frame it rounds to the nearest half.
 */
export const OPERATORS: Record<string, Operator> = {
  f: ([x]) => num(x) + 1,
  g: ([x], ctx) => {
    const value = num(x) * 1.3;
    const frame = activeScope(ctx, "autocast");
    return frame?.params[1] === "f16" ? Math.round(value * 2) / 2 : value;
  },
  h: ([x]) => num(x) * 2,
  add: ([a, b]) => num(a) + num(b),
  grad_enabled: (_args, ctx) => {
    const frame = activeScope(ctx, "grad_mode");
    return frame ? frame.params[0] === true : true;
  },
};

/** a = f(x); b = enter(); c = g(a); d = exit(b); e = h(c); return e */
export function buildSingleRegion(): Graph {
  const b = new GraphBuilder();
  const x = b.input("x");
  const a = b.call("f", [x], { name: "a" });
  const enter = b.enter(F16_PARAMS, { name: "b" });
  const c = b.call("g", [a], { name: "c" });
  b.exit(enter, { name: "d" });
  const e = b.call("h", [c], { name: "e" });
  b.output(e);
  return b.graph;
}

/** a = f(x); b = enter(); c = g(a); d = exit(b); e = h(d); return e */
export function buildExitResultRegion(): Graph {
  const b = new GraphBuilder();
  const x = b.input("x");
  const a = b.call("f", [x], { name: "a" });
  const enter = b.enter(F16_PARAMS, { name: "b" });
  b.call("g", [a], { name: "c" });
  const d = b.exit(enter, { name: "d" });
  const e = b.call("h", [d], { name: "e" });
  b.output(e);
  return b.graph;
}

/** A region producing two values that are consumed afterwards. */
export function buildTupleRegion(returns: "sum" | "sum_and_inner" = "sum"): Graph {
  const b = new GraphBuilder();
  const x = b.input("x");
  const enter = b.enter(F16_PARAMS, {
    name: "b",
    meta: { moduleStack: { "model.block": "Block" } },
  });
  const c = b.call("g", [x], { name: "c", meta: { val: { shape: [2], dtype: "f16" } } });
  const d = b.call("h", [x], { name: "d", meta: { val: { shape: [2], dtype: "f32" } } });
  b.exit(enter, { name: "ex" });
  const s = b.call("add", [c, d], { name: "s" });
  b.output(returns === "sum" ? s : [s, d]);
  return b.graph;
}

/** An f16 region holding a nested f32 region. */
export function buildNestedRegions(): Graph {
  const b = new GraphBuilder();
  const x = b.input("x");
  const outer = b.enter(F16_PARAMS, { name: "outer" });
  const a = b.call("g", [x], { name: "a" });
  const inner = b.enter(F32_PARAMS, { name: "inner" });
  const bv = b.call("g", [a], { name: "b" });
  b.exit(inner, { name: "inner_exit" });
  const c = b.call("add", [a, bv], { name: "c" });
  b.exit(outer, { name: "outer_exit" });
  const d = b.call("h", [c], { name: "d" });
  b.output(d);
  return b.graph;
}

/** Every node of `graph` and its children, depth first. */
export function allNodes(graph: Graph): Instruction[] {
  const nodes = graph.nodes();
  for (const name of graph.childNames()) {
    nodes.push(...allNodes(graph.requireChild(name)));
  }
  return nodes;
}

export function countMarkers(graph: Graph, scope = "autocast"): number {
  return allNodes(graph).filter(
    (node) => (node.op === "enter" || node.op === "exit") && node.scope === scope,
  ).length;
}
