import { Graph } from "./graph";
import {
  type Arg,
  type CallNode,
  type Constant,
  constant,
  type EnterNode,
  type ExitNode,
  type GetItemNode,
  type InputNode,
  type Instruction,
  type InvokeNode,
  type NodeMeta,
  type OutputNode,
  ref,
  type RegionNode,
  type SubgraphNode,
  tuple,
} from "./instruction";

/** Anything the builder accepts as an argument; arrays become tuples. */
export type ArgLike = Instruction | Constant | ArgLike[];

export type BuildOptions = {
  name?: string;
  meta?: NodeMeta;
};

export const DEFAULT_SCOPE = "autocast";

export function toArg(value: ArgLike): Arg {
  if (Array.isArray(value)) {
    return tuple(value.map(toArg));
  }
  if (typeof value === "object" && value !== null) {
    return ref(value.id);
  }
  return constant(value);
}

/**
 * Fluent graph construction.
 *
 *   const b = new GraphBuilder();
 *   const x = b.input("x");
 *   const enter = b.enter(["cpu", "f16", true]);
 *   const y = b.call("relu", [x]);
 *   b.exit(enter);
 *   b.output(y);
 */
export class GraphBuilder {
  readonly graph: Graph;

  constructor(graph: Graph = new Graph()) {
    this.graph = graph;
  }

  input(name: string, meta: NodeMeta = {}): InputNode {
    return this.graph.insert(name, (at): InputNode => ({ ...at, op: "input", args: [], meta }));
  }

  call(target: string, args: ArgLike[], options: BuildOptions = {}): CallNode {
    return this.graph.insert(
      options.name ?? target,
      (at): CallNode => ({
        ...at,
        op: "call",
        target,
        args: args.map(toArg),
        meta: options.meta ?? {},
      }),
    );
  }

  enter(
    params: Constant[],
    options: BuildOptions & { scope?: string } = {},
  ): EnterNode {
    const scope = options.scope ?? DEFAULT_SCOPE;
    return this.graph.insert(
      options.name ?? `enter_${scope}`,
      (at): EnterNode => ({
        ...at,
        op: "enter",
        scope,
        params: params.slice(),
        args: [],
        meta: options.meta ?? {},
      }),
    );
  }

  exit(enter: Instruction, options: BuildOptions & { scope?: string } = {}): ExitNode {
    const scope = options.scope ?? (enter.op === "enter" ? enter.scope : DEFAULT_SCOPE);
    return this.graph.insert(
      options.name ?? `exit_${scope}`,
      (at): ExitNode => ({
        ...at,
        op: "exit",
        scope,
        args: [ref(enter.id)],
        meta: options.meta ?? {},
      }),
    );
  }

  invoke(target: string, child: Graph, args: ArgLike[], options: BuildOptions = {}): InvokeNode {
    this.graph.setChild(target, child);
    return this.graph.insert(
      options.name ?? target,
      (at): InvokeNode => ({
        ...at,
        op: "invoke",
        target,
        args: args.map(toArg),
        meta: options.meta ?? {},
      }),
    );
  }

  getitem(source: Instruction, index: number, options: BuildOptions = {}): GetItemNode {
    return this.graph.insert(
      options.name ?? "getitem",
      (at): GetItemNode => ({
        ...at,
        op: "getitem",
        index,
        args: [ref(source.id)],
        meta: options.meta ?? {},
      }),
    );
  }

  subgraph(target: string, child: Graph, options: BuildOptions = {}): SubgraphNode {
    this.graph.setChild(target, child);
    return this.graph.insert(
      options.name ?? target,
      (at): SubgraphNode => ({
        ...at,
        op: "subgraph",
        target,
        args: [],
        meta: options.meta ?? {},
      }),
    );
  }

  region(
    scope: string,
    params: Constant[],
    body: SubgraphNode,
    args: ArgLike[],
    options: BuildOptions = {},
  ): RegionNode {
    return this.graph.insert(
      options.name ?? `${scope}_region`,
      (at): RegionNode => ({
        ...at,
        op: "region",
        scope,
        params: params.slice(),
        args: [ref(body.id), ...args.map(toArg)],
        meta: options.meta ?? {},
      }),
    );
  }

  /** `value` omitted: the graph returns nothing. */
  output(value?: ArgLike): OutputNode {
    return this.graph.insert(
      "output",
      (at): OutputNode => ({
        ...at,
        op: "output",
        args: value === undefined ? [] : [toArg(value)],
        meta: {},
      }),
    );
  }
}
