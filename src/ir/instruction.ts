/**
 * Instruction data model for the scoped program graph.
 *
 * Instructions live in a per-graph arena keyed by NodeId. Every reference
 * between instructions is an explicit `ref` argument, so rewriting a graph
 * never chases shared pointers.
 */

export type NodeId = number;

export type DType = "f32" | "f16" | "bf16" | "i32" | "bool";

export type Constant = number | boolean | string | null;

// ============================================================================
// Metadata
// ============================================================================

export type TensorMeta = {
  shape: number[];
  dtype: DType;
};

/** Static result info: one tensor, or a (possibly nested) tuple of them. */
export type ValueMeta = TensorMeta | ValueMeta[];

export type NodeMeta = {
  /** Static result shape/dtype */
  val?: ValueMeta;
  /** Provenance: enclosing module path -> module type */
  moduleStack?: Record<string, string>;
  /** Display name and qualified name of the operator that produced the node */
  sourceFn?: [string, string];
};

// ============================================================================
// Arguments
// ============================================================================

export type Arg =
  | { kind: "ref"; id: NodeId }
  | { kind: "const"; value: Constant }
  | { kind: "tuple"; items: Arg[] };

export function ref(id: NodeId): Arg {
  return { kind: "ref", id };
}

export function constant(value: Constant): Arg {
  return { kind: "const", value };
}

export function tuple(items: Arg[]): Arg {
  return { kind: "tuple", items };
}

/**
 * Every node id referenced by `args`, in argument order (duplicates kept).
 */
export function refsOf(args: readonly Arg[]): NodeId[] {
  const ids: NodeId[] = [];
  const visit = (arg: Arg): void => {
    switch (arg.kind) {
      case "ref":
        ids.push(arg.id);
        break;
      case "tuple":
        arg.items.forEach(visit);
        break;
      case "const":
        break;
    }
  };
  args.forEach(visit);
  return ids;
}

export function mapArg(arg: Arg, fn: (id: NodeId) => Arg): Arg {
  switch (arg.kind) {
    case "ref":
      return fn(arg.id);
    case "tuple":
      return tuple(arg.items.map((item) => mapArg(item, fn)));
    case "const":
      return constant(arg.value);
  }
}

export function mapRefs(args: readonly Arg[], fn: (id: NodeId) => Arg): Arg[] {
  return args.map((arg) => mapArg(arg, fn));
}

// ============================================================================
// Instructions
// ============================================================================

type InstructionBase = {
  id: NodeId;
  name: string;
  args: Arg[];
  meta: NodeMeta;
};

/** Graph input (placeholder). */
export type InputNode = InstructionBase & { op: "input" };

/** Ordinary operator call. */
export type CallNode = InstructionBase & { op: "call"; target: string };

/** Opens a dynamic scope; `params` are the scope's constant parameters. */
export type EnterNode = InstructionBase & {
  op: "enter";
  scope: string;
  params: Constant[];
};

/** Closes a dynamic scope; args[0] references the matching enter. */
export type ExitNode = InstructionBase & { op: "exit"; scope: string };

/** Calls the child graph registered under `target`. */
export type InvokeNode = InstructionBase & { op: "invoke"; target: string };

/** Extracts result `index` of a multi-result producer (args[0]). */
export type GetItemNode = InstructionBase & { op: "getitem"; index: number };

/** Evaluates to the child graph registered under `target`. */
export type SubgraphNode = InstructionBase & { op: "subgraph"; target: string };

/**
 * Runs a child graph inside a scope: args[0] references a subgraph node,
 * the remaining args are passed to the child's inputs.
 */
export type RegionNode = InstructionBase & {
  op: "region";
  scope: string;
  params: Constant[];
};

/** Graph result; zero or one argument (a single value or a tuple). */
export type OutputNode = InstructionBase & { op: "output" };

export type Instruction =
  | InputNode
  | CallNode
  | EnterNode
  | ExitNode
  | InvokeNode
  | GetItemNode
  | SubgraphNode
  | RegionNode
  | OutputNode;

export type InstructionOp = Instruction["op"];

export type Placement = {
  id: NodeId;
  name: string;
};

export function cloneValueMeta(val: ValueMeta): ValueMeta {
  if (Array.isArray(val)) {
    return val.map(cloneValueMeta);
  }
  return { shape: val.shape.slice(), dtype: val.dtype };
}

export function cloneMeta(meta: NodeMeta): NodeMeta {
  const copy: NodeMeta = {};
  if (meta.val !== undefined) copy.val = cloneValueMeta(meta.val);
  if (meta.moduleStack !== undefined) copy.moduleStack = { ...meta.moduleStack };
  if (meta.sourceFn !== undefined) copy.sourceFn = [meta.sourceFn[0], meta.sourceFn[1]];
  return copy;
}

/**
 * Copy `node` to a new placement with new arguments. Op-specific fields and
 * metadata are copied; nothing is shared with the source instruction.
 */
export function copyInstruction(
  node: Instruction,
  at: Placement,
  args: Arg[],
): Instruction {
  const base = { id: at.id, name: at.name, args, meta: cloneMeta(node.meta) };
  switch (node.op) {
    case "input":
      return { ...base, op: "input" };
    case "output":
      return { ...base, op: "output" };
    case "call":
      return { ...base, op: "call", target: node.target };
    case "enter":
      return { ...base, op: "enter", scope: node.scope, params: node.params.slice() };
    case "exit":
      return { ...base, op: "exit", scope: node.scope };
    case "invoke":
      return { ...base, op: "invoke", target: node.target };
    case "getitem":
      return { ...base, op: "getitem", index: node.index };
    case "subgraph":
      return { ...base, op: "subgraph", target: node.target };
    case "region":
      return { ...base, op: "region", scope: node.scope, params: node.params.slice() };
  }
}

/** Child graph name an instruction refers to, if any. */
export function childTarget(node: Instruction): string | undefined {
  return node.op === "invoke" || node.op === "subgraph" ? node.target : undefined;
}
