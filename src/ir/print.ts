import type { Graph } from "./graph";
import type { Arg, Constant, Instruction } from "./instruction";

function formatConstant(value: Constant): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

function formatArg(graph: Graph, arg: Arg): string {
  switch (arg.kind) {
    case "ref": {
      const node = graph.tryGet(arg.id);
      return node ? `%${node.name}` : `%<missing ${arg.id}>`;
    }
    case "const":
      return formatConstant(arg.value);
    case "tuple":
      return arg.items.length === 1
        ? `(${formatArg(graph, arg.items[0])},)`
        : `(${arg.items.map((item) => formatArg(graph, item)).join(", ")})`;
  }
}

function formatArgs(graph: Graph, args: readonly Arg[]): string {
  return args.map((arg) => formatArg(graph, arg)).join(", ");
}

export function formatInstruction(graph: Graph, node: Instruction): string {
  const lhs = `%${node.name} = `;
  switch (node.op) {
    case "input":
      return `${lhs}input`;
    case "call":
      return `${lhs}call ${node.target}(${formatArgs(graph, node.args)})`;
    case "enter":
      return `${lhs}enter[${node.scope}](${node.params.map(formatConstant).join(", ")})`;
    case "exit":
      return `${lhs}exit[${node.scope}](${formatArgs(graph, node.args)})`;
    case "invoke":
      return `${lhs}invoke ${node.target}(${formatArgs(graph, node.args)})`;
    case "getitem":
      return `${lhs}getitem(${formatArgs(graph, node.args)}, ${node.index})`;
    case "subgraph":
      return `${lhs}subgraph ${node.target}`;
    case "region":
      return `${lhs}region[${node.scope}]{${node.params.map(formatConstant).join(", ")}}(${formatArgs(graph, node.args)})`;
    case "output":
      return node.args.length === 0 ? "return" : `return ${formatArgs(graph, node.args)}`;
  }
}

/** One line per instruction of `graph`, children excluded. */
export function printNodes(graph: Graph): string[] {
  return graph.nodes().map((node) => formatInstruction(graph, node));
}

/** Readable listing of `graph` followed by its children, indented. */
export function printGraph(graph: Graph, indent = ""): string {
  const lines = printNodes(graph).map((line) => `${indent}${line}`);
  for (const name of graph.childNames()) {
    lines.push(`${indent}${name}:`);
    lines.push(printGraph(graph.requireChild(name), `${indent}  `));
  }
  return lines.join("\n");
}
