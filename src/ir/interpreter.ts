/**
 * Reference interpreter.
 *
 * Evaluates a graph against an operator table. Scope markers and region
 * nodes drive a shared scope stack that operators can observe, so a graph
 * and its rewritten form can be compared value for value.
 */

import { InterpreterError } from "../errors";
import type { Graph } from "./graph";
import type { Arg, Constant, NodeId } from "./instruction";

export type RuntimeValue = number | boolean | string | null | RuntimeValue[];

export type ScopeFrame = {
  scope: string;
  params: Constant[];
  token: number;
};

export type OperatorContext = {
  /** Active scopes, outermost first. */
  scopes: readonly ScopeFrame[];
};

export type Operator = (args: RuntimeValue[], ctx: OperatorContext) => RuntimeValue;

export type InterpreterOptions = {
  operators: Record<string, Operator>;
};

type InterpreterState = {
  operators: Record<string, Operator>;
  scopes: ScopeFrame[];
  nextToken: number;
};

/** Innermost active frame of `scope`, if any. */
export function activeScope(
  ctx: OperatorContext,
  scope: string,
): ScopeFrame | undefined {
  for (let i = ctx.scopes.length - 1; i >= 0; i--) {
    if (ctx.scopes[i].scope === scope) return ctx.scopes[i];
  }
  return undefined;
}

export function interpretGraph(
  graph: Graph,
  inputs: RuntimeValue[],
  options: InterpreterOptions,
): RuntimeValue {
  const state: InterpreterState = {
    operators: options.operators,
    scopes: [],
    nextToken: 1,
  };
  const result = run(graph, inputs, state);
  if (state.scopes.length > 0) {
    throw new InterpreterError(
      `graph finished with ${state.scopes.length} open scope(s)`,
    );
  }
  return result;
}

function run(graph: Graph, inputs: RuntimeValue[], state: InterpreterState): RuntimeValue {
  const env = new Map<NodeId, RuntimeValue>();
  let nextInput = 0;

  const evaluate = (arg: Arg): RuntimeValue => {
    switch (arg.kind) {
      case "ref": {
        if (!env.has(arg.id)) {
          throw new InterpreterError(`value ${arg.id} read before it was computed`);
        }
        return env.get(arg.id) ?? null;
      }
      case "const":
        return arg.value;
      case "tuple":
        return arg.items.map(evaluate);
    }
  };

  for (const node of graph.nodes()) {
    switch (node.op) {
      case "input": {
        if (nextInput >= inputs.length) {
          throw new InterpreterError(`missing value for input ${node.name}`);
        }
        env.set(node.id, inputs[nextInput++]);
        break;
      }
      case "call": {
        const op = state.operators[node.target];
        if (!op) {
          throw new InterpreterError(`unknown operator ${node.target}`);
        }
        env.set(node.id, op(node.args.map(evaluate), { scopes: state.scopes.slice() }));
        break;
      }
      case "enter": {
        const token = state.nextToken++;
        state.scopes.push({ scope: node.scope, params: node.params.slice(), token });
        env.set(node.id, token);
        break;
      }
      case "exit": {
        const frame = state.scopes.pop();
        const token = node.args.length > 0 ? evaluate(node.args[0]) : null;
        if (!frame || frame.token !== token || frame.scope !== node.scope) {
          throw new InterpreterError(`${node.name} does not close the innermost scope`);
        }
        env.set(node.id, null);
        break;
      }
      case "invoke":
        env.set(node.id, run(graph.requireChild(node.target), node.args.map(evaluate), state));
        break;
      case "getitem": {
        const source = evaluate(node.args[0]);
        if (!Array.isArray(source) || node.index >= source.length) {
          throw new InterpreterError(`${node.name}: no result at index ${node.index}`);
        }
        env.set(node.id, source[node.index]);
        break;
      }
      case "subgraph":
        env.set(node.id, node.target);
        break;
      case "region": {
        const [body, ...args] = node.args.map(evaluate);
        if (typeof body !== "string") {
          throw new InterpreterError(`${node.name}: first argument is not a subgraph`);
        }
        const token = state.nextToken++;
        state.scopes.push({ scope: node.scope, params: node.params.slice(), token });
        const value = run(graph.requireChild(body), args, state);
        const frame = state.scopes.pop();
        if (frame?.token !== token) {
          throw new InterpreterError(`${node.name}: body left its scope stack unbalanced`);
        }
        env.set(node.id, value);
        break;
      }
      case "output":
        return node.args.length > 0 ? evaluate(node.args[0]) : null;
    }
  }
  return null;
}
