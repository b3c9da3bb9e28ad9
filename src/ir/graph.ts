import { GraphMutationError } from "../errors";
import {
  type Arg,
  childTarget,
  copyInstruction,
  type Instruction,
  mapRefs,
  type NodeId,
  type NodeMeta,
  type OutputNode,
  type Placement,
  refsOf,
} from "./instruction";

/**
 * Fired once per affected user when a node's uses are redirected or the node
 * is renamed. `newName` is null when uses are replaced by a non-node value.
 */
export type ReplaceEvent = {
  oldName: string;
  newName: string | null;
  user: Instruction;
};

export type ReplaceHook = (event: ReplaceEvent) => void;

/**
 * An ordered arena of instructions plus the named child graphs its
 * `invoke` and `subgraph` instructions refer to.
 */
export class Graph {
  private readonly byId = new Map<NodeId, Instruction>();
  private readonly byName = new Map<string, NodeId>();
  private readonly children = new Map<string, Graph>();
  private readonly replaceHooks = new Set<ReplaceHook>();
  private order: NodeId[] = [];
  private nextId = 1;

  get size(): number {
    return this.order.length;
  }

  /** Snapshot of the instructions in program order. */
  nodes(): Instruction[] {
    return this.order.map((id) => this.get(id));
  }

  has(id: NodeId): boolean {
    return this.byId.has(id);
  }

  get(id: NodeId): Instruction {
    const node = this.byId.get(id);
    if (!node) {
      throw new GraphMutationError(`unknown node id ${id}`);
    }
    return node;
  }

  tryGet(id: NodeId): Instruction | undefined {
    return this.byId.get(id);
  }

  findByName(name: string): Instruction | undefined {
    const id = this.byName.get(name);
    return id === undefined ? undefined : this.byId.get(id);
  }

  /** Position of `id` in program order, or -1. */
  indexOf(id: NodeId): number {
    return this.order.indexOf(id);
  }

  output(): OutputNode | undefined {
    for (let i = this.order.length - 1; i >= 0; i--) {
      const node = this.get(this.order[i]);
      if (node.op === "output") return node;
    }
    return undefined;
  }

  /**
   * Add an instruction built by `build` under a unique name derived from
   * `nameCandidate`, appended or placed before `before`.
   */
  insert<T extends Instruction>(
    nameCandidate: string,
    build: (at: Placement) => T,
    before?: NodeId,
  ): T {
    const at: Placement = { id: this.nextId++, name: this.uniqueName(nameCandidate) };
    const node = build(at);
    if (node.id !== at.id || node.name !== at.name) {
      throw new GraphMutationError(`instruction must keep its placement (${at.name})`);
    }
    if (before === undefined) {
      this.order.push(node.id);
    } else {
      const index = this.indexOf(before);
      if (index < 0) {
        throw new GraphMutationError(`cannot insert before unknown node id ${before}`);
      }
      this.order.splice(index, 0, node.id);
    }
    this.byId.set(node.id, node);
    this.byName.set(node.name, node.id);
    return node;
  }

  /** Copy `node` (from any graph) into this graph with new arguments. */
  insertCopy(node: Instruction, args: Arg[], before?: NodeId): Instruction {
    return this.insert(node.name, (at) => copyInstruction(node, at, args), before);
  }

  erase(id: NodeId): void {
    const node = this.get(id);
    const users = this.users(id);
    if (users.length > 0) {
      throw new GraphMutationError(
        `cannot erase ${node.name}: still used by ${users.map((u) => u.name).join(", ")}`,
      );
    }
    this.order = this.order.filter((other) => other !== id);
    this.byId.delete(id);
    this.byName.delete(node.name);
  }

  /** Instructions whose arguments reference `id`, in program order. */
  users(id: NodeId): Instruction[] {
    return this.nodes().filter((node) => refsOf(node.args).includes(id));
  }

  /**
   * Redirect every use of `oldId` to `replacement`. Returns the affected users.
   */
  replaceAllUsesWith(oldId: NodeId, replacement: Arg): Instruction[] {
    const old = this.get(oldId);
    const newName =
      replacement.kind === "ref" ? this.get(replacement.id).name : null;
    const users = this.users(oldId);
    for (const user of users) {
      this.fireReplace({ oldName: old.name, newName, user });
      user.args = mapRefs(user.args, (id) =>
        id === oldId ? replacement : { kind: "ref", id },
      );
    }
    return users;
  }

  /** Rename `id` to a unique name derived from `candidate`. */
  rename(id: NodeId, candidate: string): string {
    const node = this.get(id);
    if (node.name === candidate) return candidate;
    this.byName.delete(node.name);
    const name = this.uniqueName(candidate);
    for (const user of this.users(id)) {
      this.fireReplace({ oldName: node.name, newName: name, user });
    }
    node.name = name;
    this.byName.set(name, id);
    return name;
  }

  setArgs(id: NodeId, args: Arg[]): void {
    this.get(id).args = args;
  }

  setMeta(id: NodeId, meta: NodeMeta): void {
    this.get(id).meta = meta;
  }

  uniqueName(candidate: string): string {
    const base = sanitizeName(candidate);
    if (!this.byName.has(base)) return base;
    let suffix = 1;
    while (this.byName.has(`${base}_${suffix}`)) suffix++;
    return `${base}_${suffix}`;
  }

  // ==========================================================================
  // Child graphs
  // ==========================================================================

  getChild(name: string): Graph | undefined {
    return this.children.get(name);
  }

  requireChild(name: string): Graph {
    const child = this.children.get(name);
    if (!child) {
      throw new GraphMutationError(`no child graph named ${name}`);
    }
    return child;
  }

  setChild(name: string, child: Graph): void {
    this.children.set(name, child);
  }

  /**
   * Register `child` under `preferred`, or under a fresh name if another
   * graph already holds it. Returns the name used.
   */
  adoptChild(preferred: string, child: Graph): string {
    let name = preferred;
    let suffix = 1;
    while (this.children.has(name) && this.children.get(name) !== child) {
      name = `${preferred}_${suffix++}`;
    }
    this.children.set(name, child);
    return name;
  }

  childNames(): string[] {
    return Array.from(this.children.keys());
  }

  /** Drop children no instruction refers to. Returns the dropped names. */
  deleteUnusedChildren(): string[] {
    const used = new Set<string>();
    for (const node of this.nodes()) {
      const target = childTarget(node);
      if (target !== undefined) used.add(target);
    }
    const dropped = this.childNames().filter((name) => !used.has(name));
    for (const name of dropped) {
      this.children.delete(name);
    }
    return dropped;
  }

  // ==========================================================================
  // Hooks and copies
  // ==========================================================================

  /** Register a replace hook; the returned function removes it. */
  onReplace(hook: ReplaceHook): () => void {
    this.replaceHooks.add(hook);
    return () => {
      this.replaceHooks.delete(hook);
    };
  }

  /** Deep copy, children included. Node ids and names are preserved. */
  clone(): Graph {
    const copy = new Graph();
    for (const node of this.nodes()) {
      const placed = copyInstruction(
        node,
        { id: node.id, name: node.name },
        mapRefs(node.args, (id) => ({ kind: "ref", id })),
      );
      copy.order.push(placed.id);
      copy.byId.set(placed.id, placed);
      copy.byName.set(placed.name, placed.id);
    }
    copy.nextId = this.nextId;
    for (const [name, child] of this.children) {
      copy.children.set(name, child.clone());
    }
    return copy;
  }

  private fireReplace(event: ReplaceEvent): void {
    for (const hook of this.replaceHooks) {
      hook(event);
    }
  }
}

function sanitizeName(candidate: string): string {
  const cleaned = candidate.replace(/[^A-Za-z0-9_]/g, "_");
  if (cleaned.length === 0) return "_";
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}
