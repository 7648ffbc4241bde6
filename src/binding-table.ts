import type { NodeId } from "./types";

/**
 * The parts of the composition tree a binding table walks.
 */
export interface TreeView {
	getParent(nodeId: NodeId): NodeId | null;
	getChildren(nodeId: NodeId): readonly NodeId[];
}

/**
 * Values owned by nodes and inherited by their descendants.
 *
 * Every node resolves to the value of its nearest owning ancestor (itself
 * included). Resolutions are cached per node and recomputed only for the
 * subtree a change can reach: propagation stops at descendants that own a
 * value of their own.
 */
export default class BindingTable<V> {
	private own: Map<NodeId, V> = new Map();
	/** node -> owning node */
	private resolved: Map<NodeId, NodeId> = new Map();

	constructor(private readonly tree: TreeView) {}

	attach(nodeId: NodeId, value: V): void {
		this.own.set(nodeId, value);
		this.propagate(nodeId, nodeId);
	}

	/**
	 * Drop a node's own value; its subtree falls back to the nearest ancestor's.
	 * @returns true if the node owned a value
	 */
	detach(nodeId: NodeId): boolean {
		if (!this.own.delete(nodeId)) return false;
		this.propagate(nodeId, this.ownerAbove(nodeId));
		return true;
	}

	/**
	 * Refresh a node's subtree after it was spawned under, or moved to, a new parent.
	 */
	inherit(nodeId: NodeId): void {
		if (this.own.has(nodeId)) return;
		this.propagate(nodeId, this.ownerAbove(nodeId));
	}

	/**
	 * Remove every trace of a node. Only valid once its subtree is gone as well.
	 */
	forget(nodeId: NodeId): void {
		this.own.delete(nodeId);
		this.resolved.delete(nodeId);
	}

	getOwn(nodeId: NodeId): V | undefined {
		return this.own.get(nodeId);
	}

	resolve(nodeId: NodeId): V | undefined {
		const owner = this.resolved.get(nodeId);
		return owner === undefined ? undefined : this.own.get(owner);
	}

	/**
	 * The node whose value `nodeId` resolves to, or null if none.
	 */
	resolveOwner(nodeId: NodeId): NodeId | null {
		return this.resolved.get(nodeId) ?? null;
	}

	private ownerAbove(nodeId: NodeId): NodeId | null {
		const parent = this.tree.getParent(nodeId);
		return parent === null ? null : this.resolveOwner(parent);
	}

	private propagate(start: NodeId, owner: NodeId | null): void {
		const stack = [start];

		while (stack.length > 0) {
			const current = stack.pop();
			if (current === undefined) break;
			if (current !== start && this.own.has(current)) continue;

			if (owner === null) {
				this.resolved.delete(current);
			} else {
				this.resolved.set(current, owner);
			}

			stack.push(...this.tree.getChildren(current));
		}
	}
}
