import type { NodeId } from "./types";

/**
 * Ordered parent-child relationships between animation nodes.
 * Child order is significant: it is the playback order of a sequence.
 */
export default class HierarchyManager {
	/** childId -> parentId */
	private parentMap: Map<NodeId, NodeId> = new Map();
	/** parentId -> ordered childIds */
	private childrenMap: Map<NodeId, NodeId[]> = new Map();

	/**
	 * Insert `childId` among the children of `parentId` at `index` (appended
	 * by default), detaching it from any previous parent.
	 * @throws Error if this would create a circular reference or self-parenting
	 */
	setParent(childId: NodeId, parentId: NodeId, index?: number): this {
		if (childId === parentId) {
			throw new Error(`Cannot set node ${childId} as its own parent`);
		}

		if (this.wouldCreateCycle(childId, parentId)) {
			throw new Error('Cannot set parent: would create circular reference');
		}

		this.detachFromParent(childId);
		this.parentMap.set(childId, parentId);

		const children = this.childrenMap.get(parentId);
		if (!children) {
			this.childrenMap.set(parentId, [childId]);
		} else if (index === undefined || index >= children.length) {
			children.push(childId);
		} else {
			children.splice(Math.max(index, 0), 0, childId);
		}

		return this;
	}

	getParent(nodeId: NodeId): NodeId | null {
		return this.parentMap.get(nodeId) ?? null;
	}

	/**
	 * Children of a node, in playback order.
	 */
	getChildren(parentId: NodeId): readonly NodeId[] {
		const children = this.childrenMap.get(parentId);
		return children ? [...children] : [];
	}

	getChildCount(parentId: NodeId): number {
		return this.childrenMap.get(parentId)?.length ?? 0;
	}

	getChildIndex(parentId: NodeId, childId: NodeId): number {
		const children = this.childrenMap.get(parentId);
		if (!children) return -1;
		return children.indexOf(childId);
	}

	/**
	 * Forget a node. Its children become roots; callers removing a whole
	 * subtree remove descendants first.
	 * @returns The former parent and the children that were orphaned
	 */
	removeNode(nodeId: NodeId): { oldParent: NodeId | null; orphanedChildren: NodeId[] } {
		const oldParent = this.parentMap.get(nodeId) ?? null;
		this.detachFromParent(nodeId);
		this.parentMap.delete(nodeId);

		const orphanedChildren = this.childrenMap.get(nodeId) ?? [];
		for (const childId of orphanedChildren) {
			this.parentMap.delete(childId);
		}
		this.childrenMap.delete(nodeId);

		return { oldParent, orphanedChildren };
	}

	/**
	 * Descendants in depth-first pre-order (tree order).
	 */
	getDescendants(nodeId: NodeId): readonly NodeId[] {
		const descendants: NodeId[] = [];
		const stack = [...(this.childrenMap.get(nodeId) ?? [])].reverse();

		while (stack.length > 0) {
			const current = stack.pop();
			if (current === undefined) break;
			descendants.push(current);
			const children = this.childrenMap.get(current);
			if (children) {
				for (let i = children.length - 1; i >= 0; i--) {
					const child = children[i];
					if (child !== undefined) stack.push(child);
				}
			}
		}

		return descendants;
	}

	/**
	 * Childless nodes of the subtree rooted at `nodeId`, in tree order.
	 * A childless root is its own single leaf.
	 */
	getLeaves(nodeId: NodeId): readonly NodeId[] {
		if (this.getChildCount(nodeId) === 0) return [nodeId];
		return this.getDescendants(nodeId).filter((id) => this.getChildCount(id) === 0);
	}

	/**
	 * Topmost ancestor, or the node itself if it has no parent.
	 */
	getRoot(nodeId: NodeId): NodeId {
		let current = nodeId;
		let parent = this.parentMap.get(current);
		while (parent !== undefined) {
			current = parent;
			parent = this.parentMap.get(current);
		}
		return current;
	}

	private detachFromParent(childId: NodeId): void {
		const parentId = this.parentMap.get(childId);
		if (parentId === undefined) return;

		const siblings = this.childrenMap.get(parentId);
		if (!siblings) return;

		const idx = siblings.indexOf(childId);
		if (idx !== -1) {
			siblings.splice(idx, 1);
		}
		if (siblings.length === 0) {
			this.childrenMap.delete(parentId);
		}
	}

	/**
	 * A cycle would occur if the prospective parent is a descendant of the child.
	 */
	private wouldCreateCycle(childId: NodeId, parentId: NodeId): boolean {
		let current: NodeId | undefined = parentId;
		while (current !== undefined) {
			if (current === childId) {
				return true;
			}
			current = this.parentMap.get(current);
		}
		return false;
	}
}
