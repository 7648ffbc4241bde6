import HierarchyManager from "./hierarchy-manager";
import type { Curve } from "./curves";
import type { CompletionPolicy, CompositionKind, NodeId, PlayheadMove } from "./types";
import type { Track } from "./tracks/track";
import type { NodeCallback, NodeEvent } from "./tracks/callback";

/**
 * One node of a composition tree.
 */
export interface AnimationNode {
	readonly id: NodeId;
	composition: CompositionKind;
	/** Own duration in seconds, used only while the node is a leaf */
	duration: number;
	curve: Curve | null;
	completion: CompletionPolicy;
	tracks: Track[];
	callback: NodeCallback | null;
	event: NodeEvent | null;
	/** Movement applied to this node in the most recent stage that reached it */
	movement: PlayheadMove | null;
}

export interface CreateNodeOptions {
	composition?: CompositionKind;
	duration?: number;
	curve?: Curve | null;
	completion?: CompletionPolicy;
}

/**
 * The read-only view of a composition tree the playhead tracer needs.
 */
export interface TimelineSource {
	getChildren(nodeId: NodeId): readonly NodeId[];
	getComposition(nodeId: NodeId): CompositionKind;
	/** Traversal duration of the whole subtree */
	getDuration(nodeId: NodeId): number;
}

export default
class NodeManager implements TimelineSource {
	private nextId: number = 1;
	private nodes: Map<NodeId, AnimationNode> = new Map();
	private roots: Set<NodeId> = new Set();
	private hierarchyManager: HierarchyManager = new HierarchyManager();

	get nodeCount(): number {
		return this.nodes.size;
	}

	createNode(options: CreateNodeOptions = {}): AnimationNode {
		const {
			composition = 'sequence',
			duration = 0,
			curve = null,
			completion = 'preserve',
		} = options;

		if (!Number.isFinite(duration) || duration < 0) {
			throw new Error(`Node duration must be a non-negative number of seconds, got ${duration}`);
		}

		const node: AnimationNode = {
			id: this.nextId++,
			composition,
			duration,
			curve,
			completion,
			tracks: [],
			callback: null,
			event: null,
			movement: null,
		};
		this.nodes.set(node.id, node);
		this.roots.add(node.id);
		return node;
	}

	getNode(nodeId: NodeId): AnimationNode | undefined {
		return this.nodes.get(nodeId);
	}

	hasNode(nodeId: NodeId): boolean {
		return this.nodes.has(nodeId);
	}

	/**
	 * Parentless nodes, in creation order.
	 */
	getRoots(): readonly NodeId[] {
		return [...this.roots];
	}

	/**
	 * Attach a node under `parentId`, at `index` or after the last child.
	 */
	setParent(childId: NodeId, parentId: NodeId, index?: number): void {
		if (!this.nodes.has(childId)) throw new Error(`Cannot set parent: node ${childId} does not exist`);
		if (!this.nodes.has(parentId)) throw new Error(`Cannot set parent: node ${parentId} does not exist`);
		this.hierarchyManager.setParent(childId, parentId, index);
		this.roots.delete(childId);
	}

	/**
	 * Remove a node and its whole subtree.
	 * @returns The removed ids, descendants before the node itself
	 */
	removeNode(nodeId: NodeId): NodeId[] {
		if (!this.nodes.has(nodeId)) return [];

		const removed = [...this.hierarchyManager.getDescendants(nodeId)].reverse();
		removed.push(nodeId);

		for (const id of removed) {
			this.hierarchyManager.removeNode(id);
			this.nodes.delete(id);
			this.roots.delete(id);
		}

		return removed;
	}

	getParent(nodeId: NodeId): NodeId | null {
		return this.hierarchyManager.getParent(nodeId);
	}

	getChildren(nodeId: NodeId): readonly NodeId[] {
		return this.hierarchyManager.getChildren(nodeId);
	}

	getRoot(nodeId: NodeId): NodeId {
		return this.hierarchyManager.getRoot(nodeId);
	}

	/**
	 * Position of a child among its parent's children, or -1.
	 */
	getChildIndex(parentId: NodeId, childId: NodeId): number {
		return this.hierarchyManager.getChildIndex(parentId, childId);
	}

	getDescendants(nodeId: NodeId): readonly NodeId[] {
		return this.hierarchyManager.getDescendants(nodeId);
	}

	getLeaves(nodeId: NodeId): readonly NodeId[] {
		if (!this.nodes.has(nodeId)) return [];
		return this.hierarchyManager.getLeaves(nodeId);
	}

	getComposition(nodeId: NodeId): CompositionKind {
		return this.nodes.get(nodeId)?.composition ?? 'leaf';
	}

	/**
	 * Traversal duration: a leaf's own duration, the sum over a sequence's
	 * children, the max over a parallel's.
	 */
	getDuration(nodeId: NodeId): number {
		if (!this.nodes.has(nodeId)) return 0;

		// Pre-order reversed visits every child before its parent
		const order = [nodeId, ...this.hierarchyManager.getDescendants(nodeId)].reverse();
		const durations = new Map<NodeId, number>();

		for (const id of order) {
			const children = this.hierarchyManager.getChildren(id);
			if (children.length === 0) {
				durations.set(id, this.nodes.get(id)?.duration ?? 0);
				continue;
			}

			const parallel = this.getComposition(id) === 'parallel';
			let total = 0;
			for (const child of children) {
				const childDuration = durations.get(child) ?? 0;
				total = parallel ? Math.max(total, childDuration) : total + childDuration;
			}
			durations.set(id, total);
		}

		return durations.get(nodeId) ?? 0;
	}
}
