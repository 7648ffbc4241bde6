import type { AnimationError } from "./errors";

export type NodeId = number;

/**
 * How a node's children share time.
 * Composition only matters for nodes with children: a childless node is
 * always traversed as a leaf.
 */
export type CompositionKind = 'sequence' | 'parallel' | 'leaf';

/**
 * What happens to a node once it completes.
 * - `preserve`: nothing
 * - `remove`: strip the node's animation behavior, keep it as a timing spacer
 * - `despawn`: remove the node and its subtree
 */
export type CompletionPolicy = 'preserve' | 'remove' | 'despawn';

/**
 * A local time window, in seconds, within `[0, duration]` of a leaf.
 * Forward movements have `start <= end`; backward movements have `start > end`.
 */
export interface PlayheadMove {
	start: number;
	end: number;
}

/**
 * One leaf's movement within a tick, tagged with the stage it runs in.
 */
export interface PlayheadStep {
	stage: number;
	playhead: NodeId;
	node: NodeId;
	movement: PlayheadMove;
	/** The playhead started its sequence with this step */
	started: boolean;
	/** The playhead completed its sequence with this step */
	ended: boolean;
}

export interface EventHandler<T> {
	callback(data: T): void;
	once: boolean;
}

/**
 * Signals published on the animator's event bus.
 */
export interface AnimationEvents {
	sequenceStarted: { playhead: NodeId };
	sequenceCompleted: { playhead: NodeId };
	movementApplied: {
		node: NodeId;
		playhead: NodeId;
		start: number;
		end: number;
		stage: number;
	};
	animationError: { node: NodeId; error: AnimationError };
}
