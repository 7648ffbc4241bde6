import type Animator from "../animator";
import type { NodeId } from "../types";

export interface CallbackContext {
	animator: Animator;
	node: NodeId;
	playhead: NodeId;
}

/**
 * One-shot action run when a playhead carries its node to completion.
 */
export type NodeCallback = (context: CallbackContext) => void;

/**
 * Event published on the animator's event bus when its node completes.
 */
export interface NodeEvent {
	name: string;
	data?: unknown;
}

/**
 * Run a node's completion action and publish its event.
 * Both fire once per crossing of the node's end, in that order.
 */
export function dispatchCompletion(animator: Animator, node: NodeId, playhead: NodeId): void {
	const record = animator.getNode(node);
	if (!record) return;

	const { callback, event } = record;
	if (callback) {
		callback({ animator, node, playhead });
	}
	if (event) {
		animator.eventBus.publish(event.name, event.data);
	}
}
