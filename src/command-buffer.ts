import type Animator from './animator';
import type { NodeId } from './types';

export type Command = (animator: Animator) => void;

export interface CommandFailure {
	/** Node the command was queued for, if any */
	node: NodeId | null;
	error: unknown;
}

/**
 * CommandBuffer queues mutations to be executed between evaluation phases.
 * Tracks, callbacks and completion policies queue work here instead of
 * changing the tree while it is being traversed.
 *
 * Commands are executed in FIFO order when playback() is called.
 *
 * @example
 * ```typescript
 * // In a callback
 * animator.commands.despawn(nodeId);
 *
 * // Later (automatically at the end of each stage)
 * animator.commands.playback(animator);
 * ```
 */
export default class CommandBuffer {
	private commands: Array<{ node: NodeId | null; run: Command }> = [];

	/**
	 * Queue an arbitrary command
	 * @param command Runs during playback with the animator
	 * @param node The node the command acts for, reported with its failure
	 */
	queue(command: Command, node: NodeId | null = null): void {
		this.commands.push({ node, run: command });
	}

	/**
	 * Queue the removal of a node and its subtree
	 */
	despawn(node: NodeId): void {
		this.queue((animator) => {
			animator.despawn(node);
		}, node);
	}

	/**
	 * Queue stripping a node's animation behavior, keeping it as a timing spacer
	 */
	removeAnimation(node: NodeId): void {
		this.queue((animator) => {
			animator.removeAnimation(node);
		}, node);
	}

	/**
	 * Execute all queued commands in FIFO order, including commands queued by
	 * commands during playback. A failing command does not stop the others.
	 * @returns The failures, for the caller to route
	 */
	playback(animator: Animator): CommandFailure[] {
		const failures: CommandFailure[] = [];

		while (this.commands.length > 0) {
			const batch = this.commands;
			this.commands = [];

			for (const { node, run } of batch) {
				try {
					run(animator);
				} catch (error) {
					failures.push({ node, error });
				}
			}
		}

		return failures;
	}

	/**
	 * Clear all queued commands without executing them
	 */
	clear(): void {
		this.commands = [];
	}

	/**
	 * Get the number of queued commands
	 */
	get length(): number {
		return this.commands.length;
	}
}
