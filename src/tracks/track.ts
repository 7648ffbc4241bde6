import type Animator from "../animator";
import type { AnimationNode } from "../node-manager";
import type { NodeId, PlayheadMove } from "../types";
import type { ValueType } from "../value-types";

export interface TrackContext {
	animator: Animator;
	node: AnimationNode;
	playhead: NodeId;
	movement: PlayheadMove;
}

/**
 * Per-node evaluator turning a movement into a field write.
 */
export interface Track {
	readonly valueType: ValueType<unknown>;
	evaluate(context: TrackContext): void;
	/**
	 * The absolute value this track animates towards, if it is a keyframe of
	 * `type`. Used to chain keyframes: a keyframe starts where the previous
	 * one on the same field ended.
	 */
	keyframeValue<T>(type: ValueType<T>): T | undefined;
	/** Forget any state captured during playback */
	reset(): void;
}

/**
 * Builds a fresh track instance for each node it is attached to.
 */
export type TrackFactory = () => Track;
