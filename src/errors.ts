import type { NodeId } from "./types";

export type AnimationErrorKind =
	| 'FieldMissing'
	| 'MissingStartValue'
	| 'TraversalError'
	| 'UnsupportedTraversal';

/**
 * Base class for every error the engine raises on its own.
 * `kind` decides how the animator routes it (see `Animator.update`).
 */
export class AnimationError extends Error {
	readonly kind: AnimationErrorKind;

	constructor(kind: AnimationErrorKind, message: string) {
		super(message);
		this.name = new.target.name;
		this.kind = kind;
	}
}

/**
 * The lens target lacks the expected field, or the field does not hold a
 * value of the lens's type. Also raised when a track has no lens or target.
 */
export class FieldMissingError extends AnimationError {
	constructor(message: string) {
		super('FieldMissing', message);
	}
}

export class MissingStartValueError extends AnimationError {
	readonly node: NodeId;

	constructor(node: NodeId, valueType: string) {
		super(
			'MissingStartValue',
			`Node ${node} has no start value for '${valueType}': no prior keyframe, lens or target to sample`
		);
		this.node = node;
	}
}

/**
 * A node referenced mid-stage no longer exists. Treated as already removed.
 */
export class TraversalError extends AnimationError {
	readonly node: NodeId;

	constructor(node: NodeId) {
		super('TraversalError', `Node ${node} does not exist`);
		this.node = node;
	}
}

export class UnsupportedTraversalError extends AnimationError {
	readonly playhead: NodeId;

	constructor(playhead: NodeId, parallelNode: NodeId) {
		super(
			'UnsupportedTraversal',
			`Backward playback of playhead ${playhead} crosses parallel node ${parallelNode}, which is not supported`
		);
		this.playhead = playhead;
	}
}

export function isAnimationError(error: unknown): error is AnimationError {
	return error instanceof AnimationError;
}
