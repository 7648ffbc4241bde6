import type Animator from "../animator";
import { sampleCurve } from "../curves";
import { FieldMissingError, MissingStartValueError } from "../errors";
import type { FieldLens } from "../lens";
import type { AnimationNode } from "../node-manager";
import type { PlayheadMove } from "../types";
import type { ValueType } from "../value-types";
import type { Track, TrackContext, TrackFactory } from "./track";

type StartValue<T> =
	| { status: 'noStartValue' }
	| { status: 'hasStartValue'; value: T };

/**
 * Resolve the lens and target a node writes through.
 * @throws FieldMissingError if either is missing
 */
export function bindingFor<T>(
	animator: Animator,
	node: AnimationNode,
	type: ValueType<T>,
): { lens: FieldLens<T>; target: object } {
	const lens = animator.resolveLens(node.id, type);
	if (!lens) {
		throw new FieldMissingError(`Node ${node.id} has no ${type.name} lens`);
	}
	const target = animator.resolveTarget(node.id);
	if (!target) {
		throw new FieldMissingError(`Node ${node.id} has no target`);
	}
	return { lens, target };
}

/**
 * Absolute animation towards `value`, starting from wherever the field was
 * when the node was first reached.
 */
export class KeyframeTrack<T> implements Track {
	private start: StartValue<T> = { status: 'noStartValue' };

	constructor(
		readonly valueType: ValueType<T>,
		readonly value: T,
	) {}

	get hasStartValue(): boolean {
		return this.start.status === 'hasStartValue';
	}

	evaluate({ animator, node, movement }: TrackContext): void {
		if (this.start.status === 'noStartValue') {
			animator.commands.queue((current) => this.fetchStartValue(current, node, movement), node.id);
			return;
		}
		this.apply(animator, node, movement, this.start.value);
	}

	keyframeValue<U>(type: ValueType<U>): U | undefined {
		const own: ValueType<unknown> = this.valueType;
		if (type !== own) return undefined;
		const value = this.value;
		return type.is(value) ? value : undefined;
	}

	reset(): void {
		this.start = { status: 'noStartValue' };
	}

	private apply(animator: Animator, node: AnimationNode, movement: PlayheadMove, start: T): void {
		const { lens, target } = bindingFor(animator, node, this.valueType);
		const t = sampleCurve(node.curve, node.duration === 0 ? 1 : movement.end / node.duration);
		lens.set(target, this.valueType.lerp(start, this.value, t));
	}

	/**
	 * Capture the start value, then evaluate again. Runs from the command
	 * buffer, after every track of the stage has been evaluated.
	 */
	private fetchStartValue(animator: Animator, node: AnimationNode, movement: PlayheadMove): void {
		if (!animator.hasNode(node.id)) return;

		if (this.start.status === 'noStartValue') {
			const value = this.priorKeyframe(animator, node) ?? this.liveValue(animator, node);
			if (value !== undefined) {
				this.start = { status: 'hasStartValue', value };
			}
		}

		if (this.start.status === 'noStartValue') {
			throw new MissingStartValueError(node.id, this.valueType.name);
		}
		this.apply(animator, node, movement, this.start.value);
	}

	/**
	 * Value of the last keyframe of the same type, before this node in tree
	 * order, that writes to the same field of the same target.
	 */
	private priorKeyframe(animator: Animator, node: AnimationNode): T | undefined {
		const lens = animator.resolveLens(node.id, this.valueType);
		const target = animator.resolveTarget(node.id);
		if (!lens || !target) return undefined;

		let found: T | undefined;
		for (const leaf of animator.getLeaves(animator.getRoot(node.id))) {
			if (leaf === node.id) break;
			if (animator.resolveLens(leaf, this.valueType) !== lens) continue;
			if (animator.resolveTarget(leaf) !== target) continue;

			for (const track of animator.getNode(leaf)?.tracks ?? []) {
				const value = track.keyframeValue(this.valueType);
				if (value !== undefined) found = value;
			}
		}
		return found;
	}

	private liveValue(animator: Animator, node: AnimationNode): T | undefined {
		const lens = animator.resolveLens(node.id, this.valueType);
		const target = animator.resolveTarget(node.id);
		if (!lens || !target) return undefined;
		return lens.get(target);
	}
}

/**
 * Animate a field to `value`.
 *
 * @example
 * ```typescript
 * animator.spawn({ duration: 0.5, tracks: [keyframe(vec3Type, vec3(10, 0, 0))] });
 * ```
 */
export function keyframe<T>(type: ValueType<T>, value: T): TrackFactory {
	return () => new KeyframeTrack(type, value);
}
