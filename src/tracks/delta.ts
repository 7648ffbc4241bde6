import { sampleCurve } from "../curves";
import type { ValueType } from "../value-types";
import { bindingFor } from "./keyframe";
import type { Track, TrackContext, TrackFactory } from "./track";

/**
 * Additive animation: over the node's duration the field gains `delta` in
 * total, on top of whatever else writes to it. Stateless, so any window can
 * be applied in either direction.
 */
export class DeltaTrack<T> implements Track {
	constructor(
		readonly valueType: ValueType<T>,
		readonly delta: T,
	) {}

	evaluate({ animator, node, movement }: TrackContext): void {
		if (movement.start === movement.end) return;

		const type = this.valueType;
		const { lens, target } = bindingFor(animator, node, type);
		const from = sampleCurve(node.curve, movement.start / node.duration);
		const to = sampleCurve(node.curve, movement.end / node.duration);

		const identity = type.identity();
		const applied = type.difference(
			type.lerp(identity, this.delta, to),
			type.lerp(identity, this.delta, from),
		);
		lens.set(target, type.accumulate(lens.get(target), applied));
	}

	keyframeValue(): undefined {
		return undefined;
	}

	reset(): void {}
}

/**
 * Add `delta` to a field over the node's duration.
 */
export function delta<T>(type: ValueType<T>, value: T): TrackFactory {
	return () => new DeltaTrack(type, value);
}
