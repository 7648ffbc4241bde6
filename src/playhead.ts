import { UnsupportedTraversalError } from "./errors";
import type { TimelineSource } from "./node-manager";
import type { NodeId, PlayheadMove, PlayheadStep } from "./types";

/**
 * A position on a tree's timeline, in seconds from the start of its root.
 *
 * `position` is free to move; `previousPosition` marks where the last trace
 * left off and only moves through `advance()` or `jumpTo()`.
 */
export class Playhead {
	position: number;
	previousPosition: number;

	constructor(position = 0) {
		this.position = position;
		this.previousPosition = position;
	}

	/**
	 * Move the playhead. Every leaf between the old and new position is
	 * traced on the next update.
	 */
	set(position: number): void {
		this.position = position;
	}

	/**
	 * Move the playhead without tracing the leaves in between.
	 */
	jumpTo(position: number): void {
		this.position = position;
		this.previousPosition = position;
	}

	advance(): void {
		this.previousPosition = this.position;
	}
}

/**
 * A movement reaches the end of a leaf: it finishes at the leaf's duration
 * and started before it. Zero-length leaves complete whenever they are reached.
 */
export function crossesCompletion(movement: PlayheadMove, duration: number): boolean {
	return movement.end >= duration && (movement.start < duration || duration === 0);
}

function clamp(value: number, min: number, max: number): number {
	return value < min ? min : value > max ? max : value;
}

interface LeafSpan {
	node: NodeId;
	start: number;
	duration: number;
}

interface TraceFrame {
	node: NodeId;
	/** Global time this node starts at */
	time: number;
	/** Next child to visit */
	next: number;
	/** Global time the next sequence child starts at */
	timeCursor: number;
	stageIn: number;
	/** Stage the next sequence child starts in */
	stageCursor: number;
	/** Furthest stage reached by a parallel child */
	stageMax: number;
}

function createFrame(node: NodeId, time: number, stageIn: number): TraceFrame {
	return { node, time, next: 0, timeCursor: time, stageIn, stageCursor: stageIn, stageMax: stageIn };
}

function flagFirstAndLast(steps: PlayheadStep[], started: boolean, ended: boolean): PlayheadStep[] {
	const first = steps[0];
	const last = steps[steps.length - 1];
	if (first && started) first.started = true;
	if (last && ended) last.ended = true;
	return steps;
}

/**
 * Leaves of the subtree visited by a forward sweep from `from` to `to`,
 * each with its local window and stage.
 *
 * A leaf `[s, e]` participates when `from <= e` and `to >= s`; a zero-length
 * leaf also needs `from < s`, unless the sweep starts at 0. Inside a
 * sequence, a child starts in the stage after its previous participating
 * sibling; parallel children share their parent's first stage.
 */
export function traceForward(
	source: TimelineSource,
	playhead: NodeId,
	from: number,
	to: number,
): PlayheadStep[] {
	const steps: PlayheadStep[] = [];
	const stack: TraceFrame[] = [createFrame(playhead, 0, 0)];

	while (stack.length > 0) {
		const frame = stack[stack.length - 1];
		if (!frame) break;

		const children = source.getChildren(frame.node);
		const parallel = source.getComposition(frame.node) === 'parallel';
		let stageOut: number;

		if (children.length === 0) {
			const duration = source.getDuration(frame.node);
			// A zero-length leaf the previous sweep stopped on was already visited
			const participates = duration > 0
				? from <= frame.time + duration && to >= frame.time
				: (from < frame.time || from === 0) && to >= frame.time;
			if (participates) {
				steps.push({
					stage: frame.stageIn,
					playhead,
					node: frame.node,
					movement: {
						start: Math.max(from - frame.time, 0),
						end: Math.min(to - frame.time, duration),
					},
					started: false,
					ended: false,
				});
			}
			stageOut = participates ? frame.stageIn + 1 : frame.stageIn;
		} else if (frame.next < children.length) {
			const child = children[frame.next];
			frame.next++;
			if (child === undefined) continue;

			if (parallel) {
				stack.push(createFrame(child, frame.time, frame.stageIn));
			} else {
				stack.push(createFrame(child, frame.timeCursor, frame.stageCursor));
				frame.timeCursor += source.getDuration(child);
			}
			continue;
		} else {
			stageOut = parallel ? frame.stageMax : frame.stageCursor;
		}

		stack.pop();
		const parent = stack[stack.length - 1];
		if (parent) {
			parent.stageCursor = stageOut;
			parent.stageMax = Math.max(parent.stageMax, stageOut);
		}
	}

	// Stable: tree order is kept within a stage
	steps.sort((a, b) => a.stage - b.stage);

	return flagFirstAndLast(steps, from === 0, to >= source.getDuration(playhead));
}

/**
 * Leaves of a sequence-only subtree, in tree order, with their global start.
 * Parallel nodes with a single child are transparent.
 */
function collectSequenceLeaves(source: TimelineSource, playhead: NodeId): LeafSpan[] {
	const leaves: LeafSpan[] = [];
	const stack: Array<{ node: NodeId; time: number }> = [{ node: playhead, time: 0 }];

	while (stack.length > 0) {
		const entry = stack.pop();
		if (!entry) break;

		const children = source.getChildren(entry.node);
		if (children.length === 0) {
			leaves.push({ node: entry.node, start: entry.time, duration: source.getDuration(entry.node) });
			continue;
		}
		if (children.length > 1 && source.getComposition(entry.node) === 'parallel') {
			throw new UnsupportedTraversalError(playhead, entry.node);
		}

		const pending: Array<{ node: NodeId; time: number }> = [];
		let time = entry.time;
		for (const child of children) {
			pending.push({ node: child, time });
			time += source.getDuration(child);
		}
		// Reversed so the first child is popped first
		for (let i = pending.length - 1; i >= 0; i--) {
			const item = pending[i];
			if (item) stack.push(item);
		}
	}

	return leaves;
}

/**
 * Leaves visited by a backward sweep from `from` down to `to`, last leaf
 * first, one stage each. Movements run from the higher local offset to the
 * lower one.
 *
 * @throws UnsupportedTraversalError if the subtree holds a parallel node
 * with more than one child
 */
export function traceBackward(
	source: TimelineSource,
	playhead: NodeId,
	from: number,
	to: number,
): PlayheadStep[] {
	const leaves = collectSequenceLeaves(source, playhead);
	const steps: PlayheadStep[] = [];

	for (let i = leaves.length - 1; i >= 0; i--) {
		const leaf = leaves[i];
		if (!leaf) continue;

		const { start, duration } = leaf;
		const participates = duration > 0
			? from > start && to < start + duration
			: to <= start && start < from;
		if (!participates) continue;

		steps.push({
			stage: steps.length,
			playhead,
			node: leaf.node,
			movement: {
				start: clamp(from - start, 0, duration),
				end: clamp(to - start, 0, duration),
			},
			started: false,
			ended: false,
		});
	}

	return flagFirstAndLast(steps, from >= source.getDuration(playhead), to <= 0);
}

/**
 * Steps for a playhead that moved from `from` to `to` since the last trace.
 */
export function tracePlayhead(
	source: TimelineSource,
	playhead: NodeId,
	from: number,
	to: number,
): PlayheadStep[] {
	if (to > from) return traceForward(source, playhead, from, to);
	if (to < from) return traceBackward(source, playhead, from, to);
	return [];
}

/**
 * Steps of several playheads grouped by stage: stage k of every playhead
 * runs together.
 */
export class StagedSteps implements Iterable<PlayheadStep[]> {
	private stages: PlayheadStep[][] = [];

	add(steps: readonly PlayheadStep[]): void {
		for (const step of steps) {
			const stage = this.stages[step.stage];
			if (stage) {
				stage.push(step);
			} else {
				this.stages[step.stage] = [step];
			}
		}
	}

	get stageCount(): number {
		return this.stages.length;
	}

	*[Symbol.iterator](): Iterator<PlayheadStep[]> {
		for (const stage of this.stages) {
			if (stage) yield stage;
		}
	}
}
