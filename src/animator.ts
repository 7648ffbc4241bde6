import BindingTable from "./binding-table";
import CommandBuffer from "./command-buffer";
import { createTimeDriver, type TimeDriver, type TimeDriverOptions } from "./driver";
import { TraversalError, isAnimationError, type AnimationError } from "./errors";
import EventBus from "./event-bus";
import { isLensOf, type FieldLens } from "./lens";
import NodeManager, { type AnimationNode } from "./node-manager";
import { Playhead, StagedSteps, crossesCompletion, tracePlayhead } from "./playhead";
import { dispatchCompletion, type NodeCallback, type NodeEvent } from "./tracks/callback";
import type { TrackFactory } from "./tracks/track";
import type { Curve } from "./curves";
import type {
	AnimationEvents,
	CompletionPolicy,
	CompositionKind,
	NodeId,
	PlayheadMove,
	PlayheadStep,
} from "./types";
import type { ValueType } from "./value-types";
import { version } from "../package.json";

export interface AnimatorOptions {
	/** Log field errors with console.warn (default: true) */
	reportFieldErrors?: boolean;
}

/**
 * Everything a node can be spawned with. Nested `children` are spawned in
 * order under the node.
 */
export interface AnimationNodeInit {
	/** How children share time (default: 'sequence') */
	composition?: CompositionKind;
	/** Seconds, used while the node is a leaf (default: 0) */
	duration?: number;
	curve?: Curve;
	/** What happens once the node completes (default: 'preserve') */
	completion?: CompletionPolicy;
	/** Object written by this node and its descendants */
	target?: object;
	lenses?: ReadonlyArray<FieldLens<unknown>>;
	tracks?: ReadonlyArray<TrackFactory>;
	callback?: NodeCallback;
	event?: NodeEvent;
	/**
	 * Attach a playhead advanced by a time driver.
	 * Defaults to true for roots and false for children.
	 */
	driver?: boolean | TimeDriverOptions;
	/** Attach a playhead without a driver, moved by hand (default: false) */
	playhead?: boolean;
	children?: ReadonlyArray<AnimationNodeInit>;
}

/**
 * Animator owns composition trees and plays them back.
 *
 * Each call to `update()` advances the driven playheads, traces the leaves
 * every playhead swept over, and evaluates them stage by stage.
 */
export default class Animator {
	/** Library version*/
	public static readonly VERSION = version;

	/** Node records and the tree they form*/
	private _nodes: NodeManager;
	/** Publish/subscribe to playback signals*/
	private _eventBus: EventBus<AnimationEvents>;
	/** Mutations deferred to stage boundaries*/
	private _commands: CommandBuffer;
	/** One inheritance table per value type*/
	private _lenses: Map<ValueType<unknown>, BindingTable<FieldLens<unknown>>> = new Map();
	private _targets: BindingTable<object>;
	private _playheads: Map<NodeId, Playhead> = new Map();
	private _drivers: Map<NodeId, TimeDriver> = new Map();
	/** Playheads already warned about an unsupported backward sweep*/
	private _warnedPlayheads: Set<NodeId> = new Set();
	private _reportFieldErrors: boolean;

	constructor(options: AnimatorOptions = {}) {
		const {
			reportFieldErrors = true,
		} = options;

		this._nodes = new NodeManager();
		this._eventBus = new EventBus<AnimationEvents>();
		this._commands = new CommandBuffer();
		this._targets = new BindingTable<object>(this._nodes);
		this._reportFieldErrors = reportFieldErrors;
	}

	// ==================== Tree authoring ====================

	/**
	 * Spawn a root node, with its nested children.
	 * Roots get a playhead and a time driver unless `driver: false`.
	 *
	 * @example
	 * ```typescript
	 * const root = animator.spawn({
	 *   target: sprite,
	 *   lenses: [createFieldLens(vec3Type, 'translation')],
	 *   children: [
	 *     { duration: 1, tracks: [keyframe(vec3Type, vec3(10, 0, 0))] },
	 *     { duration: 0.5, tracks: [delta(vec3Type, vec3(0, 5, 0))] },
	 *   ],
	 * });
	 * ```
	 */
	spawn(init: AnimationNodeInit = {}): NodeId {
		return this._spawnTree(init, null);
	}

	/**
	 * Spawn a node as the last child of `parent`.
	 */
	spawnChild(parent: NodeId, init: AnimationNodeInit = {}): NodeId {
		this._assertNode(parent);
		return this._spawnTree(init, parent);
	}

	/**
	 * Move a node to the end of `parent`'s children. It inherits the lenses
	 * and target visible from its new position.
	 */
	setParent(child: NodeId, parent: NodeId): void {
		this._nodes.setParent(child, parent);
		this._refreshBindings(child);
	}

	/**
	 * Remove a node and its subtree, with their playheads and bindings.
	 * A removed child leaves an empty spacer of the same duration in its
	 * place, so the rest of the timeline keeps its timing.
	 * @returns false if the node did not exist
	 */
	despawn(node: NodeId): boolean {
		const parent = this._nodes.getParent(node);
		const slot = this._nodes.getDuration(node);
		const index = parent === null ? -1 : this._nodes.getChildIndex(parent, node);
		const removed = this._nodes.removeNode(node);

		for (const id of removed) {
			this._playheads.delete(id);
			this._drivers.delete(id);
			this._warnedPlayheads.delete(id);
			this._targets.forget(id);
			for (const table of this._lenses.values()) {
				table.forget(id);
			}
		}

		if (parent !== null && slot > 0) {
			const spacer = this._nodes.createNode({ duration: slot });
			this._nodes.setParent(spacer.id, parent, index);
			this._refreshBindings(spacer.id);
		}

		return removed.length > 0;
	}

	/**
	 * Strip a node's animation behavior: tracks, callback, event, own lenses,
	 * own target, driver and playhead. The node keeps its place and duration.
	 * @returns false if the node did not exist
	 */
	removeAnimation(node: NodeId): boolean {
		const record = this._nodes.getNode(node);
		if (!record) return false;

		record.tracks = [];
		record.callback = null;
		record.event = null;
		this._targets.detach(node);
		for (const table of this._lenses.values()) {
			table.detach(node);
		}
		this._playheads.delete(node);
		this._drivers.delete(node);
		this._warnedPlayheads.delete(node);
		return true;
	}

	addTrack(node: NodeId, factory: TrackFactory): void {
		this._assertNode(node).tracks.push(factory());
	}

	/**
	 * Forget the start values captured by a node's keyframe tracks; they are
	 * sampled again the next time the node is reached.
	 */
	resetStartValues(node: NodeId): void {
		for (const track of this._nodes.getNode(node)?.tracks ?? []) {
			track.reset();
		}
	}

	// ==================== Bindings ====================

	/**
	 * Make `node` and its descendants write values of the lens's type through
	 * `lens`, until a descendant attaches its own.
	 */
	attachLens<T>(node: NodeId, lens: FieldLens<T>): void {
		this._assertNode(node);
		this._lensTable(lens.valueType).attach(node, lens);
	}

	/**
	 * @returns false if the node owned no lens of that type
	 */
	detachLens(node: NodeId, valueType: ValueType<unknown>): boolean {
		return this._lenses.get(valueType)?.detach(node) ?? false;
	}

	/**
	 * The lens of `valueType` visible to a node: its own, else its nearest ancestor's.
	 */
	resolveLens<T>(node: NodeId, valueType: ValueType<T>): FieldLens<T> | undefined {
		const lens = this._lenses.get(valueType)?.resolve(node);
		return lens && isLensOf(lens, valueType) ? lens : undefined;
	}

	/**
	 * Set the object a node and its descendants write to. `null` clears it.
	 */
	setTarget(node: NodeId, target: object | null): void {
		this._assertNode(node);
		if (target === null) {
			this._targets.detach(node);
		} else {
			this._targets.attach(node, target);
		}
	}

	resolveTarget(node: NodeId): object | undefined {
		return this._targets.resolve(node);
	}

	// ==================== Queries ====================

	get nodeCount(): number {
		return this._nodes.nodeCount;
	}

	hasNode(node: NodeId): boolean {
		return this._nodes.hasNode(node);
	}

	getNode(node: NodeId): AnimationNode | undefined {
		return this._nodes.getNode(node);
	}

	getParent(node: NodeId): NodeId | null {
		return this._nodes.getParent(node);
	}

	getChildren(node: NodeId): readonly NodeId[] {
		return this._nodes.getChildren(node);
	}

	getRoot(node: NodeId): NodeId {
		return this._nodes.getRoot(node);
	}

	getRoots(): readonly NodeId[] {
		return this._nodes.getRoots();
	}

	/**
	 * Childless nodes under `node`, in playback order.
	 */
	getLeaves(node: NodeId): readonly NodeId[] {
		return this._nodes.getLeaves(node);
	}

	/**
	 * Traversal duration of a node's subtree in seconds.
	 */
	getDuration(node: NodeId): number {
		return this._nodes.getDuration(node);
	}

	/**
	 * Movement applied to the node in the last stage that reached it.
	 */
	getMovement(node: NodeId): PlayheadMove | null {
		return this._nodes.getNode(node)?.movement ?? null;
	}

	getPlayhead(node: NodeId): Playhead | undefined {
		return this._playheads.get(node);
	}

	getDriver(node: NodeId): TimeDriver | undefined {
		return this._drivers.get(node);
	}

	get eventBus(): EventBus<AnimationEvents> {
		return this._eventBus;
	}

	get commands(): CommandBuffer {
		return this._commands;
	}

	// ==================== Playback ====================

	/**
	 * Advance driven playheads by `deltaTime` seconds and evaluate every
	 * movement since the previous update.
	 *
	 * Field errors are reported and skipped. Other errors do not interrupt the
	 * tick: every stage still runs, then the error is thrown (an
	 * `AggregateError` when there were several).
	 */
	update(deltaTime: number): void {
		for (const [id, driver] of this._drivers) {
			const playhead = this._playheads.get(id);
			if (playhead) driver.tick(playhead, deltaTime);
		}

		const hardErrors: unknown[] = [];
		const staged = new StagedSteps();

		for (const [id, playhead] of this._playheads) {
			try {
				staged.add(tracePlayhead(this._nodes, id, playhead.previousPosition, playhead.position));
			} catch (error) {
				this._routeError(id, error, hardErrors);
			}
			playhead.advance();
		}

		for (const steps of staged) {
			this._runStage(steps, hardErrors);
		}

		const [firstError] = hardErrors;
		if (hardErrors.length === 1) throw firstError;
		if (hardErrors.length > 1) {
			throw new AggregateError(hardErrors, `Animator: ${hardErrors.length} errors during update`);
		}
	}

	private _runStage(steps: readonly PlayheadStep[], hardErrors: unknown[]): void {
		const active: PlayheadStep[] = [];
		for (const step of steps) {
			const node = this._nodes.getNode(step.node);
			if (!node || !this._playheads.has(step.playhead)) continue;
			node.movement = step.movement;
			active.push(step);
		}

		for (const step of active) {
			if (step.started) {
				this._eventBus.publish('sequenceStarted', { playhead: step.playhead });
			}
		}

		for (const step of active) {
			const node = this._nodes.getNode(step.node);
			if (!node) continue;

			for (const track of node.tracks) {
				try {
					track.evaluate({ animator: this, node, playhead: step.playhead, movement: step.movement });
				} catch (error) {
					// The node's remaining tracks are skipped for this stage
					this._routeError(step.node, error, hardErrors);
					break;
				}
			}
		}

		this._drainCommands(hardErrors);

		const completed: NodeId[] = [];
		for (const step of active) {
			const node = this._nodes.getNode(step.node);
			if (!node || !crossesCompletion(step.movement, node.duration)) continue;
			completed.push(step.node);
			try {
				dispatchCompletion(this, step.node, step.playhead);
			} catch (error) {
				this._routeError(step.node, error, hardErrors);
			}
		}

		for (const step of active) {
			if (!this._nodes.hasNode(step.node)) continue;
			this._eventBus.publish('movementApplied', {
				node: step.node,
				playhead: step.playhead,
				start: step.movement.start,
				end: step.movement.end,
				stage: step.stage,
			});
		}

		for (const step of active) {
			if (!step.ended) continue;
			const playhead = this._playheads.get(step.playhead);
			if (!playhead) continue;
			completed.push(step.playhead);
			this._eventBus.publish('sequenceCompleted', { playhead: step.playhead });
			this._drivers.get(step.playhead)?.complete(playhead, this._nodes.getDuration(step.playhead));
		}

		this._queueCompletionPolicies(completed);
		this._drainCommands(hardErrors);
	}

	private _queueCompletionPolicies(completed: readonly NodeId[]): void {
		const queued = new Set<NodeId>();

		for (const id of completed) {
			const node = this._nodes.getNode(id);
			if (!node || node.completion === 'preserve' || queued.has(id)) continue;
			queued.add(id);

			if (node.completion === 'despawn') {
				this._commands.despawn(id);
			} else {
				this._commands.removeAnimation(id);
			}
		}
	}

	private _drainCommands(hardErrors: unknown[]): void {
		for (const { node, error } of this._commands.playback(this)) {
			this._routeError(node, error, hardErrors);
		}
	}

	private _routeError(node: NodeId | null, error: unknown, hardErrors: unknown[]): void {
		if (!isAnimationError(error)) {
			hardErrors.push(error);
			return;
		}

		switch (error.kind) {
			case 'TraversalError':
				return;
			case 'UnsupportedTraversal':
				if (node !== null && !this._warnedPlayheads.has(node)) {
					this._warnedPlayheads.add(node);
					console.warn(`Animator: ${error.message}`);
				}
				return;
			case 'FieldMissing':
				if (this._reportFieldErrors) {
					console.warn(`Animator: ${error.message}`);
				}
				this._publishError(node, error);
				return;
			case 'MissingStartValue':
				this._publishError(node, error);
				hardErrors.push(error);
				return;
		}
	}

	private _publishError(node: NodeId | null, error: AnimationError): void {
		if (node === null) return;
		this._eventBus.publish('animationError', { node, error });
	}

	// ==================== Internals ====================

	private _spawnTree(init: AnimationNodeInit, parent: NodeId | null): NodeId {
		const rootId = this._createNode(init, parent);
		const pending = (init.children ?? []).map((child) => ({ init: child, parent: rootId }));

		while (pending.length > 0) {
			const next = pending.shift();
			if (!next) break;
			const id = this._createNode(next.init, next.parent);
			for (const child of next.init.children ?? []) {
				pending.push({ init: child, parent: id });
			}
		}

		return rootId;
	}

	private _createNode(init: AnimationNodeInit, parent: NodeId | null): NodeId {
		const {
			composition,
			duration,
			curve,
			completion,
			target,
			lenses = [],
			tracks = [],
			callback = null,
			event = null,
			driver,
			playhead = false,
		} = init;

		const node = this._nodes.createNode({ composition, duration, curve, completion });
		node.callback = callback;
		node.event = event;

		if (parent !== null) {
			this._nodes.setParent(node.id, parent);
		}
		this._refreshBindings(node.id);

		if (target) {
			this._targets.attach(node.id, target);
		}
		for (const lens of lenses) {
			this.attachLens(node.id, lens);
		}
		node.tracks = tracks.map((factory) => factory());

		const isRoot = parent === null;
		const driverOptions = driver ?? isRoot;
		if (driverOptions !== false) {
			this._playheads.set(node.id, new Playhead());
			this._drivers.set(node.id, createTimeDriver(driverOptions === true ? {} : driverOptions));
		} else if (isRoot || playhead) {
			this._playheads.set(node.id, new Playhead());
		}

		return node.id;
	}

	private _refreshBindings(node: NodeId): void {
		this._targets.inherit(node);
		for (const table of this._lenses.values()) {
			table.inherit(node);
		}
	}

	private _lensTable(valueType: ValueType<unknown>): BindingTable<FieldLens<unknown>> {
		let table = this._lenses.get(valueType);
		if (!table) {
			table = new BindingTable<FieldLens<unknown>>(this._nodes);
			this._lenses.set(valueType, table);
		}
		return table;
	}

	private _assertNode(node: NodeId): AnimationNode {
		const record = this._nodes.getNode(node);
		if (!record) throw new TraversalError(node);
		return record;
	}
}
