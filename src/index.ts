import Animator from './animator';

export * from './types';
export * from './errors';
export * from './math';
export * from './value-types';
export * from './curves';
export * from './lens';
export * from './playhead';
export * from './driver';
export type { AnimatorOptions, AnimationNodeInit } from './animator';
export type { AnimationNode, CreateNodeOptions, TimelineSource } from './node-manager';
export type { Track, TrackContext, TrackFactory } from './tracks/track';
export { KeyframeTrack, keyframe } from './tracks/keyframe';
export { DeltaTrack, delta } from './tracks/delta';
export type { CallbackContext, NodeCallback, NodeEvent } from './tracks/callback';
export { default as EventBus } from './event-bus';
export type { EventPayload } from './event-bus';
export { default as CommandBuffer } from './command-buffer';
export type { Command, CommandFailure } from './command-buffer';
/**
 * @internal NodeManager is exported for testing purposes only.
 * Use Animator methods instead: spawn(), spawnChild(), despawn(), getChildren(), getDuration()
 */
export { default as NodeManager } from './node-manager';
export { Animator };
export default Animator;
