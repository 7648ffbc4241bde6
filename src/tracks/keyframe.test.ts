import { afterEach, describe, expect, test, vi } from 'vitest';
import Animator from '../animator';
import { MissingStartValueError } from '../errors';
import { createFieldLens } from '../lens';
import { vec3 } from '../math';
import { numberType, vec3Type } from '../value-types';
import { KeyframeTrack, keyframe } from './keyframe';

describe('keyframe track', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	test('interpolates from the live value to the keyframe', () => {
		const animator = new Animator();
		const target = { x: 0 };
		animator.spawn({
			duration: 0.5,
			target,
			lenses: [createFieldLens(numberType, 'x')],
			tracks: [keyframe(numberType, 10)],
		});

		animator.update(0.25);
		expect(target.x).toBe(5);

		animator.update(0.25);
		expect(target.x).toBe(10);
	});

	test('captures the start value once', () => {
		const animator = new Animator();
		const target = { x: 0 };
		animator.spawn({
			duration: 1,
			target,
			lenses: [createFieldLens(numberType, 'x')],
			tracks: [keyframe(numberType, 10)],
		});

		animator.update(0.5);
		target.x = 100;
		animator.update(0.25);

		expect(target.x).toBe(7.5);
	});

	test('starts from the previous keyframe on the same field', () => {
		const animator = new Animator();
		const target = { x: 0 };
		const root = animator.spawn({
			target,
			lenses: [createFieldLens(numberType, 'x')],
			children: [
				{ duration: 1, tracks: [keyframe(numberType, 10)] },
				{ duration: 1, tracks: [keyframe(numberType, 20)] },
			],
		});

		animator.getPlayhead(root)?.jumpTo(1.25);
		animator.update(0.5);

		expect(target.x).toBe(17.5);
	});

	test('ignores previous keyframes writing to another field', () => {
		const animator = new Animator();
		const target = { x: 0, y: 4 };
		const root = animator.spawn({
			target,
			lenses: [createFieldLens(numberType, 'x')],
			children: [
				{ duration: 1, tracks: [keyframe(numberType, 10)] },
				{ duration: 1, lenses: [createFieldLens(numberType, 'y')], tracks: [keyframe(numberType, 20)] },
			],
		});

		animator.getPlayhead(root)?.jumpTo(1.25);
		animator.update(0.25);

		expect(target.y).toBe(12);
		expect(target.x).toBe(0);
	});

	test('evaluates consecutive keyframes in order within one update', () => {
		const animator = new Animator();
		const target = { position: vec3(0, 0, 0) };
		animator.spawn({
			target,
			lenses: [createFieldLens(vec3Type, 'position')],
			children: [
				{ duration: 1, tracks: [keyframe(vec3Type, vec3(4, 0, 0))] },
				{ duration: 1, tracks: [keyframe(vec3Type, vec3(4, 8, 0))] },
			],
		});

		animator.update(1.5);

		expect(target.position).toEqual(vec3(4, 4, 0));
	});

	test('resetStartValues samples the live value again', () => {
		const animator = new Animator();
		const target = { x: 0 };
		const root = animator.spawn({
			duration: 0.5,
			target,
			lenses: [createFieldLens(numberType, 'x')],
			tracks: [keyframe(numberType, 10)],
		});

		animator.update(0.25);
		target.x = 100;
		animator.resetStartValues(root);
		animator.getPlayhead(root)?.jumpTo(0);
		animator.update(0.25);

		expect(target.x).toBe(55);
	});

	test('throws MissingStartValueError when nothing can be sampled', () => {
		const animator = new Animator();
		const root = animator.spawn({ duration: 1, tracks: [keyframe(numberType, 10)] });
		const errors: string[] = [];
		animator.eventBus.subscribe('animationError', ({ node, error }) => {
			errors.push(`${node}:${error.kind}`);
		});

		expect(() => animator.update(0.5)).toThrow(MissingStartValueError);
		expect(errors).toEqual([`${root}:MissingStartValue`]);
	});

	test('reports a missing field and keeps playing', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const animator = new Animator();
		const root = animator.spawn({
			duration: 1,
			target: { x: 0 },
			lenses: [createFieldLens(numberType, 'y')],
			tracks: [keyframe(numberType, 10)],
		});
		const errors: string[] = [];
		animator.eventBus.subscribe('animationError', ({ node, error }) => {
			errors.push(`${node}:${error.kind}`);
		});

		expect(() => animator.update(0.5)).not.toThrow();
		expect(errors).toEqual([`${root}:FieldMissing`]);
		expect(warn).toHaveBeenCalledWith("Animator: Target has no field 'y'");
	});

	test('field error logging can be turned off', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const animator = new Animator({ reportFieldErrors: false });
		animator.spawn({
			duration: 1,
			target: { x: 0 },
			lenses: [createFieldLens(numberType, 'y')],
			tracks: [keyframe(numberType, 10)],
		});

		animator.update(0.5);

		expect(warn).not.toHaveBeenCalled();
	});

	test('keyframeValue answers only for its own value type', () => {
		const track = new KeyframeTrack(numberType, 3);

		expect(track.keyframeValue(numberType)).toBe(3);
		expect(track.keyframeValue(vec3Type)).toBeUndefined();
		expect(track.hasStartValue).toBe(false);
	});
});
