import { describe, expect, test } from 'vitest';
import Animator from '../animator';
import type { CallbackContext } from './callback';

describe('completion callbacks', () => {
	test('fire once when the playhead reaches the end of the node', () => {
		const animator = new Animator();
		const calls: Array<Omit<CallbackContext, 'animator'>> = [];
		const root = animator.spawn({
			driver: false,
			children: [
				{ duration: 1, callback: ({ node, playhead }) => calls.push({ node, playhead }) },
				{ duration: 1 },
			],
		});
		const [first] = animator.getChildren(root);
		const playhead = animator.getPlayhead(root);

		playhead?.set(0.5);
		animator.update(0);
		expect(calls).toEqual([]);

		playhead?.set(1);
		animator.update(0);
		expect(calls).toEqual([{ node: first, playhead: root }]);

		playhead?.set(1.5);
		animator.update(0);
		expect(calls).toHaveLength(1);
	});

	test('receive the animator', () => {
		const animator = new Animator();
		let received: Animator | null = null;
		animator.spawn({ duration: 0.5, callback: (context) => { received = context.animator; } });

		animator.update(1);

		expect(received).toBe(animator);
	});

	test('zero-duration nodes fire when reached', () => {
		const animator = new Animator();
		let fired = 0;
		animator.spawn({
			children: [
				{ duration: 0, callback: () => { fired++; } },
				{ duration: 1 },
			],
		});

		animator.update(0.25);

		expect(fired).toBe(1);
	});

	test('zero-duration nodes do not fire again when a tick stopped on them', () => {
		const animator = new Animator();
		let fired = 0;
		animator.spawn({
			children: [
				{ duration: 1 },
				{ duration: 0, callback: () => { fired++; } },
				{ duration: 1 },
			],
		});

		animator.update(0.5);
		animator.update(0.5);
		animator.update(0.5);

		expect(fired).toBe(1);
	});

	test('node events publish on the event bus', () => {
		const animator = new Animator();
		const received: unknown[] = [];
		animator.eventBus.subscribe('titleShown', (data) => {
			received.push(data);
		});
		animator.spawn({ duration: 1, event: { name: 'titleShown', data: { text: 'hello' } } });

		animator.update(0.5);
		expect(received).toEqual([]);

		animator.update(0.5);
		expect(received).toEqual([{ text: 'hello' }]);
	});

	test('a throwing callback does not stop the tick', () => {
		const animator = new Animator();
		const failure = new Error('callback failed');
		let secondFired = false;
		animator.spawn({
			children: [
				{ duration: 1, callback: () => { throw failure; } },
				{ duration: 1, callback: () => { secondFired = true; } },
			],
		});

		expect(() => animator.update(2)).toThrow(failure);
		expect(secondFired).toBe(true);
	});

	test('several failures surface as an AggregateError', () => {
		const animator = new Animator();
		animator.spawn({
			children: [
				{ duration: 1, callback: () => { throw new Error('first'); } },
				{ duration: 1, callback: () => { throw new Error('second'); } },
			],
		});

		let caught: unknown = null;
		try {
			animator.update(2);
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(AggregateError);
		expect(caught instanceof AggregateError ? caught.errors.map((error: Error) => error.message) : []).toEqual(['first', 'second']);
	});
});
