import { describe, expect, test } from 'vitest';
import {
	colorType,
	defineValueType,
	backwardsDelta,
	forwardsDelta,
	numberType,
	quatType,
	vec2Type,
	vec3Type,
	volumeType,
} from './value-types';
import {
	decibels,
	linearVolume,
	quatEquals,
	quatFromRotationZ,
	rgba,
	vec2,
	vec3,
	vec3Equals,
	volumeToDecibels,
} from './math';

describe('value types', () => {
	describe('accumulate(difference(b, a), a) restores b', () => {
		test('number', () => {
			expect(numberType.accumulate(numberType.difference(7.5, 2), 2)).toBe(7.5);
		});

		test('vec2', () => {
			const a = vec2(1, -2);
			const b = vec2(4, 0.5);
			expect(vec2Type.accumulate(vec2Type.difference(b, a), a)).toEqual(b);
		});

		test('vec3', () => {
			const a = vec3(1, 2, 3);
			const b = vec3(-4, 0.25, 8);
			expect(vec3Equals(vec3Type.accumulate(vec3Type.difference(b, a), a), b)).toBe(true);
		});

		test('quaternion', () => {
			const a = quatFromRotationZ(0.3);
			const b = quatFromRotationZ(1.2);
			expect(quatEquals(quatType.accumulate(quatType.difference(b, a), a), b)).toBe(true);
		});

		test('color', () => {
			const a = rgba(0.25, 0.5, 0.75, 1);
			const b = rgba(1, 0, 0.5, 0.5);
			expect(colorType.accumulate(colorType.difference(b, a), a)).toEqual(b);
		});

		test('volume', () => {
			const a = decibels(-12);
			const b = decibels(-3);
			expect(volumeType.accumulate(volumeType.difference(b, a), a)).toEqual(b);
		});
	});

	test('accumulating identity leaves a value unchanged', () => {
		expect(numberType.accumulate(3, numberType.identity())).toBe(3);
		expect(vec3Type.accumulate(vec3(1, 2, 3), vec3Type.identity())).toEqual(vec3(1, 2, 3));
		expect(quatEquals(quatType.accumulate(quatFromRotationZ(0.5), quatType.identity()), quatFromRotationZ(0.5))).toBe(true);
		expect(volumeType.accumulate(decibels(-6), volumeType.identity())).toEqual(decibels(-6));
	});

	test('forwardsDelta and backwardsDelta undo each other', () => {
		const moved = forwardsDelta(vec2Type, vec2(1, 1), vec2(2, 3));
		expect(moved).toEqual(vec2(3, 4));
		expect(backwardsDelta(vec2Type, moved, vec2(2, 3))).toEqual(vec2(1, 1));
	});

	test('lerp does not clamp t', () => {
		expect(numberType.lerp(0, 10, 1.5)).toBe(15);
		expect(vec2Type.lerp(vec2(0, 0), vec2(2, 4), -0.5)).toEqual(vec2(-1, -2));
	});

	test('quaternion lerp takes the shortest arc', () => {
		const halfway = quatType.lerp(quatFromRotationZ(0), quatFromRotationZ(Math.PI / 2), 0.5);
		expect(quatEquals(halfway, quatFromRotationZ(Math.PI / 4))).toBe(true);
	});

	describe('volume', () => {
		test('lerps in the shared unit', () => {
			expect(volumeType.lerp(linearVolume(0), linearVolume(1), 0.25)).toEqual(linearVolume(0.25));
			expect(volumeType.lerp(decibels(-20), decibels(0), 0.5)).toEqual(decibels(-10));
		});

		test('lerps mixed units in decibels', () => {
			expect(volumeType.lerp(linearVolume(1), decibels(-10), 0.5)).toEqual(decibels(-5));
		});

		test('silence clamps at the floor', () => {
			expect(volumeToDecibels(linearVolume(0))).toBe(-96);
			expect(volumeType.accumulate(decibels(-90), decibels(-20))).toEqual(decibels(-96));
		});
	});

	test('guards check the value shape', () => {
		expect(numberType.is(1)).toBe(true);
		expect(numberType.is('1')).toBe(false);
		expect(vec3Type.is({ x: 1, y: 2, z: 3 })).toBe(true);
		expect(vec3Type.is({ x: 1, y: 2 })).toBe(false);
		expect(volumeType.is({ linear: 0.5 })).toBe(true);
		expect(volumeType.is({ gain: 0.5 })).toBe(false);
	});

	test('defineValueType accepts custom algebras', () => {
		const scaleType = defineValueType<number>({
			name: 'scale',
			is: (value): value is number => typeof value === 'number',
			identity: () => 1,
			lerp: (a, b, t) => a * Math.pow(b / a, t),
			difference: (a, b) => a / b,
			accumulate: (value, delta) => value * delta,
		});

		expect(scaleType.accumulate(scaleType.difference(8, 2), 2)).toBe(8);
		expect(scaleType.lerp(1, 4, 0.5)).toBe(2);
	});
});
