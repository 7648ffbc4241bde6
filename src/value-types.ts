import {
	type Color,
	type Quaternion,
	type Vector2D,
	type Vector3D,
	type Volume,
	clampDecibels,
	colorLerp,
	lerpNumber,
	quatIdentity,
	quatInverse,
	quatMul,
	quatSlerp,
	vec2Add,
	vec2Lerp,
	vec2Sub,
	vec3Add,
	vec3Lerp,
	vec3Sub,
	volumeLerp,
	volumeToDecibels,
} from './math';

/**
 * The algebra an animatable value type supplies to the engine.
 *
 * Laws, in exact arithmetic:
 * - `accumulate(difference(a, b), b)` equals `a`
 * - `accumulate(v, identity())` equals `v`
 *
 * For rotation-like types "addition" is composition and `difference` is the
 * composing inverse, not subtraction.
 */
export interface ValueType<T> {
	/** Used in error messages */
	readonly name: string;
	/** Runtime guard used by lenses to validate field contents */
	is(value: unknown): value is T;
	/** Fold basis for additive (delta) evaluation */
	identity(): T;
	/** `t` is not clamped: curves may overshoot */
	lerp(a: T, b: T, t: number): T;
	difference(a: T, b: T): T;
	accumulate(value: T, delta: T): T;
}

/**
 * Identity helper that pins the type parameter of a custom value type.
 *
 * @example
 * ```typescript
 * const scaleType = defineValueType<number>({
 *   name: 'scale',
 *   is: (value): value is number => typeof value === 'number',
 *   identity: () => 1,
 *   lerp: (a, b, t) => a * Math.pow(b / a, t),
 *   difference: (a, b) => a / b,
 *   accumulate: (value, delta) => value * delta,
 * });
 * ```
 */
export function defineValueType<T>(definition: ValueType<T>): ValueType<T> {
	return definition;
}

/**
 * Apply `delta` on top of `value`.
 */
export function forwardsDelta<T>(type: ValueType<T>, value: T, delta: T): T {
	return type.accumulate(value, delta);
}

/**
 * Take `delta` back off `value`.
 */
export function backwardsDelta<T>(type: ValueType<T>, value: T, delta: T): T {
	return type.difference(value, delta);
}

function hasNumbers<K extends string>(value: unknown, keys: readonly K[]): value is Record<K, number> {
	if (typeof value !== 'object' || value === null) return false;
	for (const key of keys) {
		if (!(key in value)) return false;
		if (typeof Reflect.get(value, key) !== 'number') return false;
	}
	return true;
}

const VEC2_KEYS = ['x', 'y'] as const;
const VEC3_KEYS = ['x', 'y', 'z'] as const;
const QUAT_KEYS = ['x', 'y', 'z', 'w'] as const;
const COLOR_KEYS = ['r', 'g', 'b', 'a'] as const;

export const numberType = defineValueType<number>({
	name: 'number',
	is: (value): value is number => typeof value === 'number',
	identity: () => 0,
	lerp: lerpNumber,
	difference: (a, b) => a - b,
	accumulate: (value, delta) => value + delta,
});

export const vec2Type = defineValueType<Vector2D>({
	name: 'vec2',
	is: (value): value is Vector2D => hasNumbers(value, VEC2_KEYS),
	identity: () => ({ x: 0, y: 0 }),
	lerp: vec2Lerp,
	difference: vec2Sub,
	accumulate: vec2Add,
});

export const vec3Type = defineValueType<Vector3D>({
	name: 'vec3',
	is: (value): value is Vector3D => hasNumbers(value, VEC3_KEYS),
	identity: () => ({ x: 0, y: 0, z: 0 }),
	lerp: vec3Lerp,
	difference: vec3Sub,
	accumulate: vec3Add,
});

/**
 * Rotations compose by quaternion product: `accumulate(value, delta)` is
 * `value * delta` and `difference(a, b)` is `a * b⁻¹`.
 */
export const quatType = defineValueType<Quaternion>({
	name: 'quat',
	is: (value): value is Quaternion => hasNumbers(value, QUAT_KEYS),
	identity: quatIdentity,
	lerp: quatSlerp,
	difference: (a, b) => quatMul(a, quatInverse(b)),
	accumulate: quatMul,
});

export const colorType = defineValueType<Color>({
	name: 'color',
	is: (value): value is Color => hasNumbers(value, COLOR_KEYS),
	identity: () => ({ r: 0, g: 0, b: 0, a: 0 }),
	lerp: colorLerp,
	difference: (a, b) => ({ r: a.r - b.r, g: a.g - b.g, b: a.b - b.b, a: a.a - b.a }),
	accumulate: (value, delta) => ({
		r: value.r + delta.r,
		g: value.g + delta.g,
		b: value.b + delta.b,
		a: value.a + delta.a,
	}),
});

/**
 * Volumes combine multiplicatively, which is addition in decibels.
 * Combined results are expressed in decibels, clamped at the silent floor.
 */
export const volumeType = defineValueType<Volume>({
	name: 'volume',
	is: (value): value is Volume => hasNumbers(value, ['linear']) || hasNumbers(value, ['decibels']),
	identity: () => ({ decibels: 0 }),
	lerp: volumeLerp,
	difference: (a, b) => ({ decibels: clampDecibels(volumeToDecibels(a) - volumeToDecibels(b)) }),
	accumulate: (value, delta) => ({ decibels: clampDecibels(volumeToDecibels(value) + volumeToDecibels(delta)) }),
});
