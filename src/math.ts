/**
 * Vector, quaternion, color and volume primitives for animated values.
 * All functions are pure: they return new values, never mutate inputs.
 */

/**
 * A 2D vector with x and y components.
 */
export interface Vector2D {
	x: number;
	y: number;
}

export interface Vector3D {
	x: number;
	y: number;
	z: number;
}

/**
 * A rotation quaternion. Unit length is expected but not enforced.
 */
export interface Quaternion {
	x: number;
	y: number;
	z: number;
	w: number;
}

/**
 * Linear RGBA color, each channel nominally in [0, 1].
 */
export interface Color {
	r: number;
	g: number;
	b: number;
	a: number;
}

/**
 * A gain, either as a linear amplitude factor or in decibels.
 */
export type Volume = { linear: number } | { decibels: number };

/** Decibel floor used whenever volumes are combined or converted. */
export const SILENT_DECIBELS = -96;

export function lerpNumber(a: number, b: number, t: number): number {
	return a + (b - a) * t;
}

// ==================== Vector2D ====================

export function vec2(x: number, y: number): Vector2D {
	return { x, y };
}

export function vec2Add(a: Vector2D, b: Vector2D): Vector2D {
	return { x: a.x + b.x, y: a.y + b.y };
}

/**
 * Subtract b from a component-wise.
 */
export function vec2Sub(a: Vector2D, b: Vector2D): Vector2D {
	return { x: a.x - b.x, y: a.y - b.y };
}

export function vec2Lerp(a: Vector2D, b: Vector2D, t: number): Vector2D {
	return { x: lerpNumber(a.x, b.x, t), y: lerpNumber(a.y, b.y, t) };
}

// ==================== Vector3D ====================

export function vec3(x: number, y: number, z: number): Vector3D {
	return { x, y, z };
}

export function vec3Add(a: Vector3D, b: Vector3D): Vector3D {
	return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function vec3Sub(a: Vector3D, b: Vector3D): Vector3D {
	return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function vec3Lerp(a: Vector3D, b: Vector3D, t: number): Vector3D {
	return {
		x: lerpNumber(a.x, b.x, t),
		y: lerpNumber(a.y, b.y, t),
		z: lerpNumber(a.z, b.z, t),
	};
}

/**
 * Check if two vectors are approximately equal within an epsilon tolerance.
 */
export function vec3Equals(a: Vector3D, b: Vector3D, epsilon = 1e-10): boolean {
	return Math.abs(a.x - b.x) <= epsilon
		&& Math.abs(a.y - b.y) <= epsilon
		&& Math.abs(a.z - b.z) <= epsilon;
}

// ==================== Quaternion ====================

export function quatIdentity(): Quaternion {
	return { x: 0, y: 0, z: 0, w: 1 };
}

/**
 * Rotation of `angle` radians around a unit `axis`.
 */
export function quatFromAxisAngle(axis: Vector3D, angle: number): Quaternion {
	const half = angle / 2;
	const s = Math.sin(half);
	return { x: axis.x * s, y: axis.y * s, z: axis.z * s, w: Math.cos(half) };
}

export function quatFromRotationZ(angle: number): Quaternion {
	return quatFromAxisAngle({ x: 0, y: 0, z: 1 }, angle);
}

/**
 * Hamilton product `a * b`: the rotation `b` followed by `a` in world terms.
 */
export function quatMul(a: Quaternion, b: Quaternion): Quaternion {
	return {
		x: a.w * b.x + a.x * b.w + a.y * b.z - a.z * b.y,
		y: a.w * b.y - a.x * b.z + a.y * b.w + a.z * b.x,
		z: a.w * b.z + a.x * b.y - a.y * b.x + a.z * b.w,
		w: a.w * b.w - a.x * b.x - a.y * b.y - a.z * b.z,
	};
}

export function quatDot(a: Quaternion, b: Quaternion): number {
	return a.x * b.x + a.y * b.y + a.z * b.z + a.w * b.w;
}

export function quatInverse(q: Quaternion): Quaternion {
	const lenSq = quatDot(q, q);
	if (lenSq === 0) return quatIdentity();
	return { x: -q.x / lenSq, y: -q.y / lenSq, z: -q.z / lenSq, w: q.w / lenSq };
}

export function quatNormalize(q: Quaternion): Quaternion {
	const len = Math.sqrt(quatDot(q, q));
	if (len === 0) return quatIdentity();
	return { x: q.x / len, y: q.y / len, z: q.z / len, w: q.w / len };
}

/**
 * Spherical interpolation along the shortest arc. `t` outside [0, 1]
 * extrapolates along the same arc.
 */
export function quatSlerp(a: Quaternion, b: Quaternion, t: number): Quaternion {
	let cos = quatDot(a, b);
	let end = b;
	if (cos < 0) {
		cos = -cos;
		end = { x: -b.x, y: -b.y, z: -b.z, w: -b.w };
	}

	// Nearly parallel: fall back to normalized lerp
	if (cos > 0.9995) {
		return quatNormalize({
			x: lerpNumber(a.x, end.x, t),
			y: lerpNumber(a.y, end.y, t),
			z: lerpNumber(a.z, end.z, t),
			w: lerpNumber(a.w, end.w, t),
		});
	}

	const theta = Math.acos(cos);
	const sin = Math.sin(theta);
	const wa = Math.sin((1 - t) * theta) / sin;
	const wb = Math.sin(t * theta) / sin;

	return {
		x: a.x * wa + end.x * wb,
		y: a.y * wa + end.y * wb,
		z: a.z * wa + end.z * wb,
		w: a.w * wa + end.w * wb,
	};
}

/**
 * Rotation equality, treating `q` and `-q` as the same rotation.
 */
export function quatEquals(a: Quaternion, b: Quaternion, epsilon = 1e-9): boolean {
	return Math.abs(Math.abs(quatDot(quatNormalize(a), quatNormalize(b))) - 1) <= epsilon;
}

// ==================== Color ====================

export function rgba(r: number, g: number, b: number, a = 1): Color {
	return { r, g, b, a };
}

export function colorLerp(a: Color, b: Color, t: number): Color {
	return {
		r: lerpNumber(a.r, b.r, t),
		g: lerpNumber(a.g, b.g, t),
		b: lerpNumber(a.b, b.b, t),
		a: lerpNumber(a.a, b.a, t),
	};
}

// ==================== Volume ====================

export function decibels(value: number): Volume {
	return { decibels: value };
}

export function linearVolume(amount: number): Volume {
	return { linear: amount };
}

export function clampDecibels(value: number): number {
	return value < SILENT_DECIBELS ? SILENT_DECIBELS : value;
}

/**
 * Convert a volume to decibels, clamped at the silent floor.
 */
export function volumeToDecibels(volume: Volume): number {
	if ('decibels' in volume) return clampDecibels(volume.decibels);
	if (volume.linear <= 0) return SILENT_DECIBELS;
	return clampDecibels(20 * Math.log10(volume.linear));
}

export function volumeLerp(a: Volume, b: Volume, t: number): Volume {
	if ('linear' in a && 'linear' in b) {
		return { linear: lerpNumber(a.linear, b.linear, t) };
	}
	if ('decibels' in a && 'decibels' in b) {
		return { decibels: lerpNumber(a.decibels, b.decibels, t) };
	}
	return { decibels: lerpNumber(volumeToDecibels(a), volumeToDecibels(b), t) };
}
