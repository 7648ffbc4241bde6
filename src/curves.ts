/**
 * Curves
 *
 * Easing functions that remap normalized progress in [0, 1]. Each family is
 * defined once as an "in" curve; the "out" and "in-out" variants are derived.
 */

export type Curve = (t: number) => number;

/**
 * Remap progress through a curve. Progress outside [0, 1] lies outside the
 * curve's domain and passes through unchanged.
 */
export function sampleCurve(curve: Curve | null | undefined, t: number): number {
	if (!curve) return t;
	if (t < 0 || t > 1) return t;
	return curve(t);
}

/**
 * Mirror an "in" curve into its "out" counterpart.
 */
export function easeOut(curve: Curve): Curve {
	return (t) => 1 - curve(1 - t);
}

/**
 * Run the "in" curve over the first half and its mirror over the second.
 */
export function easeInOut(curve: Curve): Curve {
	return (t) => t < 0.5
		? curve(2 * t) / 2
		: 1 - curve(2 - 2 * t) / 2;
}

export function linear(t: number): number {
	return t;
}

export const quadraticIn: Curve = (t) => t * t;
export const quadraticOut = easeOut(quadraticIn);
export const quadraticInOut = easeInOut(quadraticIn);

export const cubicIn: Curve = (t) => t * t * t;
export const cubicOut = easeOut(cubicIn);
export const cubicInOut = easeInOut(cubicIn);

export const quarticIn: Curve = (t) => t * t * t * t;
export const quarticOut = easeOut(quarticIn);
export const quarticInOut = easeInOut(quarticIn);

export const quinticIn: Curve = (t) => t * t * t * t * t;
export const quinticOut = easeOut(quinticIn);
export const quinticInOut = easeInOut(quinticIn);

export const sineIn: Curve = (t) => 1 - Math.cos((t * Math.PI) / 2);
export const sineOut = easeOut(sineIn);
export const sineInOut = easeInOut(sineIn);

export const circularIn: Curve = (t) => 1 - Math.sqrt(1 - t * t);
export const circularOut = easeOut(circularIn);
export const circularInOut = easeInOut(circularIn);

export const exponentialIn: Curve = (t) => t === 0 ? 0 : Math.pow(2, 10 * t - 10);
export const exponentialOut = easeOut(exponentialIn);
export const exponentialInOut = easeInOut(exponentialIn);

const BACK_C1 = 1.70158;
const BACK_C3 = BACK_C1 + 1;

export const backIn: Curve = (t) => BACK_C3 * t * t * t - BACK_C1 * t * t;
export const backOut = easeOut(backIn);
export const backInOut = easeInOut(backIn);

const ELASTIC_C4 = (2 * Math.PI) / 3;

export const elasticIn: Curve = (t) => {
	if (t === 0) return 0;
	if (t === 1) return 1;
	return -Math.pow(2, 10 * t - 10) * Math.sin((10 * t - 10.75) * ELASTIC_C4);
};
export const elasticOut = easeOut(elasticIn);
export const elasticInOut = easeInOut(elasticIn);

// Bounce is naturally an "out" curve
export const bounceOut: Curve = (t) => {
	const n1 = 7.5625;
	const d1 = 2.75;

	if (t < 1 / d1) {
		return n1 * t * t;
	} else if (t < 2 / d1) {
		const t1 = t - 1.5 / d1;
		return n1 * t1 * t1 + 0.75;
	} else if (t < 2.5 / d1) {
		const t1 = t - 2.25 / d1;
		return n1 * t1 * t1 + 0.9375;
	}
	const t1 = t - 2.625 / d1;
	return n1 * t1 * t1 + 0.984375;
};
export const bounceIn = easeOut(bounceOut);
export const bounceInOut = easeInOut(bounceIn);

export const smoothStep: Curve = (t) => t * t * (3 - 2 * t);

export const smootherStep: Curve = (t) => t * t * t * (t * (6 * t - 15) + 10);

/**
 * Staircase with `count` equal jumps, each taken at the end of its interval.
 */
export function steps(count: number): Curve {
	const n = Math.max(1, Math.floor(count));
	return (t) => Math.floor(t * n) / n;
}

/** Runtime lookup of the named curves */
export const curves = {
	linear,
	quadraticIn,
	quadraticOut,
	quadraticInOut,
	cubicIn,
	cubicOut,
	cubicInOut,
	quarticIn,
	quarticOut,
	quarticInOut,
	quinticIn,
	quinticOut,
	quinticInOut,
	sineIn,
	sineOut,
	sineInOut,
	circularIn,
	circularOut,
	circularInOut,
	exponentialIn,
	exponentialOut,
	exponentialInOut,
	backIn,
	backOut,
	backInOut,
	elasticIn,
	elasticOut,
	elasticInOut,
	bounceIn,
	bounceOut,
	bounceInOut,
	smoothStep,
	smootherStep,
} as const;
