import { FieldMissingError } from "./errors";
import type { ValueType } from "./value-types";

/**
 * Reads and writes one typed value on a target object.
 * Both directions throw `FieldMissingError` when the target lacks the field
 * or the field does not hold a value of `valueType`.
 */
export interface FieldLens<T> {
	readonly valueType: ValueType<T>;
	/** Human-readable location, used in error messages */
	readonly description: string;
	get(target: object): T;
	set(target: object, value: T): void;
}

/**
 * Union of dot-separated paths within `T` whose value is assignable to `V`.
 * Depth-limited to 4 levels to prevent TS recursion errors.
 *
 * @example
 * PathsOfType<{ x: number; pos: { y: number } }, number> // 'x' | 'pos.y'
 */
export type PathsOfType<T, V, Depth extends readonly unknown[] = []> =
	Depth['length'] extends 4 ? never :
	T extends readonly unknown[] ? never :
	T extends object
		? { [K in keyof T & string]:
			NonNullable<T[K]> extends V
				? K
				: NonNullable<T[K]> extends readonly unknown[]
					? never
					: NonNullable<T[K]> extends object
						? `${K}.${PathsOfType<NonNullable<T[K]>, V, [...Depth, unknown]>}`
						: never
		}[keyof T & string]
		: never;

/**
 * Walk every segment but the last. Returns the object owning the final key.
 */
function resolveOwner(target: object, path: readonly string[]): object | null {
	let current: object = target;

	for (let i = 0; i < path.length - 1; i++) {
		const segment = path[i];
		if (segment === undefined) return null;
		const next: unknown = Reflect.get(current, segment);
		if (next === null || typeof next !== 'object') return null;
		current = next;
	}

	return current;
}

/**
 * Lens over a dot-separated property path, e.g. `'transform.translation'`.
 *
 * @example
 * ```typescript
 * const x = createFieldLens(numberType, 'position.x');
 * x.set(sprite, x.get(sprite) + 1);
 * ```
 */
export function createFieldLens<T>(valueType: ValueType<T>, fieldPath: string): FieldLens<T> {
	const path = fieldPath.split('.');
	const finalKey = path[path.length - 1] ?? '';

	function read(target: object): { owner: object; value: T } {
		const owner = resolveOwner(target, path);
		if (!owner || !(finalKey in owner)) {
			throw new FieldMissingError(`Target has no field '${fieldPath}'`);
		}
		const value: unknown = Reflect.get(owner, finalKey);
		if (!valueType.is(value)) {
			throw new FieldMissingError(`Field '${fieldPath}' does not hold a ${valueType.name}`);
		}
		return { owner, value };
	}

	return {
		valueType,
		description: fieldPath,
		get(target) {
			return read(target).value;
		},
		set(target, value) {
			const { owner } = read(target);
			Reflect.set(owner, finalKey, value);
		},
	};
}

export interface AccessorLensOptions<Target extends object, T> {
	/** Guard deciding whether an object is a valid target for this lens */
	matches(target: object): target is Target;
	get(target: Target): T;
	set(target: Target, value: T): void;
	description?: string;
}

/**
 * Lens built from plain accessor functions, for fields that are not reachable
 * by a property path (setters, private state, computed values).
 */
export function createAccessorLens<Target extends object, T>(
	valueType: ValueType<T>,
	options: AccessorLensOptions<Target, T>,
): FieldLens<T> {
	const {
		matches,
		get,
		set,
		description = `accessor(${valueType.name})`,
	} = options;

	function guard(target: object): Target {
		if (!matches(target)) {
			throw new FieldMissingError(`Target does not match ${description}`);
		}
		return target;
	}

	return {
		valueType,
		description,
		get(target) {
			const value = get(guard(target));
			if (!valueType.is(value)) {
				throw new FieldMissingError(`${description} does not hold a ${valueType.name}`);
			}
			return value;
		},
		set(target, value) {
			set(guard(target), value);
		},
	};
}

/**
 * Path lenses restricted at compile time to the fields of `Target` that hold
 * the lens's value type.
 *
 * @example
 * ```typescript
 * const { fieldLens } = createLensHelpers<Sprite>();
 * const translation = fieldLens(vec3Type, 'transform.translation');
 * ```
 */
export function createLensHelpers<Target extends object>() {
	return {
		fieldLens<T>(valueType: ValueType<T>, path: PathsOfType<Target, T> & string): FieldLens<T> {
			return createFieldLens(valueType, path);
		},
	};
}

/**
 * Narrow a lens of unknown value type by comparing its value type.
 */
export function isLensOf<T>(lens: FieldLens<unknown>, valueType: ValueType<T>): lens is FieldLens<T> {
	const own: ValueType<unknown> = valueType;
	return lens.valueType === own;
}
