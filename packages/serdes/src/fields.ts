import type { ScalarArray } from "@xmlmap/core";
import { isScalarArray, RecordVector } from "@xmlmap/core";

/**
 * Field values decoded from one element, keyed by field name in descriptor
 * order (attributes first, then elements)
 *
 * The typed accessors check the runtime type of a value and throw a
 * TypeError naming the field when it does not match.
 *
 * @example
 * const fields = Furniture.xmlDescriptor.deserialize(element);
 * new Furniture(fields.string("type"), fields.string("name"), fields.array("dimensions"));
 */
export class XmlFields {
	private readonly values: ReadonlyMap<string, unknown>;

	constructor(entries: Iterable<readonly [string, unknown]>) {
		this.values = new Map(entries);
	}

	get names(): string[] {
		return [...this.values.keys()];
	}

	get size(): number {
		return this.values.size;
	}

	has(name: string): boolean {
		return this.values.has(name);
	}

	get(name: string): unknown {
		if (!this.values.has(name)) {
			throw new TypeError(`No decoded field "${name}"`);
		}
		return this.values.get(name);
	}

	/** Value checked by a type guard, for enumerations and custom codecs */
	value<T>(name: string, guard: (value: unknown) => value is T, expected = "value"): T {
		const value = this.get(name);
		if (!guard(value)) throw mismatch(name, expected, value);
		return value;
	}

	number(name: string): number {
		return this.value(name, (v): v is number => typeof v === "number", "number");
	}

	string(name: string): string {
		return this.value(name, (v): v is string => typeof v === "string", "string");
	}

	boolean(name: string): boolean {
		return this.value(name, (v): v is boolean => typeof v === "boolean", "boolean");
	}

	array(name: string): unknown[] {
		const value = this.get(name);
		if (!Array.isArray(value)) throw mismatch(name, "array", value);
		return [...value];
	}

	/** Array whose every item passes a type guard */
	arrayOf<T>(name: string, guard: (value: unknown) => value is T, expected = "value"): T[] {
		const items = this.array(name);
		const result: T[] = [];
		for (const item of items) {
			if (!guard(item)) throw mismatch(name, `array of ${expected}`, item);
			result.push(item);
		}
		return result;
	}

	numbers(name: string): number[] {
		return this.arrayOf(name, (v): v is number => typeof v === "number", "number");
	}

	strings(name: string): string[] {
		return this.arrayOf(name, (v): v is string => typeof v === "string", "string");
	}

	instance<T>(name: string, type: abstract new (...args: never[]) => T): T {
		return this.value(name, (v): v is T => v instanceof type, type.name);
	}

	instances<T>(name: string, type: abstract new (...args: never[]) => T): T[] {
		return this.arrayOf(name, (v): v is T => v instanceof type, type.name);
	}

	vector(name: string): ScalarArray {
		return this.value(name, isScalarArray, "typed array");
	}

	records(name: string): RecordVector {
		return this.value(
			name,
			(v): v is RecordVector => v instanceof RecordVector,
			"RecordVector",
		);
	}

	toObject(): Record<string, unknown> {
		return Object.fromEntries(this.values);
	}
}

function mismatch(name: string, expected: string, value: unknown): TypeError {
	const actual = Array.isArray(value) ? "array" : value === null ? "null" : typeof value;
	return new TypeError(`Field "${name}" holds ${actual}, expected ${expected}`);
}
