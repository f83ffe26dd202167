import { z } from 'zod';

const NUMERIC = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;

/**
 * Accept a numeric string where the schema expects a number. `$VAR`
 * references in YAML config always expand to strings, so numeric fields
 * parse them here instead of in the loader.
 */
export function numberFromString<T extends z.ZodTypeAny>(schema: T) {
	return z.preprocess(
		value => (typeof value === 'string' && NUMERIC.test(value.trim()) ? Number(value) : value),
		schema
	);
}
