import { z } from 'zod';
import { DecodingError, EncodingError } from './errors.js';

/**
 * Turns values into the opaque payload bytes a cache stores, and back
 */
export interface ValueCodec {
	encode(value: unknown): Buffer;
	decode<T = unknown>(payload: Buffer, schema?: z.ZodType<T, z.ZodTypeDef, unknown>): T;
}

/**
 * JSON codec, indented with a single space.
 * Accepts anything JSON.stringify can represent (primitives, arrays, plain records).
 */
export class JsonCodec implements ValueCodec {
	encode(value: unknown): Buffer {
		let json: string | undefined;
		try {
			json = JSON.stringify(value, null, ' ');
		} catch (error) {
			throw new EncodingError(
				`Value is not serializable: ${error instanceof Error ? error.message : String(error)}`,
				{ cause: error }
			);
		}

		// functions, symbols and undefined stringify to nothing
		if (json === undefined) {
			throw new EncodingError(`Value of type ${typeof value} is not serializable`);
		}

		return Buffer.from(json, 'utf-8');
	}

	decode<T = unknown>(payload: Buffer, schema?: z.ZodType<T, z.ZodTypeDef, unknown>): T {
		let parsed: unknown;
		try {
			parsed = JSON.parse(payload.toString('utf-8'));
		} catch (error) {
			throw new DecodingError(
				`Payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
				{ cause: error }
			);
		}

		if (!schema) {
			return parsed as T;
		}

		const result = schema.safeParse(parsed);
		if (!result.success) {
			const issues = result.error.errors.map((err) => err.message);
			throw new DecodingError(`Payload does not match the expected shape: ${issues.join(', ')}`, {
				cause: result.error,
			});
		}
		return result.data;
	}
}

export const defaultCodec: ValueCodec = new JsonCodec();

export function encodeValue(value: unknown): Buffer {
	return defaultCodec.encode(value);
}

export function decodeValue<T = unknown>(
	payload: Buffer,
	schema?: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
	return defaultCodec.decode(payload, schema);
}
