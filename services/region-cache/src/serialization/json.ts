import { z, type ZodType } from 'zod';
import type { CacheSerializer } from '../contracts/serializer';
import { CacheSerializationError } from '../errors';

/** JSON payloads, validated against `schema` on the way out of the store. */
export class JsonSerializer<V> implements CacheSerializer<V> {
  constructor(private readonly schema: ZodType<V>) {}

  serialize(value: V): string {
    let payload: string | undefined;
    try {
      payload = JSON.stringify(value);
    } catch (err) {
      throw new CacheSerializationError('value is not JSON-serializable', { cause: err });
    }
    if (payload === undefined) {
      throw new CacheSerializationError('value is not JSON-serializable');
    }
    return payload;
  }

  deserialize(payload: string): V {
    let decoded: unknown;
    try {
      decoded = JSON.parse(payload);
    } catch (err) {
      throw new CacheSerializationError('stored payload is not valid JSON', { cause: err });
    }
    const parsed = this.schema.safeParse(decoded);
    if (!parsed.success) {
      throw new CacheSerializationError(`stored payload failed validation: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

/** Accepts any JSON value; callers narrow what they read back. */
export function untypedJsonSerializer(): JsonSerializer<unknown> {
  return new JsonSerializer(z.unknown());
}
