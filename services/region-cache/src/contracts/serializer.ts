/** Converts cached values to and from the string payload kept in the store. */
export interface CacheSerializer<V> {
  serialize(value: V): string;
  deserialize(payload: string): V;
}
