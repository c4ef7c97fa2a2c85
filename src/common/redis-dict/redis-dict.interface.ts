import { StoreValue } from '../internal/redis/store-value';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export abstract class HashStore {
	abstract hset(key: string, field: string, value: string): Promise<void>;
	abstract hget(key: string, field: string): Promise<StoreValue | null>;
	abstract hdel(key: string, field: string): Promise<number>;
	abstract hexists(key: string, field: string): Promise<boolean>;
	abstract hlen(key: string): Promise<number>;
	abstract hkeys(key: string): Promise<string[]>;
	abstract hvals(key: string): Promise<StoreValue[]>;
	abstract hgetall(key: string): Promise<Record<string, StoreValue>>;
	abstract delete(key: string): Promise<boolean>;
	abstract quit(): Promise<void>;
}

export type UpdateSource<T> = PersistentMapping<T> | Iterable<readonly [string, T]> | Readonly<Record<string, T>>;

/**
 * String-keyed mapping whose entries live outside the process. Every call is a round trip.
 */
export abstract class PersistentMapping<T> {
	abstract set(key: string, value: T): Promise<void>;
	/** @throws KeyNotFoundError when the key is absent */
	abstract get(key: string): Promise<T>;
	abstract get<D>(key: string, defaultValue: D): Promise<T | D>;
	/** @throws KeyNotFoundError when the key is absent */
	abstract delete(key: string): Promise<void>;
	abstract contains(key: string): Promise<boolean>;
	abstract size(): Promise<number>;
	abstract keys(): Promise<string[]>;
	abstract values(): Promise<T[]>;
	abstract items(): Promise<Array<[string, T]>>;
	abstract setDefault(key: string, defaultValue: T): Promise<T>;
	abstract update(source: UpdateSource<T>): Promise<void>;
	abstract clear(): Promise<void>;
}
