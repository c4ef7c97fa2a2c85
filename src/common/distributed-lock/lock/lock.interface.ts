import { StoreValue } from '../../internal/redis/store-value';

export abstract class LockStore {
	/** Sets `key` to `value` only when the key does not exist */
	abstract acquire(key: string, value: string, ttlSeconds: number): Promise<boolean>;
	/** Extends the expiry of `key` only while it still holds `value` */
	abstract renew(key: string, value: string, ttlSeconds: number): Promise<boolean>;
	/** Deletes `key` only while it still holds `value` */
	abstract release(key: string, value: string): Promise<boolean>;
	abstract get(key: string): Promise<StoreValue | null>;
	abstract delete(key: string): Promise<boolean>;
	abstract quit(): Promise<void>;
}
