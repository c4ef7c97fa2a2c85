import { v4 as uuidv4 } from 'uuid';
import { resolveRedisStore } from '../../internal/redis/redis-store';
import { SentinelAddress } from '../../internal/redis/redis-url';
import { LockStore } from './lock.interface';

export interface RedisLockOptions {
	/**
	 * Compare and delete in one Lua script on release, instead of a GET followed by a DEL.
	 *
	 * @default false
	 */
	atomicRelease?: boolean;
}

/**
 * Single-owner lock stored as `lockName -> lockToken` with an expiry.
 *
 * Acquiring never blocks; poll `acquire()` to wait for the lock.
 */
export class RedisLock {
	public readonly lockToken: string = uuidv4();
	private lockObtained = false;
	private ownedStore: LockStore | null = null;

	constructor(
		private readonly lockStore: LockStore,
		public readonly lockName: string,
		public readonly ttlSeconds: number,
		private readonly options: RedisLockOptions = {},
	) {}

	/**
	 * Creates a lock with its own connection, closed by `close()`.
	 */
	static fromUrl(redisUrl: string, lockName: string, ttlSeconds: number, sentinels: readonly SentinelAddress[] = [], options: RedisLockOptions = {}): RedisLock {
		const store = resolveRedisStore(redisUrl, sentinels, { decodeResponses: true });
		const lock = new RedisLock(store, lockName, ttlSeconds, options);
		lock.ownedStore = store;
		return lock;
	}

	get held(): boolean {
		return this.lockObtained;
	}

	async acquire(): Promise<boolean> {
		this.lockObtained = await this.lockStore.acquire(this.lockName, this.lockToken, this.ttlSeconds);
		return this.lockObtained;
	}

	/**
	 * Extends the expiry only while the record still holds this lock's token.
	 */
	async renew(): Promise<boolean> {
		const renewed = await this.lockStore.renew(this.lockName, this.lockToken, this.ttlSeconds);
		if (!renewed) {
			this.lockObtained = false;
		}
		return renewed;
	}

	/**
	 * Removes the record if it still holds this lock's token. A lock lost to expiry is left alone.
	 *
	 * Without `atomicRelease` the check and the delete are two round trips, so a record
	 * that expires and is taken over in between can still be deleted.
	 */
	async release(): Promise<void> {
		this.lockObtained = false;
		if (this.options.atomicRelease) {
			await this.lockStore.release(this.lockName, this.lockToken);
			return;
		}
		const lockValue = await this.lockStore.get(this.lockName);
		if (lockValue !== null && lockValue.toString() === this.lockToken) {
			await this.lockStore.delete(this.lockName);
		}
	}

	async close(): Promise<void> {
		if (this.ownedStore) {
			await this.ownedStore.quit();
			this.ownedStore = null;
		}
	}
}
