import { Injectable, Logger } from '@nestjs/common';
import { setTimeout } from 'node:timers/promises';
import { DistributedLockConfigService } from './distributed-lock-config.service';
import { Lock } from './lock/lock';
import { LockStore } from './lock/lock.interface';
import { RedisLock } from './lock/redis-lock';

export interface CreateLockOptions {
	/**
	 * Max amount of time a lock should be held for in seconds
	 *
	 * @default DistributedLockConfigService.expirationTimeInSeconds
	 */
	expirationTimeInSeconds?: number | undefined;

	/**
	 * @default DistributedLockConfigService.atomicRelease
	 */
	atomicRelease?: boolean | undefined;
}

export interface DistributedLockOptions extends CreateLockOptions {
	/**
	 * Max amount of time in milliseconds to keep retrying before giving up. `0` makes a single attempt.
	 *
	 * @default undefined (Never)
	 */
	timeout?: number | undefined;
}

@Injectable()
export class DistributedLockService {
	private readonly logger = new Logger(DistributedLockService.name);

	constructor(
		private readonly lockStore: LockStore,
		private readonly distributedLockConfigService: DistributedLockConfigService,
	) {}

	create(lockName: string, options?: CreateLockOptions): RedisLock {
		return new RedisLock(this.lockStore, lockName, options?.expirationTimeInSeconds ?? this.distributedLockConfigService.expirationTimeInSeconds, {
			atomicRelease: options?.atomicRelease ?? this.distributedLockConfigService.atomicRelease,
		});
	}

	/**
	 * Polls until the lock is acquired, then keeps it renewed until `Lock.release()`.
	 */
	async acquire(lockName: string, options?: DistributedLockOptions): Promise<Lock> {
		const redisLock = this.create(lockName, options);
		const timeoutInMs = options?.timeout;
		const startTime = Date.now();

		while (true) {
			if (await redisLock.acquire()) {
				return new Lock(redisLock);
			}
			if (timeoutInMs !== undefined && Date.now() - startTime >= timeoutInMs) {
				this.logger.warn(`Gave up on lock "${lockName}" after ${timeoutInMs}ms`);
				throw new Error(`Timeout: Failed to acquire lock "${lockName}"`);
			}
			const jitter = Math.floor(Math.random() * 40);
			this.logger.debug(`Lock "${lockName}" is taken, retrying in ${80 + jitter}ms`);
			await setTimeout(80 + jitter); // 80 - 120 ms
		}
	}
}
