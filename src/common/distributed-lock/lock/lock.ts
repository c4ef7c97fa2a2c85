import { Logger } from '@nestjs/common';
import { EventEmitter } from 'events';
import { RedisLock } from './redis-lock';

/**
 * An acquired lock that renews itself at half its expiry time until released.
 *
 * Emits `lost` with an `Error` when a renewal fails; renewal stops at that point.
 */
export class Lock extends EventEmitter {
	private readonly logger = new Logger(Lock.name);
	private renewLockInterval: NodeJS.Timeout | null = null;

	constructor(private readonly redisLock: RedisLock) {
		super();
		this.startAutoRenew();
	}

	get name(): string {
		return this.redisLock.lockName;
	}

	get held(): boolean {
		return this.redisLock.held;
	}

	private stopAutoRenew() {
		if (this.renewLockInterval) {
			clearInterval(this.renewLockInterval);
			this.renewLockInterval = null;
		}
	}

	private startAutoRenew() {
		if (this.renewLockInterval) {
			this.stopAutoRenew();
		}
		const renewPeriodInMs = Math.floor(this.redisLock.ttlSeconds / 2) * 1000;
		if (renewPeriodInMs <= 0) {
			return;
		}
		this.renewLockInterval = setInterval(() => void this.renewLock(), renewPeriodInMs);
	}

	private async renewLock() {
		try {
			const success = await this.redisLock.renew();
			if (!success) {
				this.handleLockLost(new Error(`Lock on key "${this.name}" was lost during renewal.`));
			}
		} catch (error) {
			this.handleLockLost(error instanceof Error ? error : new Error(String(error)));
		}
	}

	private handleLockLost(error: Error) {
		this.stopAutoRenew();
		this.logger.warn(error.message);
		this.emit('lost', error);
	}

	public async release(): Promise<void> {
		this.stopAutoRenew();
		await this.redisLock.release();
	}
}
