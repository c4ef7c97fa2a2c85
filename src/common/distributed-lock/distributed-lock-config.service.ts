import { Injectable } from '@nestjs/common';
import { parseBooleanEnv } from '../config/config-factory';
import { DistributedLockEnv } from './distributed-lock.env';

@Injectable()
export class DistributedLockConfigService {
	public readonly expirationTimeInSeconds: number;
	public readonly atomicRelease: boolean;

	constructor(env: DistributedLockEnv) {
		this.expirationTimeInSeconds = env.LOCK_EXPIRATION_TIME_IN_SECONDS ?? 30;
		this.atomicRelease = parseBooleanEnv(env.LOCK_ATOMIC_RELEASE, false);
	}
}
