import { mock } from 'jest-mock-extended';
import Redis from 'ioredis';
import { InMemoryRedisStore } from 'test/in-memory-redis-store';
import { LockStore } from './lock.interface';
import { RedisLock } from './redis-lock';

const mockRedisClient = {
	defineCommand: jest.fn(),
	quit: jest.fn(),
};

jest.mock('ioredis', () => ({
	__esModule: true,
	default: jest.fn().mockImplementation(() => mockRedisClient),
}));

describe('RedisLock', () => {
	let store: InMemoryRedisStore;

	beforeEach(() => {
		store = new InMemoryRedisStore();
	});

	it('should give every instance its own token', () => {
		// Act
		const first = new RedisLock(store, 'job-1', 5);
		const second = new RedisLock(store, 'job-1', 5);

		// Assert
		expect(first.lockToken).not.toBe(second.lockToken);
		expect(first.held).toBe(false);
	});

	it('should hand the lock to one holder at a time', async () => {
		// Arrange
		const lockA = new RedisLock(store, 'job-1', 5);
		const lockB = new RedisLock(store, 'job-1', 5);

		// Act & Assert
		await expect(lockA.acquire()).resolves.toBe(true);
		await expect(lockB.acquire()).resolves.toBe(false);
		expect(lockA.held).toBe(true);
		expect(lockB.held).toBe(false);

		await lockA.release();
		expect(store.strings.has('job-1')).toBe(false);

		await expect(lockB.acquire()).resolves.toBe(true);
		expect(store.strings.get('job-1')).toEqual({ value: lockB.lockToken, ttlSeconds: 5 });
	});

	it('should let only one of many concurrent attempts win', async () => {
		// Arrange
		const locks = Array.from({ length: 5 }, () => new RedisLock(store, 'job-1', 5));

		// Act
		const results = await Promise.all(locks.map((lock) => lock.acquire()));

		// Assert
		expect(results.filter(Boolean)).toHaveLength(1);
	});

	it('should not release a record taken over after expiry', async () => {
		// Arrange
		const lockA = new RedisLock(store, 'job-1', 5);
		const lockB = new RedisLock(store, 'job-1', 5);
		await lockA.acquire();
		store.expire('job-1');
		await lockB.acquire();

		// Act
		await lockA.release();

		// Assert
		expect(store.strings.get('job-1')?.value).toBe(lockB.lockToken);
		expect(lockA.held).toBe(false);
	});

	it('should do nothing when releasing a lock that has expired', async () => {
		// Arrange
		const lock = new RedisLock(store, 'job-1', 5);
		await lock.acquire();
		store.expire('job-1');

		// Act & Assert
		await expect(lock.release()).resolves.toBeUndefined();
		expect(store.strings.size).toBe(0);
	});

	describe('renew', () => {
		it('should extend a lock that is still held', async () => {
			// Arrange
			const lock = new RedisLock(store, 'job-1', 5);
			await lock.acquire();

			// Act & Assert
			await expect(lock.renew()).resolves.toBe(true);
			expect(lock.held).toBe(true);
		});

		it('should refuse to extend a record now owned by another holder', async () => {
			// Arrange
			const lockA = new RedisLock(store, 'job-1', 5);
			const lockB = new RedisLock(store, 'job-1', 5);
			await lockA.acquire();
			store.expire('job-1');
			await lockB.acquire();

			// Act
			const renewed = await lockA.renew();

			// Assert
			expect(renewed).toBe(false);
			expect(lockA.held).toBe(false);
			expect(store.strings.get('job-1')?.value).toBe(lockB.lockToken);
		});

		it('should refuse to extend a lock that was never acquired', async () => {
			// Arrange
			const lock = new RedisLock(store, 'job-1', 5);

			// Act & Assert
			await expect(lock.renew()).resolves.toBe(false);
			expect(store.strings.has('job-1')).toBe(false);
		});
	});

	describe('with a mocked store', () => {
		const lockStore = mock<LockStore>();

		it('should compare and delete in one call when atomicRelease is set', async () => {
			// Arrange
			const lock = new RedisLock(lockStore, 'job-1', 5, { atomicRelease: true });
			lockStore.release.mockResolvedValue(false);

			// Act
			await lock.release();

			// Assert
			expect(lockStore.release).toHaveBeenCalledWith('job-1', lock.lockToken);
			expect(lockStore.get).not.toHaveBeenCalled();
			expect(lockStore.delete).not.toHaveBeenCalled();
		});

		it('should compare a token read back as bytes', async () => {
			// Arrange
			const lock = new RedisLock(lockStore, 'job-1', 5);
			lockStore.get.mockResolvedValue(Buffer.from(lock.lockToken));

			// Act
			await lock.release();

			// Assert
			expect(lockStore.delete).toHaveBeenCalledWith('job-1');
		});

		it('should pass store errors through', async () => {
			// Arrange
			const lock = new RedisLock(lockStore, 'job-1', 5);
			lockStore.acquire.mockRejectedValue(new Error('Connection is closed.'));

			// Act & Assert
			await expect(lock.acquire()).rejects.toThrow('Connection is closed.');
		});
	});

	describe('fromUrl', () => {
		it('should open its own connection and close it', async () => {
			// Arrange
			const lock = RedisLock.fromUrl('redis://localhost:6379/0', 'job-1', 5);

			// Act
			await lock.close();
			await lock.close();

			// Assert
			expect(Redis).toHaveBeenCalledWith('redis://localhost:6379/0', { lazyConnect: false });
			expect(lock.lockName).toBe('job-1');
			expect(lock.ttlSeconds).toBe(5);
			expect(mockRedisClient.quit).toHaveBeenCalledTimes(1);
		});
	});
});
