import { ConfigurationError } from './configuration.error';

export const DEFAULT_SENTINEL_SERVICE = 'mymaster';
export const DEFAULT_REDIS_PORT = 6379;

export interface SentinelAddress {
	host: string;
	port: number;
}

export interface SentinelUrlConfig {
	username: string | undefined;
	password: string | undefined;
	/** Name of the master group monitored by the sentinels */
	service: string;
	port: number;
	db: number;
}

function parseUrl(redisUrl: string): URL {
	try {
		return new URL(redisUrl);
	} catch {
		throw new ConfigurationError(`Malformed Redis URL "${redisUrl}".`);
	}
}

function decodeUserInfo(value: string, redisUrl: string): string | undefined {
	try {
		return decodeURIComponent(value) || undefined;
	} catch {
		throw new ConfigurationError(`Malformed credentials in Redis URL "${redisUrl}".`);
	}
}

/**
 * Parses a locator URL of the form `redis://[user[:pass]@][service][:port][/db]`.
 */
export function parseSentinelUrl(redisUrl: string): SentinelUrlConfig {
	const url = parseUrl(redisUrl);
	if (url.protocol !== 'redis:') {
		throw new ConfigurationError('Invalid Redis URL scheme. Must be "redis".');
	}

	const db = url.pathname.replace(/^\/+/, '');
	if (db !== '' && !/^\d+$/.test(db)) {
		throw new ConfigurationError(`Invalid Redis database index "${db}".`);
	}

	return {
		username: decodeUserInfo(url.username, redisUrl),
		password: decodeUserInfo(url.password, redisUrl),
		service: url.hostname || DEFAULT_SENTINEL_SERVICE,
		port: url.port ? Number(url.port) : DEFAULT_REDIS_PORT,
		db: db ? Number(db) : 0,
	};
}

/**
 * Builds sentinel endpoints from a comma-separated host list sharing one port.
 */
export function parseSentinelHosts(hosts: string | undefined, port: number): SentinelAddress[] {
	if (!hosts) {
		return [];
	}
	return hosts
		.split(',')
		.map((host) => host.trim())
		.filter((host) => host.length > 0)
		.map((host) => ({ host, port }));
}
