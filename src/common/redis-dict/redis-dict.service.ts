import { Injectable } from '@nestjs/common';
import { RedisDict } from './redis-dict';
import { HashStore, JsonValue } from './redis-dict.interface';

@Injectable()
export class RedisDictService {
	constructor(private readonly hashStore: HashStore) {}

	create<T extends JsonValue = JsonValue>(name: string): RedisDict<T> {
		return new RedisDict<T>(this.hashStore, name);
	}
}
