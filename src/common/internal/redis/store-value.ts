/** A value read back from Redis: text when responses are decoded, raw bytes otherwise. */
export type StoreValue = string | Buffer;
