import { inspect } from 'node:util';
import { KVLoaderError } from '@/misc/errors/KVLoaderError.js';

/**
 * Reported when a batch has been loaded, but it holds no value for the requested key.
 * The key was either never requested, or the loader did not return it.
 */
export class KeyNotFoundError extends KVLoaderError {
	// Fix the error name in stack traces - https://stackoverflow.com/a/71573071
	override name = this.constructor.name;

	public readonly code = 'NOT_FOUND';

	public readonly batchKey: unknown;
	public readonly key: unknown;

	constructor(loaderName: string, batchKey: unknown, key: unknown) {
		super(loaderName, `No value for key ${inspect(key)} in batch ${inspect(batchKey)}`);

		this.batchKey = batchKey;
		this.key = key;
	}
}
