import { inspect } from 'node:util';
import { KVLoaderError } from '@/misc/errors/KVLoaderError.js';

/**
 * Reported when nothing has ever been loaded for a batch identifier.
 */
export class UnknownBatchError extends KVLoaderError {
	// Fix the error name in stack traces - https://stackoverflow.com/a/71573071
	override name = this.constructor.name;

	public readonly code = 'UNKNOWN_BATCH';

	public readonly batchKey: unknown;

	constructor(loaderName: string, batchKey: unknown) {
		super(loaderName, `Unable to find batch ${inspect(batchKey)}`);

		this.batchKey = batchKey;
	}
}
