import { inspect } from 'node:util';
import { KVLoaderError } from '@/misc/errors/KVLoaderError.js';
import { renderInlineError } from '@/misc/render-inline-error.js';

/**
 * Recorded against every key of a batch when loading that batch failed.
 * The original failure is available as "reason" (and as "cause").
 */
export class LoadFailedError extends KVLoaderError {
	// Fix the error name in stack traces - https://stackoverflow.com/a/71573071
	override name = this.constructor.name;

	public readonly code = 'LOAD_FAILED';

	public readonly batchKey: unknown;

	/**
	 * Value thrown or rejected by the load function (or the executor).
	 */
	public readonly reason: unknown;

	constructor(loaderName: string, batchKey: unknown, reason: unknown) {
		super(loaderName, `Load failed for batch ${inspect(batchKey)}: ${renderInlineError(reason)}`, { cause: reason });

		this.batchKey = batchKey;
		this.reason = reason;
	}
}
