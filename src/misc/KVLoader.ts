/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import { inspect } from 'node:util';
import { bindThis } from '@/decorators.js';
import { resolveLoaderConfig, type LoaderConfig } from '@/config.js';
import { renderInlineError } from '@/misc/render-inline-error.js';
import { failure, success, type Failure, type Result } from '@/misc/result.js';
import { KVLoaderError } from '@/misc/errors/KVLoaderError.js';
import { KeyNotFoundError } from '@/misc/errors/KeyNotFoundError.js';
import { UnknownBatchError } from '@/misc/errors/UnknownBatchError.js';
import { LoadFailedError } from '@/misc/errors/LoadFailedError.js';
import type { BatchExecutor, BatchOutcome } from '@/misc/BatchExecutor.js';
import type { EnvService } from '@/global/EnvService.js';
import type { TimeService } from '@/global/TimeService.js';
import type Logger from '@/logger.js';

export interface KVLoaderOpts<TBatch, TKey, TValue extends Value> extends Partial<LoaderConfig> {
	/**
	 * Callback to load the values for a set of keys belonging to one batch.
	 */
	loader: BatchLoadFunction<TBatch, TKey, TValue>;
}

export interface LoaderMeta<TBatch, TKey, TValue extends Value> {
	/**
	 * The loader instance that triggered this callback.
	 */
	readonly loader: KVLoader<TBatch, TKey, TValue>;

	/**
	 * AbortSignal that will fire when the run is cancelled or times out.
	 * Should be propagated to any I/O started by the callback.
	 */
	readonly signal: AbortSignal;
}

/**
 * Callback to load all requested keys of a batch in one go.
 * Should return the value for each key it could resolve; a Map works, as does any iterable of [key, value] pairs.
 * Keys may be omitted, or mapped to null/undefined, when no value exists. Those keys stay unresolved.
 * Throwing (or rejecting) fails the whole batch: the error is recorded against every requested key.
 * May be synchronous or async.
 */
export type BatchLoadFunction<TBatch, TKey, TValue extends Value> = (
	batchKey: TBatch,
	keys: ReadonlySet<TKey>,
	meta: LoaderMeta<TBatch, TKey, TValue>,
) => MaybePromise<Iterable<readonly [key: TKey, value: TValue | null | undefined]>>;

export interface KVLoaderServices {
	readonly executor: BatchExecutor;
	readonly logger: Logger;
	readonly envService: EnvService;
	readonly timeService: TimeService;
}

export interface RunOpts {
	/**
	 * Cancels the whole run. Batches that have not finished are recorded as failed.
	 */
	signal?: AbortSignal;
}

export interface RunSummary {
	/**
	 * Number of batches dispatched.
	 */
	batches: number;
	succeeded: number;
	failed: number;
	durationMs: number;
}

/**
 * Any of the reasons fetch() can fail.
 */
export type FetchError = KeyNotFoundError | UnknownBatchError | LoadFailedError;

export type CachedResult<TValue> = Result<TValue, LoadFailedError>;

// Make sure null / undefined cannot be a valid value
type Value = NonNullable<unknown>;
type MaybePromise<T> = T | Promise<T>;

/**
 * KVLoader collects point and bulk lookups, grouped by a batch identifier, and resolves them in as few loads as possible.
 * Calls to load() and loadMany() only record what is needed; run() then loads every pending batch at once, and fetch() reads the results.
 * Keys that are already resolved (including keys whose batch failed) are never loaded again.
 * Results live until the instance is discarded.
 */
export class KVLoader<TBatch, TKey, TValue extends Value = Value> {
	private readonly executor: BatchExecutor;
	private readonly timeService: TimeService;
	private readonly logger: Logger;
	private readonly config: Readonly<LoaderConfig>;

	private readonly pending = new Map<TBatch, Set<TKey>>();
	private readonly results = new Map<TBatch, Map<TKey, CachedResult<TValue>>>();

	public readonly loader: BatchLoadFunction<TBatch, TKey, TValue>;

	/**
	 * @param name Name of the loader, used in logs and error messages
	 * @param services Executor, logger, and environment
	 * @param opts Loader options
	 */
	constructor(
		public readonly name: string,
		services: KVLoaderServices,
		opts: KVLoaderOpts<TBatch, TKey, TValue>,
	) {
		this.config = resolveLoaderConfig(opts, services.envService);
		this.executor = services.executor;
		this.timeService = services.timeService;
		this.logger = services.logger.createSubLogger(name);
		this.loader = opts.loader;
	}

	private get nameForError() {
		return `KVLoader[${this.name}]`;
	}

	/**
	 * Maximum number of batches loaded at once during run().
	 */
	public get maxConcurrency(): number {
		return this.config.maxConcurrency;
	}

	/**
	 * Deadline for a single run(), in milliseconds. Zero means no deadline.
	 */
	public get timeout(): number {
		return this.config.timeout;
	}

	/**
	 * Requests a single key.
	 * Does nothing if the key is null/undefined or already has a cached result (including a cached error).
	 */
	@bindThis
	public load(batchKey: TBatch, key: TKey | null | undefined): this {
		if (key == null) {
			return this;
		}

		const cached = this.fetch(batchKey, key);
		if (!cached.success && !(cached.error instanceof LoadFailedError)) {
			this.addPending(batchKey, [key]);
		}

		return this;
	}

	/**
	 * Requests multiple keys from the same batch.
	 * Keys that already have a cached result are skipped.
	 */
	@bindThis
	public loadMany(batchKey: TBatch, keys: Iterable<TKey> | null | undefined): this {
		if (keys == null) {
			return this;
		}

		const requested = new Set(keys);
		if (requested.size === 0) {
			return this;
		}

		const batch = this.results.get(batchKey);
		if (batch) {
			const toLoad = new Set<TKey>();
			for (const key of requested) {
				if (!batch.has(key)) {
					toLoad.add(key);
				}
			}

			if (toLoad.size > 0) {
				this.addPending(batchKey, toLoad);
			}
		} else {
			// Nothing cached for this batch, so there's no need to check each key.
			this.addPending(batchKey, requested);
		}

		return this;
	}

	/**
	 * Returns true if any keys are waiting for run().
	 */
	@bindThis
	public hasPendingBatches(): boolean {
		return this.pending.size > 0;
	}

	/**
	 * Returns the keys of a batch that are waiting for run(), or undefined if there are none.
	 */
	@bindThis
	public getPendingKeys(batchKey: TBatch): ReadonlySet<TKey> | undefined {
		return this.pending.get(batchKey);
	}

	/**
	 * Loads everything that is pending, one call to the load function per batch.
	 * Pending requests are cleared as soon as the run starts; anything requested during the run waits for the next one.
	 * Never rejects because a batch failed: failures are cached against each requested key instead.
	 */
	@bindThis
	public async run(opts?: RunOpts): Promise<RunSummary> {
		if (this.pending.size === 0) {
			return { batches: 0, succeeded: 0, failed: 0, durationMs: 0 };
		}

		const batches: ReadonlyMap<TBatch, ReadonlySet<TKey>> = new Map(this.pending);
		this.pending.clear();

		const startTime = this.timeService.now;
		this.logger.debug(`Loading ${batches.size} batch(es) with concurrency ${this.config.maxConcurrency} and timeout ${this.config.timeout}ms`);

		let outcomes: BatchOutcome<TBatch, Map<TKey, TValue>>[];
		try {
			outcomes = await this.executor.runBatches(batches, this.runBatch, {
				maxConcurrency: this.config.maxConcurrency,
				timeout: this.config.timeout,
				signal: opts?.signal,
			});
		} catch (err) {
			// The executor itself broke, so none of the batches have an outcome.
			this.logger.error(`Batch executor failed: ${renderInlineError(err)}`);
			outcomes = Array.from(batches.keys(), (batchKey): BatchOutcome<TBatch, Map<TKey, TValue>> => [batchKey, failure(err)]);
		}

		let succeeded = 0;
		let failed = 0;
		const settled = new Set<TBatch>();

		for (const [batchKey, outcome] of outcomes) {
			const keys = batches.get(batchKey);
			if (keys === undefined || settled.has(batchKey)) {
				continue;
			}
			settled.add(batchKey);

			if (outcome.success) {
				this.mergeValues(batchKey, outcome.result);
				succeeded++;
			} else {
				this.logger.warn(`Batch ${inspect(batchKey)} failed for ${keys.size} key(s): ${renderInlineError(outcome.error)}`);
				this.mergeFailure(batchKey, keys, outcome.error);
				failed++;
			}
		}

		// Every dispatched batch must end up in the cache, even if the executor lost track of it.
		for (const [batchKey, keys] of batches) {
			if (!settled.has(batchKey)) {
				this.mergeFailure(batchKey, keys, new KVLoaderError(this.nameForError, `Executor reported no outcome for batch ${inspect(batchKey)}`));
				failed++;
			}
		}

		const durationMs = this.timeService.now - startTime;
		this.logger.debug(`Loaded ${batches.size} batch(es) - succeeded: ${succeeded}, failed: ${failed}, duration: ${durationMs}ms`);

		return { batches: batches.size, succeeded, failed, durationMs };
	}

	/**
	 * Reads a single cached result.
	 * Returns the cached value or cached error, UnknownBatchError if the batch has never been loaded,
	 * or KeyNotFoundError if the batch has been loaded but holds nothing for this key.
	 */
	@bindThis
	public fetch(batchKey: TBatch, key: TKey): Result<TValue, FetchError> {
		const batch = this.results.get(batchKey);
		if (!batch) {
			return failure(new UnknownBatchError(this.nameForError, batchKey));
		}

		const cached = batch.get(key);
		if (!cached) {
			return failure(new KeyNotFoundError(this.nameForError, batchKey, key));
		}

		return cached;
	}

	/**
	 * Reads multiple cached results from the same batch, in order.
	 * Stops at the first key that fails and returns only that failure.
	 */
	@bindThis
	public fetchMany(batchKey: TBatch, keys: Iterable<TKey>): Result<TValue[], FetchError> {
		const values: TValue[] = [];

		for (const key of keys) {
			const result = this.fetch(batchKey, key);
			if (!result.success) {
				return result;
			}
			values.push(result.result);
		}

		return success(values);
	}

	/**
	 * Stores a result directly, without going through the load function.
	 * Failures are wrapped in LoadFailedError unless they already are one.
	 * Does nothing if the result is null/undefined.
	 */
	@bindThis
	public put(batchKey: TBatch, key: TKey, result: Result<TValue, unknown> | null | undefined): this {
		if (result == null) {
			return this;
		}

		const entry: CachedResult<TValue> = result.success
			? result
			: this.toLoadFailure(batchKey, result.error);
		this.getOrCreateBatch(batchKey).set(key, entry);

		return this;
	}

	/**
	 * Unit of work handed to the executor for each batch.
	 */
	@bindThis
	private async runBatch(batchKey: TBatch, keys: ReadonlySet<TKey>, signal: AbortSignal): Promise<Map<TKey, TValue>> {
		const loaded = await this.loader(batchKey, keys, { loader: this, signal });

		const values = new Map<TKey, TValue>();
		for (const [key, value] of loaded) {
			if (value != null) {
				values.set(key, value);
			}
		}
		return values;
	}

	private addPending(batchKey: TBatch, keys: Iterable<TKey>): void {
		let batch = this.pending.get(batchKey);
		if (!batch) {
			batch = new Set();
			this.pending.set(batchKey, batch);
		}

		for (const key of keys) {
			batch.add(key);
		}
	}

	private getOrCreateBatch(batchKey: TBatch): Map<TKey, CachedResult<TValue>> {
		let batch = this.results.get(batchKey);
		if (!batch) {
			batch = new Map();
			this.results.set(batchKey, batch);
		}
		return batch;
	}

	private mergeValues(batchKey: TBatch, values: ReadonlyMap<TKey, TValue>): void {
		const batch = this.getOrCreateBatch(batchKey);
		for (const [key, value] of values) {
			batch.set(key, success(value));
		}
	}

	private mergeFailure(batchKey: TBatch, keys: Iterable<TKey>, reason: unknown): void {
		const batch = this.getOrCreateBatch(batchKey);
		const entry = this.toLoadFailure(batchKey, reason);
		for (const key of keys) {
			batch.set(key, entry);
		}
	}

	private toLoadFailure(batchKey: TBatch, reason: unknown): Failure<LoadFailedError> {
		const error = reason instanceof LoadFailedError
			? reason
			: new LoadFailedError(this.nameForError, batchKey, reason);
		return failure(error);
	}
}
