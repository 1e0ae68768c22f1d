/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import { Injectable } from '@nestjs/common';
import promiseLimit from 'promise-limit';
import { bindThis } from '@/decorators.js';
import { TimeService } from '@/global/TimeService.js';
import { BatchTimeoutError } from '@/misc/errors/BatchTimeoutError.js';
import { withCleanup, withSignal } from '@/misc/promiseUtils.js';
import { failure, success } from '@/misc/result.js';
import type { BatchExecutor, BatchExecutorOpts, BatchOutcome, BatchWork } from '@/misc/BatchExecutor.js';

/**
 * BatchExecutor that runs units of work in parallel, up to a concurrency limit.
 * When the deadline passes (or the caller's signal aborts), every unit that is still running or queued settles as a failure.
 * Units that already finished keep their results.
 */
@Injectable()
export class ConcurrentBatchExecutor implements BatchExecutor {
	constructor(
		private readonly timeService: TimeService,
	) {}

	@bindThis
	public async runBatches<TBatch, TKey, TOut>(
		batches: ReadonlyMap<TBatch, ReadonlySet<TKey>>,
		work: BatchWork<TBatch, TKey, TOut>,
		opts: BatchExecutorOpts,
	): Promise<BatchOutcome<TBatch, TOut>[]> {
		if (batches.size === 0) {
			return [];
		}

		const deadline = new AbortController();
		const signal = opts.signal
			? AbortSignal.any([deadline.signal, opts.signal])
			: deadline.signal;

		const timer = opts.timeout > 0
			? this.timeService.startTimer(() => deadline.abort(new BatchTimeoutError(opts.timeout)), opts.timeout)
			: null;

		const limiter = promiseLimit<BatchOutcome<TBatch, TOut>>(Math.max(opts.maxConcurrency, 1));

		const tasks = Array.from(batches, ([batchKey, keys]) => limiter(async (): Promise<BatchOutcome<TBatch, TOut>> => {
			try {
				const result = await withSignal(() => work(batchKey, keys, signal), signal);
				return [batchKey, success(result)];
			} catch (err) {
				return [batchKey, failure(err)];
			}
		}));

		// Outcomes keep the input order
		return await withCleanup(Promise.all(tasks), () => {
			if (timer) {
				this.timeService.stopTimer(timer);
			}
		});
	}
}
