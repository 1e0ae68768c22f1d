/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import type { Result } from '@/misc/result.js';

export interface BatchExecutorOpts {
	/**
	 * Maximum number of units of work to run at once.
	 */
	maxConcurrency: number;

	/**
	 * Deadline for the whole call, in milliseconds. Zero disables it.
	 */
	timeout: number;

	/**
	 * Optional signal to cancel the whole call.
	 */
	signal?: AbortSignal;
}

/**
 * Unit of work for a single batch.
 * The signal fires when the call is cancelled or times out, and should be propagated to any I/O.
 */
export type BatchWork<TBatch, TKey, TOut> = (batchKey: TBatch, keys: ReadonlySet<TKey>, signal: AbortSignal) => Promise<TOut>;

export type BatchOutcome<TBatch, TOut> = [batchKey: TBatch, result: Result<TOut, unknown>];

/**
 * Runs one unit of work per batch identifier.
 * Implementations must report exactly one outcome for every input batch, and must not reject because a unit failed.
 */
export interface BatchExecutor {
	runBatches<TBatch, TKey, TOut>(
		batches: ReadonlyMap<TBatch, ReadonlySet<TKey>>,
		work: BatchWork<TBatch, TKey, TOut>,
		opts: BatchExecutorOpts,
	): Promise<BatchOutcome<TBatch, TOut>[]>;
}
