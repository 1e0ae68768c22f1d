/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import 'reflect-metadata';
import { coreEnvService, coreLogger, coreTimeService } from '@/boot/coreLogger.js';
import { ConcurrentBatchExecutor } from '@/misc/ConcurrentBatchExecutor.js';
import { KVLoader, type BatchLoadFunction, type KVLoaderOpts } from '@/misc/KVLoader.js';

export { KVLoader } from '@/misc/KVLoader.js';
export type { BatchLoadFunction, CachedResult, FetchError, KVLoaderOpts, KVLoaderServices, LoaderMeta, RunOpts, RunSummary } from '@/misc/KVLoader.js';
export type { BatchExecutor, BatchExecutorOpts, BatchOutcome, BatchWork } from '@/misc/BatchExecutor.js';
export { ConcurrentBatchExecutor } from '@/misc/ConcurrentBatchExecutor.js';
export { failure, success, type Failure, type Result, type Success } from '@/misc/result.js';
export { KVLoaderError } from '@/misc/errors/KVLoaderError.js';
export { KeyNotFoundError } from '@/misc/errors/KeyNotFoundError.js';
export { UnknownBatchError } from '@/misc/errors/UnknownBatchError.js';
export { LoadFailedError } from '@/misc/errors/LoadFailedError.js';
export { BatchTimeoutError } from '@/misc/errors/BatchTimeoutError.js';
export { AbortedError } from '@/misc/errors/AbortedError.js';
export { ConfigError } from '@/misc/errors/ConfigError.js';
export { resolveLoaderConfig, DEFAULT_TIMEOUT, type LoaderConfig } from '@/config.js';
export { KVLoaderModule } from '@/KVLoaderModule.js';
export { KVLoaderService } from '@/core/KVLoaderService.js';
export { LoggerService } from '@/core/LoggerService.js';
export { EnvService } from '@/global/EnvService.js';
export { TimeService, NativeTimeService } from '@/global/TimeService.js';
export { default as Logger, type Console } from '@/logger.js';

const coreExecutor = new ConcurrentBatchExecutor(coreTimeService);

/**
 * Creates a standalone loader that uses the process-wide logger and environment.
 * Inside a Nest application, prefer KVLoaderService.create().
 */
export function createKVLoader<TBatch, TKey, TValue extends NonNullable<unknown>>(
	loader: BatchLoadFunction<TBatch, TKey, TValue>,
	opts?: Omit<KVLoaderOpts<TBatch, TKey, TValue>, 'loader'> & { name?: string },
): KVLoader<TBatch, TKey, TValue> {
	return new KVLoader(opts?.name ?? 'default', {
		executor: coreExecutor,
		logger: coreLogger,
		envService: coreEnvService,
		timeService: coreTimeService,
	}, {
		loader,
		maxConcurrency: opts?.maxConcurrency,
		timeout: opts?.timeout,
	});
}
