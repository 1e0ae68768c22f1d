/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import { Inject, Injectable } from '@nestjs/common';
import { bindThis } from '@/decorators.js';
import { DI } from '@/di-symbols.js';
import { EnvService } from '@/global/EnvService.js';
import { TimeService } from '@/global/TimeService.js';
import { LoggerService } from '@/core/LoggerService.js';
import { KVLoader, type BatchLoadFunction, type KVLoaderOpts, type KVLoaderServices } from '@/misc/KVLoader.js';
import type { BatchExecutor } from '@/misc/BatchExecutor.js';
import type Logger from '@/logger.js';

/**
 * Creates KVLoader instances that share the application's executor, logger, and environment.
 * Loaders are cheap and meant to be created per unit of work (one request, one job) and then dropped.
 */
@Injectable()
export class KVLoaderService {
	private readonly logger: Logger;

	constructor(
		@Inject(DI.batchExecutor)
		private readonly batchExecutor: BatchExecutor,

		private readonly envService: EnvService,
		private readonly timeService: TimeService,
		loggerService: LoggerService,
	) {
		this.logger = loggerService.getLogger('kv-loader', 'cyan');
	}

	private get loaderServices(): KVLoaderServices {
		return {
			executor: this.batchExecutor,
			logger: this.logger,
			envService: this.envService,
			timeService: this.timeService,
		};
	}

	@bindThis
	public create<TBatch, TKey, TValue extends NonNullable<unknown>>(
		name: string,
		loader: BatchLoadFunction<TBatch, TKey, TValue>,
		opts?: Omit<KVLoaderOpts<TBatch, TKey, TValue>, 'loader'>,
	): KVLoader<TBatch, TKey, TValue> {
		return new KVLoader(name, this.loaderServices, { ...opts, loader });
	}
}
