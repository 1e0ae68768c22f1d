/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import 'reflect-metadata';
import { Global, Module } from '@nestjs/common';
import { DI } from '@/di-symbols.js';
import { EnvService } from '@/global/EnvService.js';
import { NativeTimeService, TimeService } from '@/global/TimeService.js';
import { LoggerService } from '@/core/LoggerService.js';
import { KVLoaderService } from '@/core/KVLoaderService.js';
import { ConcurrentBatchExecutor } from '@/misc/ConcurrentBatchExecutor.js';
import type { Provider } from '@nestjs/common';

const $console: Provider = {
	provide: DI.console,
	useFactory: () => {
		// eslint-disable-next-line no-restricted-globals
		return global.console;
	},
};

const $timeService: Provider = {
	provide: TimeService,
	useClass: NativeTimeService,
};

const $batchExecutor: Provider = {
	provide: DI.batchExecutor,
	useExisting: ConcurrentBatchExecutor,
};

@Global()
@Module({
	providers: [
		$console,
		$timeService,
		$batchExecutor,
		EnvService,
		LoggerService,
		ConcurrentBatchExecutor,
		KVLoaderService,
	],
	exports: [
		$console,
		$timeService,
		$batchExecutor,
		EnvService,
		LoggerService,
		ConcurrentBatchExecutor,
		KVLoaderService,
	],
})
export class KVLoaderModule {}
