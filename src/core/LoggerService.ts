/*
 * SPDX-FileCopyrightText: syuilo and misskey-project
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import { Inject, Injectable } from '@nestjs/common';
import Logger, { type Console } from '@/logger.js';
import { TimeService } from '@/global/TimeService.js';
import { EnvService } from '@/global/EnvService.js';
import { bindThis } from '@/decorators.js';
import { DI } from '@/di-symbols.js';

@Injectable()
export class LoggerService {
	constructor(
		@Inject(DI.console)
		protected readonly console: Console,

		protected readonly timeService: TimeService,
		protected readonly envService: EnvService,
	) {
	}

	@bindThis
	public getLogger(domain: string, color?: string) {
		return new Logger(domain, color, this.envService, this.timeService, this.console);
	}
}
