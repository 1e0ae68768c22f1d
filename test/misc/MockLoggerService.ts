/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import { jest } from '@jest/globals';
import { Injectable } from '@nestjs/common';
import { LoggerService } from '@/core/LoggerService.js';
import { bindThis } from '@/decorators.js';
import { MockEnvService } from './MockEnvService.js';
import { GodOfTimeService } from './GodOfTimeService.js';
import type { Console } from '@/logger.js';
import type { TimeService } from '@/global/TimeService.js';

export type MockConsole = {
	[K in keyof Console]: jest.Mock<(...args: unknown[]) => void>;
};

export function createMockConsole(): MockConsole {
	return {
		error: jest.fn<(...args: unknown[]) => void>(),
		warn: jest.fn<(...args: unknown[]) => void>(),
		info: jest.fn<(...args: unknown[]) => void>(),
		log: jest.fn<(...args: unknown[]) => void>(),
		debug: jest.fn<(...args: unknown[]) => void>(),
	};
}

/**
 * Mocked implementation of LoggerService.
 * Suppresses all log output to prevent console spam, and records calls for assertions.
 * Output is muted by default (as in any test process) - call unmute() to record it.
 */
@Injectable()
export class MockLoggerService extends LoggerService {
	/**
	 * Mocked Console implementation.
	 * All logs from all logger instances will be sent here.
	 */
	public readonly mockConsole: MockConsole;

	public readonly mockEnvService: MockEnvService;

	constructor(envService?: MockEnvService, timeService?: TimeService) {
		const mockConsole = createMockConsole();
		const mockEnvService = envService ?? new MockEnvService();
		super(mockConsole, timeService ?? new GodOfTimeService(), mockEnvService);

		this.mockConsole = mockConsole;
		this.mockEnvService = mockEnvService;
	}

	/**
	 * Controls the verbose flag for logger instances.
	 */
	public set verbose(value: boolean) {
		this.mockEnvService.options.verbose = value;
	}

	/**
	 * Turns off quiet mode so that log calls reach the mocked console.
	 */
	@bindThis
	public unmute(): void {
		this.mockEnvService.set('KVL_QUIET', '0');
	}

	/**
	 * Resets the instance to initial state.
	 * Mocks are reset, and flags are cleared.
	 */
	@bindThis
	public reset() {
		this.mockConsole.error.mockReset();
		this.mockConsole.warn.mockReset();
		this.mockConsole.info.mockReset();
		this.mockConsole.log.mockReset();
		this.mockConsole.debug.mockReset();

		this.mockEnvService.mockReset();
	}

	/**
	 * Asserts that no errors and/or warnings have been logged.
	 */
	@bindThis
	public assertNoErrors(opts?: { orWarnings?: boolean }): void {
		expect(this.mockConsole.error).not.toHaveBeenCalled();

		if (opts?.orWarnings) {
			expect(this.mockConsole.warn).not.toHaveBeenCalled();
		}
	}
}

/**
 * Removes terminal colors from a log line.
 */
export function stripColors(text: unknown): string {
	// eslint-disable-next-line no-control-regex
	return String(text).replace(/\u001b\[[0-9;]*m/g, '');
}
