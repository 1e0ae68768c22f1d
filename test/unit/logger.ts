/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import { GodOfTimeService } from '../misc/GodOfTimeService.js';
import { MockEnvService } from '../misc/MockEnvService.js';
import { MockLoggerService, stripColors } from '../misc/MockLoggerService.js';
import Logger from '@/logger.js';

describe(Logger, () => {
	let mockEnvService: MockEnvService;
	let mockTimeService: GodOfTimeService;
	let mockLoggerService: MockLoggerService;
	let logger: Logger;

	beforeEach(() => {
		mockEnvService = new MockEnvService();
		mockTimeService = new GodOfTimeService();
		mockLoggerService = new MockLoggerService(mockEnvService, mockTimeService);
		mockLoggerService.unmute();
		logger = mockLoggerService.getLogger('core');
	});

	it('should be silent by default in tests', () => {
		mockEnvService.delete('KVL_QUIET');

		logger.info('hello');
		logger.error('broken');

		expect(mockLoggerService.mockConsole.info).not.toHaveBeenCalled();
		expect(mockLoggerService.mockConsole.error).not.toHaveBeenCalled();
	});

	it('should write info lines', () => {
		logger.info('hello');

		expect(mockLoggerService.mockConsole.info).toHaveBeenCalledTimes(1);
		expect(mockLoggerService.mockConsole.info.mock.calls[0]).toHaveLength(1);
		expect(stripColors(mockLoggerService.mockConsole.info.mock.calls[0][0])).toBe('INFO\t[core]\thello');
	});

	it('should write success lines to log', () => {
		logger.succ('finished');

		expect(stripColors(mockLoggerService.mockConsole.log.mock.calls[0][0])).toBe('DONE\t[core]\tfinished');
	});

	it('should include the contexts of sub-loggers', () => {
		logger.createSubLogger('users').warn('careful');

		expect(stripColors(mockLoggerService.mockConsole.warn.mock.calls[0][0])).toBe('WARN\t[core users]\tcareful');
	});

	it('should pass data through', () => {
		logger.info('hello', { id: 1 });

		expect(mockLoggerService.mockConsole.info.mock.calls[0][1]).toEqual({ id: 1 });
	});

	it('should render errors inline and attach them as data', () => {
		const err = new Error('boom', { cause: new Error('fuse') });

		logger.error(err);

		const args = mockLoggerService.mockConsole.error.mock.calls[0];
		expect(stripColors(args[0])).toBe('ERR \t[core]\tError: boom [caused by]: Error: fuse');
		expect(args[1]).toEqual({ error: err });
	});

	it('should skip debug lines unless verbose', () => {
		logger.debug('trace');
		expect(mockLoggerService.mockConsole.debug).not.toHaveBeenCalled();

		mockLoggerService.verbose = true;
		logger.debug('trace');
		expect(stripColors(mockLoggerService.mockConsole.debug.mock.calls[0][0])).toBe('VERB\t[core]\ttrace');
	});

	it('should prefix the time when enabled', () => {
		mockTimeService.resetTo(Date.UTC(2024, 0, 2, 3, 4, 5));
		mockEnvService.options.withLogTime = true;

		logger.info('hello');

		expect(stripColors(mockLoggerService.mockConsole.info.mock.calls[0][0])).toBe('2024-01-02T03:04:05.000Z INFO\t[core]\thello');
	});
});
