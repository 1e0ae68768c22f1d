/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import type { EnvService } from '@/global/EnvService.js';
import { ConfigError } from '@/misc/errors/ConfigError.js';

export interface LoaderConfig {
	/**
	 * Maximum number of batches to load at once.
	 * Excess batches are queued until earlier ones complete.
	 */
	maxConcurrency: number;

	/**
	 * Deadline for a whole run, in milliseconds.
	 * Zero disables the deadline.
	 */
	timeout: number;
}

export const DEFAULT_TIMEOUT = 30_000;

export const MAX_CONCURRENCY_ENV = 'KVL_MAX_CONCURRENCY';
export const TIMEOUT_ENV = 'KVL_TIMEOUT';

/**
 * Fills in and validates loader settings.
 * Explicit options take priority, then environment variables, then defaults.
 * Throws ConfigError if any value is out of range.
 */
export function resolveLoaderConfig(opts: Partial<LoaderConfig> | undefined, envService: EnvService): LoaderConfig {
	const maxConcurrency = opts?.maxConcurrency
		?? readEnvNumber(envService, MAX_CONCURRENCY_ENV, isPositiveInteger, 'a positive integer')
		?? envService.availableParallelism * 2;

	const timeout = opts?.timeout
		?? readEnvNumber(envService, TIMEOUT_ENV, isNonNegativeInteger, 'a non-negative integer')
		?? DEFAULT_TIMEOUT;

	if (!isPositiveInteger(maxConcurrency)) {
		throw new ConfigError(`Invalid maxConcurrency value "${maxConcurrency}": must be a positive integer.`);
	}

	if (!isNonNegativeInteger(timeout)) {
		throw new ConfigError(`Invalid timeout value "${timeout}": must be a non-negative integer.`);
	}

	return { maxConcurrency, timeout };
}

function readEnvNumber(envService: EnvService, name: string, isValid: (value: number) => boolean, expected: string): number | undefined {
	const raw = envService.env[name]?.trim();
	if (!raw) {
		return undefined;
	}

	const value = Number(raw);
	if (!isValid(value)) {
		throw new ConfigError(`Invalid ${name} value "${raw}": must be ${expected}.`);
	}

	return value;
}

function isPositiveInteger(value: number): boolean {
	return Number.isInteger(value) && value >= 1;
}

function isNonNegativeInteger(value: number): boolean {
	return Number.isInteger(value) && value >= 0;
}
