/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

/**
 * Abort reason used when a run exceeds its deadline.
 */
export class BatchTimeoutError extends Error {
	// Fix the error name in stack traces - https://stackoverflow.com/a/71573071
	override name = this.constructor.name;

	public readonly timeout: number;

	constructor(timeout: number) {
		super(`Run timed out after ${timeout} ms`);
		this.timeout = timeout;
	}
}
