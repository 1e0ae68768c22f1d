/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import { inspect } from 'node:util';
import { renderInlineError } from '@/misc/render-inline-error.js';
import type { Result } from '@/misc/result.js';

export function throws<TError extends AnyConstructor>(errorClass: TError, callback: SyncCallback): InstanceType<TError> {
	let result: unknown = undefined;

	try {
		result = callback();
	}	catch (error) {
		expect(error).toBeInstanceOf(errorClass);
		return error as InstanceType<TError>;
	}

	const callbackName = callback.name || 'callback';
	const resultSummary = inspect(result);
	throw new Error(`assert.throws: expected ${callbackName} to throw ${errorClass.name}, but instead it returned: ${resultSummary}`, { cause: result });
}

export async function rejectsAsync<TError extends AnyConstructor>(errorClass: TError, promise: AnyPromise): Promise<InstanceType<TError>> {
	let result: unknown = undefined;

	try {
		result = await promise;
	}	catch (error) {
		expect(error).toBeInstanceOf(errorClass);
		return error as InstanceType<TError>;
	}

	const resultSummary = inspect(result);
	throw new Error(`assert.rejectsAsync: expected promise to reject with ${errorClass.name}, but instead it resolved with ${resultSummary}`, { cause: result });
}

/**
 * Asserts that a Result is a success, and returns the value.
 */
export function succeeds<T>(result: Result<T, unknown>): T {
	if (!result.success) {
		throw new Error(`assert.succeeds: expected a success, but got a failure: ${renderInlineError(result.error)}`, { cause: result.error });
	}

	return result.result;
}

/**
 * Asserts that a Result is a failure with the given type of error, and returns the error.
 */
export function fails<TError extends AnyConstructor>(errorClass: TError, result: Result<unknown, unknown>): InstanceType<TError> {
	if (result.success) {
		throw new Error(`assert.fails: expected ${errorClass.name}, but got a success: ${inspect(result.result)}`);
	}

	expect(result.error).toBeInstanceOf(errorClass);
	return result.error as InstanceType<TError>;
}

type AnyConstructor = abstract new(...args: never[]) => unknown;
type AnyPromise = Promise<unknown>;
type SyncCallback = () => unknown;
