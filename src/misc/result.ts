/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

/**
 * Outcome of an operation that can fail, with the failure carried as a value instead of thrown.
 */
export type Result<T, E = unknown> = Success<T> | Failure<E>;

export interface Success<T> {
	readonly success: true;
	readonly result: T;
}

export interface Failure<E> {
	readonly success: false;
	readonly error: E;
}

export function success<T>(result: T): Success<T> {
	return { success: true, result };
}

export function failure<E>(error: E): Failure<E> {
	return { success: false, error };
}
