/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

/**
 * Takes a callback of any kind (returns or throws, synchronously or asynchronously) and wraps its result in a Promise.
 * Stand-in for https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Promise/try
 */
export function promiseTry<T, U extends unknown[]>(callbackFn: (...args: U) => T | PromiseLike<T>, ...args: U): Promise<Awaited<T>> {
	try {
		// async return or throw, or sync return
		return Promise.resolve(callbackFn(...args));
	}	catch (err) {
		// sync throw
		return Promise.reject(err);
	}
}
