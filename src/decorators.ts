/*
 * SPDX-FileCopyrightText: syuilo and misskey-project
 * SPDX-License-Identifier: AGPL-3.0-only
 */

/**
 * Binds a method to its instance on first access, so it can be passed around as a callback.
 */
export function bindThis(target: object, key: string | symbol, descriptor: PropertyDescriptor): PropertyDescriptor {
	let fn: unknown = descriptor.value;

	if (typeof(fn) !== 'function') {
		throw new TypeError(`@bindThis decorator can only be applied to methods not: ${typeof(fn)}`);
	}

	return {
		configurable: true,
		get(this: object) {
			if (typeof(fn) !== 'function' || this === target || Object.hasOwn(this, key)) {
				return fn;
			}

			const boundFn: unknown = fn.bind(this);
			Object.defineProperty(this, key, {
				value: boundFn,
				configurable: true,
				writable: true,
			});
			return boundFn;
		},
		set(value: unknown) {
			fn = value;
		},
	};
}
