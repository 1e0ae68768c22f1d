/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

/**
 * Base class for all errors reported by a KVLoader.
 */
export class KVLoaderError extends Error {
	// Fix the error name in stack traces - https://stackoverflow.com/a/71573071
	override name = this.constructor.name;

	/**
	 * Name of the loader that produced this error.
	 */
	public readonly loaderName: string;

	constructor(
		loaderName: string,
		message?: string,
		options?: ErrorOptions,
	) {
		const actualMessage = message
			? `Error in loader ${loaderName}: ${message}`
			: `Error in loader ${loaderName}.`;
		super(actualMessage, options);

		this.loaderName = loaderName;
	}
}
