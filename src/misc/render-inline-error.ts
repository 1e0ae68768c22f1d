/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import { inspect } from 'node:util';

/**
 * Renders an error, and its chain of causes, as a single line of text for use in logs and messages.
 */
export function renderInlineError(err: unknown): string {
	const parts: string[] = [];
	renderTo(err, parts, new Set());
	return parts.join('');
}

function renderTo(err: unknown, parts: string[], seen: Set<unknown>): void {
	seen.add(err);
	parts.push(printError(err));

	if (err instanceof AggregateError && err.errors.length > 0) {
		const inner = err.errors.map(e => renderInlineError(e));
		parts.push(` [${inner.join(', ')}]`);
	}

	if (err instanceof Error && err.cause != null && !seen.has(err.cause)) {
		parts.push(' [caused by]: ');
		renderTo(err.cause, parts, seen);
	}
}

function printError(err: unknown): string {
	if (err instanceof Error) {
		return err.message
			? `${err.name}: ${err.message}`
			: err.name;
	}

	if (typeof(err) === 'string') {
		return err;
	}

	return inspect(err);
}
