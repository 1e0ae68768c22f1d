/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import { renderInlineError } from '@/misc/render-inline-error.js';

describe(renderInlineError, () => {
	it('should render name and message', () => {
		expect(renderInlineError(new TypeError('bad type'))).toBe('TypeError: bad type');
	});

	it('should render only the name when there is no message', () => {
		expect(renderInlineError(new Error())).toBe('Error');
	});

	it('should render the cause chain', () => {
		const err = new Error('outer', { cause: new TypeError('inner') });

		expect(renderInlineError(err)).toBe('Error: outer [caused by]: TypeError: inner');
	});

	it('should stop at a circular cause', () => {
		const err = new Error('loop');
		err.cause = err;

		expect(renderInlineError(err)).toBe('Error: loop');
	});

	it('should render inner errors of an AggregateError', () => {
		const err = new AggregateError([new Error('a'), new Error('b')], 'many');

		expect(renderInlineError(err)).toBe('AggregateError: many [Error: a, Error: b]');
	});

	it('should return strings as-is', () => {
		expect(renderInlineError('plain reason')).toBe('plain reason');
	});

	it('should inspect other values', () => {
		expect(renderInlineError({ code: 42 })).toBe('{ code: 42 }');
	});
});
