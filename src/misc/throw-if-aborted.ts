/*
 * SPDX-FileCopyrightText: hazelnoot and other Sharkey contributors
 * SPDX-License-Identifier: AGPL-3.0-only
 */

import { AbortedError } from '@/misc/errors/AbortedError.js';

export function throwIfAborted(signal: AbortSignal): void {
	if (signal.aborted) {
		throw new AbortedError(signal);
	}
}
