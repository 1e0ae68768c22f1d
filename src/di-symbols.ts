/*
 * SPDX-FileCopyrightText: syuilo and misskey-project
 * SPDX-License-Identifier: AGPL-3.0-only
 */

export const DI = {
	console: Symbol('console'),
	batchExecutor: Symbol('batchExecutor'),
};
