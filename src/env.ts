/*
 * SPDX-FileCopyrightText: syuilo and misskey-project
 * SPDX-License-Identifier: AGPL-3.0-only
 */

export interface EnvOption {
	verbose: boolean;
	withLogTime: boolean;
	quiet: boolean;
	[key: string]: boolean;
}

const defaultEnvOption: Readonly<EnvOption> = {
	verbose: false,
	withLogTime: false,
	quiet: false,
};

const testEnvOption: Readonly<EnvOption> = {
	...defaultEnvOption,
	quiet: true,
};

/**
 * Maps an option name to its environment variable, for example "withLogTime" to "KVL_WITH_LOG_TIME".
 */
export function translateKey(key: string): string {
	return 'KVL_' + key.replace(/[A-Z]/g, letter => `_${letter}`).toUpperCase();
}

export function createEnvOptions(getEnv: () => Partial<Record<string, string>>): EnvOption {
	const target: EnvOption = { ...defaultEnvOption };

	return new Proxy(target, {
		get(target, key) {
			if (typeof(key) !== 'string') {
				return Reflect.get(target, key);
			}

			const env = getEnv();
			const envKey = translateKey(key);
			if (envKey in env) {
				const envValue = env[envKey]?.toLowerCase();
				return !!envValue && envValue !== '0' && envValue !== 'false';
			}

			const def = env.NODE_ENV === 'test' ? testEnvOption : defaultEnvOption;
			if (key in def) {
				return def[key];
			}

			return false;
		},
		set(target, key, value) {
			if (typeof(key) !== 'string') {
				return Reflect.set(target, key, value);
			}

			const env = getEnv();
			const envKey = translateKey(key);
			if (value) {
				env[envKey] = '1';
			} else {
				delete env[envKey];
			}
			return true;
		},
		has(target, key): boolean {
			return typeof(key) === 'string' || key in target;
		},
		deleteProperty(target, key): boolean {
			if (typeof(key) !== 'string') {
				return Reflect.deleteProperty(target, key);
			}

			const env = getEnv();
			delete env[translateKey(key)];
			return true;
		},
	});
}
