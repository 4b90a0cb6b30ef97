/**
 * Environment readers shared by the server and relay configuration.
 *
 * One explicit parse function per value type. A malformed value throws
 * ConfigError naming the variable; an unset or empty variable yields undefined
 * so callers fall back to the defaults.
 */

import { ConfigError } from "./errors.js";

/** Prefix of every environment variable the relay and server read. */
export const ENV_PREFIX = "SIGNAL_RELAY_";

type Env = Readonly<Record<string, string | undefined>>;

function rawEnv(env: Env, key: string): string | undefined {
	const raw = env[`${ENV_PREFIX}${key}`];
	if (raw === undefined || raw.trim().length === 0) return undefined;
	return raw;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

/** Reads a string variable verbatim. */
export function readString(env: Env, key: string): string | undefined {
	return rawEnv(env, key);
}

/** Reads an integer > 0. */
export function readPositiveInt(env: Env, key: string): number | undefined {
	const raw = rawEnv(env, key);
	if (raw === undefined) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed <= 0) {
		throw new ConfigError(`Invalid ${ENV_PREFIX}${key}: "${raw}" must be a positive integer`);
	}
	return parsed;
}

/** Reads an integer >= 0. */
export function readNonNegativeInt(env: Env, key: string): number | undefined {
	const raw = rawEnv(env, key);
	if (raw === undefined) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < 0) {
		throw new ConfigError(`Invalid ${ENV_PREFIX}${key}: "${raw}" must be a non-negative integer`);
	}
	return parsed;
}

/** Reads a TCP port in 0..65535 (0 asks the OS for a free port). */
export function readPort(env: Env, key: string): number | undefined {
	const port = readNonNegativeInt(env, key);
	if (port !== undefined && port > 65_535) {
		throw new ConfigError(`Invalid ${ENV_PREFIX}${key}: "${port}" is not a valid port`);
	}
	return port;
}

/** Reads `true`/`false`/`1`/`0` (case-insensitive). */
export function readBoolean(env: Env, key: string): boolean | undefined {
	const raw = rawEnv(env, key);
	if (raw === undefined) return undefined;
	const normalized = raw.trim().toLowerCase();
	if (normalized === "true" || normalized === "1") return true;
	if (normalized === "false" || normalized === "0") return false;
	throw new ConfigError(`Invalid ${ENV_PREFIX}${key}: "${raw}" must be true or false`);
}

/** Reads a value and narrows it with `parse`, which returns null for invalid input. */
export function readParsed<T>(
	env: Env,
	key: string,
	expected: string,
	parse: (raw: string) => T | null,
): T | undefined {
	const raw = rawEnv(env, key);
	if (raw === undefined) return undefined;
	const parsed = parse(raw.trim());
	if (parsed === null) {
		throw new ConfigError(`Invalid ${ENV_PREFIX}${key}: "${raw}" must be ${expected}`);
	}
	return parsed;
}
