/**
 * Relay configuration: defaults plus `SIGNAL_RELAY_*` overrides.
 *
 * | Variable                               | Field                   |
 * |----------------------------------------|-------------------------|
 * | `SIGNAL_RELAY_LOCAL_HOST`              | `localHost`             |
 * | `SIGNAL_RELAY_LOCAL_PORT`              | `localPort`             |
 * | `SIGNAL_RELAY_LOCAL_SECRET_KEY`        | `localSecretKey`        |
 * | `SIGNAL_RELAY_UPSTREAM_HOST`           | `upstream.host`         |
 * | `SIGNAL_RELAY_UPSTREAM_PORT`           | `upstream.port`         |
 * | `SIGNAL_RELAY_SECRET_KEY`              | `upstream.secretKey` (required) |
 * | `SIGNAL_RELAY_UPSTREAM_TLS`            | `upstream.tls`          |
 * | `SIGNAL_RELAY_UPSTREAM_TLS_INSECURE`   | `upstream.tls.rejectUnauthorized` (inverted) |
 * | `SIGNAL_RELAY_CONNECT_TIMEOUT_MS`      | `connectTimeoutMs`      |
 * | `SIGNAL_RELAY_AUTH_TIMEOUT_MS`         | `authTimeoutMs`         |
 * | `SIGNAL_RELAY_HEARTBEAT_INTERVAL_MS`   | `heartbeatIntervalMs`   |
 * | `SIGNAL_RELAY_HEARTBEAT_TIMEOUT_MS`    | `heartbeatTimeoutMs`    |
 * | `SIGNAL_RELAY_MAX_FRAME_BYTES`         | `maxFrameBytes`         |
 * | `SIGNAL_RELAY_BACKOFF_BASE_MS`         | `backoff.baseDelayMs`   |
 * | `SIGNAL_RELAY_BACKOFF_MAX_MS`          | `backoff.maxDelayMs`    |
 * | `SIGNAL_RELAY_MAX_OUTBOUND_QUEUE`      | `maxOutboundQueue`      |
 * | `SIGNAL_RELAY_OVERFLOW_POLICY`         | `overflowPolicy`        |
 * | `SIGNAL_RELAY_LOG_LEVEL`               | `logLevel`              |
 */

import { isLogLevel } from "../lib/logger/index.js";
import type { LogLevel } from "../lib/logger/index.js";
import { DEFAULT_MAX_FRAME_BYTES } from "../protocol/frame-codec.js";
import type { UpstreamTlsOptions } from "../session/upstream-session.js";
import {
	ENV_PREFIX,
	readBoolean,
	readParsed,
	readPort,
	readPositiveInt,
	readString,
} from "../shared/config.js";
import { ConfigError } from "../shared/errors.js";
import type { BackoffConfig } from "./backoff.js";
import { OverflowPolicy } from "./types.js";

export interface UpstreamEndpoint {
	readonly host: string;
	readonly port: number;
	readonly secretKey: string;
	/** Null connects over plain TCP. */
	readonly tls: UpstreamTlsOptions | null;
}

export interface RelayConfig {
	readonly localHost: string;
	readonly localPort: number;
	/** Null lets local producers in without authenticating. */
	readonly localSecretKey: string | null;
	readonly upstream: UpstreamEndpoint;
	readonly connectTimeoutMs: number;
	readonly authTimeoutMs: number;
	readonly heartbeatIntervalMs: number;
	/** Idle limit for local sessions and for the upstream link. */
	readonly heartbeatTimeoutMs: number;
	readonly maxFrameBytes: number;
	readonly backoff: BackoffConfig;
	readonly maxOutboundQueue: number;
	readonly overflowPolicy: OverflowPolicy;
	readonly logLevel: LogLevel;
}

export const DEFAULT_RELAY_CONFIG: RelayConfig = {
	localHost: "127.0.0.1",
	localPort: 7777,
	localSecretKey: null,
	upstream: { host: "127.0.0.1", port: 8888, secretKey: "", tls: null },
	connectTimeoutMs: 10_000,
	authTimeoutMs: 10_000,
	heartbeatIntervalMs: 20_000,
	heartbeatTimeoutMs: 60_000,
	maxFrameBytes: DEFAULT_MAX_FRAME_BYTES,
	backoff: { baseDelayMs: 10_000, maxDelayMs: 60_000 },
	maxOutboundQueue: 1_000,
	overflowPolicy: OverflowPolicy.Reject,
	logLevel: "info",
};

type Env = Readonly<Record<string, string | undefined>>;

const POLICIES: readonly OverflowPolicy[] = [OverflowPolicy.Reject, OverflowPolicy.DropOldest];

function parsePolicy(raw: string): OverflowPolicy | null {
	return POLICIES.find((p) => p === raw.toLowerCase()) ?? null;
}

/** Builds the relay config from the environment. Throws ConfigError on invalid or missing values. */
export function relayConfigFromEnv(env: Env, base: RelayConfig = DEFAULT_RELAY_CONFIG): RelayConfig {
	const secretKey = readString(env, "SECRET_KEY") ?? base.upstream.secretKey;
	if (secretKey.length === 0) {
		throw new ConfigError(`${ENV_PREFIX}SECRET_KEY is required`);
	}

	const backoff: BackoffConfig = {
		...base.backoff,
		baseDelayMs: readPositiveInt(env, "BACKOFF_BASE_MS") ?? base.backoff.baseDelayMs,
		maxDelayMs: readPositiveInt(env, "BACKOFF_MAX_MS") ?? base.backoff.maxDelayMs,
	};
	if (backoff.maxDelayMs < backoff.baseDelayMs) {
		throw new ConfigError(`${ENV_PREFIX}BACKOFF_MAX_MS must not be below ${ENV_PREFIX}BACKOFF_BASE_MS`);
	}

	return {
		localHost: readString(env, "LOCAL_HOST") ?? base.localHost,
		localPort: readPort(env, "LOCAL_PORT") ?? base.localPort,
		localSecretKey: readString(env, "LOCAL_SECRET_KEY") ?? base.localSecretKey,
		upstream: {
			host: readString(env, "UPSTREAM_HOST") ?? base.upstream.host,
			port: readPort(env, "UPSTREAM_PORT") ?? base.upstream.port,
			secretKey,
			tls: readUpstreamTls(env, base.upstream.tls),
		},
		connectTimeoutMs: readPositiveInt(env, "CONNECT_TIMEOUT_MS") ?? base.connectTimeoutMs,
		authTimeoutMs: readPositiveInt(env, "AUTH_TIMEOUT_MS") ?? base.authTimeoutMs,
		heartbeatIntervalMs: readPositiveInt(env, "HEARTBEAT_INTERVAL_MS") ?? base.heartbeatIntervalMs,
		heartbeatTimeoutMs: readPositiveInt(env, "HEARTBEAT_TIMEOUT_MS") ?? base.heartbeatTimeoutMs,
		maxFrameBytes: readPositiveInt(env, "MAX_FRAME_BYTES") ?? base.maxFrameBytes,
		backoff,
		maxOutboundQueue: readPositiveInt(env, "MAX_OUTBOUND_QUEUE") ?? base.maxOutboundQueue,
		overflowPolicy:
			readParsed(env, "OVERFLOW_POLICY", "reject or drop_oldest", parsePolicy) ?? base.overflowPolicy,
		logLevel:
			readParsed(env, "LOG_LEVEL", "a log level (trace, debug, info, warn, error, fatal, silent)", (raw) =>
				isLogLevel(raw) ? raw : null,
			) ?? base.logLevel,
	};
}

function readUpstreamTls(env: Env, fallback: UpstreamTlsOptions | null): UpstreamTlsOptions | null {
	const enabled = readBoolean(env, "UPSTREAM_TLS");
	if (enabled === false) return null;
	const insecure = readBoolean(env, "UPSTREAM_TLS_INSECURE");
	if (enabled === undefined) {
		if (fallback === null || insecure === undefined) return fallback;
		return { ...fallback, rejectUnauthorized: !insecure };
	}
	return { ...fallback, rejectUnauthorized: !(insecure ?? false) };
}
