/**
 * Signal server configuration: defaults plus `SIGNAL_RELAY_*` overrides.
 *
 * | Variable                         | Field                        |
 * |----------------------------------|------------------------------|
 * | `SIGNAL_RELAY_SERVER_HOST`       | `host`                       |
 * | `SIGNAL_RELAY_SERVER_PORT`       | `port`                       |
 * | `SIGNAL_RELAY_SECRET_KEY`        | `secretKey` (required)       |
 * | `SIGNAL_RELAY_AUTH_TIMEOUT_MS`   | `authTimeoutMs`              |
 * | `SIGNAL_RELAY_HEARTBEAT_TIMEOUT_MS` | `heartbeatTimeoutMs`      |
 * | `SIGNAL_RELAY_MAX_FRAME_BYTES`   | `maxFrameBytes`              |
 * | `SIGNAL_RELAY_TLS_CERT_PATH`     | `tls.certPath`               |
 * | `SIGNAL_RELAY_TLS_KEY_PATH`      | `tls.keyPath`                |
 * | `SIGNAL_RELAY_DAILY_CAP`         | `admission.dailyCap`         |
 * | `SIGNAL_RELAY_MIN_INTERVAL_MS`   | `admission.minIntervalMs`    |
 * | `SIGNAL_RELAY_TRADING_START`     | `admission.tradingHours`     |
 * | `SIGNAL_RELAY_TRADING_END`       | `admission.tradingHours`     |
 * | `SIGNAL_RELAY_STALENESS_MS`      | `retry.stalenessMs`          |
 * | `SIGNAL_RELAY_MAX_RETRIES`       | `retry.maxRetries`           |
 * | `SIGNAL_RELAY_RETRY_DELAY_MS`    | `retry.retryDelayMs`         |
 * | `SIGNAL_RELAY_REPORT_FILE`       | `reportFile`                 |
 * | `SIGNAL_RELAY_LOG_LEVEL`         | `logLevel`                   |
 */

import { DEFAULT_ADMISSION_CONFIG } from "../admission/admission-controller.js";
import { parseTimeOfDay } from "../admission/time-of-day.js";
import type { AdmissionConfig, TradingHours } from "../admission/types.js";
import { isLogLevel } from "../lib/logger/index.js";
import type { LogLevel } from "../lib/logger/index.js";
import { DEFAULT_MAX_FRAME_BYTES } from "../protocol/frame-codec.js";
import { DEFAULT_RETRY_CONFIG } from "../retry/retry-queue.js";
import type { RetryConfig } from "../retry/types.js";
import {
	ENV_PREFIX,
	readNonNegativeInt,
	readParsed,
	readPort,
	readPositiveInt,
	readString,
} from "../shared/config.js";
import { ConfigError } from "../shared/errors.js";

export interface ServerTlsConfig {
	readonly certPath: string;
	readonly keyPath: string;
}

export interface ServerConfig {
	readonly host: string;
	readonly port: number;
	readonly secretKey: string;
	readonly authTimeoutMs: number;
	readonly heartbeatTimeoutMs: number;
	readonly maxFrameBytes: number;
	/** TLS when both paths are set; null serves plain TCP. */
	readonly tls: ServerTlsConfig | null;
	readonly admission: AdmissionConfig;
	readonly retry: RetryConfig;
	/** JSONL file for operator reports; null keeps them in memory. */
	readonly reportFile: string | null;
	readonly logLevel: LogLevel;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
	host: "0.0.0.0",
	port: 8888,
	secretKey: "",
	authTimeoutMs: 10_000,
	heartbeatTimeoutMs: 60_000,
	maxFrameBytes: DEFAULT_MAX_FRAME_BYTES,
	tls: null,
	admission: DEFAULT_ADMISSION_CONFIG,
	retry: DEFAULT_RETRY_CONFIG,
	reportFile: null,
	logLevel: "info",
};

type Env = Readonly<Record<string, string | undefined>>;

const TIME_OF_DAY = "a time of day HH:MM[:SS]";
const LOG_LEVEL = "a log level (trace, debug, info, warn, error, fatal, silent)";

/** Builds the server config from the environment. Throws ConfigError on invalid or missing values. */
export function serverConfigFromEnv(env: Env, base: ServerConfig = DEFAULT_SERVER_CONFIG): ServerConfig {
	const secretKey = readString(env, "SECRET_KEY") ?? base.secretKey;
	if (secretKey.length === 0) {
		throw new ConfigError(`${ENV_PREFIX}SECRET_KEY is required`);
	}

	return {
		host: readString(env, "SERVER_HOST") ?? base.host,
		port: readPort(env, "SERVER_PORT") ?? base.port,
		secretKey,
		authTimeoutMs: readPositiveInt(env, "AUTH_TIMEOUT_MS") ?? base.authTimeoutMs,
		heartbeatTimeoutMs: readPositiveInt(env, "HEARTBEAT_TIMEOUT_MS") ?? base.heartbeatTimeoutMs,
		maxFrameBytes: readPositiveInt(env, "MAX_FRAME_BYTES") ?? base.maxFrameBytes,
		tls: readTls(env, base.tls),
		admission: {
			dailyCap: readNonNegativeInt(env, "DAILY_CAP") ?? base.admission.dailyCap,
			minIntervalMs: readNonNegativeInt(env, "MIN_INTERVAL_MS") ?? base.admission.minIntervalMs,
			tradingHours: readTradingHours(env, base.admission.tradingHours),
		},
		retry: {
			stalenessMs: readPositiveInt(env, "STALENESS_MS") ?? base.retry.stalenessMs,
			maxRetries: readPositiveInt(env, "MAX_RETRIES") ?? base.retry.maxRetries,
			retryDelayMs: readNonNegativeInt(env, "RETRY_DELAY_MS") ?? base.retry.retryDelayMs,
		},
		reportFile: readString(env, "REPORT_FILE") ?? base.reportFile,
		logLevel: readParsed(env, "LOG_LEVEL", LOG_LEVEL, (raw) => (isLogLevel(raw) ? raw : null)) ?? base.logLevel,
	};
}

function readTls(env: Env, fallback: ServerTlsConfig | null): ServerTlsConfig | null {
	const certPath = readString(env, "TLS_CERT_PATH");
	const keyPath = readString(env, "TLS_KEY_PATH");
	if (certPath === undefined && keyPath === undefined) return fallback;
	if (certPath === undefined || keyPath === undefined) {
		throw new ConfigError(`${ENV_PREFIX}TLS_CERT_PATH and ${ENV_PREFIX}TLS_KEY_PATH must be set together`);
	}
	return { certPath, keyPath };
}

function readTradingHours(env: Env, fallback: TradingHours | null): TradingHours | null {
	const startMs = readParsed(env, "TRADING_START", TIME_OF_DAY, parseTimeOfDay);
	const endMs = readParsed(env, "TRADING_END", TIME_OF_DAY, parseTimeOfDay);
	if (startMs === undefined && endMs === undefined) return fallback;
	if (startMs === undefined || endMs === undefined) {
		throw new ConfigError(`${ENV_PREFIX}TRADING_START and ${ENV_PREFIX}TRADING_END must be set together`);
	}
	return { startMs, endMs };
}
