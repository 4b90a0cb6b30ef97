import { describe, expect, it } from "vitest";
import { DEFAULT_RELAY_CONFIG, relayConfigFromEnv } from "./config.js";

const BASE_ENV = { SIGNAL_RELAY_SECRET_KEY: "test-secret" };

describe("relayConfigFromEnv", () => {
	it("uses the documented defaults", () => {
		const config = relayConfigFromEnv(BASE_ENV);

		expect(config).toEqual({
			...DEFAULT_RELAY_CONFIG,
			upstream: { ...DEFAULT_RELAY_CONFIG.upstream, secretKey: "test-secret" },
		});
		expect(config.heartbeatIntervalMs).toBe(20_000);
		expect(config.backoff).toEqual({ baseDelayMs: 10_000, maxDelayMs: 60_000 });
		expect(config.maxOutboundQueue).toBe(1_000);
		expect(config.overflowPolicy).toBe("reject");
	});

	it("requires the upstream secret", () => {
		expect(() => relayConfigFromEnv({})).toThrow("SIGNAL_RELAY_SECRET_KEY is required");
	});

	it("reads endpoints, queue bounds and the overflow policy", () => {
		const config = relayConfigFromEnv({
			...BASE_ENV,
			SIGNAL_RELAY_LOCAL_PORT: "7001",
			SIGNAL_RELAY_LOCAL_SECRET_KEY: "local-secret",
			SIGNAL_RELAY_UPSTREAM_HOST: "signals.example.com",
			SIGNAL_RELAY_UPSTREAM_PORT: "9443",
			SIGNAL_RELAY_MAX_OUTBOUND_QUEUE: "50",
			SIGNAL_RELAY_OVERFLOW_POLICY: "DROP_OLDEST",
			SIGNAL_RELAY_BACKOFF_BASE_MS: "500",
			SIGNAL_RELAY_BACKOFF_MAX_MS: "2000",
		});

		expect(config.localPort).toBe(7001);
		expect(config.localSecretKey).toBe("local-secret");
		expect(config.upstream).toEqual({
			host: "signals.example.com",
			port: 9443,
			secretKey: "test-secret",
			tls: null,
		});
		expect(config.maxOutboundQueue).toBe(50);
		expect(config.overflowPolicy).toBe("drop_oldest");
		expect(config.backoff).toEqual({ baseDelayMs: 500, maxDelayMs: 2_000 });
	});

	it("enables upstream TLS, verifying certificates unless told otherwise", () => {
		expect(relayConfigFromEnv({ ...BASE_ENV, SIGNAL_RELAY_UPSTREAM_TLS: "true" }).upstream.tls).toEqual({
			rejectUnauthorized: true,
		});
		expect(
			relayConfigFromEnv({
				...BASE_ENV,
				SIGNAL_RELAY_UPSTREAM_TLS: "1",
				SIGNAL_RELAY_UPSTREAM_TLS_INSECURE: "true",
			}).upstream.tls,
		).toEqual({ rejectUnauthorized: false });
	});

	it("rejects an unknown overflow policy and an inverted backoff range", () => {
		expect(() => relayConfigFromEnv({ ...BASE_ENV, SIGNAL_RELAY_OVERFLOW_POLICY: "block" })).toThrow(
			'Invalid SIGNAL_RELAY_OVERFLOW_POLICY: "block" must be reject or drop_oldest',
		);
		expect(() =>
			relayConfigFromEnv({ ...BASE_ENV, SIGNAL_RELAY_BACKOFF_BASE_MS: "5000", SIGNAL_RELAY_BACKOFF_MAX_MS: "1000" }),
		).toThrow("SIGNAL_RELAY_BACKOFF_MAX_MS must not be below SIGNAL_RELAY_BACKOFF_BASE_MS");
	});
});
