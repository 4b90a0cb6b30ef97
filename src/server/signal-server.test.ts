import { afterEach, describe, expect, it } from "vitest";
import { dial, waitFor } from "../__tests__/loopback.js";
import { MemoryReportSink } from "../persistence/memory-report-sink.js";
import { MemorySignalStore } from "../persistence/memory-signal-store.js";
import type { Envelope } from "../protocol/types.js";
import type { FrameStream } from "../session/frame-stream.js";
import { DEFAULT_SERVER_CONFIG } from "./config.js";
import { SignalServer } from "./signal-server.js";
import type { SignalServerConfig } from "./signal-server.js";
import type { Notifier } from "./types.js";

const SECRET = "test-secret";

const quietNotifier: Notifier = { notify: async () => undefined };

let server: SignalServer | null = null;
const clients: FrameStream[] = [];

async function start(overrides: Partial<SignalServerConfig> = {}) {
	const store = new MemorySignalStore();
	server = new SignalServer(
		{
			...DEFAULT_SERVER_CONFIG,
			host: "127.0.0.1",
			port: 0,
			secretKey: SECRET,
			admission: { ...DEFAULT_SERVER_CONFIG.admission, minIntervalMs: 0 },
			...overrides,
		},
		{ store, notifier: quietNotifier, reporter: new MemoryReportSink() },
	);
	const address = await server.start();
	return { server, store, address };
}

async function connect(port: number): Promise<FrameStream> {
	const client = await dial(port);
	clients.push(client);
	return client;
}

async function next(client: FrameStream): Promise<Envelope> {
	const read = await client.read(2_000);
	if (read.type !== "frame") throw new Error(`expected a frame, got ${read.type}`);
	return read.envelope;
}

afterEach(async () => {
	for (const client of clients.splice(0)) client.close();
	await server?.stop();
	server = null;
});

describe("SignalServer", () => {
	it("authenticates a producer and stores its signals", async () => {
		const { address, store } = await start();
		const client = await connect(address.port);

		await client.write({ secret_key: SECRET });
		expect(await next(client)).toEqual({ status: "success", message: "Authentication successful" });

		await client.write({ action: "BUY", symbol: "EURUSD", price: 1.1, client_msg_id: "a-1" });
		expect(await next(client)).toEqual({
			status: "success",
			message: "Signal BUY processed successfully",
			signal_id: 1,
			client_msg_id: "a-1",
		});

		await client.write({ action: "CLOSE", symbol: "EURUSD", price: 1.2, open_signal_id: 1, client_msg_id: "a-2" });
		expect(await next(client)).toEqual({
			status: "success",
			message: "Close signal for #1 processed successfully",
			signal_id: 1,
			client_msg_id: "a-2",
		});
		expect(store.get(1)?.closed).toBe(true);
	});

	it("answers a ping without touching the store", async () => {
		const { address, store } = await start();
		const client = await connect(address.port);
		await client.write({ secret_key: SECRET });
		await next(client);

		await client.write({ type: "ping" });

		expect(await next(client)).toEqual({ type: "pong" });
		expect(store.connectionsOpened).toBe(0);
		expect(store.get(1)).toBeUndefined();
	});

	it("keeps serving and stops cleanly when event listeners throw", async () => {
		const { server: running, address } = await start();
		const broken = (): void => {
			throw new Error("listener broke");
		};
		running.events.on("session_opened", broken);
		running.events.on("session_closed", broken);

		const first = await connect(address.port);
		await first.write({ secret_key: "wrong" });
		await next(first);
		await waitFor(() => running.sessionCount === 0);

		const second = await connect(address.port);
		await second.write({ secret_key: SECRET });
		expect(await next(second)).toEqual({ status: "success", message: "Authentication successful" });

		await expect(running.stop()).resolves.toBeUndefined();
		expect((await second.read(2_000)).type).toBe("eof");
	});

	it("answers a wrong secret and hangs up", async () => {
		const { address } = await start();
		const client = await connect(address.port);

		await client.write({ secret_key: "wrong" });

		expect(await next(client)).toEqual({ status: "error", message: "Invalid secret key" });
		expect((await client.read(2_000)).type).toBe("eof");
	});

	it("closes live sessions on stop and starts the retry worker only while running", async () => {
		const { server: running, address } = await start();
		const client = await connect(address.port);
		await client.write({ secret_key: SECRET });
		await next(client);
		await waitFor(() => running.sessionCount === 1);
		expect(running.processor.retryQueue.running).toBe(true);

		await running.stop();

		expect((await client.read(2_000)).type).toBe("eof");
		expect(running.sessionCount).toBe(0);
		expect(running.processor.retryQueue.running).toBe(false);
		expect(running.address).toBeNull();
	});

	it("falls back to plain TCP when the TLS files cannot be read", async () => {
		const { address } = await start({
			tls: { certPath: "/nonexistent/cert.pem", keyPath: "/nonexistent/key.pem" },
		});
		expect(address.tls).toBe(false);

		const client = await connect(address.port);
		await client.write({ secret_key: SECRET });
		expect(await next(client)).toEqual({ status: "success", message: "Authentication successful" });
	});
});
