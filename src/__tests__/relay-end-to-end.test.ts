import { afterEach, describe, expect, it } from "vitest";
import { MemoryReportSink } from "../persistence/memory-report-sink.js";
import { MemorySignalStore } from "../persistence/memory-signal-store.js";
import type { Envelope } from "../protocol/types.js";
import { DEFAULT_RELAY_CONFIG } from "../relay/config.js";
import { RelayMultiplexer } from "../relay/relay.js";
import { DEFAULT_SERVER_CONFIG } from "../server/config.js";
import { SignalServer } from "../server/signal-server.js";
import type { FrameStream } from "../session/frame-stream.js";
import { dial, waitFor } from "./loopback.js";

const SECRET = "test-secret";

let server: SignalServer | null = null;
let relay: RelayMultiplexer | null = null;
const clients: FrameStream[] = [];

async function startStack() {
	const store = new MemorySignalStore();
	const notes: string[] = [];
	server = new SignalServer(
		{ ...DEFAULT_SERVER_CONFIG, host: "127.0.0.1", port: 0, secretKey: SECRET },
		{
			store,
			notifier: {
				notify: async (message) => {
					notes.push(message);
				},
			},
			reporter: new MemoryReportSink(),
		},
	);
	const upstream = await server.start();

	const started = new RelayMultiplexer({
		...DEFAULT_RELAY_CONFIG,
		localHost: "127.0.0.1",
		localPort: 0,
		upstream: { host: "127.0.0.1", port: upstream.port, secretKey: SECRET, tls: null },
		connectTimeoutMs: 1_000,
		backoff: { baseDelayMs: 20, maxDelayMs: 50 },
	});
	relay = started;
	const port = await started.start();
	await waitFor(() => started.status().upstreamConnected);

	const producer = await dial(port);
	clients.push(producer);
	return { relay: started, producer, store, notes };
}

async function request(producer: FrameStream, envelope: Envelope): Promise<Envelope> {
	const written = await producer.write(envelope);
	if (!written.ok) throw written.error;
	const read = await producer.read(2_000);
	if (read.type !== "frame") throw new Error(`expected a frame, got ${read.type}`);
	return read.envelope;
}

afterEach(async () => {
	for (const client of clients.splice(0)) client.close();
	await relay?.stop();
	await server?.stop();
	relay = null;
	server = null;
});

describe("producer → relay → signal server", () => {
	it("opens and closes a signal end to end", async () => {
		const { producer, store, notes, relay: running } = await startStack();

		expect(
			await request(producer, { action: "buy", symbol: "EURUSD", price: 1.1, client_msg_id: "p-1" }),
		).toEqual({
			status: "success",
			message: "Signal BUY processed successfully",
			signal_id: 1,
			client_msg_id: "p-1",
		});

		expect(
			await request(producer, {
				action: "CLOSE",
				symbol: "EURUSD",
				price: 1.105,
				open_signal_id: 1,
				client_msg_id: "p-2",
			}),
		).toEqual({
			status: "success",
			message: "Close signal for #1 processed successfully",
			signal_id: 1,
			client_msg_id: "p-2",
		});

		expect(store.get(1)?.pnl?.toString()).toBe("0.005");
		expect(notes.map((n) => n.split("\n")[0])).toEqual(["<b>BUY SIGNAL</b>", "<b>CLOSE SIGNAL</b>"]);
		expect(running.status()).toMatchObject({ queueDepth: 0, pendingCorrelations: 0 });
	});

	it("carries admission rejections and validation errors back to the producer", async () => {
		const { producer } = await startStack();
		await request(producer, { action: "BUY", symbol: "EURUSD", price: 1.1, client_msg_id: "p-1" });

		expect(
			await request(producer, { action: "SELL", symbol: "EURUSD", price: 1.2, client_msg_id: "p-2" }),
		).toEqual({
			status: "error",
			message: "Rate limit active. Please wait 60 more seconds.",
			client_msg_id: "p-2",
		});
		expect(await request(producer, { action: "HOLD", symbol: "EURUSD", price: 1.2, client_msg_id: "p-3" })).toEqual({
			status: "error",
			message: "Invalid action",
			client_msg_id: "p-3",
		});
	});

	it("answers heartbeats locally", async () => {
		const { producer } = await startStack();
		expect(await request(producer, { type: "ping" })).toEqual({ type: "pong" });
	});
});
