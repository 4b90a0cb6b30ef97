/**
 * Producer Simulator
 *
 * Connects to a local relay the way a trading terminal would and sends a
 * BUY followed by its CLOSE, printing every response. Run local-relay.ts
 * first; set SIGNAL_RELAY_LOCAL_SECRET_KEY on both sides to authenticate.
 */

import { connect } from "node:net";
import type { Envelope } from "../src/index.js";
import { FrameStream, authRequest, createLogger } from "../src/index.js";

const host = process.env["SIGNAL_RELAY_LOCAL_HOST"] ?? "127.0.0.1";
const port = Number(process.env["SIGNAL_RELAY_LOCAL_PORT"] ?? "7777");
const secret = process.env["SIGNAL_RELAY_LOCAL_SECRET_KEY"];
const logger = createLogger({ level: "info", name: "producer" });

const socket = connect({ host, port });
await new Promise<void>((resolve, reject) => {
	socket.once("connect", resolve);
	socket.once("error", reject);
});
const stream = new FrameStream(socket);

async function send(envelope: Envelope): Promise<Envelope | null> {
	const written = await stream.write(envelope);
	if (!written.ok) throw written.error;
	// A queued ack may precede the real answer.
	for (;;) {
		const read = await stream.read(30_000);
		if (read.type !== "frame") {
			logger.warn({ result: read.type }, "No response");
			return null;
		}
		logger.info({ response: read.envelope }, "Response");
		if (read.envelope["status"] !== "queued") return read.envelope;
	}
}

// ── Scenario ────────────────────────────────────────────────────────

if (secret !== undefined) {
	await send(authRequest(secret));
}

const opened = await send({
	action: "BUY",
	symbol: "EURUSD",
	price: 1.085,
	sl: 1.08,
	tp1: 1.09,
	client_msg_id: "sim-1",
});

const signalId = opened?.["signal_id"];
if (typeof signalId === "number") {
	await send({
		action: "CLOSE",
		symbol: "EURUSD",
		price: 1.0875,
		open_signal_id: signalId,
		client_msg_id: "sim-2",
	});
}

stream.close();
