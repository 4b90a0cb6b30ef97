/**
 * Envelope classification and signal validation.
 */

import { validate, z } from "../lib/validation/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { clientMsgId } from "../shared/identifiers.js";
import type { ClientMsgId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { ResponseStatus, SignalAction } from "./types.js";
import type { Envelope, ResponseEnvelope, SignalRequest } from "./types.js";

export type ClassifiedEnvelope =
	| { readonly kind: "auth"; readonly secretKey: string }
	| { readonly kind: "ping" }
	| { readonly kind: "pong" }
	| { readonly kind: "signal"; readonly envelope: Envelope }
	| { readonly kind: "response"; readonly response: ResponseEnvelope }
	| { readonly kind: "unknown"; readonly envelope: Envelope };

const responseSchema = z.object({
	status: z.enum([ResponseStatus.Success, ResponseStatus.Error, ResponseStatus.Queued]),
	message: z.string().default(""),
	signal_id: z.number().int().optional(),
	client_msg_id: z.string().optional(),
	queue_depth: z.number().int().nonnegative().optional(),
});

/** Work out what a decoded envelope is. Checks run in a fixed order: type, secret_key, action, status. */
export function classifyEnvelope(envelope: Envelope): ClassifiedEnvelope {
	const type = envelope["type"];
	if (type === "ping") return { kind: "ping" };
	if (type === "pong") return { kind: "pong" };

	const secretKey = envelope["secret_key"];
	if (typeof secretKey === "string") return { kind: "auth", secretKey };

	if ("action" in envelope) return { kind: "signal", envelope };

	if ("status" in envelope) {
		const parsed = responseSchema.safeParse(envelope);
		if (parsed.success) {
			return { kind: "response", response: stripUndefined(parsed.data) };
		}
	}
	return { kind: "unknown", envelope };
}

/** The envelope's correlation token, when it carries a non-empty string one. */
export function clientMsgIdOf(envelope: Envelope): ClientMsgId | undefined {
	const value = envelope["client_msg_id"];
	return typeof value === "string" && value.length > 0 ? clientMsgId(value) : undefined;
}

// ── Signal validation ───────────────────────────────────────────────

const MISSING_FIELDS = "Missing required fields: action, symbol, price";

function optionalNumber(field: string) {
	return z.number({ invalid_type_error: `${field} must be a number` }).nullish();
}

const signalSchema = z
	.object({
		action: z
			.string({ required_error: MISSING_FIELDS, invalid_type_error: "Invalid action" })
			.min(1, MISSING_FIELDS)
			.transform((s) => s.toUpperCase())
			.pipe(
				z.enum([SignalAction.Buy, SignalAction.Sell, SignalAction.Close], {
					errorMap: () => ({ message: "Invalid action" }),
				}),
			),
		symbol: z
			.string({ required_error: MISSING_FIELDS, invalid_type_error: "symbol must be a string" })
			.min(1, MISSING_FIELDS),
		price: z
			.number({
				required_error: MISSING_FIELDS,
				invalid_type_error: "price must be a positive number",
			})
			.positive("price must be a positive number"),
		sl: optionalNumber("sl"),
		tp1: optionalNumber("tp1"),
		tp2: optionalNumber("tp2"),
		tp3: optionalNumber("tp3"),
		atr: optionalNumber("atr"),
		open_signal_id: z
			.number({ invalid_type_error: "open_signal_id must be an integer" })
			.int("open_signal_id must be an integer")
			.nullish(),
		client_msg_id: z.string().nullish(),
	})
	.superRefine((s, ctx) => {
		if (s.action === SignalAction.Close && (s.open_signal_id === undefined || s.open_signal_id === null)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["open_signal_id"],
				message: "open_signal_id is required for CLOSE action",
			});
		}
	})
	.transform((s): SignalRequest => {
		const id = s.client_msg_id ? clientMsgId(s.client_msg_id) : undefined;
		return {
			action: s.action,
			symbol: s.symbol,
			price: s.price,
			...(s.sl != null && { sl: s.sl }),
			...(s.tp1 != null && { tp1: s.tp1 }),
			...(s.tp2 != null && { tp2: s.tp2 }),
			...(s.tp3 != null && { tp3: s.tp3 }),
			...(s.atr != null && { atr: s.atr }),
			...(s.open_signal_id != null && { openSignalId: s.open_signal_id }),
			...(id !== undefined && { clientMsgId: id }),
		};
	});

/** Validate a signal envelope. The error's first issue is the message returned to the caller. */
export function parseSignal(envelope: Envelope): Result<SignalRequest, ValidationError> {
	return validate(signalSchema, envelope);
}

/** Back to wire form, used when a signal is described in a report. */
export function signalToWire(signal: SignalRequest): Envelope {
	return {
		action: signal.action,
		symbol: signal.symbol,
		price: signal.price,
		...(signal.sl !== undefined && { sl: signal.sl }),
		...(signal.tp1 !== undefined && { tp1: signal.tp1 }),
		...(signal.tp2 !== undefined && { tp2: signal.tp2 }),
		...(signal.tp3 !== undefined && { tp3: signal.tp3 }),
		...(signal.atr !== undefined && { atr: signal.atr }),
		...(signal.openSignalId !== undefined && { open_signal_id: signal.openSignalId }),
		...(signal.clientMsgId !== undefined && { client_msg_id: signal.clientMsgId }),
	};
}

function stripUndefined(data: z.infer<typeof responseSchema>): ResponseEnvelope {
	return {
		status: data.status,
		message: data.message,
		...(data.signal_id !== undefined && { signal_id: data.signal_id }),
		...(data.client_msg_id !== undefined && { client_msg_id: data.client_msg_id }),
		...(data.queue_depth !== undefined && { queue_depth: data.queue_depth }),
	};
}
