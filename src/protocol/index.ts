export {
	DEFAULT_MAX_FRAME_BYTES,
	FRAME_HEADER_BYTES,
	FrameDecoder,
	decodeFrame,
	encodeFrame,
	parsePayload,
} from "./frame-codec.js";
export type { DecodeResult } from "./frame-codec.js";
export { classifyEnvelope, clientMsgIdOf, parseSignal, signalToWire } from "./envelope.js";
export type { ClassifiedEnvelope } from "./envelope.js";
export {
	AUTH_FAILURE_MESSAGE,
	AUTH_SUCCESS_MESSAGE,
	INTERNAL_ERROR_MESSAGE,
	PING,
	PONG,
	ResponseStatus,
	SignalAction,
	authRequest,
	errorResponse,
	queuedResponse,
	successResponse,
	withCorrelation,
} from "./types.js";
export type { Envelope, ResponseEnvelope, SignalRequest } from "./types.js";
