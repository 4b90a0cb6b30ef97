export { FrameStream } from "./frame-stream.js";
export type { FrameStreamOptions, ReadResult } from "./frame-stream.js";
export { ServerSession } from "./server-session.js";
export type { EnvelopeProcessor, ServerSessionOptions } from "./server-session.js";
export { Session } from "./session.js";
export { SessionStateMachine } from "./state-machine.js";
export { UpstreamSession } from "./upstream-session.js";
export type {
	UpstreamConnectOptions,
	UpstreamRunOptions,
	UpstreamTlsOptions,
} from "./upstream-session.js";
export { CloseReason, SessionRole, SessionState } from "./types.js";
export type {
	OutboundItem,
	OutboundSource,
	SessionEvents,
	SessionSnapshot,
	SessionTransition,
} from "./types.js";
