// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type ClientMsgId,
	type SessionId,
	clientMsgId,
	idToString,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrapOr,
	type Clock,
	SystemClock,
	FakeClock,
	sleep,
	ErrorCategory,
	ProtocolErrorKind,
	RelayError,
	ProtocolError,
	AuthError,
	NetworkError,
	TimeoutError,
	StoreUnavailableError,
	SignalNotFoundError,
	ConfigError,
	SystemError,
	classifyError,
	isProtocolError,
	isAuthError,
	isNetworkError,
	isTimeoutError,
	isConfigError,
	ENV_PREFIX,
} from "./shared/index.js";

// ── Protocol ─────────────────────────────────────────────────────────
export {
	DEFAULT_MAX_FRAME_BYTES,
	FRAME_HEADER_BYTES,
	FrameDecoder,
	decodeFrame,
	encodeFrame,
	classifyEnvelope,
	clientMsgIdOf,
	parseSignal,
	signalToWire,
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
} from "./protocol/index.js";
export type {
	ClassifiedEnvelope,
	DecodeResult,
	Envelope,
	ResponseEnvelope,
	SignalRequest,
} from "./protocol/index.js";

// ── Session ──────────────────────────────────────────────────────────
export {
	CloseReason,
	FrameStream,
	ServerSession,
	Session,
	SessionRole,
	SessionState,
	SessionStateMachine,
	UpstreamSession,
} from "./session/index.js";
export type {
	EnvelopeProcessor,
	OutboundItem,
	OutboundSource,
	ServerSessionOptions,
	SessionEvents,
	SessionSnapshot,
	UpstreamConnectOptions,
	UpstreamRunOptions,
	UpstreamTlsOptions,
} from "./session/index.js";

// ── Admission ────────────────────────────────────────────────────────
export {
	AdmissionController,
	DEFAULT_ADMISSION_CONFIG,
	DailyCapCheck,
	MinIntervalCheck,
	PAUSED_REASON,
	PausedCheck,
	TradingHoursCheck,
	parseTimeOfDay,
} from "./admission/index.js";
export type {
	AdmissionCheck,
	AdmissionConfig,
	AdmissionContext,
	AdmissionVerdict,
	TradingHours,
} from "./admission/index.js";

// ── Retry ────────────────────────────────────────────────────────────
export { DEFAULT_RETRY_CONFIG, RetryDisposition, RetryQueue } from "./retry/index.js";
export type { RetryAttempt, RetryConfig, RetryEvents, RetryItem, RetryOutcome } from "./retry/index.js";

// ── Relay ────────────────────────────────────────────────────────────
export {
	CorrelationMap,
	DEFAULT_RELAY_CONFIG,
	LinearBackoff,
	OutboundQueue,
	OverflowPolicy,
	RELAY_QUEUED_MESSAGE,
	RelayMultiplexer,
	relayConfigFromEnv,
} from "./relay/index.js";
export type { RelayConfig, RelayEvents, RelayItem, RelayStatus } from "./relay/index.js";

// ── Server ───────────────────────────────────────────────────────────
export {
	DEFAULT_SERVER_CONFIG,
	ReportKind,
	SignalProcessor,
	SignalServer,
	serverConfigFromEnv,
} from "./server/index.js";
export type {
	Notifier,
	Report,
	Reporter,
	ServerConfig,
	SignalServerConfig,
	SignalStore,
	SignalStoreConnection,
	TodayStats,
} from "./server/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export { FileReportSink, LogNotifier, MemoryReportSink, MemorySignalStore } from "./persistence/index.js";

// ── Lib: Logger ──────────────────────────────────────────────────────
export { createLogger, silentLogger } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ──────────────────────────────────────────────────
export { validate, ValidationError, z } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";

// ── Lib: Events ──────────────────────────────────────────────────────
export { TypedEmitter } from "./lib/events/index.js";
export type { EventMap, ListenerErrorHandler } from "./lib/events/index.js";

// ── Lib: Decimal ─────────────────────────────────────────────────────
export { LibDecimal } from "./lib/decimal/index.js";

// ── Lib: Queue ───────────────────────────────────────────────────────
export { AsyncQueue } from "./lib/queue/index.js";
export type { TakeOptions } from "./lib/queue/index.js";
