export {
	type ClientMsgId,
	type SessionId,
	clientMsgId,
	nextSessionId,
	idToString,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	unwrapOr,
	isOk,
	isErr,
	tryCatch,
	tryCatchAsync,
} from "./result.js";

export {
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
} from "./errors.js";

export { type Clock, SystemClock, FakeClock, sleep } from "./time.js";
export {
	ENV_PREFIX,
	readBoolean,
	readNonNegativeInt,
	readParsed,
	readPort,
	readPositiveInt,
	readString,
} from "./config.js";
export { listenOn } from "./net.js";
