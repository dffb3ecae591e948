export { createRecorder } from "./recorder"
export { createArrayCursor } from "./array-cursor"
export type { ArrayCursorOptions } from "./array-cursor"
export { HistoryError } from "./errors"
export type { HistoryErrorKind } from "./errors"
export { createHistoryTrace } from "./trace"
export type {
	HistoryTrace,
	HistoryTraceEvent,
	RecordedEvent,
	ReplayedEvent,
	ExhaustedEvent,
	SourceErrorEvent,
	BacktrackEvent,
} from "./trace"
export { resolveOptions } from "./options"
export type { RecorderOptions, ResolvedRecorderOptions } from "./options"
export type {
	Mark,
	CursorMode,
	HistorySource,
	HistoryRecorder,
	BacktrackingCursor,
	Walkback,
	RecordResult,
	ReplayedResult,
	RecordedResult,
	EndResult,
} from "./types"
