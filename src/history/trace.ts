/**
 * Trace collector for history diagnostics.
 *
 * Records every pull, replay and cursor jump on a recorder. Attached through
 * RecorderOptions and entirely opt-in.
 */

export interface RecordedEvent {
	readonly type: "recorded"
	readonly index: number
}

export interface ReplayedEvent {
	readonly type: "replayed"
	readonly index: number
}

export interface ExhaustedEvent {
	readonly type: "exhausted"
	readonly index: number
}

export interface SourceErrorEvent {
	readonly type: "source_error"
	readonly index: number
	readonly error: string
}

export interface BacktrackEvent {
	readonly type: "backtrack"
	readonly from: number
	readonly to: number
}

export type HistoryTraceEvent =
	| RecordedEvent
	| ReplayedEvent
	| ExhaustedEvent
	| SourceErrorEvent
	| BacktrackEvent

export interface HistoryTrace {
	recorded(index: number): void
	replayed(index: number): void
	exhausted(index: number): void
	sourceError(index: number, error: unknown): void
	backtrack(from: number, to: number): void
	getEvents(): readonly HistoryTraceEvent[]
	clear(): void
}

export function createHistoryTrace(): HistoryTrace {
	const events: HistoryTraceEvent[] = []

	return {
		recorded(index: number) {
			events.push({ type: "recorded", index })
		},

		replayed(index: number) {
			events.push({ type: "replayed", index })
		},

		exhausted(index: number) {
			events.push({ type: "exhausted", index })
		},

		sourceError(index: number, error: unknown) {
			const errorString = error instanceof Error ? error.message : String(error)
			events.push({ type: "source_error", index, error: errorString })
		},

		backtrack(from: number, to: number) {
			events.push({ type: "backtrack", from, to })
		},

		getEvents(): readonly HistoryTraceEvent[] {
			return events
		},

		clear() {
			events.length = 0
		},
	}
}
