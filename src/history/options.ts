import type { HistoryTrace } from "./trace"

export interface RecorderOptions<T> {
	/** How copying cursors duplicate a recorded item. Defaults to structuredClone. */
	duplicate?: (item: T) => T
	/** Optional collector for pull/replay/backtrack events. */
	trace?: HistoryTrace
}

export interface ResolvedRecorderOptions<T> {
	readonly duplicate: (item: T) => T
	readonly trace: HistoryTrace | undefined
}

export function resolveOptions<T>(options: RecorderOptions<T> = {}): ResolvedRecorderOptions<T> {
	return {
		duplicate: options.duplicate ?? ((item: T) => structuredClone(item)),
		trace: options.trace,
	}
}
