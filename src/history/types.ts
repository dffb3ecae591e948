/**
 * History Module Interfaces
 *
 * Boundary: a forward-only source (Iterable / Iterator) → replayable history
 *
 * A HistoryRecorder pulls from its source at most once per position and keeps
 * every value it has seen. Cursors over the recorder move forwards and backwards
 * through that history; when a cursor reaches the live edge the recorder pulls
 * the next value on its behalf.
 */

/** A saved cursor position. Valid for the whole life of the recorder it came from. */
export type Mark = number

export type CursorMode = "copying" | "referencing"

/** The forward-only producer being recorded. */
export type HistorySource<T> = Iterable<T> | Iterator<T>

// ─── Recorder ─────────────────────────────────────────────────────────────────

export interface ReplayedResult<T> {
	readonly kind: "replayed"
	readonly index: number
	readonly item: T
}

export interface RecordedResult<T> {
	readonly kind: "recorded"
	readonly index: number
	readonly item: T
}

export interface EndResult {
	readonly kind: "end"
	readonly index: number
}

export type RecordResult<T> = ReplayedResult<T> | RecordedResult<T> | EndResult

export interface HistoryRecorder<T> {
	/**
	 * Resolve a position against the history. Positions below `length` are
	 * replayed; position `length` pulls one value from the source (or reports
	 * the end once the source is exhausted). Anything past `length` throws.
	 */
	recordOrReplay(index: number): RecordResult<T>

	/** A cursor that hands out independent duplicates of recorded items. */
	copying(at?: Mark): BacktrackingCursor<T>

	/** A cursor that hands out the recorded items themselves. */
	referencing(at?: Mark): BacktrackingCursor<Readonly<T>>

	/** Number of recorded items. Never decreases. */
	readonly length: number

	/** True once the source has signalled completion. */
	readonly exhausted: boolean

	/** The recorded item at a position, without pulling. */
	at(index: number): Readonly<T> | undefined

	/** The recorded items in [start, end), or undefined if the range is not recorded. */
	slice(start?: Mark, end?: Mark): readonly Readonly<T>[] | undefined
}

// ─── Cursors ──────────────────────────────────────────────────────────────────

export interface BacktrackingCursor<O> extends IterableIterator<O> {
	readonly mode: CursorMode

	next(): IteratorResult<O, undefined>

	/** The position of the next item to be consumed. */
	getRefPoint(): Mark

	/** The earliest position a cursor can return to. */
	getOldestPoint(): Mark

	/** Move to a mark previously taken from a cursor over the same history. */
	backtrack(mark: Mark): void

	/** Return to the oldest point. */
	startAgain(): void

	/** An independent cursor of the same mode, starting at this cursor's position. */
	fork(): BacktrackingCursor<O>

	/** Walk backwards from the current position without pulling from the source. */
	walkBack(): Walkback<O>

	/** Recorded items between two marks, converted the way `next()` converts them. */
	slice(start?: Mark, end?: Mark): O[] | undefined
}

/**
 * A reverse walk over recorded history. After each yielded item,
 * `getRefPoint()` is the mark just before that item, so backtracking to it
 * makes the cursor yield that item next.
 */
export interface Walkback<O> extends IterableIterator<O> {
	next(): IteratorResult<O, undefined>
	getRefPoint(): Mark
}
