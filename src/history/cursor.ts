import { HistoryError, assertMark, isMark } from "./errors"
import type { HistoryTrace } from "./trace"
import type { BacktrackingCursor, CursorMode, Mark, RecordResult, Walkback } from "./types"

export interface HistoryEntry<T> {
	readonly item: T
}

/**
 * What a cursor needs from the history it walks. Implemented by the recorder
 * and by the array cursor.
 */
export interface CursorHistory<T> {
	readonly length: number
	readonly trace: HistoryTrace | undefined
	recordOrReplay(index: number): RecordResult<T>
	/** A recorded entry, never pulling from the source. */
	entry(index: number): HistoryEntry<T> | undefined
}

/**
 * Create a cursor over a shared history.
 *
 * Copying and referencing cursors share this implementation; `convert` turns
 * the stored item into what the cursor hands out (a duplicate, or the item
 * itself).
 */
export function createCursor<T, O>(
	history: CursorHistory<T>,
	mode: CursorMode,
	convert: (item: T) => O,
	start: Mark = 0,
): BacktrackingCursor<O> {
	assertMark(start, history.length)
	let position = start

	const cursor: BacktrackingCursor<O> = {
		mode,

		next(): IteratorResult<O, undefined> {
			const result = history.recordOrReplay(position)
			if (result.kind === "end") {
				return { done: true, value: undefined }
			}
			position = result.index + 1
			return { done: false, value: convert(result.item) }
		},

		getRefPoint(): Mark {
			return position
		},

		getOldestPoint(): Mark {
			return 0
		},

		backtrack(mark: Mark): void {
			assertMark(mark, history.length)
			history.trace?.backtrack(position, mark)
			position = mark
		},

		startAgain(): void {
			cursor.backtrack(cursor.getOldestPoint())
		},

		fork(): BacktrackingCursor<O> {
			return createCursor(history, mode, convert, position)
		},

		walkBack(): Walkback<O> {
			return createWalkback(history, convert, position)
		},

		slice(start: Mark = 0, end: Mark = history.length): O[] | undefined {
			const entries = sliceEntries(history, start, end)
			return entries?.map((entry) => convert(entry.item))
		},

		[Symbol.iterator]() {
			return cursor
		},
	}

	return cursor
}

function createWalkback<T, O>(
	history: CursorHistory<T>,
	convert: (item: T) => O,
	from: Mark,
): Walkback<O> {
	let reversePosition = from

	const walk: Walkback<O> = {
		next(): IteratorResult<O, undefined> {
			const entry = reversePosition > 0 ? history.entry(reversePosition - 1) : undefined
			if (!entry) {
				return { done: true, value: undefined }
			}
			reversePosition--
			return { done: false, value: convert(entry.item) }
		},

		getRefPoint(): Mark {
			return reversePosition
		},

		[Symbol.iterator]() {
			return walk
		},
	}

	return walk
}

/**
 * Recorded entries in [start, end), or undefined if either mark is not recorded.
 * Throws if the history reports a length it cannot back with entries.
 */
export function sliceEntries<T>(
	history: CursorHistory<T>,
	start: Mark,
	end: Mark,
): HistoryEntry<T>[] | undefined {
	if (!isMark(start, history.length) || !isMark(end, history.length) || start > end) {
		return undefined
	}
	const entries: HistoryEntry<T>[] = []
	for (let index = start; index < end; index++) {
		const entry = history.entry(index)
		if (!entry) {
			throw new HistoryError("out_of_range", index, history.length)
		}
		entries.push(entry)
	}
	return entries
}
