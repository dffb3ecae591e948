import { createCursor, sliceEntries } from "./cursor"
import type { CursorHistory, HistoryEntry } from "./cursor"
import { HistoryError, assertMark } from "./errors"
import type { RecorderOptions } from "./options"
import { resolveOptions } from "./options"
import type { HistoryRecorder, HistorySource, Mark, RecordResult } from "./types"

/**
 * Wrap a forward-only source in a replayable history.
 *
 * The source is pulled lazily, only when a cursor reaches the live edge, and
 * at most once per position no matter how many cursors replay it. Recorded
 * items are never removed or replaced, so items handed out by referencing
 * cursors stay valid for the life of the recorder.
 */
export function createRecorder<T>(
	source: HistorySource<T>,
	options: RecorderOptions<T> = {},
): HistoryRecorder<T> {
	const { duplicate, trace } = resolveOptions(options)
	const iterator = toIterator(source)
	const entries: HistoryEntry<T>[] = []
	let exhausted = false
	let pulling = false

	function pull(index: number): IteratorResult<T> {
		pulling = true
		try {
			return iterator.next()
		} catch (error) {
			trace?.sourceError(index, error)
			throw error
		} finally {
			pulling = false
		}
	}

	function recordOrReplay(index: number): RecordResult<T> {
		assertMark(index, entries.length)

		const entry = entries[index]
		if (entry) {
			trace?.replayed(index)
			return { kind: "replayed", index, item: entry.item }
		}

		if (exhausted) {
			return { kind: "end", index }
		}
		if (pulling) {
			throw new HistoryError("reentrant_pull", index, entries.length)
		}

		const result = pull(index)
		if (result.done) {
			exhausted = true
			trace?.exhausted(index)
			return { kind: "end", index }
		}

		entries.push({ item: result.value })
		trace?.recorded(index)
		return { kind: "recorded", index, item: result.value }
	}

	const history: CursorHistory<T> = {
		get length() {
			return entries.length
		},
		trace,
		recordOrReplay,
		entry(index: number) {
			return entries[index]
		},
	}

	return {
		recordOrReplay,

		copying(at: Mark = 0) {
			return createCursor(history, "copying", duplicate, at)
		},

		referencing(at: Mark = 0) {
			return createCursor(history, "referencing", (item: T): Readonly<T> => item, at)
		},

		get length() {
			return entries.length
		},

		get exhausted() {
			return exhausted
		},

		at(index: number): Readonly<T> | undefined {
			return entries[index]?.item
		},

		slice(start: Mark = 0, end: Mark = entries.length) {
			return sliceEntries(history, start, end)?.map((entry): Readonly<T> => entry.item)
		},
	}
}

function toIterator<T>(source: HistorySource<T>): Iterator<T> {
	return isIterable(source) ? source[Symbol.iterator]() : source
}

function isIterable<T>(source: HistorySource<T>): source is Iterable<T> {
	return typeof source === "string" || Symbol.iterator in source
}
