import { createCursor } from "./cursor"
import type { CursorHistory } from "./cursor"
import { assertMark } from "./errors"
import type { HistoryTrace } from "./trace"
import type { BacktrackingCursor, RecordResult } from "./types"

export interface ArrayCursorOptions {
	trace?: HistoryTrace
}

/**
 * A referencing cursor over an existing array. The array already is the
 * history, so nothing is pulled or recorded; its contents are read once, at
 * creation, and the cursor ends at its length. Holes read as undefined.
 */
export function createArrayCursor<T>(
	items: readonly T[],
	options: ArrayCursorOptions = {},
): BacktrackingCursor<Readonly<T>> {
	const entries = Array.from(items, (item) => ({ item }))
	const { trace } = options

	const history: CursorHistory<T> = {
		length: entries.length,
		trace,

		recordOrReplay(index: number): RecordResult<T> {
			assertMark(index, entries.length)
			const entry = entries[index]
			if (!entry) {
				return { kind: "end", index }
			}
			trace?.replayed(index)
			return { kind: "replayed", index, item: entry.item }
		},

		entry(index: number) {
			return entries[index]
		},
	}

	return createCursor(history, "referencing", (item: T): Readonly<T> => item)
}
