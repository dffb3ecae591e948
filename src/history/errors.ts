export type HistoryErrorKind = "out_of_range" | "reentrant_pull"

export class HistoryError extends Error {
	readonly kind: HistoryErrorKind
	/** The position that was requested. */
	readonly index: number
	/** The number of recorded items when the request was rejected. */
	readonly recorded: number

	constructor(kind: HistoryErrorKind, index: number, recorded: number) {
		super(messageFor(kind, index, recorded))
		this.name = "HistoryError"
		this.kind = kind
		this.index = index
		this.recorded = recorded
	}
}

function messageFor(kind: HistoryErrorKind, index: number, recorded: number): string {
	switch (kind) {
		case "out_of_range":
			return `Position ${index} is outside the recorded history (0..${recorded})`
		case "reentrant_pull":
			return `Source asked for position ${index} while it was still producing it`
	}
}

export function isMark(index: number, recorded: number): boolean {
	return Number.isInteger(index) && index >= 0 && index <= recorded
}

/** Throws unless `index` is a whole number in [0, recorded]. */
export function assertMark(index: number, recorded: number): void {
	if (!isMark(index, recorded)) {
		throw new HistoryError("out_of_range", index, recorded)
	}
}
