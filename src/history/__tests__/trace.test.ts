import { describe, expect, it } from "vitest"
import { createRecorder } from "../recorder"
import { createHistoryTrace } from "../trace"
import { failingSource } from "./sources"

describe("HistoryTrace", () => {
	it("collects pulls, replays, the end and jumps in order", () => {
		const trace = createHistoryTrace()
		const cursor = createRecorder([10, 20], { trace }).copying()

		cursor.next()
		cursor.next()
		cursor.next()
		cursor.backtrack(1)
		cursor.next()
		cursor.next()

		expect(trace.getEvents()).toEqual([
			{ type: "recorded", index: 0 },
			{ type: "recorded", index: 1 },
			{ type: "exhausted", index: 2 },
			{ type: "backtrack", from: 2, to: 1 },
			{ type: "replayed", index: 1 },
		])
	})

	it("records source failures", () => {
		const trace = createHistoryTrace()
		const cursor = createRecorder(failingSource([1], 1), { trace }).copying()

		expect(() => cursor.next()).toThrow("source unavailable")
		cursor.next()

		expect(trace.getEvents()).toEqual([
			{ type: "source_error", index: 0, error: "source unavailable" },
			{ type: "recorded", index: 0 },
		])
	})

	it("stringifies non-Error failures", () => {
		const trace = createHistoryTrace()
		trace.sourceError(3, "boom")

		expect(trace.getEvents()).toEqual([{ type: "source_error", index: 3, error: "boom" }])
	})

	it("can be cleared", () => {
		const trace = createHistoryTrace()
		trace.recorded(0)
		trace.clear()

		expect(trace.getEvents()).toEqual([])
	})
})
