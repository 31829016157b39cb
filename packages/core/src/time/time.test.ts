import { describe, it, expect } from "vitest";
import {
	isSupportedTimeframe,
	minutesBetween,
	parseIsoTimestamp,
	toIsoTimestamp,
} from "./time";

describe("time utilities", () => {
	describe("isSupportedTimeframe", () => {
		it("accepts the analysis intervals and rejects others", () => {
			expect(isSupportedTimeframe("1m")).toBe(true);
			expect(isSupportedTimeframe("12h")).toBe(true);
			expect(isSupportedTimeframe("7m")).toBe(false);
			expect(isSupportedTimeframe("1w")).toBe(false);
		});
	});

	describe("ISO conversion", () => {
		it("round-trips epoch milliseconds", () => {
			const ts = Date.UTC(2024, 0, 2, 3, 4, 5, 678);
			const iso = toIsoTimestamp(ts);
			expect(iso).toBe("2024-01-02T03:04:05.678Z");
			expect(parseIsoTimestamp(iso)).toBe(ts);
		});

		it("returns null for unparseable strings", () => {
			expect(parseIsoTimestamp("not-a-date")).toBeNull();
		});
	});

	it("measures minutes between timestamps", () => {
		expect(minutesBetween(0, 90_000)).toBe(1.5);
	});
});
