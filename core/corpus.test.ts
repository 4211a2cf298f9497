import { describe, expect, it } from "vitest";
import {
	assertDistinctItems,
	assertNonEmptyCorpus,
	cooccurrenceCount,
	createCorpus,
	itemFrequency,
	totalOccurrences,
	vocabulary,
} from "./corpus.ts";
import { compareItems, enumeratePairs } from "./pairs.ts";
import { InvalidInputError } from "./errors.ts";

describe("corpus", () => {
	const corpus = createCorpus([["milk", "bread"], ["milk"], ["bread", "eggs"], ["eggs", "milk", "bread"]]);

	it("collapses repeated items within a basket", () => {
		const input = [["milk", "milk", "bread"]];
		const built = createCorpus(input);

		expect(built[0]?.size).toBe(2);
		expect(input[0]).toEqual(["milk", "milk", "bread"]);
	});

	it("lists the vocabulary in sorted order", () => {
		expect(vocabulary(corpus)).toEqual(["bread", "eggs", "milk"]);
		expect(vocabulary(createCorpus([[10, 9], [1]]))).toEqual([1, 9, 10]);
	});

	it("counts baskets, not occurrences, per item", () => {
		expect(itemFrequency("milk", corpus)).toBe(3);
		expect(itemFrequency("flour", corpus)).toBe(0);
		expect(cooccurrenceCount("milk", "bread", corpus)).toBe(2);
		expect(cooccurrenceCount("bread", "milk", corpus)).toBe(2);
	});

	it("sums basket sizes for total occurrences", () => {
		expect(totalOccurrences(corpus)).toBe(8);
		expect(totalOccurrences(createCorpus([[], []]))).toBe(0);
	});

	it("reports precondition violations with their codes", () => {
		expect(() => assertNonEmptyCorpus([])).toThrow(InvalidInputError);
		expect(() => assertNonEmptyCorpus(corpus)).not.toThrow();
		expect(() => assertDistinctItems("milk", "milk")).toThrow(
			'cannot associate an item with itself: "milk"',
		);
		expect(() => assertDistinctItems("milk", "bread")).not.toThrow();
	});
});

describe("pairs", () => {
	it("orders numbers numerically and other items by string", () => {
		expect([10, 9, 1].sort(compareItems)).toEqual([1, 9, 10]);
		expect(["10", "9", "1"].sort(compareItems)).toEqual(["1", "10", "9"]);
		expect(["b", "B", "a"].sort(compareItems)).toEqual(["B", "a", "b"]);
	});

	it("sorts NaN after every other number", () => {
		expect([3, Number.NaN, 1, Number.NaN, 2].sort(compareItems)).toEqual([1, 2, 3, Number.NaN, Number.NaN]);
		expect(compareItems(Number.NaN, Number.NaN)).toBe(0);
		expect(enumeratePairs([Number.NaN, 2, 1])).toEqual([
			[1, 2],
			[1, Number.NaN],
			[2, Number.NaN],
		]);
	});

	it("enumerates each unordered pair once, lower item first", () => {
		expect(enumeratePairs(["c", "a", "b", "a"])).toEqual([
			["a", "b"],
			["a", "c"],
			["b", "c"],
		]);
	});

	it("produces n(n-1)/2 pairs", () => {
		expect(enumeratePairs([1, 2, 3, 4, 5])).toHaveLength(10);
		expect(enumeratePairs(["only"])).toEqual([]);
		expect(enumeratePairs([])).toEqual([]);
	});

	it("accepts a custom comparator", () => {
		const byLength = (a: string, b: string): number => a.length - b.length;

		expect(enumeratePairs(["ccc", "a", "bb"], byLength)).toEqual([
			["a", "bb"],
			["a", "ccc"],
			["bb", "ccc"],
		]);
	});
});
