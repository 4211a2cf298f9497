import { describe, expect, it } from "vitest";
import {
	localMutualInformation,
	localMutualInformationDetails,
} from "./local-mutual-information.ts";
import { createCorpus } from "../corpus.ts";
import { InvalidInputError } from "../errors.ts";

const toy = createCorpus([["A", "B"], ["A"], ["B"], ["C"]]);

describe("localMutualInformation", () => {
	it("compares co-occurrence against item occurrences, not basket count", () => {
		// O = 1, freq(A) = freq(B) = 2, N' = 5, so E = 0.8
		expect(localMutualInformation("A", "B", toy)).toBeCloseTo(Math.log2(1.25), 12);
		expect(localMutualInformation("A", "B", toy)).toBeCloseTo(0.3219, 4);
	});

	it("is exactly 0 when the items never co-occur", () => {
		const corpus = createCorpus([["A"], ["B"]]);

		expect(localMutualInformation("A", "B", corpus)).toBe(0);
		expect(localMutualInformation("A", "missing", toy)).toBe(0);
	});

	it("is positive for items bought together more often than chance", () => {
		// O = 1, E = 1 · 1 / 4
		const corpus = createCorpus([["A", "B"], ["C"], ["D"]]);

		expect(localMutualInformation("A", "B", corpus)).toBe(2);
	});

	it("is negative for items bought together less often than chance", () => {
		// O = 1, E = 3 · 3 / 6 = 1.5
		const corpus = createCorpus([["A", "B"], ["A"], ["A"], ["B"], ["B"]]);

		expect(localMutualInformation("A", "B", corpus)).toBeCloseTo(Math.log2(1 / 1.5), 12);
		expect(localMutualInformation("A", "B", corpus)).toBeLessThan(0);
	});

	it("ignores sample size", () => {
		const small = createCorpus([["A", "B"], ["C"], ["D"]]);
		const large = createCorpus(Array.from({ length: 10 }, () => [...small]).flat());

		expect(large).toHaveLength(30);
		expect(localMutualInformation("A", "B", large)).toBe(localMutualInformation("A", "B", small));
	});

	it("is symmetric in its items", () => {
		const corpus = createCorpus([["A", "B"], ["A", "C"], ["B"], ["A", "B", "C"]]);

		expect(localMutualInformation("B", "A", corpus)).toBe(localMutualInformation("A", "B", corpus));
	});

	it("rejects identical items and an empty corpus", () => {
		expect(() => localMutualInformation("A", "A", toy)).toThrow(InvalidInputError);
		expect(() => localMutualInformation("A", "B", [])).toThrow("corpus must be non-empty");
	});
});

describe("localMutualInformationDetails", () => {
	it("reports the counts behind the score", () => {
		const details = localMutualInformationDetails("A", "B", toy);

		expect(details).toMatchObject({
			cooccurrences: 1,
			frequencyI: 2,
			frequencyJ: 2,
			totalOccurrences: 5,
			expected: 0.8,
		});
		expect(details.value).toBe(localMutualInformation("A", "B", toy));
	});

	it("leaves out the expectation when the items never co-occur", () => {
		const details = localMutualInformationDetails("A", "C", toy);

		expect(details).toEqual({
			value: 0,
			cooccurrences: 0,
			frequencyI: 2,
			frequencyJ: 1,
			totalOccurrences: 5,
		});
	});
});
