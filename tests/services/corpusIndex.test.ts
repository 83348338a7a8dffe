import { describe, expect, it } from "vitest";
import { CorpusIndex, bigramCosine, lexicalOverlap, queryTokens } from "../../src/services/corpusIndex";

const index = new CorpusIndex(
  [
    { caseId: "A", chiefComplaint: "頭痛", presentIllness: "", diagnosis: "肝陽上亢", symptomTerms: ["頭痛"], tonguePulseTerms: [], zangfuTerms: ["肝"] },
    { caseId: "B", chiefComplaint: "失眠多夢", presentIllness: "", diagnosis: "心血虛", symptomTerms: ["失眠", "多夢"], tonguePulseTerms: [], zangfuTerms: ["心"] },
    { caseId: "C", chiefComplaint: "咳嗽", presentIllness: "", diagnosis: "肺氣虛", symptomTerms: [], tonguePulseTerms: [], zangfuTerms: ["肺"] }
  ],
  0.5
);

describe("corpus scoring helpers", () => {
  it("splits long segments into character bigrams", () => {
    expect(queryTokens("失眠多夢，心悸")).toEqual(["失眠", "眠多", "多夢", "心悸"]);
  });

  it("scores lexical overlap against at least four tokens", () => {
    expect(lexicalOverlap("失眠多夢", "失眠，多夢")).toBe(0.5);
  });

  it("computes bigram cosine similarity", () => {
    expect(bigramCosine("失眠", "失眠")).toBeCloseTo(1, 10);
    expect(bigramCosine("失眠", "頭痛")).toBe(0);
  });
});

describe("CorpusIndex", () => {
  it("ranks records with a non-empty field by the blended score", async () => {
    const hits = await index.search("失眠多夢", "symptom_terms", 5);
    expect(hits).toHaveLength(1);
    expect(hits[0]).toMatchObject({ caseId: "B", similarity: 1, lexical: 0.5, score: 0.75 });
  });

  it("searches the diagnosis label on syndrome_terms", async () => {
    const hits = await index.search("心血虛", "syndrome_terms", 5);
    expect(hits.map((hit) => hit.caseId)).toEqual(["B"]);
  });

  it("returns nothing for an unknown field or a blank query", async () => {
    await expect(index.search("失眠", "unknown_field", 5)).resolves.toEqual([]);
    await expect(index.search("   ", "search_tokens", 5)).resolves.toEqual([]);
  });

  it("loads the bundled corpus", () => {
    expect(CorpusIndex.fromFile().size).toBe(12);
  });

  it("lists records in stored order with zero scores", async () => {
    const listed = await index.list(2);

    expect(listed.map((item) => item.caseId)).toEqual(["A", "B"]);
    expect(listed[0]).toMatchObject({ similarity: 0, lexical: 0, score: 0, diagnosis: "肝陽上亢" });
  });
});
