import { describe, expect, it } from "vitest";
import { TermExtractor, planTerms } from "../../src/services/termExtractor";

const extractor = new TermExtractor();

describe("TermExtractor", () => {
  it("extracts symptom, tongue/pulse and organ terms and separates negated ones", () => {
    const plan = extractor.extract("最近失眠多夢，心悸，沒有盜汗，舌淡苔薄白，脈細弱");

    expect(plan).toEqual({
      symptomTerms: ["失眠", "多夢", "心悸"],
      tonguePulseTerms: ["舌淡", "苔薄白", "脈細"],
      zangfuTerms: ["心"],
      negatedTerms: ["盜汗"]
    });
  });

  it("treats a term as present when any occurrence is not negated", () => {
    const plan = extractor.extract("失眠兩週\n補充：昨晚沒有失眠");
    expect(plan.symptomTerms).toEqual(["失眠"]);
    expect(plan.negatedTerms).toEqual([]);
  });

  it("returns an empty plan for text without lexicon terms", () => {
    expect(planTerms(extractor.extract("你好，請問一下"))).toEqual([]);
  });

  it("classifies the query domain with digestive words taking precedence", () => {
    expect(extractor.classifyDomain("飯後胃脘脹痛")).toBe("digestive");
    expect(extractor.classifyDomain("白帶量多")).toBe("gynecological");
    expect(extractor.classifyDomain("月經延後，伴胃脹")).toBe("digestive");
    expect(extractor.classifyDomain("失眠多夢")).toBe("general");
  });

  it("tells compound pattern labels from single-organ ones", () => {
    expect(extractor.isCompoundPattern("心脾兩虛")).toBe(true);
    expect(extractor.isCompoundPattern("氣血兩虛")).toBe(true);
    expect(extractor.isCompoundPattern("肝胃不和")).toBe(true);
    expect(extractor.isSingleOrganPattern("心血虛")).toBe(true);
    expect(extractor.isSingleOrganPattern("心脾兩虛")).toBe(false);
    expect(extractor.isSingleOrganPattern("血虛經遲")).toBe(false);
  });

  it("splits tongue and pulse terms, including pulse terms outside the lexicon", () => {
    expect(extractor.splitTonguePulse(["舌淡", "脈細", "脈象和緩", "苔薄白"])).toEqual({
      tongue: ["舌淡", "苔薄白"],
      pulse: ["脈細", "脈象和緩"]
    });
  });
});
