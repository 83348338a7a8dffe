import { describe, expect, it } from "vitest";
import { DiagnoseAgent } from "../../src/agents/diagnoseAgent";
import { ReviewAgent } from "../../src/agents/reviewAgent";
import { caseRecord, RecordingReasoning } from "../helpers/fixtures";

describe("DiagnoseAgent", () => {
  it("lists the ranked candidates, the proposed anchor and the previous anchor", async () => {
    const reasoning = new RecordingReasoning({ anchorCaseId: "C-002", coverageRatio: 0.6, missingInfo: ["脈象"] });
    const agent = new DiagnoseAgent(reasoning, 3000);
    const candidate = caseRecord("C-002", "心血虛", { chiefComplaint: "心悸失眠", symptomTerms: ["心悸", "失眠"] });

    const result = await agent.diagnose({
      sessionId: "s-1",
      round: 2,
      accumulatedQuery: "心悸失眠\n補充：沒有盜汗",
      plan: { symptomTerms: ["心悸", "失眠"], tonguePulseTerms: [], zangfuTerms: ["心"], negatedTerms: ["盜汗"] },
      ranked: [{ candidate, scores: { similarity: 0.5, symptomJaccard: 1, tonguePulseJaccard: 0, specificity: 1, total: 0.6 } }],
      proposedAnchorId: "C-002",
      previousAnchor: caseRecord("C-001", "心脾兩虛"),
      previousCoverage: 0.45
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.missingInfo).toEqual(["脈象"]);
      expect(result.value.contradictsPreviousAnchor).toBe(false);
    }

    const [request] = reasoning.requests;
    expect(request).toMatchObject({ stage: "diagnose", role: "diagnoser", timeoutMs: 3000 });
    const sections = request.user.split("\n\n");
    expect(sections).toContain("Denied by the patient: 盜汗");
    expect(sections).toContain("Proposed anchor: C-002");
    expect(sections).toContain("Previous anchor: C-001 (心脾兩虛), previous coverage 0.45");
    expect(sections).toContain(
      "Candidate cases:\n- C-002: 心血虛\n  chief complaint: 心悸失眠\n  symptoms: 心悸、失眠; tongue/pulse: (none)\n  selection score: 0.600"
    );
  });
});

describe("ReviewAgent", () => {
  it("asks the reviewer stage to audit the reviewed content", async () => {
    const reasoning = new RecordingReasoning({ verdict: "passed" });
    const agent = new ReviewAgent(reasoning, 800);

    const result = await agent.audit({
      sessionId: "s-1",
      round: 1,
      content: { primaryPattern: "心血虛", analysis: "心血不足。", followUpQuestions: [] }
    });

    expect(result).toEqual({ ok: true, value: { verdict: "passed", issues: [] }, attempts: 1 });
    expect(reasoning.requests[0]).toMatchObject({ stage: "review", role: "reviewer", timeoutMs: 800 });
    expect(reasoning.requests[0].user).toBe("Pattern: 心血虛\n\nAnalysis:\n心血不足。\n\nFollow-up questions:\n(none)");
  });
});
