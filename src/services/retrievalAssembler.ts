import { createHash } from "node:crypto";
import { config } from "../config";
import { componentLogger } from "../logger";
import { retrievedCaseSchema } from "../schemas/caseRecord";
import type { CaseRecord, Domain, RetrievalPlan, TraceEntry, VirtualCase } from "../types";
import type { RetrievalCapability } from "./corpusIndex";
import { planTerms } from "./termExtractor";
import { withTimeout } from "../utils/timeout";

const log = componentLogger("retrieval");

export interface DomainClassifier {
  classifyDomain(text: string): Domain;
}

export interface RetrievalAssemblerOptions {
  fields: string[];
  candidateCount: number;
  overfetchFactor: number;
  /** Per-call budget for each search and listing request. */
  timeoutMs: number;
}

export interface AssembleInput {
  query: string;
  plan: RetrievalPlan;
}

export interface AssembledCandidates {
  candidates: CaseRecord[];
  trace: TraceEntry[];
  fieldUsed: string | null;
  queryDomain: Domain;
  discarded: number;
  domainRelaxed: boolean;
  virtualInjected: boolean;
  /** Every field came back empty and the plan had no terms to synthesize from. */
  empty: boolean;
}

const entry = (event: string, message: string, data?: Record<string, unknown>): TraceEntry => ({
  stage: "diagnose",
  event,
  message,
  at: new Date().toISOString(),
  data
});

export const buildVirtualCase = (query: string, plan: RetrievalPlan, domain: Domain): VirtualCase => {
  const digest = createHash("sha256").update(query).digest("hex").slice(0, 12);
  const organs = plan.zangfuTerms.join("");
  return {
    caseId: `virtual-${digest}`,
    chiefComplaint: query.split("\n")[0]?.slice(0, 120) ?? "",
    presentIllness: query,
    diagnosis: organs ? `${organs}證候待辨` : "證候待辨",
    symptomTerms: [...plan.symptomTerms],
    tonguePulseTerms: [...plan.tonguePulseTerms],
    zangfuTerms: [...plan.zangfuTerms],
    domain,
    similarity: 0,
    lexical: 0,
    score: 0,
    virtual: true
  };
};

const overlapsPlan = (candidate: CaseRecord, terms: Set<string>): boolean =>
  [...candidate.symptomTerms, ...candidate.tonguePulseTerms, ...candidate.zangfuTerms].some((term) => terms.has(term));

export class RetrievalAssembler {
  constructor(
    private readonly retrieval: RetrievalCapability,
    private readonly domains: DomainClassifier,
    private readonly options: RetrievalAssemblerOptions = {
      fields: config.retrieval.fallbackFields,
      candidateCount: config.retrieval.candidateCount,
      overfetchFactor: config.retrieval.overfetchFactor,
      timeoutMs: config.timeouts.retrievalMs
    }
  ) {}

  async assemble(input: AssembleInput): Promise<AssembledCandidates> {
    const { fields, candidateCount } = this.options;
    const limit = candidateCount * Math.max(1, this.options.overfetchFactor);
    const trace: TraceEntry[] = [];
    const hits: CaseRecord[] = [];
    const seen = new Set<string>();
    let discarded = 0;
    let fieldUsed: string | null = null;

    const accept = (raw: unknown[], field: string, room = Number.POSITIVE_INFINITY): number => {
      let added = 0;
      for (const [index, item] of raw.entries()) {
        if (added >= room) break;
        const parsed = retrievedCaseSchema.safeParse(item);
        if (!parsed.success) {
          discarded += 1;
          trace.push(
            entry("malformed_discarded", `Discarded malformed retrieval item #${index} from ${field}.`, {
              field,
              index,
              issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            })
          );
          continue;
        }

        const record = parsed.data;
        if (seen.has(record.caseId)) continue;
        seen.add(record.caseId);
        hits.push({
          ...record,
          domain: record.domain ?? this.domains.classifyDomain(`${record.chiefComplaint} ${record.presentIllness} ${record.diagnosis}`),
          score: record.score ?? (record.similarity + record.lexical) / 2,
          virtual: false
        });
        added += 1;
      }
      return added;
    };

    // A failed or slow call counts as an empty result for that source.
    const fetchFrom = async (source: string, call: () => Promise<unknown[]>): Promise<unknown[]> => {
      try {
        return await withTimeout(call(), this.options.timeoutMs, `retrieval on ${source}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.warn({ source, err: message }, "retrieval call failed");
        trace.push(entry("field_failed", `Retrieval on ${source} failed: ${message}`, { field: source, error: message }));
        return [];
      }
    };

    for (const [index, field] of fields.entries()) {
      const raw = await fetchFrom(field, () => this.retrieval.search(input.query, field, limit));

      if (fieldUsed === null) {
        if (raw.length === 0) {
          const nextField = fields[index + 1];
          trace.push(
            entry(
              "field_fallback",
              nextField ? `No results on ${field}; retrying on ${nextField}.` : `No results on ${field}; fallback fields exhausted.`,
              { field, nextField: nextField ?? null }
            )
          );
          continue;
        }
        fieldUsed = field;
        accept(raw, field);
      } else {
        const added = accept(raw, field);
        if (added > 0) {
          trace.push(entry("backfilled", `Backfilled ${added} candidate(s) from ${field}.`, { field, added }));
        }
      }

      if (hits.length >= candidateCount) break;
    }

    if (fieldUsed !== null && hits.length < candidateCount) {
      const listed = await fetchFrom("corpus", () => this.retrieval.list(limit + hits.length));
      const added = accept(listed, "corpus", candidateCount - hits.length);
      if (added > 0) {
        trace.push(entry("backfilled", `Backfilled ${added} candidate(s) from the corpus listing.`, { field: "corpus", added }));
      }
    }

    const queryDomain = this.domains.classifyDomain(input.query);
    const sameDomain = hits.filter((hit) => hit.domain === queryDomain);
    const domainRelaxed = hits.length > 0 && sameDomain.length === 0;
    const ordered = domainRelaxed ? hits : [...sameDomain, ...hits.filter((hit) => hit.domain !== queryDomain)];

    if (domainRelaxed) {
      trace.push(entry("domain_relaxed", `No candidate shares the ${queryDomain} domain; keeping retrieval order.`, { queryDomain }));
    } else if (hits.length > 0) {
      trace.push(entry("domain_reordered", `Placed ${sameDomain.length} ${queryDomain} candidate(s) first.`, { queryDomain }));
    }

    let candidates = ordered.slice(0, candidateCount);
    const terms = new Set(planTerms(input.plan));
    let virtualInjected = false;

    if (terms.size > 0 && !candidates.some((candidate) => overlapsPlan(candidate, terms))) {
      const virtualCase = buildVirtualCase(input.query, input.plan, queryDomain);
      candidates = [virtualCase, ...candidates.slice(0, Math.max(0, candidateCount - 1))];
      virtualInjected = true;
      trace.push(
        entry("virtual_injected", "No retrieved case shares a term with the plan; synthesized a virtual case from the query.", {
          caseId: virtualCase.caseId,
          kept: candidates.length - 1
        })
      );
    }

    const empty = candidates.length === 0;
    if (empty) {
      trace.push(entry("retrieval_empty", "Every fallback field came back empty and the plan has no terms.", { fields }));
    }

    return { candidates, trace, fieldUsed, queryDomain, discarded, domainRelaxed, virtualInjected, empty };
  }
}
