import { readFileSync } from "node:fs";
import { z } from "zod";
import { config } from "../config";
import { componentLogger } from "../logger";
import { type RetrievedCase, type StoredCase, storedCaseSchema } from "../schemas/caseRecord";

const log = componentLogger("corpus-index");

/** Hybrid search over one named field of the case corpus. Unknown fields and misses yield []. */
export interface RetrievalCapability {
  search(query: string, field: string, limit: number): Promise<unknown[]>;
  /** Corpus entries in stored order with zero scores, used to backfill a short candidate list. */
  list(limit: number): Promise<unknown[]>;
}

const SEPARATORS = /[\s，。、；：！？「」（）,.;:!?()\-]+/u;

const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;

export const characterBigrams = (text: string): string[] => {
  const compact = text.split(SEPARATORS).join("");
  const chars = [...compact];
  if (chars.length < 2) return chars;
  return chars.slice(0, -1).map((char, index) => `${char}${chars[index + 1]}`);
};

export const bigramCosine = (left: string, right: string): number => {
  const count = (text: string): Map<string, number> => {
    const counts = new Map<string, number>();
    for (const gram of characterBigrams(text)) {
      counts.set(gram, (counts.get(gram) ?? 0) + 1);
    }
    return counts;
  };

  const a = count(left);
  const b = count(right);
  if (a.size === 0 || b.size === 0) return 0;

  let dot = 0;
  for (const [gram, weight] of a.entries()) {
    dot += weight * (b.get(gram) ?? 0);
  }
  const norm = (counts: Map<string, number>) => Math.sqrt([...counts.values()].reduce((sum, v) => sum + v * v, 0));
  return dot / (norm(a) * norm(b));
};

/** Short segments are kept whole, longer ones are split into character bigrams. */
export const queryTokens = (query: string): string[] => {
  const tokens = query
    .split(SEPARATORS)
    .filter(Boolean)
    .flatMap((segment) => ([...segment].length <= 2 ? [segment] : characterBigrams(segment)));
  return [...new Set(tokens)];
};

export const lexicalOverlap = (query: string, text: string): number => {
  const tokens = queryTokens(query);
  if (tokens.length === 0) return 0;
  const hits = tokens.filter((token) => text.includes(token)).length;
  return Math.min(1, hits / Math.max(4, tokens.length));
};

const fieldText = (record: StoredCase, field: string): string | undefined => {
  switch (field) {
    case "search_tokens":
      return [record.chiefComplaint, record.presentIllness, record.diagnosis, ...record.symptomTerms, ...record.tonguePulseTerms].join(" ");
    case "syndrome_terms":
      return record.diagnosis;
    case "symptom_terms":
      return record.symptomTerms.join(" ");
    case "tongue_pulse_terms":
      return record.tonguePulseTerms.join(" ");
    case "zangfu_terms":
      return record.zangfuTerms.join(" ");
    default:
      return undefined;
  }
};

export class CorpusIndex implements RetrievalCapability {
  constructor(
    private readonly records: StoredCase[],
    private readonly alpha = config.retrieval.hybridAlpha
  ) {}

  static fromFile(filePath = config.corpusPath, alpha = config.retrieval.hybridAlpha): CorpusIndex {
    const records = z.array(storedCaseSchema).parse(JSON.parse(readFileSync(filePath, "utf8")));
    log.info({ filePath, records: records.length }, "corpus loaded");
    return new CorpusIndex(records, alpha);
  }

  get size(): number {
    return this.records.length;
  }

  async search(query: string, field: string, limit: number): Promise<RetrievedCase[]> {
    if (limit <= 0 || !query.trim()) return [];

    const scored: RetrievedCase[] = [];
    for (const record of this.records) {
      const text = fieldText(record, field);
      if (!text?.trim()) continue;

      const similarity = round4(bigramCosine(query, text));
      const lexical = round4(lexicalOverlap(query, text));
      const score = round4(this.alpha * similarity + (1 - this.alpha) * lexical);
      if (score <= 0) continue;
      scored.push({ ...record, similarity, lexical, score });
    }

    return scored
      .map((item, index) => ({ item, index }))
      .sort((a, b) => (b.item.score ?? 0) - (a.item.score ?? 0) || a.index - b.index)
      .slice(0, limit)
      .map(({ item }) => item);
  }

  async list(limit: number): Promise<RetrievedCase[]> {
    return this.records.slice(0, Math.max(0, limit)).map((record) => ({ ...record, similarity: 0, lexical: 0, score: 0 }));
  }
}
