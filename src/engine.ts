import { DiagnoseAgent } from "./agents/diagnoseAgent";
import { GateAgent } from "./agents/gateAgent";
import { ReviewAgent } from "./agents/reviewAgent";
import { type JsonLlmLike, type PromptTrace, ReasoningClient } from "./llm/reasoning";
import { SpiralPipeline } from "./orchestrator/spiralPipeline";
import { CaseSelector } from "./services/caseSelector";
import { ConvergenceEvaluator } from "./services/convergenceEvaluator";
import { CorpusIndex, type RetrievalCapability } from "./services/corpusIndex";
import { FollowUpPlanner } from "./services/followUpPlanner";
import { RetrievalAssembler } from "./services/retrievalAssembler";
import type { SecurityScreen } from "./services/securityScreen";
import { SessionStore } from "./services/sessionStore";
import { TermExtractor } from "./services/termExtractor";

export interface EngineOptions {
  llm: JsonLlmLike;
  retrieval?: RetrievalCapability;
  store?: SessionStore;
  extractor?: TermExtractor;
  security?: SecurityScreen;
}

export interface Engine {
  store: SessionStore;
  pipeline: SpiralPipeline;
}

/** Wires the pipeline from its collaborators; anything not supplied comes from config. */
export const createEngine = (options: EngineOptions): Engine => {
  const store = options.store ?? new SessionStore();
  const extractor = options.extractor ?? new TermExtractor();

  const logPrompt = (trace: PromptTrace): void => {
    store.pushEvent(trace.sessionId, trace.role, "prompt_logged", `${trace.role} prompt captured.`, {
      stage: trace.stage,
      round: trace.round,
      data: {
        system: trace.system,
        user: trace.user
      }
    });
  };

  const reasoning = new ReasoningClient(options.llm, undefined, logPrompt);
  const pipeline = new SpiralPipeline({
    store,
    assembler: new RetrievalAssembler(options.retrieval ?? CorpusIndex.fromFile(), extractor),
    selector: new CaseSelector(extractor),
    evaluator: new ConvergenceEvaluator(),
    extractor,
    followUps: new FollowUpPlanner(extractor.gapCategories),
    gateAgent: new GateAgent(reasoning),
    diagnoseAgent: new DiagnoseAgent(reasoning),
    reviewAgent: new ReviewAgent(reasoning),
    security: options.security
  });

  return { store, pipeline };
};
