#!/usr/bin/env node
import readline from "node:readline/promises";
import { assertConfig } from "./config";
import { createEngine } from "./engine";
import { OpenAiClient } from "./llm/openaiClient";
import type { RoundResult } from "./types";

const getArgValue = (name: string): string | undefined => {
  const marker = `--${name}`;
  const index = process.argv.findIndex((arg) => arg === marker);
  if (index === -1) return undefined;
  return process.argv[index + 1];
};

const printResult = (result: RoundResult): void => {
  console.log(`\n[round ${result.round}] ${result.status}${result.degraded ? ` (degraded: ${result.degradedStages.join(", ")})` : ""}`);
  console.log(result.message);
  if (result.coverageRatio !== null) {
    console.log(`coverage=${result.coverageRatio.toFixed(2)} converged=${result.converged}${result.forcedConvergence ? " (forced)" : ""}`);
  }
  if (getArgValue("trace") === "true") {
    for (const entry of result.trace) {
      console.log(`  - [${entry.stage}] ${entry.event}: ${entry.message}`);
    }
  }
};

const main = async (): Promise<void> => {
  assertConfig();

  const llm = new OpenAiClient();
  await llm.assertModelAvailable();
  const { pipeline } = createEngine({ llm });

  const text = getArgValue("text")?.trim();
  let sessionId = getArgValue("session")?.trim();

  if (text) {
    const result = await pipeline.runRound({ sessionId, text });
    console.log(`Session: ${result.sessionId}`);
    printResult(result);
    return;
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  console.log("Describe the complaint. Empty line or Ctrl+D to quit.");
  try {
    while (true) {
      const line = (await rl.question("> ")).trim();
      if (!line) break;

      const result = await pipeline.runRound({ sessionId, text: line });
      sessionId = result.sessionId;
      printResult(result);
      if (result.converged) {
        console.log("\nConverged. Start a new session for another case.");
        break;
      }
    }
  } finally {
    rl.close();
  }
};

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exit(1);
});
