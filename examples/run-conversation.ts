/**
 * Example: asking a remote agent one question and recording the run.
 *
 * Reads its settings from the environment (see loadSessionConfig):
 *
 *   AGENT_ENDPOINT=https://… AGENT_TOKEN=… npx tsx examples/run-conversation.ts "How did sales do last quarter?"
 *
 * The run's events.jsonl and result.json land under AGENT_RUN_DIR.
 */

import { createCallerMessage, getMessageText } from "@agent-ledger/stream-client";
import {
  createLogger,
  loadSessionConfig,
  runConversation,
  type RunEvent,
} from "@agent-ledger/conversation";

function describeEvent(event: RunEvent): string | undefined {
  switch (event.type) {
    case "RunStarted":
      return `[RUN] Started: ${event.runId}`;
    case "ConnectionRetrying":
      return `  [CONNECT] Attempt ${event.attempt} failed (${event.error}), retrying in ${Math.round(event.delay)}ms`;
    case "StreamOpened":
      return `  [CONNECT] Stream open after ${event.attempt} attempt(s)`;
    case "FrameDropped":
      return `  [FRAME] Dropped: ${event.reason}`;
    case "RunFinished":
      return `[RUN] ${event.status} in ${event.duration}ms`;
    case "ArtifactSaved":
      return `[ARTIFACT] ${event.dir}`;
    case "ArtifactFailed":
      return `[ARTIFACT] Not saved: ${event.error}`;
  }
}

async function main(): Promise<void> {
  const question = process.argv[2] ?? "What changed in revenue last quarter?";
  const { logLevel, ...config } = loadSessionConfig(process.env);

  const { result, persistenceError } = await runConversation({
    ...config,
    conversation: { messages: [createCallerMessage(question)] },
    toolConstraint: { mode: "auto" },
    logger: createLogger({ level: logLevel }),
    onEvent: (event) => {
      const line = describeEvent(event);
      if (line) console.log(line);
    },
  });

  console.log("\n=== Run Result ===");
  console.log(`Status: ${result.status}`);
  if (result.error) console.log(`Error: ${result.error.kind}: ${result.error.message}`);
  console.log(`Tool calls: ${result.toolCalls.map((c) => `${c.name} (${c.state})`).join(", ") || "none"}`);
  console.log(`\nAnswer:\n${result.answer}`);

  const last = result.conversation.messages.at(-1);
  if (last && last.role === "assistant") {
    console.log(`\n(${getMessageText(last).length} characters of agent text)`);
  }

  if (persistenceError) process.exitCode = 2;
  else if (result.status !== "completed") process.exitCode = 1;
}

main().catch((err: unknown) => {
  console.error("Run failed:", err);
  process.exit(1);
});
