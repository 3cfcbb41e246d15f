/**
 * Assistant Graph — one conversational turn.
 *
 * load checkpoint → classify intent → run the handler for that intent →
 * merge its update → save checkpoint → append transcript.
 *
 * Each intent maps to exactly one handler node. The only chained edge is
 * analyze → create issue, taken when automatic issue tracking is enabled and
 * the analysis succeeded. Turns for the same session run one at a time.
 */

import { applyStateUpdate, type ConversationState } from "./conversationState";
import { addDetails } from "./handlers/addDetails";
import { analyzeVulnerability } from "./handlers/analyzeVulnerability";
import { queryGraph } from "./handlers/graphQuery";
import { help, notUnderstood } from "./handlers/help";
import { createIssue, fetchIssue, updateIssue } from "./handlers/issueHandlers";
import { listVulnerabilities } from "./handlers/listVulnerabilities";
import { patchVulnerability } from "./handlers/patcher";
import { generatePlan } from "./handlers/planner";
import { runCommand } from "./handlers/runCommand";
import { classifyIntent, type Intent } from "./intentClassifier";
import type { AssistantServices, Handler, HandlerResult, TurnContext } from "./services";

export const ROUTES: Record<Intent, Handler> = {
  LIST_VULNS: listVulnerabilities,
  ANALYZE_VULN: analyzeVulnerability,
  ADD_DETAILS: addDetails,
  CREATE_JIRA_STORY: createIssue,
  FETCH_JIRA_STORY: fetchIssue,
  UPDATE_JIRA_STORY: updateIssue,
  QUERY_GRAPHDB: queryGraph,
  GENERATE_PLAN: generatePlan,
  PATCH_VULN: patchVulnerability,
  RUN_COMMAND: runCommand,
  HELP: help,
  OTHER: notUnderstood,
};

export interface TurnResult {
  sessionId: string;
  intent: Intent;
  output: string;
  currentStep: number;
}

async function runHandler(handler: Handler, ctx: TurnContext): Promise<HandlerResult> {
  try {
    return await handler(ctx);
  } catch (err) {
    console.error(`[Assistant] Handler for ${ctx.intent.intent} failed: ${(err as Error).message}`);
    return { output: `An unexpected error occurred while handling your request: ${(err as Error).message}`, ok: false };
  }
}

/**
 * Dispatch the classified turn and apply the fixed analyze → create issue
 * chain. Returns the combined output and the merged state.
 */
async function dispatch(ctx: TurnContext): Promise<{ output: string; state: ConversationState }> {
  const first = await runHandler(ROUTES[ctx.intent.intent], ctx);
  let state = applyStateUpdate(ctx.state, first.update ?? {});
  let output = first.output;

  if (ctx.intent.intent === "ANALYZE_VULN" && first.ok !== false && ctx.services.settings.autoTrackIssues) {
    console.log("[Assistant] Auto-tracking analyzed vulnerability");
    const second = await runHandler(createIssue, { ...ctx, state });
    state = applyStateUpdate(state, second.update ?? {});
    output = `${output}\n\n${second.output}`;
  }

  return { output, state };
}

async function executeTurn(services: AssistantServices, sessionId: string, message: string): Promise<TurnResult> {
  const previous = (await services.store.load(sessionId)) ?? {};
  const intent = await classifyIntent(services.model, message);
  console.log(`[Assistant] Session ${sessionId}: intent ${intent.intent}${intent.data ? ` (${intent.data})` : ""}`);

  const { output, state } = await dispatch({ sessionId, message, intent, state: previous, services });
  const next = applyStateUpdate(state, {
    userInput: message,
    intent: intent.intent,
    intentData: intent.data,
    output,
  });

  await services.store.save(sessionId, next);
  await services.store.appendMessages(sessionId, [
    { role: "user", content: message },
    { role: "assistant", content: output, intent: intent.intent },
  ]);

  return { sessionId, intent: intent.intent, output, currentStep: next.currentStep ?? 0 };
}

// Tail of the running turn chain, per session
const sessionQueues = new Map<string, Promise<unknown>>();

/**
 * Run one turn. Turns for the same session are serialized; different
 * sessions run concurrently.
 */
export function runTurn(services: AssistantServices, sessionId: string, message: string): Promise<TurnResult> {
  const previous = sessionQueues.get(sessionId) ?? Promise.resolve();
  const turn = previous.then(() => executeTurn(services, sessionId, message));
  // Failures reach the caller through `turn`; the queue only needs to settle
  const tail = turn.catch(() => undefined);
  sessionQueues.set(sessionId, tail);
  void tail.then(() => {
    if (sessionQueues.get(sessionId) === tail) sessionQueues.delete(sessionId);
  });
  return turn;
}
