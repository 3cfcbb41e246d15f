/**
 * Collaborators the assistant handlers depend on. Production wiring lives in
 * createDefaultServices(); tests build the object with fakes.
 */

import { ENV } from "../_core/env";
import { RedHatAdvisoryClient, type AdvisorySource } from "../advisories/redhatClient";
import { GremlinGraphClient, isGremlinConfigured, type GraphStore } from "../gremlin/gremlinClient";
import { JiraClient, isJiraConfigured, type IssueTracker } from "../jira/jiraClient";
import { defaultModelClient, type ModelClient } from "../llm/llmService";
import { FilePlanStore, type PlanStore } from "../remediation/planFile";
import { SshCommandRunner, type CommandRunner } from "../ssh/sshClient";
import { CsvVulnerabilityTable, type VulnerabilityTable } from "../vulnData/vulnerabilityTable";
import { getCheckpointStore, type CheckpointStore } from "./checkpointStore";
import type { ConversationState, StateUpdate } from "./conversationState";
import type { IntentResult } from "./intentClassifier";

export interface AssistantSettings {
  maxRetries: number;
  autoTrackIssues: boolean;
}

export interface AssistantServices {
  model: ModelClient;
  shell: CommandRunner;
  /** null when Jira is not configured */
  issues: IssueTracker | null;
  /** null when the graph database is not configured */
  graph: GraphStore | null;
  advisories: AdvisorySource;
  vulnTable: VulnerabilityTable;
  store: CheckpointStore;
  planStore: PlanStore;
  settings: AssistantSettings;
}

export interface TurnContext {
  sessionId: string;
  message: string;
  intent: IntentResult;
  state: ConversationState;
  services: AssistantServices;
}

export interface HandlerResult {
  output: string;
  update?: StateUpdate;
  /** False when the handler could not do its job (missing data, remote failure) */
  ok?: boolean;
}

export type Handler = (ctx: TurnContext) => Promise<HandlerResult>;

let defaultServices: AssistantServices | null = null;

export function createDefaultServices(): AssistantServices {
  if (defaultServices) return defaultServices;

  defaultServices = {
    model: defaultModelClient,
    shell: new SshCommandRunner(),
    issues: isJiraConfigured() ? new JiraClient() : null,
    graph: isGremlinConfigured() ? new GremlinGraphClient() : null,
    advisories: new RedHatAdvisoryClient(),
    vulnTable: new CsvVulnerabilityTable(),
    store: getCheckpointStore(),
    planStore: new FilePlanStore(),
    settings: {
      maxRetries: ENV.patchMaxRetries,
      autoTrackIssues: ENV.autoTrackIssues,
    },
  };
  return defaultServices;
}
