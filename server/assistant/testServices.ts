/**
 * In-process stand-ins for the assistant's collaborators, used by the tests.
 */

import type { AdvisoryBundle, AdvisorySource } from "../advisories/redhatClient";
import type {
  CreatedIssue,
  IssueStatusTarget,
  IssueTracker,
  JiraFieldCatalog,
  JiraIssueSummary,
} from "../jira/jiraClient";
import type { AskOptions, ModelClient } from "../llm/llmService";
import type { PlanStore } from "../remediation/planFile";
import type { RemediationPlan } from "../remediation/remediationPlan";
import type { CommandRunner } from "../ssh/sshClient";
import {
  describeRows,
  VULN_ID_COLUMN,
  type VulnerabilityRow,
  type VulnerabilityTable,
} from "../vulnData/vulnerabilityTable";
import { InMemoryCheckpointStore } from "./checkpointStore";
import type { ConversationState } from "./conversationState";
import type { Intent } from "./intentClassifier";
import type { AssistantServices, TurnContext } from "./services";

type ScriptedReply = string | Error | ((prompt: string) => string);

/**
 * Model that answers from per-caller queues. A caller with no reply left
 * rejects, like an unavailable endpoint.
 */
export class ScriptedModel implements ModelClient {
  readonly calls: Array<{ caller: string; prompt: string }> = [];
  private readonly replies = new Map<string, ScriptedReply[]>();

  on(caller: string, ...replies: ScriptedReply[]): this {
    this.replies.set(caller, [...(this.replies.get(caller) ?? []), ...replies]);
    return this;
  }

  /** Classifier reply for the next turn. */
  intent(intent: string, data = ""): this {
    return this.on("intent-classifier", JSON.stringify({ intent, data }));
  }

  callsFor(caller: string): string[] {
    return this.calls.filter(call => call.caller === caller).map(call => call.prompt);
  }

  async ask(prompt: string, options: AskOptions): Promise<string> {
    this.calls.push({ caller: options.caller, prompt });
    const queue = this.replies.get(options.caller) ?? [];
    const reply = queue.shift();
    if (reply === undefined) throw new Error(`No scripted reply for ${options.caller}`);
    if (reply instanceof Error) throw reply;
    return typeof reply === "function" ? reply(prompt) : reply;
  }
}

export class FakeShell implements CommandRunner {
  readonly commands: string[] = [];

  constructor(private readonly respond: (command: string) => string = () => "ok") {}

  async run(command: string): Promise<string> {
    this.commands.push(command);
    return this.respond(command);
  }
}

export class MemoryPlanStore implements PlanStore {
  readonly location = "memory://plan.json";
  saved: RemediationPlan | null;

  constructor(initial: RemediationPlan | null = null) {
    this.saved = initial;
  }

  async load(): Promise<RemediationPlan | null> {
    return this.saved;
  }

  async save(plan: RemediationPlan): Promise<void> {
    this.saved = plan;
  }
}

export class FakeVulnTable implements VulnerabilityTable {
  constructor(private readonly rows: VulnerabilityRow[]) {}

  async sample(count = 5): Promise<string[]> {
    return describeRows(this.rows).slice(0, count);
  }

  async getById(vulnId: string): Promise<VulnerabilityRow | null> {
    return this.rows.find(row => row[VULN_ID_COLUMN] === vulnId) ?? null;
  }
}

export class FakeAdvisories implements AdvisorySource {
  readonly fetched: string[] = [];

  constructor(
    private readonly bundles: Record<string, AdvisoryBundle> = {},
    private readonly localCves: Record<string, unknown> = {}
  ) {}

  async fetchByRhsa(rhsaId: string): Promise<AdvisoryBundle> {
    this.fetched.push(rhsaId);
    const bundle = this.bundles[rhsaId];
    if (!bundle) throw new Error(`No CVE data found for advisory ${rhsaId}`);
    return bundle;
  }

  async loadLocalCves(cveIds: string[]): Promise<unknown[]> {
    return cveIds.filter(id => id in this.localCves).map(id => this.localCves[id]);
  }
}

function summary(key: string, summaryText: string, type: string, status = "To Do"): JiraIssueSummary {
  return {
    key,
    id: key.replace(/\D/g, ""),
    summary: summaryText,
    type,
    status,
    progress: { progress: 0, total: 0, percent: 0 },
    fields: {},
  };
}

export class FakeIssueTracker implements IssueTracker {
  readonly epics: JiraIssueSummary[] = [];
  readonly stories: Array<JiraIssueSummary & { epicKey: string | null; customFields: Record<string, unknown> }> = [];
  readonly comments: Array<{ key: string; body: string }> = [];
  readonly transitions: Array<{ key: string; target: IssueStatusTarget }> = [];
  readonly fieldUpdates: Array<{ key: string; fields: Record<string, unknown> }> = [];
  catalog: JiraFieldCatalog = {};
  private nextId = 100;

  addEpic(summaryText: string): string {
    const key = `VULN-${this.nextId++}`;
    this.epics.push(summary(key, summaryText, "Epic"));
    return key;
  }

  async listEpics(): Promise<JiraIssueSummary[]> {
    return [...this.epics];
  }

  async getIssue(issueKey: string): Promise<JiraIssueSummary> {
    const issue = [...this.epics, ...this.stories].find(item => item.key === issueKey);
    if (!issue) throw new Error(`Issue ${issueKey} not found`);
    return issue;
  }

  async listSubtasks(): Promise<JiraIssueSummary[]> {
    return [];
  }

  async createEpic(summaryText: string): Promise<CreatedIssue> {
    const key = this.addEpic(summaryText);
    return { key, id: key.replace(/\D/g, "") };
  }

  async createStory(
    epicKey: string | null,
    summaryText: string,
    fields: Record<string, unknown>
  ): Promise<CreatedIssue> {
    const key = `VULN-${this.nextId++}`;
    this.stories.push({ ...summary(key, summaryText, "Story"), epicKey, customFields: fields });
    return { key, id: key.replace(/\D/g, "") };
  }

  async getStoryFieldCatalog(): Promise<JiraFieldCatalog> {
    return this.catalog;
  }

  async updateFields(issueKey: string, fields: Record<string, unknown>): Promise<void> {
    this.fieldUpdates.push({ key: issueKey, fields });
  }

  async transitionTo(issueKey: string, target: IssueStatusTarget): Promise<boolean> {
    this.transitions.push({ key: issueKey, target });
    return true;
  }

  async addComment(issueKey: string, body: string): Promise<void> {
    this.comments.push({ key: issueKey, body });
  }
}

export const SAMPLE_ROW: VulnerabilityRow = {
  "Vuln ID": "241573",
  "Vuln Name": "RHSA-2025:90011: openssl security update (Important)",
  "App Code": "PAY01",
  "App Name": "Payments Gateway",
  "Asset Name": "pay-gw-01.example.internal",
  Env: "PROD",
  "First Detection": "3/14/2025",
  "Fix By": "4/13/2025",
  Priority: "High",
  Solution: "Update the openssl packages",
};

export function createTestServices(overrides: Partial<AssistantServices> = {}): AssistantServices {
  return {
    model: new ScriptedModel(),
    shell: new FakeShell(),
    issues: null,
    graph: null,
    advisories: new FakeAdvisories(),
    vulnTable: new FakeVulnTable([SAMPLE_ROW]),
    store: new InMemoryCheckpointStore(),
    planStore: new MemoryPlanStore(),
    settings: { maxRetries: 2, autoTrackIssues: false },
    ...overrides,
  };
}

export function turnContext(
  services: AssistantServices,
  options: { message?: string; intent?: Intent; data?: string; state?: ConversationState } = {}
): TurnContext {
  return {
    sessionId: "test-session",
    message: options.message ?? "",
    intent: { intent: options.intent ?? "OTHER", data: options.data ?? "" },
    state: options.state ?? {},
    services,
  };
}
