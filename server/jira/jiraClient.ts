/**
 * Jira REST API v2 client — epics, stories, sub-tasks, transitions and
 * comments for the remediation tracking workflow.
 *
 * Authentication is basic auth with an account email and API token.
 */

import axios, { type AxiosInstance } from "axios";
import { ENV } from "../_core/env";

// ── Types ───────────────────────────────────────────────────────────────────

export interface IssueProgress {
  progress: number;
  total: number;
  percent: number;
}

export interface JiraIssueSummary {
  key: string;
  id: string;
  summary: string;
  type: string;
  status: string;
  progress: IssueProgress;
  fields: Record<string, unknown>;
}

export interface JiraFieldMeta {
  name: string;
  schema?: { type?: string; custom?: string };
}

/** Field id → metadata, as returned by createmeta for one issue type */
export type JiraFieldCatalog = Record<string, JiraFieldMeta>;

export type IssueStatusTarget = "To Do" | "In Progress" | "Done";

export interface CreatedIssue {
  key: string;
  id: string;
}

export interface IssueTracker {
  listEpics(maxResults?: number): Promise<JiraIssueSummary[]>;
  getIssue(issueKey: string): Promise<JiraIssueSummary>;
  listSubtasks(parentKey: string): Promise<JiraIssueSummary[]>;
  createEpic(summary: string, description?: string): Promise<CreatedIssue>;
  createStory(epicKey: string | null, summary: string, fields: Record<string, unknown>, description?: string): Promise<CreatedIssue>;
  getStoryFieldCatalog(): Promise<JiraFieldCatalog>;
  updateFields(issueKey: string, fields: Record<string, unknown>): Promise<void>;
  transitionTo(issueKey: string, target: IssueStatusTarget): Promise<boolean>;
  addComment(issueKey: string, body: string): Promise<void>;
}

// ── Config ──────────────────────────────────────────────────────────────────

export function isJiraConfigured(): boolean {
  return !!ENV.jiraUrl && !!ENV.jiraEmail && !!ENV.jiraApiToken && !!ENV.jiraProjectKey;
}

const EPIC_LINK_SCHEMA = "com.pyxis.greenhopper.jira:gh-epic-link";

// ── Helpers ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function asString(value: unknown): string {
  return typeof value === "string" ? value : value === undefined || value === null ? "" : String(value);
}

function asNumber(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

export function simplifyIssue(raw: unknown): JiraIssueSummary {
  const issue = asRecord(raw);
  const fields = asRecord(issue.fields);
  const progressRaw = asRecord(fields.aggregateprogress ?? fields.progress);
  const progress = asNumber(progressRaw.progress);
  const total = asNumber(progressRaw.total);

  return {
    key: asString(issue.key),
    id: asString(issue.id),
    summary: asString(fields.summary),
    type: asString(asRecord(fields.issuetype).name),
    status: asString(asRecord(fields.status).name),
    progress: {
      progress,
      total,
      percent: total > 0 ? Math.round((progress * 100) / total) : 0,
    },
    fields,
  };
}

/**
 * Map a 0–100 completion figure to the nearest workflow status.
 */
export function statusForPercent(percent: number): IssueStatusTarget {
  const anchors: Array<[number, IssueStatusTarget]> = [
    [0, "To Do"],
    [50, "In Progress"],
    [100, "Done"],
  ];
  let best = anchors[0];
  for (const anchor of anchors) {
    if (Math.abs(anchor[0] - percent) < Math.abs(best[0] - percent)) best = anchor;
  }
  return best[1];
}

function describeAxiosError(err: unknown, action: string): Error {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status === 401 || status === 403) {
      return new Error(`[Jira] Authentication failed while trying to ${action}. Check JIRA_EMAIL and JIRA_API_TOKEN.`);
    }
    if (status === 404) {
      return new Error(`[Jira] Not found while trying to ${action}.`);
    }
    if (status === 429) {
      return new Error("[Jira] Rate limit exceeded. Please wait before retrying.");
    }
    const body = asRecord(err.response?.data);
    const messages = Array.isArray(body.errorMessages) ? body.errorMessages.map(asString).join("; ") : "";
    const fieldErrors = Object.entries(asRecord(body.errors))
      .map(([field, message]) => `${field}: ${asString(message)}`)
      .join("; ");
    const detail = [messages, fieldErrors].filter(Boolean).join("; ") || err.message;
    return new Error(`[Jira] Failed to ${action} (${status ?? "network"}): ${detail}`);
  }
  return err instanceof Error ? err : new Error(String(err));
}

// ── Client ──────────────────────────────────────────────────────────────────

export class JiraClient implements IssueTracker {
  private readonly http: AxiosInstance;
  private fieldCatalog: JiraFieldCatalog | null = null;

  constructor(
    baseUrl: string = ENV.jiraUrl,
    private readonly projectKey: string = ENV.jiraProjectKey,
    email: string = ENV.jiraEmail,
    apiToken: string = ENV.jiraApiToken
  ) {
    this.http = axios.create({
      baseURL: baseUrl,
      timeout: 20_000,
      auth: { username: email, password: apiToken },
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
    });
  }

  private async request<T>(action: string, fn: () => Promise<{ data: T }>): Promise<T> {
    try {
      const response = await fn();
      return response.data;
    } catch (err) {
      throw describeAxiosError(err, action);
    }
  }

  async searchIssues(jql: string, maxResults = 100): Promise<JiraIssueSummary[]> {
    const data = await this.request("search issues", () =>
      this.http.get<unknown>("/rest/api/2/search", { params: { jql, maxResults } })
    );
    const issues = asRecord(data).issues;
    return Array.isArray(issues) ? issues.map(simplifyIssue) : [];
  }

  listEpics(maxResults = 100): Promise<JiraIssueSummary[]> {
    return this.searchIssues(`project = ${this.projectKey} AND issuetype = Epic ORDER BY updated DESC`, maxResults);
  }

  listSubtasks(parentKey: string, maxResults = 200): Promise<JiraIssueSummary[]> {
    return this.searchIssues(`parent = ${parentKey} ORDER BY updated DESC`, maxResults);
  }

  async getIssue(issueKey: string): Promise<JiraIssueSummary> {
    const data = await this.request(`fetch issue ${issueKey}`, () =>
      this.http.get<unknown>(`/rest/api/2/issue/${encodeURIComponent(issueKey)}`)
    );
    return simplifyIssue(data);
  }

  private async createIssue(fields: Record<string, unknown>): Promise<CreatedIssue> {
    const data = await this.request("create issue", () => this.http.post<unknown>("/rest/api/2/issue", { fields }));
    const created = asRecord(data);
    return { key: asString(created.key), id: asString(created.id) };
  }

  async createEpic(summary: string, description?: string): Promise<CreatedIssue> {
    console.log(`[Jira] Creating epic "${summary}"`);
    return this.createIssue({
      project: { key: this.projectKey },
      summary,
      issuetype: { name: "Epic" },
      ...(description ? { description } : {}),
    });
  }

  /**
   * Fields available when creating a Story in the project. Cached for the
   * lifetime of the client.
   */
  async getStoryFieldCatalog(): Promise<JiraFieldCatalog> {
    if (this.fieldCatalog) return this.fieldCatalog;

    const data = await this.request("read create metadata", () =>
      this.http.get<unknown>("/rest/api/2/issue/createmeta", {
        params: {
          projectKeys: this.projectKey,
          issuetypeNames: "Story",
          expand: "projects.issuetypes.fields",
        },
      })
    );

    const projects = asRecord(data).projects;
    const project = Array.isArray(projects) ? asRecord(projects[0]) : {};
    const issueTypes = project.issuetypes;
    const storyType = Array.isArray(issueTypes) ? asRecord(issueTypes[0]) : {};

    const catalog: JiraFieldCatalog = {};
    for (const [fieldId, rawMeta] of Object.entries(asRecord(storyType.fields))) {
      const meta = asRecord(rawMeta);
      const schema = asRecord(meta.schema);
      catalog[fieldId] = {
        name: asString(meta.name),
        schema: { type: asString(schema.type) || undefined, custom: asString(schema.custom) || undefined },
      };
    }
    this.fieldCatalog = catalog;
    return catalog;
  }

  private findEpicLinkField(catalog: JiraFieldCatalog): string | null {
    for (const [fieldId, meta] of Object.entries(catalog)) {
      const custom = meta.schema?.custom ?? "";
      if (custom === EPIC_LINK_SCHEMA) return fieldId;
      if (meta.name.toLowerCase().includes("epic link") && custom.startsWith("com.")) return fieldId;
    }
    return null;
  }

  /**
   * Create a story and attach it to the epic: through the Epic Link field when
   * the project has one, otherwise through the Agile API.
   */
  async createStory(
    epicKey: string | null,
    summary: string,
    fields: Record<string, unknown>,
    description?: string
  ): Promise<CreatedIssue> {
    console.log(`[Jira] Creating story "${summary}"`);

    let epicLinkField: string | null = null;
    try {
      epicLinkField = this.findEpicLinkField(await this.getStoryFieldCatalog());
    } catch (err) {
      console.warn(`[Jira] Could not look up Epic Link field: ${(err as Error).message}`);
    }

    const story = await this.createIssue({
      project: { key: this.projectKey },
      summary,
      issuetype: { name: "Story" },
      ...fields,
      ...(description ? { description } : {}),
    });

    if (!epicKey) return story;

    if (epicLinkField) {
      try {
        await this.updateFields(story.key, { [epicLinkField]: epicKey });
        console.log(`[Jira] Linked ${story.key} to ${epicKey} via ${epicLinkField}`);
        return story;
      } catch (err) {
        console.warn(`[Jira] Epic Link update failed: ${(err as Error).message}`);
      }
    }

    try {
      const epic = await this.getIssue(epicKey);
      await this.request("link story to epic", () =>
        this.http.post<unknown>(`/rest/agile/1.0/epic/${encodeURIComponent(epic.id)}/issue`, { issues: [story.key] })
      );
      console.log(`[Jira] Linked ${story.key} to ${epicKey} via Agile API`);
    } catch (err) {
      console.warn(`[Jira] Could not link ${story.key} to ${epicKey}: ${(err as Error).message}`);
    }
    return story;
  }

  async updateFields(issueKey: string, fields: Record<string, unknown>): Promise<void> {
    await this.request(`update issue ${issueKey}`, () =>
      this.http.put<unknown>(`/rest/api/2/issue/${encodeURIComponent(issueKey)}`, { fields })
    );
  }

  /**
   * Apply the first available transition whose name contains the target
   * status. Returns false when the workflow offers no such transition.
   */
  async transitionTo(issueKey: string, target: IssueStatusTarget): Promise<boolean> {
    const data = await this.request(`list transitions for ${issueKey}`, () =>
      this.http.get<unknown>(`/rest/api/2/issue/${encodeURIComponent(issueKey)}/transitions`)
    );
    const transitions = asRecord(data).transitions;
    const match = Array.isArray(transitions)
      ? transitions.map(asRecord).find(t => asString(t.name).toLowerCase().includes(target.toLowerCase()))
      : undefined;
    if (!match) return false;

    await this.request(`transition ${issueKey}`, () =>
      this.http.post<unknown>(`/rest/api/2/issue/${encodeURIComponent(issueKey)}/transitions`, {
        transition: { id: asString(match.id) },
      })
    );
    console.log(`[Jira] ${issueKey} → ${target}`);
    return true;
  }

  async addComment(issueKey: string, body: string): Promise<void> {
    await this.request(`comment on ${issueKey}`, () =>
      this.http.post<unknown>(`/rest/api/2/issue/${encodeURIComponent(issueKey)}/comment`, { body })
    );
  }
}
