import { describe, it, expect } from "vitest";
import type { ExecutionLogEntry } from "../../remediation/stepExecutor";
import { createTestServices, FakeIssueTracker, SAMPLE_ROW, ScriptedModel, turnContext } from "../testServices";
import {
  createIssue,
  fetchIssue,
  JIRA_NOT_CONFIGURED,
  resolveIssueKey,
  resolveTargetStatus,
  updateIssue,
} from "./issueHandlers";

const finishedLog: ExecutionLogEntry = {
  step: "apply_remediation",
  command: "yum update -y openssl",
  description: "",
  status: "success",
  attempts: [],
};

// ── Create ──────────────────────────────────────────────────────────────────

describe("createIssue", () => {
  it("explains how to configure JIRA when it is not set up", async () => {
    const result = await createIssue(turnContext(createTestServices(), { state: { vulnData: SAMPLE_ROW } }));
    expect(result).toEqual({ output: JIRA_NOT_CONFIGURED, ok: false });
  });

  it("requires an analyzed vulnerability", async () => {
    const result = await createIssue(turnContext(createTestServices({ issues: new FakeIssueTracker() })));
    expect(result.ok).toBe(false);
    expect(result.output).toBe(
      "No vulnerability selected. Please analyze a vulnerability first.\nExample: `Analyze Vuln ID 241573`"
    );
  });

  it("creates an epic for the application and a story under it", async () => {
    const issues = new FakeIssueTracker();
    issues.addEpic("HR03 - Human Resources");

    const result = await createIssue(
      turnContext(createTestServices({ issues }), { state: { vulnData: SAMPLE_ROW, currentStep: 2 } })
    );

    expect(result.output).toBe("JIRA: Epic VULN-101, Story VULN-102 ready.");
    expect(result.update).toEqual({ epicKey: "VULN-101", storyKey: "VULN-102", currentStep: 3 });
    expect(issues.epics.map(epic => epic.summary)).toEqual(["HR03 - Human Resources", "PAY01 - Payments Gateway"]);
    expect(issues.stories[0]).toMatchObject({
      summary: "Patch 241573: RHSA-2025:90011: openssl security update (Important)",
      epicKey: "VULN-101",
      customFields: {},
    });
  });

  it("reuses the epic whose summary names the App Code", async () => {
    const issues = new FakeIssueTracker();
    issues.addEpic("Payments pay01 platform");

    const result = await createIssue(turnContext(createTestServices({ issues }), { state: { vulnData: SAMPLE_ROW } }));

    expect(result.output).toBe("JIRA: Epic VULN-100, Story VULN-101 ready.");
    expect(issues.epics).toHaveLength(1);
  });

  it("does not create a second story for the session", async () => {
    const issues = new FakeIssueTracker();
    const result = await createIssue(
      turnContext(createTestServices({ issues }), {
        state: { vulnData: SAMPLE_ROW, epicKey: "VULN-5", storyKey: "VULN-6", currentStep: 4 },
      })
    );

    expect(result.output).toBe("JIRA: Epic VULN-5, Story VULN-6 ready.");
    expect(result.update).toEqual({ epicKey: "VULN-5", currentStep: 4 });
    expect(issues.stories).toHaveLength(0);
  });

  it("fills custom fields by column name when the model cannot map them", async () => {
    const issues = new FakeIssueTracker();
    issues.catalog = {
      customfield_1: { name: "APP_CODE" },
      customfield_2: { name: "FIX_BY", schema: { type: "date" } },
      customfield_3: { name: "PRIORITY", schema: { type: "option" } },
      customfield_4: { name: "RHSA Advisory" },
    };
    const model = new ScriptedModel();

    await createIssue(
      turnContext(createTestServices({ issues, model }), {
        state: { vulnData: SAMPLE_ROW, rhsaId: "RHSA-2025:90011" },
      })
    );

    expect(model.callsFor("jira-field-mapping")).toHaveLength(1);
    expect(issues.stories[0]?.customFields).toEqual({
      customfield_1: "PAY01",
      customfield_2: "2025-04-13",
      customfield_3: { value: "High" },
      customfield_4: "RHSA-2025:90011",
    });
  });
});

// ── Fetch ───────────────────────────────────────────────────────────────────

describe("fetchIssue", () => {
  it("shows the story status and progress", async () => {
    const issues = new FakeIssueTracker();
    await issues.createStory(null, "Patch 241573: openssl", {});

    const result = await fetchIssue(
      turnContext(createTestServices({ issues }), { intent: "FETCH_JIRA_STORY", data: "VULN-100" })
    );

    expect(result.output).toBe(
      "**VULN-100: Patch 241573: openssl**\n- Type: Story\n- Status: To Do\n- Progress: 0% (0/0)\n\nNo sub-tasks."
    );
  });

  it("asks for a story when none is known", async () => {
    const result = await fetchIssue(
      turnContext(createTestServices({ issues: new FakeIssueTracker() }), { message: "show the story" })
    );
    expect(result.ok).toBe(false);
    expect(result.output.startsWith("No JIRA story found.")).toBe(true);
  });
});

// ── Update ──────────────────────────────────────────────────────────────────

describe("updateIssue", () => {
  it("moves the story to the status nearest a percentage", async () => {
    const issues = new FakeIssueTracker();
    const result = await updateIssue(
      turnContext(createTestServices({ issues }), { intent: "UPDATE_JIRA_STORY", message: "Set VULN-102 to 50%" })
    );

    expect(result.output).toBe("Story VULN-102 moved to In Progress.");
    expect(result.update).toEqual({ storyKey: "VULN-102" });
    expect(issues.transitions).toEqual([{ key: "VULN-102", target: "In Progress" }]);
  });

  it("derives Done from a clean patch run and refreshes fields", async () => {
    const issues = new FakeIssueTracker();
    issues.catalog = { customfield_1: { name: "APP_CODE" } };

    const result = await updateIssue(
      turnContext(createTestServices({ issues }), {
        intent: "UPDATE_JIRA_STORY",
        message: "update the story",
        state: { storyKey: "VULN-7", vulnData: SAMPLE_ROW, patcherLogs: [finishedLog] },
      })
    );

    expect(result.output).toBe("Story VULN-7 moved to Done.\nUpdated 1 field(s) from the vulnerability data.");
    expect(issues.fieldUpdates).toEqual([{ key: "VULN-7", fields: { customfield_1: "PAY01" } }]);
  });
});

describe("resolveIssueKey", () => {
  it("does not mistake advisory ids for issue keys", () => {
    expect(resolveIssueKey("", "Fetch CVE-2025-90044 and RHSA-2025:90011", { storyKey: "VULN-9" })).toBe("VULN-9");
  });

  it("prefers the key in the classifier data", () => {
    expect(resolveIssueKey("OPS-12", "Fetch VULN-3", {})).toBe("OPS-12");
  });

  it("returns null without any key", () => {
    expect(resolveIssueKey("", "fetch it", {})).toBeNull();
  });
});

describe("resolveTargetStatus", () => {
  it("reads status words", () => {
    expect(resolveTargetStatus("mark it as resolved", {})).toBe("Done");
    expect(resolveTargetStatus("work has started", {})).toBe("In Progress");
    expect(resolveTargetStatus("reopen the story", {})).toBe("To Do");
  });

  it("keeps a story with patch errors in progress", () => {
    expect(
      resolveTargetStatus("sync", {
        patcherLogs: [finishedLog],
        patcherErrors: [{ step: "verify_fix", error: "exit 1", suggestion: "", reasoning: "" }],
      })
    ).toBe("In Progress");
  });

  it("falls back to the plan state", () => {
    expect(resolveTargetStatus("sync", { remediationPlan: { verifyFix: { command: "rpm -q openssl" } } })).toBe(
      "In Progress"
    );
    expect(resolveTargetStatus("sync", {})).toBe("To Do");
    expect(resolveTargetStatus("sync", { remediationPlan: {}, patcherLogs: [] })).toBe("To Do");
  });
});
