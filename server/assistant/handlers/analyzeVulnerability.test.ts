import { describe, it, expect } from "vitest";
import { createTestServices, FakeAdvisories, FakeVulnTable, SAMPLE_ROW, ScriptedModel, turnContext } from "../testServices";
import { analyzeVulnerability, resolveVulnId } from "./analyzeVulnerability";

const RHSA_BUNDLE = {
  cveData: [{ name: "CVE-2025-90011", threat_severity: "Important" }],
  cveIds: ["CVE-2025-90011"],
  csafData: { document: { title: "openssl security update" } },
};

describe("resolveVulnId", () => {
  it("prefers the classifier data", () => {
    expect(resolveVulnId(" 241573 ", "whatever")).toBe("241573");
  });

  it("reads the id from the message", () => {
    expect(resolveVulnId("", "Analyze Vuln ID: 241580")).toBe("241580");
    expect(resolveVulnId("", "please look at 241592")).toBe("241592");
  });

  it("returns null without an id", () => {
    expect(resolveVulnId("", "analyze it")).toBeNull();
  });
});

describe("analyzeVulnerability", () => {
  it("fetches advisory data by RHSA id and summarizes it", async () => {
    const model = new ScriptedModel().on("cve-summary", "CVE summary text").on("csaf-summary", "CSAF summary text");
    const advisories = new FakeAdvisories({ "RHSA-2025:90011": RHSA_BUNDLE });
    const services = createTestServices({ model, advisories });

    const result = await analyzeVulnerability(
      turnContext(services, { intent: "ANALYZE_VULN", data: "241573", message: "Analyze Vuln ID 241573" })
    );

    expect(advisories.fetched).toEqual(["RHSA-2025:90011"]);
    expect(result.ok).toBeUndefined();
    expect(result.output.split("\n")[0]).toBe(
      "## Vulnerability 241573: RHSA-2025:90011: openssl security update (Important)"
    );
    expect(result.output).toContain("### CVE Summary\nCVE summary text");
    expect(result.output).toContain("### CSAF Summary\nCSAF summary text");
    expect(result.update).toEqual({
      vulnId: "241573",
      vulnData: SAMPLE_ROW,
      rhsaId: "RHSA-2025:90011",
      cveIds: ["CVE-2025-90011"],
      cveData: RHSA_BUNDLE.cveData,
      csafData: RHSA_BUNDLE.csafData,
      cveSummary: "CVE summary text",
      csafSummary: "CSAF summary text",
      currentStep: 2,
    });
  });

  it("loads local CVE records when the row has no RHSA id", async () => {
    const row = { ...SAMPLE_ROW, "Vuln ID": "241592", "Vuln Name": "Tomcat request smuggling CVE-2025-90044" };
    const model = new ScriptedModel().on("cve-summary", "Tomcat summary");
    const advisories = new FakeAdvisories({}, { "CVE-2025-90044": { name: "CVE-2025-90044" } });
    const services = createTestServices({ model, advisories, vulnTable: new FakeVulnTable([row]) });

    const result = await analyzeVulnerability(turnContext(services, { intent: "ANALYZE_VULN", data: "241592" }));

    expect(advisories.fetched).toEqual([]);
    expect(result.update?.rhsaId).toBe("");
    expect(result.update?.cveIds).toEqual(["CVE-2025-90044"]);
    expect(result.update?.cveData).toEqual([{ name: "CVE-2025-90044" }]);
    expect(result.update?.csafSummary).toBe("");
    expect(model.callsFor("csaf-summary")).toHaveLength(0);
  });

  it("asks for the id when none is given", async () => {
    const result = await analyzeVulnerability(
      turnContext(createTestServices(), { intent: "ANALYZE_VULN", message: "analyze it" })
    );
    expect(result.ok).toBe(false);
    expect(result.output).toBe("Please provide the Vuln ID to analyze.\nExample: `Analyze Vuln ID 241573`");
  });

  it("reports an unknown id", async () => {
    const result = await analyzeVulnerability(
      turnContext(createTestServices(), { intent: "ANALYZE_VULN", data: "999999" })
    );
    expect(result.ok).toBe(false);
    expect(result.output).toBe(
      "Vuln ID 999999 was not found in the vulnerability data. Use `list vulnerabilities` to see available IDs."
    );
  });

  it("keeps the selection when the advisory fetch fails", async () => {
    const result = await analyzeVulnerability(
      turnContext(createTestServices(), { intent: "ANALYZE_VULN", data: "241573" })
    );

    expect(result.ok).toBe(false);
    expect(result.output.split("\n")[0]).toBe(
      "Error fetching CVE/CSAF data for RHSA ID RHSA-2025:90011: No CVE data found for advisory RHSA-2025:90011"
    );
    expect(result.update).toEqual({ vulnId: "241573", vulnData: SAMPLE_ROW, rhsaId: "RHSA-2025:90011", cveIds: [] });
  });

  it("keeps CVE ids the operator added for the same vulnerability", async () => {
    const row = { ...SAMPLE_ROW, "Vuln Name": "openssl update without advisory" };
    const advisories = new FakeAdvisories({}, { "CVE-2025-90099": { name: "CVE-2025-90099" } });
    const model = new ScriptedModel().on("cve-summary", "summary");
    const services = createTestServices({ model, advisories, vulnTable: new FakeVulnTable([row]) });

    const result = await analyzeVulnerability(
      turnContext(services, {
        intent: "ANALYZE_VULN",
        data: "241573",
        state: { vulnId: "241573", cveIds: ["CVE-2025-90099"] },
      })
    );

    expect(result.update?.cveIds).toEqual(["CVE-2025-90099"]);
    expect(result.update?.cveData).toEqual([{ name: "CVE-2025-90099" }]);
  });

  it("clears the previous vulnerability's issue, plan and patch history", async () => {
    const result = await analyzeVulnerability(
      turnContext(createTestServices(), {
        intent: "ANALYZE_VULN",
        data: "241573",
        state: {
          vulnId: "241580",
          cveSummary: "libxml2 summary",
          epicKey: "VULN-100",
          storyKey: "VULN-101",
          remediationPlan: { checkPackages: { command: "rpm -q libxml2" } },
          planVulnId: "241580",
          patcherErrors: [{ step: "verify_fix", error: "still vulnerable", suggestion: "", reasoning: "" }],
        },
      })
    );

    expect(result.update).toEqual({
      cveData: [],
      csafData: null,
      cveSummary: "",
      csafSummary: "",
      epicKey: "",
      storyKey: "",
      remediationPlan: {},
      planVulnId: "",
      patcherLogs: [],
      patcherErrors: [],
      vulnId: "241573",
      vulnData: SAMPLE_ROW,
      rhsaId: "RHSA-2025:90011",
      cveIds: [],
    });
  });
});
