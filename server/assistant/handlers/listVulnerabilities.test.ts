import { describe, it, expect } from "vitest";
import type { VulnerabilityTable } from "../../vulnData/vulnerabilityTable";
import { createTestServices, turnContext } from "../testServices";
import { listVulnerabilities } from "./listVulnerabilities";

describe("listVulnerabilities", () => {
  it("lists sampled rows and asks which one to resolve", async () => {
    const services = createTestServices();
    const result = await listVulnerabilities(turnContext(services, { intent: "LIST_VULNS" }));

    expect(result.output).toBe(
      [
        "Vuln ID — Vuln Name",
        "241573 — RHSA-2025:90011: openssl security update (Important)",
        "Which Vuln ID shall we resolve?",
        "sample input: `Analyze Vuln ID 241573`",
      ].join("\n")
    );
    expect(result.update).toEqual({ currentStep: 1 });
  });

  it("reports an unreadable data file", async () => {
    const vulnTable: VulnerabilityTable = {
      sample: async () => {
        throw new Error("ENOENT: no such file or directory");
      },
      getById: async () => null,
    };
    const result = await listVulnerabilities(turnContext(createTestServices({ vulnTable }), { intent: "LIST_VULNS" }));

    expect(result.ok).toBe(false);
    expect(result.output).toBe("Could not read the vulnerability data: ENOENT: no such file or directory");
  });
});
