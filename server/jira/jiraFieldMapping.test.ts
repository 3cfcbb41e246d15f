import { describe, it, expect } from "vitest";
import { ScriptedModel } from "../assistant/testServices";
import {
  buildCustomFields,
  fallbackColumnMapping,
  findRhsaField,
  toFieldName,
  toFieldValue,
  toJiraDate,
} from "./jiraFieldMapping";
import type { JiraFieldCatalog } from "./jiraClient";

const catalog: JiraFieldCatalog = {
  customfield_10: { name: "APP_CODE" },
  customfield_11: { name: "ENVIRONMENT", schema: { type: "option" } },
  customfield_12: { name: "RHSA_ID" },
};

describe("toFieldName", () => {
  it("upper-snakes column names", () => {
    expect(toFieldName("App Code")).toBe("APP_CODE");
    expect(toFieldName("Crown Jewel (Y/N)")).toBe("CROWN_JEWEL__Y_N");
  });
});

describe("toJiraDate", () => {
  it("converts month/day/year", () => {
    expect(toJiraDate("4/3/2025")).toBe("2025-04-03");
  });

  it("leaves other values alone", () => {
    expect(toJiraDate("2025-04-03")).toBe("2025-04-03");
  });
});

describe("toFieldValue", () => {
  it("shapes values by field type", () => {
    expect(toFieldValue({ name: "FIX_BY", schema: { type: "date" } }, "12/1/2025")).toBe("2025-12-01");
    expect(toFieldValue({ name: "PRIORITY", schema: { type: "option" } }, "High")).toEqual({ value: "High" });
    expect(toFieldValue({ name: "APP_CODE" }, "PAY01")).toBe("PAY01");
  });
});

describe("fallbackColumnMapping", () => {
  it("matches normalized names exactly", () => {
    expect(fallbackColumnMapping(["App Code", "App Name", "Fix By"], ["APP_CODE", "FIX_BY"])).toEqual({
      "App Code": "APP_CODE",
      "Fix By": "FIX_BY",
    });
  });
});

describe("buildCustomFields", () => {
  it("uses the model's mapping and drops unknown fields and empty cells", async () => {
    const model = new ScriptedModel().on(
      "jira-field-mapping",
      JSON.stringify({ "App Code": "APP_CODE", Env: "ENVIRONMENT", Priority: "SEVERITY", Owner: "APP_CODE" })
    );

    const fields = await buildCustomFields(model, { "App Code": "PAY01", Env: "PROD", Priority: "High", Owner: "nan" }, catalog);

    expect(fields).toEqual({ customfield_10: "PAY01", customfield_11: { value: "PROD" } });
  });

  it("falls back to name matching when the reply is not a mapping", async () => {
    const model = new ScriptedModel().on("jira-field-mapping", "App Code maps to APP_CODE");

    const fields = await buildCustomFields(model, { "App Code": "INV07", Environment: "UAT" }, catalog);

    expect(fields).toEqual({ customfield_10: "INV07", customfield_11: { value: "UAT" } });
  });
});

describe("findRhsaField", () => {
  it("finds the advisory field by name", () => {
    expect(findRhsaField(catalog)).toBe("customfield_12");
    expect(findRhsaField({ customfield_1: { name: "APP_CODE" } })).toBeNull();
  });
});
