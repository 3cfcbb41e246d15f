import { describe, it, expect } from "vitest";
import { buildClassifierPrompt, classifyIntent, INTENTS } from "./intentClassifier";
import { ScriptedModel } from "./testServices";

describe("classifyIntent", () => {
  it("returns the intent and data from the model reply", async () => {
    const model = new ScriptedModel().intent("ANALYZE_VULN", "241573");
    await expect(classifyIntent(model, "Analyze Vuln ID 241573")).resolves.toEqual({
      intent: "ANALYZE_VULN",
      data: "241573",
    });
  });

  it("accepts a fenced reply, a lower-case label and numeric data", async () => {
    const model = new ScriptedModel().on("intent-classifier", '```json\n{"intent": "analyze_vuln", "data": 241573}\n```');
    await expect(classifyIntent(model, "analyze 241573")).resolves.toEqual({ intent: "ANALYZE_VULN", data: "241573" });
  });

  it("returns an empty data string when the reply has none", async () => {
    const model = new ScriptedModel().on("intent-classifier", '{"intent": "LIST_VULNS", "data": null}');
    await expect(classifyIntent(model, "show vulns")).resolves.toEqual({ intent: "LIST_VULNS", data: "" });
  });

  it("falls back to OTHER with empty data for an unknown label", async () => {
    const model = new ScriptedModel().on("intent-classifier", '{"intent": "ORDER_PIZZA", "data": "large"}');
    await expect(classifyIntent(model, "order a pizza")).resolves.toEqual({ intent: "OTHER", data: "" });
  });

  it("drops the data of an OTHER reply", async () => {
    const model = new ScriptedModel().intent("OTHER", "weather");
    await expect(classifyIntent(model, "what is the weather")).resolves.toEqual({ intent: "OTHER", data: "" });
  });

  it("falls back to OTHER when the reply is not JSON", async () => {
    const model = new ScriptedModel().on("intent-classifier", "I believe the user wants help");
    await expect(classifyIntent(model, "hmm")).resolves.toEqual({ intent: "OTHER", data: "" });
  });

  it("falls back to OTHER when the model call fails", async () => {
    const model = new ScriptedModel().on("intent-classifier", new Error("503 Service Unavailable"));
    await expect(classifyIntent(model, "list vulns")).resolves.toEqual({ intent: "OTHER", data: "" });
  });

  it("does not call the model for an empty message", async () => {
    const model = new ScriptedModel();
    await expect(classifyIntent(model, "   ")).resolves.toEqual({ intent: "OTHER", data: "" });
    expect(model.calls).toHaveLength(0);
  });
});

describe("buildClassifierPrompt", () => {
  it("lists every intent and quotes the message", () => {
    const prompt = buildClassifierPrompt("Patch it");
    for (const intent of INTENTS) expect(prompt).toContain(`- ${intent}:`);
    expect(prompt).toContain("Message: '''Patch it'''");
  });
});
