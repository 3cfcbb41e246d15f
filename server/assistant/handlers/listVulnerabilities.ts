import { WorkflowStep } from "../conversationState";
import type { Handler } from "../services";

export const SAMPLE_SIZE = 5;

export const listVulnerabilities: Handler = async ({ services }) => {
  console.log("[Assistant] Listing vulnerabilities");

  let items: string[];
  try {
    items = await services.vulnTable.sample(SAMPLE_SIZE);
  } catch (err) {
    console.error(`[Assistant] Could not read vulnerability data: ${(err as Error).message}`);
    return { output: `Could not read the vulnerability data: ${(err as Error).message}`, ok: false };
  }

  return {
    output: [
      "Vuln ID — Vuln Name",
      ...items,
      "Which Vuln ID shall we resolve?",
      "sample input: `Analyze Vuln ID 241573`",
    ].join("\n"),
    update: { currentStep: WorkflowStep.LIST_VULNERABILITIES },
  };
};
