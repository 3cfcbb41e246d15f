import { stepName } from "../conversationState";
import type { Handler } from "../services";

export const HELP_TEXT = `I can help you remediate vulnerabilities end to end:

1. **List vulnerabilities** — \`List vulnerabilities\`
2. **Analyze a vulnerability** (RHSA, CVE and CSAF data) — \`Analyze Vuln ID 241573\`
3. **Add details** (CVE IDs, paths, plan changes) — \`Add CVE-2025-47273, app is installed in /opt/app\`
4. **Track in JIRA** — \`Create JIRA story for this vulnerability\`, \`Show JIRA story\`, \`Update JIRA story to 50%\`
5. **Query the graph database** — \`Show blast radius for CVE-2022-3602\`, \`Which teams own app app-42?\`
6. **Generate a remediation plan** — \`Generate plan\`
7. **Patch the vulnerability** (runs the plan over SSH) — \`Patch the vulnerability\`
8. **Run a command on the server** — \`Run command: rpm -q openssl\``;

export const NOT_UNDERSTOOD = "Sorry, I didn't understand that request.";

function progressLine(step: number | undefined): string {
  return `Current step: ${step ?? 0} — ${stepName(step)}`;
}

export const help: Handler = async ({ state }) => {
  console.log("[Assistant] Showing help");
  return { output: `${HELP_TEXT}\n\n${progressLine(state.currentStep)}` };
};

export const notUnderstood: Handler = async ({ state }) => {
  console.log("[Assistant] Message not understood");
  return { output: `${NOT_UNDERSTOOD}\n\n${HELP_TEXT}\n\n${progressLine(state.currentStep)}` };
};
