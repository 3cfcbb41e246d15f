import type { StepStatus } from "./stepExecutor";

export interface ReportItem {
  step: string;
  command: string;
  status: StepStatus;
  output: string;
  attempts: number;
}

export interface ReportError {
  step: string;
  error: string;
  suggestion: string;
}

export const REPORT_TITLE = "# Vulnerability Patching Execution Report";

/** "apply_remediation" / "applyRemediation" → "Apply Remediation" */
export function humanizeStepName(name: string): string {
  return name
    .replace(/_/g, " ")
    .replace(/([a-z])([A-Z])/g, "$1 $2")
    .split(" ")
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Point-wise markdown report of one patch run, followed by an
 * "Errors and Resolutions" section when any step failed.
 */
export function buildPatchReport(items: ReportItem[], errors: ReportError[], header: string[] = []): string {
  const parts: string[] = [`${REPORT_TITLE}\n\n`];
  for (const line of header) parts.push(`${line}\n`);
  if (header.length > 0) parts.push("\n");

  items.forEach((item, index) => {
    parts.push(`${index + 1}. **${item.step}**\n`);
    parts.push(`   - Command: \`${item.command}\`\n`);
    parts.push(`   - Status: ${item.status}\n`);
    if (item.attempts > 1) parts.push(`   - Attempts: ${item.attempts}\n`);
    parts.push(`   - SSH Output:\n\`\`\`\n${item.output}\n\`\`\`\n\n`);
  });

  if (items.length === 0) {
    parts.push("No executable steps were found in the remediation plan.\n\n");
  }

  if (errors.length > 0) {
    parts.push("## Errors and Resolutions\n\n");
    for (const error of errors) {
      parts.push(`- **${error.step}**: ${error.error}\n`);
      parts.push(`  - Suggestion: ${error.suggestion}\n\n`);
    }
  }

  return parts.join("");
}
