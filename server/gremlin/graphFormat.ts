import type {
  AppBlastRadius,
  ComprehensiveAnalysis,
  HostBlastRadius,
  VulnerabilityImpact,
} from "./gremlinClient";

export interface TeamLookup {
  hostIds?: string[];
  appIds?: string[];
  teams: string[];
  count: number;
}

export type GraphResult = VulnerabilityImpact | HostBlastRadius | AppBlastRadius | TeamLookup | ComprehensiveAnalysis;

const LIST_KEYS = ["packages", "hosts", "applications", "services", "downstreamServices", "systems", "teams"] as const;
const MAX_LISTED = 20;
const MAX_TEAMS = 10;

/** "downstreamServices" → "Downstream Services", "blast_radius_hosts" → "Blast Radius Hosts" */
export function toTitle(key: string): string {
  return key
    .replace(/_/g, " ")
    .replace(/([a-z])([A-Z])/g, "$1 $2")
    .split(" ")
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

function listIds(ids: string[], limit: number): string {
  const shown = ids.slice(0, limit).join(", ");
  return ids.length > limit ? `${shown} (and ${ids.length - limit} more)` : shown;
}

function readList(result: GraphResult, key: (typeof LIST_KEYS)[number]): string[] {
  if (!(key in result)) return [];
  const value: unknown = Object.getOwnPropertyDescriptor(result, key)?.value;
  return Array.isArray(value) ? value.map(String) : [];
}

/**
 * Render a graph query result as markdown for the chat reply.
 */
export function formatGraphResult(result: GraphResult, operation: string): string {
  if ("error" in result && result.error) {
    return `Error: ${result.error}`;
  }

  const parts: string[] = [`**${toTitle(operation)} Results:**\n`];

  if ("cveId" in result) {
    parts.push(`CVE ID: ${result.cveId}\n\n`);
  }

  if ("counts" in result && Object.keys(result.counts).length > 0) {
    parts.push("**Counts:**\n");
    for (const [key, value] of Object.entries(result.counts)) {
      parts.push(`- ${toTitle(key)}: ${value}\n`);
    }
    parts.push("\n");
  }

  if ("summary" in result) {
    const { summary } = result;
    parts.push("**Summary:**\n");
    parts.push(`- Total Affected Hosts: ${summary.totalAffectedHosts}\n`);
    parts.push(`- Total Affected Apps: ${summary.totalAffectedApps}\n`);
    parts.push(`- Total Responsible Teams: ${summary.totalResponsibleTeams}\n`);
    if (summary.uniqueTeams.length > 0) {
      parts.push(`- Unique Teams: ${listIds(summary.uniqueTeams, MAX_TEAMS)}\n`);
    }
  }

  const impact = "vulnerabilityImpact" in result ? result.vulnerabilityImpact : null;
  const listSource: GraphResult = impact ?? result;
  for (const key of LIST_KEYS) {
    const ids = readList(listSource, key);
    if (ids.length === 0) continue;
    parts.push(`\n**${toTitle(key)}:**\n`);
    parts.push(listIds(ids, MAX_LISTED));
    parts.push("\n");
  }

  if ("count" in result && result.teams.length === 0) {
    parts.push("\nNo responsible teams found.\n");
  }

  return parts.join("");
}
