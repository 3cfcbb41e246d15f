import { z } from "zod";
import { extractCveIds } from "../../advisories/redhatClient";
import { DEFAULT_HOPS, normalizeHops, type GraphStore } from "../../gremlin/gremlinClient";
import { formatGraphResult, type GraphResult } from "../../gremlin/graphFormat";
import type { ModelClient } from "../../llm/llmService";
import { parseModelOutput } from "../../llm/modelJson";
import type { Handler } from "../services";

export const GRAPH_OPERATIONS = [
  "analyze_vulnerability_impact",
  "blast_radius_hosts",
  "blast_radius_apps",
  "blast_radius_cve",
  "responsible_teams_host",
  "responsible_teams_app",
  "comprehensive_analysis",
] as const;

export type GraphOperation = (typeof GRAPH_OPERATIONS)[number];

export const GRAPH_NOT_CONFIGURED =
  "Graph database is not configured. Set GREMLIN_ENDPOINT, GREMLIN_DB, GREMLIN_GRAPH_NAME and GREMLIN_PRIMARY_KEY to run graph queries.";

const idList = z.preprocess(
  value => (typeof value === "string" ? value.split(",") : value),
  z.array(z.union([z.string(), z.number()]).transform(id => String(id).trim())).catch([])
);

const graphRequestSchema = z.object({
  operation: z.string().default("analyze_vulnerability_impact"),
  cve_id: z.string().nullish(),
  host_ids: idList.optional(),
  app_ids: idList.optional(),
  hops: z.coerce.number().optional().catch(undefined),
});

export interface GraphRequest {
  operation: string;
  cveId: string;
  hostIds: string[];
  appIds: string[];
  hops: number;
}

function buildGraphPrompt(message: string): string {
  return `User query: '${message}'
Determine the Gremlin operation requested:
- 'analyze_vulnerability_impact': Analyze vulnerability impact by CVE ID
- 'blast_radius_hosts': Calculate blast radius by host IDs
- 'blast_radius_apps': Calculate blast radius by app IDs
- 'blast_radius_cve': Calculate blast radius by CVE ID
- 'responsible_teams_host': Get responsible teams for host ID
- 'responsible_teams_app': Get responsible teams for app ID
- 'comprehensive_analysis': Comprehensive CVE analysis with blast radius and teams
Extract necessary parameters:
- For CVE operations: extract CVE ID (e.g., 'CVE-2022-3602')
- For host/app operations: extract IDs as a list
- For hops: extract number (default ${DEFAULT_HOPS} if not specified)
Reply with ONLY valid JSON: {"operation": "<operation>", "cve_id": "<cve_id or empty>", "host_ids": ["<id>"], "app_ids": ["<id>"], "hops": <number>}`;
}

/**
 * Ask the model which graph operation the message wants. The CVE id falls
 * back to one written in the message, then to the first CVE of the session.
 */
export async function extractGraphRequest(
  model: ModelClient,
  message: string,
  sessionCveIds: string[]
): Promise<GraphRequest> {
  const raw = await model.ask(buildGraphPrompt(message), { caller: "graph-query", json: true });
  const parsed = parseModelOutput(raw, graphRequestSchema);
  if (!parsed.ok) throw new Error(parsed.error);

  const reply = parsed.value;
  const cveId = (reply.cve_id ?? "").trim() || extractCveIds(message)[0] || sessionCveIds[0] || "";
  return {
    operation: reply.operation.trim().toLowerCase(),
    cveId,
    hostIds: (reply.host_ids ?? []).filter(Boolean),
    appIds: (reply.app_ids ?? []).filter(Boolean),
    hops: normalizeHops(reply.hops),
  };
}

function isGraphOperation(value: string): value is GraphOperation {
  return (GRAPH_OPERATIONS as readonly string[]).includes(value);
}

type RunOutcome = { result: GraphResult } | { missing: string };

async function runOperation(graph: GraphStore, operation: GraphOperation, request: GraphRequest): Promise<RunOutcome> {
  const { cveId, hostIds, appIds, hops } = request;
  switch (operation) {
    case "analyze_vulnerability_impact":
      if (!cveId) return { missing: "CVE ID is required for vulnerability impact analysis." };
      return { result: await graph.analyzeVulnerabilityImpact(cveId, hops) };
    case "blast_radius_cve":
      if (!cveId) return { missing: "CVE ID is required for blast radius calculation." };
      return { result: await graph.analyzeVulnerabilityImpact(cveId, hops) };
    case "blast_radius_hosts":
      if (hostIds.length === 0) return { missing: "Host IDs are required for blast radius calculation." };
      return { result: await graph.blastRadiusByHosts(hostIds, hops) };
    case "blast_radius_apps":
      if (appIds.length === 0) return { missing: "App IDs are required for blast radius calculation." };
      return { result: await graph.blastRadiusByApps(appIds, hops) };
    case "responsible_teams_host": {
      if (hostIds.length === 0) return { missing: "Host ID is required to get responsible teams." };
      const teams = await graph.teamsForHosts(hostIds);
      return { result: { hostIds, teams, count: teams.length } };
    }
    case "responsible_teams_app": {
      if (appIds.length === 0) return { missing: "App ID is required to get responsible teams." };
      const teams = await graph.teamsForApps(appIds);
      return { result: { appIds, teams, count: teams.length } };
    }
    case "comprehensive_analysis":
      if (!cveId) return { missing: "CVE ID is required for comprehensive analysis." };
      return { result: await graph.comprehensiveCveAnalysis(cveId, hops) };
  }
}

export const queryGraph: Handler = async ({ message, state, services }) => {
  console.log("[Assistant] Querying graph database");
  const { graph, model } = services;
  if (!graph) return { output: GRAPH_NOT_CONFIGURED, ok: false };

  let request: GraphRequest;
  try {
    request = await extractGraphRequest(model, message, state.cveIds ?? []);
  } catch (err) {
    console.error(`[Assistant] Could not parse graph request: ${(err as Error).message}`);
    return { output: `Error parsing request: ${(err as Error).message}`, ok: false };
  }

  if (!isGraphOperation(request.operation)) {
    return { output: `Unknown operation: ${request.operation}`, ok: false };
  }

  try {
    const outcome = await runOperation(graph, request.operation, request);
    if ("missing" in outcome) return { output: outcome.missing, ok: false };
    return {
      output: formatGraphResult(outcome.result, request.operation),
      update: { graphResult: outcome.result },
    };
  } catch (err) {
    console.error(`[Gremlin] Operation ${request.operation} failed: ${(err as Error).message}`);
    return { output: `Error executing graph operation: ${(err as Error).message}`, ok: false };
  }
};
