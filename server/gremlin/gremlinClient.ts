/**
 * Gremlin client for the asset graph (Cosmos DB Gremlin API).
 *
 * Graph model:
 *   Package -VULNERABLE_TO-> Vulnerability
 *   Package -INSTALLED_ON-> Host -HOSTS-> Application -DEPLOYS-> Service
 *   Service -DEPENDS_ON-> Service, Host -PART_OF-> System
 *   Team -MONITORS-> Host, Team -OWNS-> Application
 */

import gremlin from "gremlin";
import { ENV } from "../_core/env";

export const DEFAULT_HOPS = 3;
const MAX_HOPS = 10;

// ── Result types ────────────────────────────────────────────────────────────

export interface VulnerabilityImpact {
  cveId: string;
  packages: string[];
  hosts: string[];
  applications: string[];
  services: string[];
  downstreamServices: string[];
  counts: Record<string, number>;
}

export interface HostBlastRadius {
  hosts: string[];
  applications: string[];
  services: string[];
  downstreamServices: string[];
  systems: string[];
  counts: Record<string, number>;
}

export interface AppBlastRadius {
  applications: string[];
  services: string[];
  downstreamServices: string[];
  counts: Record<string, number>;
}

export interface ComprehensiveAnalysis {
  cveId: string;
  analysisTimestamp: string;
  vulnerabilityImpact: VulnerabilityImpact | null;
  hostBlastRadius: Record<string, HostBlastRadius | { error: string }>;
  appBlastRadius: Record<string, AppBlastRadius | { error: string }>;
  hostTeamMapping: Record<string, string[] | { error: string }>;
  appTeamMapping: Record<string, string[] | { error: string }>;
  summary: {
    totalAffectedHosts: number;
    totalAffectedApps: number;
    totalResponsibleTeams: number;
    uniqueTeams: string[];
  };
  error?: string;
}

export interface GraphStore {
  analyzeVulnerabilityImpact(cveId: string, hops?: number): Promise<VulnerabilityImpact>;
  blastRadiusByHosts(hostIds: string[], hops?: number): Promise<HostBlastRadius>;
  blastRadiusByApps(appIds: string[], hops?: number): Promise<AppBlastRadius>;
  teamsForHosts(hostIds: string[]): Promise<string[]>;
  teamsForApps(appIds: string[]): Promise<string[]>;
  comprehensiveCveAnalysis(cveId: string, hops?: number): Promise<ComprehensiveAnalysis>;
}

/** Executes a Gremlin script with bindings and returns the result items. */
export interface GremlinQueryRunner {
  submit(query: string, bindings: Record<string, unknown>): Promise<unknown[]>;
}

// ── Result shaping ──────────────────────────────────────────────────────────

function readKey(item: unknown, key: string): unknown {
  if (item instanceof Map) return item.get(key);
  if (typeof item === "object" && item !== null && key in item) {
    return Object.getOwnPropertyDescriptor(item, key)?.value;
  }
  return undefined;
}

function toIdList(value: unknown): string[] {
  return Array.isArray(value) ? value.map(v => String(v)) : [];
}

function countAll(lists: Record<string, string[]>): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const [key, list] of Object.entries(lists)) counts[key] = list.length;
  return counts;
}

/** Clamp hops to a small positive integer; it is interpolated into the script. */
export function normalizeHops(hops: number | undefined): number {
  const value = Math.trunc(Number(hops ?? DEFAULT_HOPS));
  if (!Number.isFinite(value) || value < 1) return DEFAULT_HOPS;
  return Math.min(value, MAX_HOPS);
}

function hasToArray(value: unknown): value is { toArray(): unknown[] } {
  return typeof value === "object" && value !== null && "toArray" in value && typeof value.toArray === "function";
}

// ── Driver-backed runner ────────────────────────────────────────────────────

export function isGremlinConfigured(): boolean {
  return !!ENV.gremlinEndpoint && !!ENV.gremlinDatabase && !!ENV.gremlinGraphName && !!ENV.gremlinPrimaryKey;
}

type DriverClient = InstanceType<typeof gremlin.driver.Client>;

export class CosmosGremlinRunner implements GremlinQueryRunner {
  private client: DriverClient | null = null;

  private getClient(): DriverClient {
    if (this.client) return this.client;
    if (!isGremlinConfigured()) {
      throw new Error(
        "Missing Gremlin configuration. Please set GREMLIN_ENDPOINT, GREMLIN_DB, GREMLIN_GRAPH_NAME, and GREMLIN_PRIMARY_KEY"
      );
    }

    const authenticator = new gremlin.driver.auth.PlainTextSaslAuthenticator(
      `/dbs/${ENV.gremlinDatabase}/colls/${ENV.gremlinGraphName}`,
      ENV.gremlinPrimaryKey
    );
    this.client = new gremlin.driver.Client(ENV.gremlinEndpoint, {
      authenticator,
      traversalSource: "g",
      rejectUnauthorized: true,
      mimeType: "application/vnd.gremlin-v2.0+json",
    });
    console.log(`[Gremlin] Client created for ${ENV.gremlinEndpoint}`);
    return this.client;
  }

  async submit(query: string, bindings: Record<string, unknown>): Promise<unknown[]> {
    const result: unknown = await this.getClient().submit(query, bindings);
    if (hasToArray(result)) return result.toArray();
    return Array.isArray(result) ? result : [];
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
    }
  }
}

// ── Graph queries ───────────────────────────────────────────────────────────

export class GremlinGraphClient implements GraphStore {
  constructor(private readonly runner: GremlinQueryRunner = new CosmosGremlinRunner()) {}

  private async ids(query: string, bindings: Record<string, unknown>): Promise<string[]> {
    return toIdList(await this.runner.submit(query, bindings));
  }

  async analyzeVulnerabilityImpact(cveId: string, hops?: number): Promise<VulnerabilityImpact> {
    const depth = normalizeHops(hops);
    const query = `
      g.V().has('Vulnerability','cve_id',cve).as('v').
        in('VULNERABLE_TO').dedup().aggregate('pkgs').
        out('INSTALLED_ON').dedup().aggregate('hosts').
        out('HOSTS').dedup().aggregate('apps').
        out('DEPLOYS').dedup().aggregate('svcs').
        repeat(out('DEPENDS_ON')).emit().until(loops().is(${depth})).dedup().aggregate('down').
        select('pkgs','hosts','apps','svcs','down').
          by(unfold().id().fold()).
          by(unfold().id().fold()).
          by(unfold().id().fold()).
          by(unfold().id().fold()).
          by(unfold().id().fold())
    `;
    const [row] = await this.runner.submit(query, { cve: cveId });
    const lists = {
      packages: toIdList(readKey(row, "pkgs")),
      hosts: toIdList(readKey(row, "hosts")),
      applications: toIdList(readKey(row, "apps")),
      services: toIdList(readKey(row, "svcs")),
      downstreamServices: toIdList(readKey(row, "down")),
    };
    return { cveId, ...lists, counts: row === undefined ? {} : countAll(lists) };
  }

  async blastRadiusByHosts(hostIds: string[], hops?: number): Promise<HostBlastRadius> {
    const depth = normalizeHops(hops);
    const query = `
      g.V().hasId(within(hids)).dedup().aggregate('hosts').
        select('hosts').unfold().out('HOSTS').dedup().aggregate('apps').
        select('apps').unfold().out('DEPLOYS').dedup().aggregate('svcs').
        select('svcs').unfold().
          repeat(out('DEPENDS_ON')).emit().until(loops().is(${depth})).dedup().aggregate('down').
        select('hosts').unfold().out('PART_OF').dedup().aggregate('systems').
        select('hosts','apps','svcs','down','systems').
          by(unfold().id().fold()).
          by(unfold().id().fold()).
          by(unfold().id().fold()).
          by(unfold().id().fold()).
          by(unfold().id().fold())
    `;
    const [row] = await this.runner.submit(query, { hids: [...hostIds] });
    const lists = {
      hosts: toIdList(readKey(row, "hosts")),
      applications: toIdList(readKey(row, "apps")),
      services: toIdList(readKey(row, "svcs")),
      downstreamServices: toIdList(readKey(row, "down")),
      systems: toIdList(readKey(row, "systems")),
    };
    return { ...lists, counts: row === undefined ? {} : countAll(lists) };
  }

  async blastRadiusByApps(appIds: string[], hops?: number): Promise<AppBlastRadius> {
    const depth = normalizeHops(hops);
    const query = `
      g.V().hasId(within(aids)).dedup().aggregate('apps').
        select('apps').unfold().out('DEPLOYS').dedup().aggregate('svcs').
        select('svcs').unfold().
          repeat(out('DEPENDS_ON')).emit().until(loops().is(${depth})).dedup().aggregate('down').
        select('apps','svcs','down').
          by(unfold().id().fold()).
          by(unfold().id().fold()).
          by(unfold().id().fold())
    `;
    const [row] = await this.runner.submit(query, { aids: [...appIds] });
    const lists = {
      applications: toIdList(readKey(row, "apps")),
      services: toIdList(readKey(row, "svcs")),
      downstreamServices: toIdList(readKey(row, "down")),
    };
    return { ...lists, counts: row === undefined ? {} : countAll(lists) };
  }

  teamsForHosts(hostIds: string[]): Promise<string[]> {
    if (hostIds.length === 1) {
      return this.ids("g.V().hasId(hid).in('MONITORS').dedup().id()", { hid: hostIds[0] });
    }
    return this.ids("g.V().hasId(within(hids)).in('MONITORS').dedup().id()", { hids: [...hostIds] });
  }

  teamsForApps(appIds: string[]): Promise<string[]> {
    if (appIds.length === 1) {
      return this.ids("g.V().hasId(aid).in('OWNS').dedup().id()", { aid: appIds[0] });
    }
    return this.ids("g.V().hasId(within(aids)).in('OWNS').dedup().id()", { aids: [...appIds] });
  }

  /**
   * Impact analysis, then per-host and per-app blast radius and owning teams.
   * Failures on an individual host or app are recorded in place.
   */
  async comprehensiveCveAnalysis(cveId: string, hops?: number): Promise<ComprehensiveAnalysis> {
    const result: ComprehensiveAnalysis = {
      cveId,
      analysisTimestamp: new Date().toISOString(),
      vulnerabilityImpact: null,
      hostBlastRadius: {},
      appBlastRadius: {},
      hostTeamMapping: {},
      appTeamMapping: {},
      summary: { totalAffectedHosts: 0, totalAffectedApps: 0, totalResponsibleTeams: 0, uniqueTeams: [] },
    };
    const teams = new Set<string>();

    try {
      const impact = await this.analyzeVulnerabilityImpact(cveId, hops);
      result.vulnerabilityImpact = impact;
      result.summary.totalAffectedHosts = impact.hosts.length;
      result.summary.totalAffectedApps = impact.applications.length;

      for (const hostId of impact.hosts) {
        try {
          result.hostBlastRadius[hostId] = await this.blastRadiusByHosts([hostId], hops);
        } catch (err) {
          result.hostBlastRadius[hostId] = { error: (err as Error).message };
        }
      }

      for (const appId of impact.applications) {
        try {
          result.appBlastRadius[appId] = await this.blastRadiusByApps([appId], hops);
        } catch (err) {
          result.appBlastRadius[appId] = { error: (err as Error).message };
        }
      }

      for (const hostId of impact.hosts) {
        try {
          const hostTeams = await this.teamsForHosts([hostId]);
          result.hostTeamMapping[hostId] = hostTeams;
          hostTeams.forEach(team => teams.add(team));
        } catch (err) {
          result.hostTeamMapping[hostId] = { error: (err as Error).message };
        }
      }

      for (const appId of impact.applications) {
        try {
          const appTeams = await this.teamsForApps([appId]);
          result.appTeamMapping[appId] = appTeams;
          appTeams.forEach(team => teams.add(team));
        } catch (err) {
          result.appTeamMapping[appId] = { error: (err as Error).message };
        }
      }
    } catch (err) {
      console.error(`[Gremlin] Comprehensive analysis failed for ${cveId}: ${(err as Error).message}`);
      result.error = (err as Error).message;
    }

    result.summary.uniqueTeams = Array.from(teams);
    result.summary.totalResponsibleTeams = teams.size;
    console.log(
      `[Gremlin] ${cveId}: ${result.summary.totalAffectedHosts} hosts, ${result.summary.totalAffectedApps} apps, ${teams.size} teams`
    );
    return result;
  }
}
