import { describe, it, expect } from "vitest";
import { GremlinGraphClient, normalizeHops, type GremlinQueryRunner } from "./gremlinClient";

type Submitted = { query: string; bindings: Record<string, unknown> };

class FakeRunner implements GremlinQueryRunner {
  readonly submitted: Submitted[] = [];

  constructor(private readonly respond: (query: string, bindings: Record<string, unknown>) => unknown[]) {}

  async submit(query: string, bindings: Record<string, unknown>): Promise<unknown[]> {
    this.submitted.push({ query, bindings });
    return this.respond(query, bindings);
  }
}

describe("normalizeHops", () => {
  it("clamps to a positive whole number", () => {
    expect(normalizeHops(undefined)).toBe(3);
    expect(normalizeHops(0)).toBe(3);
    expect(normalizeHops(2.7)).toBe(2);
    expect(normalizeHops(25)).toBe(10);
    expect(normalizeHops(Number.NaN)).toBe(3);
  });
});

describe("GremlinGraphClient", () => {
  it("binds the CVE and reads the projected lists", async () => {
    const runner = new FakeRunner(() => [
      new Map<string, unknown>([
        ["pkgs", ["openssl-3.0.7"]],
        ["hosts", ["h1", "h2"]],
        ["apps", ["a1"]],
        ["svcs", []],
        ["down", []],
      ]),
    ]);

    const impact = await new GremlinGraphClient(runner).analyzeVulnerabilityImpact("CVE-2025-90044", 4);

    expect(impact).toEqual({
      cveId: "CVE-2025-90044",
      packages: ["openssl-3.0.7"],
      hosts: ["h1", "h2"],
      applications: ["a1"],
      services: [],
      downstreamServices: [],
      counts: { packages: 1, hosts: 2, applications: 1, services: 0, downstreamServices: 0 },
    });
    expect(runner.submitted[0]?.bindings).toEqual({ cve: "CVE-2025-90044" });
    expect(runner.submitted[0]?.query).toContain("until(loops().is(4))");
  });

  it("returns empty lists when the CVE is not in the graph", async () => {
    const impact = await new GremlinGraphClient(new FakeRunner(() => [])).analyzeVulnerabilityImpact("CVE-2025-00001");
    expect(impact.hosts).toEqual([]);
    expect(impact.counts).toEqual({});
  });

  it("uses a single-id binding for one host", async () => {
    const runner = new FakeRunner(() => ["team-a"]);
    const client = new GremlinGraphClient(runner);

    expect(await client.teamsForHosts(["h1"])).toEqual(["team-a"]);
    await client.teamsForHosts(["h1", "h2"]);

    expect(runner.submitted.map(s => s.bindings)).toEqual([{ hid: "h1" }, { hids: ["h1", "h2"] }]);
  });

  it("records per-host failures in a comprehensive analysis", async () => {
    const runner = new FakeRunner(query => {
      if (query.includes("has('Vulnerability'")) {
        return [{ pkgs: ["pkg-1"], hosts: ["h1"], apps: ["a1"], svcs: [], down: [] }];
      }
      if (query.includes("aggregate('systems')")) throw new Error("timeout");
      if (query.includes("in('MONITORS')")) return ["team-a"];
      if (query.includes("in('OWNS')")) return ["team-a", "team-b"];
      return [{ apps: ["a1"], svcs: ["s1"], down: [] }];
    });

    const result = await new GremlinGraphClient(runner).comprehensiveCveAnalysis("CVE-2025-90044");

    expect(result.hostBlastRadius).toEqual({ h1: { error: "timeout" } });
    expect(result.appBlastRadius).toEqual({
      a1: {
        applications: ["a1"],
        services: ["s1"],
        downstreamServices: [],
        counts: { applications: 1, services: 1, downstreamServices: 0 },
      },
    });
    expect(result.hostTeamMapping).toEqual({ h1: ["team-a"] });
    expect(result.appTeamMapping).toEqual({ a1: ["team-a", "team-b"] });
    expect(result.summary).toEqual({
      totalAffectedHosts: 1,
      totalAffectedApps: 1,
      totalResponsibleTeams: 2,
      uniqueTeams: ["team-a", "team-b"],
    });
    expect(result.error).toBeUndefined();
  });

  it("keeps the error when the impact query fails", async () => {
    const runner = new FakeRunner(() => {
      throw new Error("401 Unauthorized");
    });

    const result = await new GremlinGraphClient(runner).comprehensiveCveAnalysis("CVE-2025-90044");

    expect(result.error).toBe("401 Unauthorized");
    expect(result.summary.totalAffectedHosts).toBe(0);
  });
});
