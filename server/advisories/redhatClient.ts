/**
 * Red Hat Security Data API client and local CVE record store.
 *
 * - CVE records for an advisory: /cve.json?advisory=<RHSA>, then each resource_url
 * - CSAF document for an advisory: /csaf/<RHSA>.json
 * - Offline fallback: resources/cve_db/<CVE>.json
 */

import axios, { type AxiosInstance } from "axios";
import NodeCache from "node-cache";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { ENV } from "../_core/env";

const REDHAT_API_BASE_URL = "https://access.redhat.com/hydra/rest/securitydata";

// Advisories are immutable once published; 30 minute TTL
const responseCache = new NodeCache({ stdTTL: 1800, checkperiod: 120 });

export const RHSA_PATTERN = /RHSA-\d{4}:\d+/i;
export const CVE_PATTERN = /CVE-\d{4}-\d{4,}/gi;

export interface AdvisoryBundle {
  cveData: unknown[];
  cveIds: string[];
  csafData: unknown | null;
}

export interface AdvisorySource {
  fetchByRhsa(rhsaId: string): Promise<AdvisoryBundle>;
  loadLocalCves(cveIds: string[]): Promise<unknown[]>;
}

// ── Identifier extraction ───────────────────────────────────────────────────

export function extractRhsaId(text: string): string | null {
  const match = RHSA_PATTERN.exec(text);
  return match ? match[0].toUpperCase() : null;
}

/** Unique, sorted, upper-cased CVE identifiers found in the text. */
export function extractCveIds(text: string): string[] {
  const found = text.match(CVE_PATTERN) ?? [];
  return Array.from(new Set(found.map(id => id.toUpperCase()))).sort();
}

// ── HTTP ────────────────────────────────────────────────────────────────────

function createInstance(): AxiosInstance {
  return axios.create({
    baseURL: REDHAT_API_BASE_URL,
    timeout: 20_000,
    headers: { Accept: "application/json" },
  });
}

function describeAxiosError(err: unknown, url: string): Error {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status === 404) return new Error(`Red Hat API: not found (${url})`);
    if (status === 429) return new Error("Red Hat API rate limit exceeded. Please wait before retrying.");
    return new Error(`Red Hat API error (${status ?? "network"}): ${err.message}`);
  }
  return err instanceof Error ? err : new Error(String(err));
}

function readResourceUrl(entry: unknown): string | null {
  if (typeof entry !== "object" || entry === null || !("resource_url" in entry)) return null;
  const url = entry.resource_url;
  return typeof url === "string" && url ? url : null;
}

function readRecordName(record: unknown): string | null {
  if (typeof record !== "object" || record === null || !("name" in record)) return null;
  return typeof record.name === "string" ? record.name : null;
}

export class RedHatAdvisoryClient implements AdvisorySource {
  private readonly http: AxiosInstance;

  constructor(private readonly cveDbDir: string = ENV.cveDbDir) {
    this.http = createInstance();
  }

  private async get(url: string, params?: Record<string, string>): Promise<unknown> {
    const cacheKey = `redhat:${url}:${JSON.stringify(params ?? {})}`;
    const cached = responseCache.get<unknown>(cacheKey);
    if (cached !== undefined) return cached;

    try {
      const response = await this.http.get<unknown>(url, { params });
      responseCache.set(cacheKey, response.data);
      return response.data;
    } catch (err) {
      throw describeAxiosError(err, url);
    }
  }

  /**
   * CVE records and CSAF document for an advisory. Individual CVE records that
   * fail to download are skipped; a missing CSAF document yields null.
   */
  async fetchByRhsa(rhsaId: string): Promise<AdvisoryBundle> {
    console.log(`[Advisories] Fetching CVE data for ${rhsaId}`);
    const index = await this.get("/cve.json", { advisory: rhsaId });
    if (!Array.isArray(index) || index.length === 0) {
      throw new Error(`No CVE data returned for advisory ${rhsaId}`);
    }

    const cveData: unknown[] = [];
    const cveIds: string[] = [];
    for (const entry of index) {
      const url = readResourceUrl(entry);
      if (!url) continue;
      try {
        const record = await this.get(url);
        cveData.push(record);
        const name = readRecordName(record);
        if (name && !cveIds.includes(name)) cveIds.push(name);
      } catch (err) {
        console.warn(`[Advisories] Skipping ${url}: ${(err as Error).message}`);
      }
    }

    let csafData: unknown | null = null;
    try {
      csafData = await this.get(`/csaf/${encodeURIComponent(rhsaId)}.json`);
    } catch (err) {
      console.warn(`[Advisories] CSAF document unavailable for ${rhsaId}: ${(err as Error).message}`);
    }

    return { cveData, cveIds, csafData };
  }

  /**
   * Read <cveDbDir>/<CVE>.json for each id. Missing or unreadable files are
   * skipped.
   */
  async loadLocalCves(cveIds: string[]): Promise<unknown[]> {
    const records: unknown[] = [];
    for (const cveId of cveIds) {
      if (!/^CVE-\d{4}-\d{4,}$/i.test(cveId)) continue;
      const filePath = path.join(this.cveDbDir, `${cveId.toUpperCase()}.json`);
      try {
        const content = await readFile(filePath, "utf8");
        records.push(JSON.parse(content));
      } catch (err) {
        console.warn(`[Advisories] Could not load ${filePath}: ${(err as Error).message}`);
      }
    }
    console.log(`[Advisories] Loaded ${records.length} CVE record(s) from ${this.cveDbDir}`);
    return records;
  }
}
