/**
 * Vulnerability table — the scanner export (CSV) the operator works through.
 * Each row is kept as a column-name → value record; the columns the assistant
 * relies on are "Vuln ID", "Vuln Name", "App Code" and "App Name".
 */

import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { ENV } from "../_core/env";

export type VulnerabilityRow = Record<string, string>;

export const VULN_ID_COLUMN = "Vuln ID";
export const VULN_NAME_COLUMN = "Vuln Name";
export const APP_CODE_COLUMN = "App Code";
export const APP_NAME_COLUMN = "App Name";

export interface VulnerabilityTable {
  sample(count?: number): Promise<string[]>;
  getById(vulnId: string): Promise<VulnerabilityRow | null>;
}

export function parseVulnerabilityCsv(content: string): VulnerabilityRow[] {
  const records: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
    relax_column_count: true,
  });
  if (!Array.isArray(records)) return [];

  const rows: VulnerabilityRow[] = [];
  for (const record of records) {
    if (typeof record !== "object" || record === null) continue;
    const row: VulnerabilityRow = {};
    for (const [key, value] of Object.entries(record)) {
      row[key] = value === undefined || value === null ? "" : String(value);
    }
    rows.push(row);
  }
  return rows;
}

/** "Vuln ID — Vuln Name" for every row that has both. */
export function describeRows(rows: VulnerabilityRow[]): string[] {
  const lines: string[] = [];
  for (const row of rows) {
    const id = row[VULN_ID_COLUMN]?.trim();
    const name = row[VULN_NAME_COLUMN]?.trim();
    if (id && name) lines.push(`${id} — ${name}`);
  }
  return lines;
}

/**
 * Pick `count` distinct items without replacement (partial Fisher–Yates).
 */
export function sampleWithoutReplacement<T>(items: T[], count: number, random: () => number = Math.random): T[] {
  if (items.length <= count) return [...items];
  const pool = [...items];
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}

/**
 * Reads the CSV on every call so edits to the export are picked up without a
 * restart.
 */
export class CsvVulnerabilityTable implements VulnerabilityTable {
  constructor(
    private readonly csvPath: string = ENV.vulnDataPath,
    private readonly random: () => number = Math.random
  ) {}

  private async readRows(): Promise<VulnerabilityRow[]> {
    const content = await readFile(this.csvPath, "utf8");
    return parseVulnerabilityCsv(content);
  }

  async sample(count = 5): Promise<string[]> {
    const lines = describeRows(await this.readRows());
    if (lines.length === 0) return ["No vulnerabilities found in data."];
    return sampleWithoutReplacement(lines, count, this.random);
  }

  async getById(vulnId: string): Promise<VulnerabilityRow | null> {
    const target = vulnId.trim();
    const rows = await this.readRows();
    return rows.find(row => (row[VULN_ID_COLUMN] ?? "").trim() === target) ?? null;
  }
}
