/**
 * Maps vulnerability CSV columns onto Jira custom fields.
 *
 * The model matches column names to field names ("App Code" → "APP_CODE");
 * when it fails, names are normalized to UPPER_SNAKE and matched exactly.
 */

import { z } from "zod";
import type { ModelClient } from "../llm/llmService";
import { parseModelOutput } from "../llm/modelJson";
import type { VulnerabilityRow } from "../vulnData/vulnerabilityTable";
import type { JiraFieldCatalog, JiraFieldMeta } from "./jiraClient";

const mappingSchema = z.record(z.string(), z.string());

const EMPTY_VALUES = new Set(["", "nan", "none", "null"]);

/** "Crown Jewel (Y/N)" → "CROWN_JEWEL__Y_N" */
export function toFieldName(column: string): string {
  return column.toUpperCase().replace(/ /g, "_").replace(/\(/g, "_").replace(/\)/g, "").replace(/\//g, "_");
}

export function fallbackColumnMapping(columns: string[], fieldNames: string[]): Record<string, string> {
  const available = new Set(fieldNames);
  const mapping: Record<string, string> = {};
  for (const column of columns) {
    const candidate = toFieldName(column);
    if (available.has(candidate)) mapping[column] = candidate;
  }
  return mapping;
}

/** m/d/Y → Y-m-d; anything else is returned unchanged. */
export function toJiraDate(value: string): string {
  const match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(value.trim());
  if (!match) return value;
  const [, month, day, year] = match;
  return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
}

export function toFieldValue(meta: JiraFieldMeta, value: string): unknown {
  const type = meta.schema?.type ?? "";
  if (type === "date") return toJiraDate(value);
  if (type === "option") return { value };
  return value;
}

export async function mapColumnsToFields(
  model: ModelClient,
  columns: string[],
  fieldNames: string[]
): Promise<Record<string, string>> {
  const prompt = [
    "Map CSV column names to JIRA custom field names.",
    "",
    `CSV columns: ${JSON.stringify(columns)}`,
    `JIRA custom fields: ${JSON.stringify(fieldNames)}`,
    "",
    'Return ONLY valid JSON mapping: {"CSV_COLUMN_NAME": "JIRA_FIELD_NAME", ...}',
    "Map each CSV column to its corresponding JIRA field. Skip fields that don't match.",
    "Handle variations like 'App Code' -> 'APP_CODE', 'Crown Jewel Indicator' -> 'CROWN_JEWEL_INDICATOR'.",
  ].join("\n");

  try {
    const raw = await model.ask(prompt, { caller: "jira-field-mapping", json: true });
    const parsed = parseModelOutput(raw, mappingSchema);
    if (parsed.ok) return parsed.value;
    console.warn(`[Jira] Field mapping reply unusable (${parsed.error}); using name matching`);
  } catch (err) {
    console.warn(`[Jira] Field mapping failed (${(err as Error).message}); using name matching`);
  }
  return fallbackColumnMapping(columns, fieldNames);
}

/**
 * Build the `fields` payload for a story from a vulnerability row.
 * Empty cells and mappings to unknown field names are dropped.
 */
export async function buildCustomFields(
  model: ModelClient,
  row: VulnerabilityRow,
  catalog: JiraFieldCatalog
): Promise<Record<string, unknown>> {
  const fieldIdsByName = new Map<string, string>();
  for (const [fieldId, meta] of Object.entries(catalog)) {
    if (meta.name && !fieldIdsByName.has(meta.name)) fieldIdsByName.set(meta.name, fieldId);
  }

  const mapping = await mapColumnsToFields(model, Object.keys(row), Array.from(fieldIdsByName.keys()));

  const fields: Record<string, unknown> = {};
  for (const [column, fieldName] of Object.entries(mapping)) {
    const value = (row[column] ?? "").trim();
    if (EMPTY_VALUES.has(value.toLowerCase())) continue;
    const fieldId = fieldIdsByName.get(fieldName);
    if (!fieldId) continue;
    fields[fieldId] = toFieldValue(catalog[fieldId], value);
  }
  return fields;
}

/** Id of the first field whose name mentions RHSA. */
export function findRhsaField(catalog: JiraFieldCatalog): string | null {
  for (const [fieldId, meta] of Object.entries(catalog)) {
    if (meta.name.toLowerCase().includes("rhsa")) return fieldId;
  }
  return null;
}
