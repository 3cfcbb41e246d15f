import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { ENV } from "../_core/env";
import { parseRemediationPlan, type RemediationPlan } from "./remediationPlan";

export interface PlanStore {
  readonly location: string;
  load(): Promise<RemediationPlan | null>;
  save(plan: RemediationPlan): Promise<void>;
}

/**
 * The last generated plan, kept as pretty-printed JSON on disk so an operator
 * can review or edit it between turns.
 */
export class FilePlanStore implements PlanStore {
  constructor(readonly location: string = ENV.planFile) {}

  async load(): Promise<RemediationPlan | null> {
    let content: string;
    try {
      content = await readFile(this.location, "utf8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw err;
    }

    const parsed = parseRemediationPlan(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Plan file ${this.location} is invalid: ${parsed.error.issues[0]?.message ?? "unknown error"}`);
    }
    return parsed.data;
  }

  async save(plan: RemediationPlan): Promise<void> {
    await mkdir(path.dirname(this.location), { recursive: true });
    await writeFile(this.location, `${JSON.stringify(plan, null, 2)}\n`, "utf8");
    console.log(`[Planner] Plan saved to ${this.location}`);
  }
}
