/**
 * Boot-time environment variable validation.
 * Prints clear diagnostic messages and exits if critical vars are missing.
 */

interface EnvCheck {
  key: string;
  required: boolean;
  description: string;
  category: "core" | "llm" | "ssh" | "jira" | "gremlin" | "data" | "optional";
}

const ENV_CHECKS: EnvCheck[] = [
  // Core
  {
    key: "DATABASE_URL",
    required: false,
    description: "MySQL connection string for conversation checkpoints (in-memory when unset)",
    category: "core",
  },

  // Built-in model
  {
    key: "AZURE_OPENAI_ENDPOINT",
    required: false,
    description: "Azure OpenAI resource endpoint",
    category: "llm",
  },
  {
    key: "AZURE_OPENAI_API_KEY",
    required: false,
    description: "Azure OpenAI API key",
    category: "llm",
  },
  {
    key: "AZURE_OPENAI_MODEL",
    required: false,
    description: "Azure OpenAI deployment name",
    category: "llm",
  },
  {
    key: "LLM_HOST",
    required: false,
    description: "Self-hosted OpenAI-compatible endpoint host (used when LLM_ENABLED=true)",
    category: "llm",
  },

  // Remote shell
  {
    key: "SSH_HOSTNAME",
    required: false,
    description: "Target host for remediation commands",
    category: "ssh",
  },
  {
    key: "SSH_USER",
    required: false,
    description: "SSH username",
    category: "ssh",
  },
  {
    key: "SSH_PASSWD",
    required: false,
    description: "SSH password",
    category: "ssh",
  },

  // Jira
  {
    key: "JIRA_URL",
    required: false,
    description: "Jira base URL",
    category: "jira",
  },
  {
    key: "JIRA_EMAIL",
    required: false,
    description: "Jira account email",
    category: "jira",
  },
  {
    key: "JIRA_API_TOKEN",
    required: false,
    description: "Jira API token",
    category: "jira",
  },
  {
    key: "JIRA_PROJECT_KEY",
    required: false,
    description: "Jira project holding remediation epics and stories",
    category: "jira",
  },

  // Gremlin
  {
    key: "GREMLIN_ENDPOINT",
    required: false,
    description: "Cosmos DB Gremlin websocket endpoint",
    category: "gremlin",
  },
  {
    key: "GREMLIN_DB",
    required: false,
    description: "Cosmos DB database name",
    category: "gremlin",
  },
  {
    key: "GREMLIN_GRAPH_NAME",
    required: false,
    description: "Cosmos DB graph (collection) name",
    category: "gremlin",
  },
  {
    key: "GREMLIN_PRIMARY_KEY",
    required: false,
    description: "Cosmos DB primary key",
    category: "gremlin",
  },

  // Local data
  {
    key: "VULN_DATA_PATH",
    required: false,
    description: "Vulnerability CSV (default: resources/vuln_data.csv)",
    category: "data",
  },
  {
    key: "CVE_DB_DIR",
    required: false,
    description: "Directory of local CVE JSON records (default: resources/cve_db)",
    category: "data",
  },

  {
    key: "PATCH_MAX_RETRIES",
    required: false,
    description: "Retries per remediation step (default: 2)",
    category: "optional",
  },
];

const CATEGORY_LABELS: Record<EnvCheck["category"], string> = {
  core: "Core",
  llm: "Language Model",
  ssh: "Remote Shell (SSH)",
  jira: "Jira",
  gremlin: "Graph Database (Gremlin)",
  data: "Local Data",
  optional: "Optional",
};

function isSet(key: string): boolean {
  const value = process.env[key];
  return value !== undefined && value.trim() !== "";
}

function maskValue(key: string, value: string): string {
  if (key.includes("PASS") || key.includes("KEY") || key.includes("TOKEN")) {
    return `${value.substring(0, 4)}${"*".repeat(Math.max(0, value.length - 4))}`;
  }
  return value.length > 50 ? `${value.substring(0, 47)}...` : value;
}

/**
 * Validate environment variables at boot time.
 * The caller exits the process when `errors` is non-empty.
 */
export function validateEnvironment(): {
  errors: string[];
  warnings: string[];
  info: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];
  const info: string[] = [];

  console.log("\n╔══════════════════════════════════════════════════╗");
  console.log("║      Remediation Assistant — Environment Check    ║");
  console.log("╚══════════════════════════════════════════════════╝\n");

  const grouped = new Map<EnvCheck["category"], EnvCheck[]>();
  for (const check of ENV_CHECKS) {
    const list = grouped.get(check.category) || [];
    list.push(check);
    grouped.set(check.category, list);
  }

  for (const [category, checks] of Array.from(grouped.entries())) {
    console.log(`  ┌─ ${CATEGORY_LABELS[category]}`);

    for (const check of checks) {
      const value = process.env[check.key];
      if (value !== undefined && value.trim() !== "") {
        console.log(`  │  ✅ ${check.key} = ${maskValue(check.key, value)}`);
      } else if (check.required) {
        console.log(`  │  ❌ ${check.key} — MISSING (${check.description})`);
        errors.push(`${check.key}: ${check.description}`);
      } else {
        console.log(`  │  ⚠️  ${check.key} — not set (${check.description})`);
      }
    }
    console.log("  └─");
  }

  // A model is the one hard dependency: every turn starts with classification
  const hasBuiltInModel =
    isSet("AZURE_OPENAI_ENDPOINT") && isSet("AZURE_OPENAI_API_KEY") && isSet("AZURE_OPENAI_MODEL");
  const hasCustomModel = process.env.LLM_ENABLED === "true" && isSet("LLM_HOST");
  if (!hasBuiltInModel && !hasCustomModel) {
    errors.push(
      "AZURE_OPENAI_ENDPOINT/AZURE_OPENAI_API_KEY/AZURE_OPENAI_MODEL or LLM_ENABLED=true with LLM_HOST: no language model configured"
    );
  } else if (!hasBuiltInModel) {
    warnings.push("Built-in model not configured — self-hosted endpoint failures will not fall back");
  }

  if (!isSet("SSH_HOSTNAME") || !isSet("SSH_USER")) {
    warnings.push("SSH not configured — patching and command pass-through will fail");
  }
  if (!isSet("JIRA_URL") || !isSet("JIRA_API_TOKEN") || !isSet("JIRA_PROJECT_KEY")) {
    warnings.push("Jira not configured — issue tracking will be unavailable");
  }
  if (!isSet("GREMLIN_ENDPOINT") || !isSet("GREMLIN_PRIMARY_KEY")) {
    warnings.push("Gremlin not configured — graph queries will be unavailable");
  }
  if (!isSet("DATABASE_URL")) {
    info.push("No DATABASE_URL — conversation state is kept in memory and lost on restart");
  }

  for (const warning of warnings) console.log(`  ⚠️  ${warning}`);
  for (const line of info) console.log(`  ℹ️  ${line}`);

  console.log("\n  ─────────────────────────────────────────────────");
  if (errors.length > 0) {
    console.error(`\n  ❌ ${errors.length} CRITICAL ERROR(S) — server cannot start:\n`);
    for (const err of errors) {
      console.error(`     • ${err}`);
    }
    console.error("\n  Fix the above variables in your .env file and restart.\n");
  } else if (warnings.length > 0) {
    console.log(`\n  ✅ Core checks passed | ⚠️  ${warnings.length} warning(s)\n`);
  } else {
    console.log("\n  ✅ All environment checks passed\n");
  }

  return { errors, warnings, info };
}
