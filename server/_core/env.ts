/**
 * Typed view of the process environment. Values are read once at import time;
 * `.env` is loaded by `dotenv/config` in the server entry point.
 */

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const ENV = {
  isProduction: process.env.NODE_ENV === "production",
  port: intFromEnv(process.env.PORT, 3000),
  databaseUrl: process.env.DATABASE_URL ?? "",

  // Built-in model (Azure OpenAI deployment)
  azureOpenAiEndpoint: (process.env.AZURE_OPENAI_ENDPOINT ?? "").replace(/\/+$/, ""),
  azureOpenAiApiKey: process.env.AZURE_OPENAI_API_KEY ?? "",
  azureOpenAiModel: process.env.AZURE_OPENAI_MODEL ?? "",
  azureOpenAiApiVersion: process.env.AZURE_OPENAI_API_VERSION ?? "2024-06-01",

  // Remote shell
  sshHostname: process.env.SSH_HOSTNAME ?? "",
  sshPort: intFromEnv(process.env.SSH_PORT, 22),
  sshUser: process.env.SSH_USER ?? "",
  sshPassword: process.env.SSH_PASSWD ?? "",

  // Issue tracker
  jiraUrl: (process.env.JIRA_URL ?? "").replace(/\/+$/, ""),
  jiraEmail: process.env.JIRA_EMAIL ?? "",
  jiraApiToken: process.env.JIRA_API_TOKEN ?? "",
  jiraProjectKey: process.env.JIRA_PROJECT_KEY ?? "",

  // Graph database (Cosmos DB Gremlin API)
  gremlinEndpoint: process.env.GREMLIN_ENDPOINT ?? "",
  gremlinDatabase: process.env.GREMLIN_DB ?? "",
  gremlinGraphName: process.env.GREMLIN_GRAPH_NAME ?? "",
  gremlinPrimaryKey: process.env.GREMLIN_PRIMARY_KEY ?? "",

  // Local data
  vulnDataPath: process.env.VULN_DATA_PATH ?? "resources/vuln_data.csv",
  cveDbDir: process.env.CVE_DB_DIR ?? "resources/cve_db",
  planFile: process.env.PLAN_FILE ?? "resources/plan.json",

  // Assistant behaviour
  patchMaxRetries: intFromEnv(process.env.PATCH_MAX_RETRIES, 2),
  autoTrackIssues: process.env.AUTO_TRACK_ISSUES === "true",
};
