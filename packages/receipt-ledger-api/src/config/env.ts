export type ApiConfig = {
  port: number;
  jsonLimit: string;
  taxonomyPath?: string;
};

export function readApiConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const portRaw = env.RECEIPT_LEDGER_API_PORT ?? "8790";
  const port = Number.parseInt(portRaw, 10);
  if (!Number.isFinite(port) || port <= 0) {
    throw new Error(`invalid RECEIPT_LEDGER_API_PORT: ${portRaw}`);
  }

  return {
    port,
    jsonLimit: env.RECEIPT_LEDGER_JSON_LIMIT?.trim() || "1mb",
    taxonomyPath: env.RECEIPT_LEDGER_TAXONOMY_PATH?.trim() || undefined,
  };
}
