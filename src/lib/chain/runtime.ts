import { loadConfig, type AppConfig } from "@/src/lib/config";
import { DeltaClient } from "@/src/lib/providers/delta";

export type ChainRuntime = {
  config: AppConfig;
  client: DeltaClient;
};

// One client per process so the catalog cache survives between requests.
let runtime: ChainRuntime | null = null;

export const getChainRuntime = (): ChainRuntime => {
  if (!runtime) {
    const config = loadConfig();
    runtime = {
      config,
      client: new DeltaClient({
        baseUrl: config.deltaBaseUrl,
        maxRetries: config.maxRetries,
        catalogTtlMs: config.catalogTtlMs
      })
    };
  }
  return runtime;
};

export const resetChainRuntime = () => {
  runtime = null;
};
