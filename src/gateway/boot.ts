import { loadCrewConfig, loadSettings, requireApiKey, type AppSettings } from "../config/config.js";
import type { CrewConfig } from "../config/schema.js";
import { loadCsvIntoStore } from "../data/loader.js";
import { FinanceStore } from "../store/finance-store.js";
import type { ModelProvider } from "../ai/provider.js";
import { OpenAICompatProvider } from "../ai/providers/openai-compat.js";
import { createCrew, type Crew } from "../agents/crew.js";
import { createLogger } from "../infra/logger.js";

const log = createLogger("boot");

export interface BootOpts {
  rootDir: string;
  env?: NodeJS.ProcessEnv;
  // Replaces the HTTP model client; the API key is then not required
  provider?: ModelProvider;
}

export interface AppContext {
  settings: AppSettings;
  crewConfig: CrewConfig;
  store: FinanceStore;
  crew: Crew;
  close(): void;
}

/**
 * Start-up sequence shared by `serve` and `ask`. Any failure here is fatal:
 * nothing is served until the data, the configuration and the credential
 * have all been checked.
 */
export async function runBoot(opts: BootOpts): Promise<AppContext> {
  log.info("Running boot sequence...");

  // 1. Settings and credential
  const settings = loadSettings(opts.env ?? process.env, opts.rootDir);
  const apiKey = opts.provider ? undefined : requireApiKey(settings);

  // 2. Agent configuration
  const crewConfig = loadCrewConfig(settings.configPath);

  // 3. Data
  const loaded = await loadCsvIntoStore({
    csvPath: settings.csvPath,
    dbPath: settings.dbPath,
    tableName: settings.tableName,
  });
  log.info("Data table %s ready (%d rows)", loaded.tableName, loaded.rowCount);

  // 4. Store, model client and crew
  const store = new FinanceStore(settings.dbPath);
  let crew: Crew;
  try {
    const provider =
      opts.provider ??
      new OpenAICompatProvider({
        baseUrl: settings.baseUrl,
        apiKey: apiKey ?? "",
        defaultModel: settings.model,
        temperature: settings.temperature,
      });
    crew = createCrew({
      config: crewConfig,
      provider,
      store,
      model: settings.model,
      temperature: settings.temperature,
    });
  } catch (err) {
    store.close();
    throw err;
  }

  log.info("Boot sequence complete (model: %s)", settings.model);
  return {
    settings,
    crewConfig,
    store,
    crew,
    close: () => store.close(),
  };
}
