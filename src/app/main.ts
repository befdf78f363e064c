import "dotenv/config";
import { resolveProviderFactory } from "../config/provider.js";
import { loadSettings } from "../config/settings.js";
import { loadProvider } from "../core/index.js";
import { InMemoryDocumentRepository } from "../documents/document-repository.js";
import { GroundedQaEngine } from "../qa/qa-engine.js";
import { HttpServer, createApp } from "../server/index.js";
import { createLogger, describeError, setLogLevel } from "../shared/index.js";

const log = createLogger("app");

export async function main(): Promise<void> {
  const settings = loadSettings();
  setLogLevel(settings.logLevel);

  const provider = await loadProvider(resolveProviderFactory(settings.llmProvider));
  await provider.start();

  const repository = new InMemoryDocumentRepository();
  const engine = new GroundedQaEngine({
    provider,
    contextMaxChars: settings.contextMaxChars,
    maxOutputTokens: settings.maxOutputTokens,
  });
  const server = new HttpServer({
    app: createApp({ repository, engine, settings }),
    port: settings.port,
  });

  await server.start();

  log.info(`${settings.appName} v${settings.appVersion} ready`, {
    provider: provider.name,
    port: server.port,
    maxDocuments: settings.maxDocuments,
    contextMaxChars: settings.contextMaxChars,
  });

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    try {
      await server.stop();
      await provider.stop();
    } catch (err) {
      log.error("Shutdown failed", { error: describeError(err) });
      process.exitCode = 1;
    }
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}
