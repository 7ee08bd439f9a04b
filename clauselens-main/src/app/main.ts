import { loadRuleLibrary } from "../audit/rule-library.js";
import { loadEngineConfig } from "../config/engine-config.js";
import { selectProviderFactory } from "../config/provider.js";
import { loadProvider } from "../core/index.js";
import type { CompletionProvider } from "../core/index.js";
import { DocumentIngestor, FileDocumentStore } from "../documents/index.js";
import { ContractEngine } from "../engine/index.js";
import { QaGateway, WsServer } from "../server/index.js";
import { devError, devLog } from "../shared/index.js";

export async function main(): Promise<void> {
  const config = loadEngineConfig();
  const ruleLibrary = await loadRuleLibrary(config.audit.rulesPath, config.audit.policyOverrides);
  const provider: CompletionProvider | undefined = config.completion.enabled
    ? await loadProvider(selectProviderFactory(config.completion.provider))
    : undefined;

  const documentStore = new FileDocumentStore({ dataDir: config.dataDir });
  const engine = new ContractEngine({ documentStore, provider, config, ruleLibrary });
  const ingestor = new DocumentIngestor(documentStore);

  let gateway: QaGateway | null = null;
  const wsServer = new WsServer({
    port: config.port,
    onMessage: (clientId, data) => gateway?.handleMessage(clientId, data),
    onDisconnect: (clientId) => gateway?.disconnect(clientId),
  });
  gateway = new QaGateway({ engine, ingestor, send: wsServer.send.bind(wsServer) });

  await engine.start();
  await wsServer.start();

  devLog(
    `ClauseLens ready on port ${config.port}: synthesis=${engine.synthesisStrategy}, rules v${ruleLibrary.version}, data=${config.dataDir}`,
  );

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    await wsServer.stop();
    await engine.stop();
  };
  const onSignal = (): void => {
    shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        devError("Shutdown failed:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}
