import "dotenv/config";
import { loadConfig, loadEngineConfig } from "./config.js";
import { loadScenarios } from "./scenarios/registry.js";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const scenarios = await loadScenarios(config.SCENARIO_DIR);
  const engineConfig = await loadEngineConfig(config);
  const server = await createServer({ config, scenarios, engineConfig });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      server.log.info(`${signal} received, shutting down`);
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          server.log.error({ err }, "shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  await server.listen({ port: config.PORT, host: config.HOST });
  server.log.info(`Mediation API running on ${config.HOST}:${config.PORT} with ${scenarios.size} scenarios`);
  server.log.info(`MCP endpoint: http://${config.HOST}:${config.PORT}/mcp`);
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
