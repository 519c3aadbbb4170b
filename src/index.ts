#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { KitSettings } from "./config/config.js";
import { createDb, openLedgerPool } from "./db/connection.js";
import { ensureLedgerSchema } from "./db/bootstrap.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { LedgerStore } from "./store/ledgerStore.js";

async function main(): Promise<void> {
  const configPath = process.env.SBATCHKIT_CONFIG ?? "config/sbatchkit.yaml";
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const settings = await KitSettings.loadFromFile(configPath);
  const ledgerPool = openLedgerPool(process.env.DATABASE_URL);
  await ensureLedgerSchema(ledgerPool, { autoSchema, schemaPath: process.env.SBATCHKIT_SCHEMA });

  const ledger = new LedgerStore(createDb(ledgerPool.pool));
  const server = createGatewayServer({ settings, ledger });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(
    `sbatchkit gateway ready (config ${settings.configHash}, ledger ${ledgerPool.external ? "postgres" : "in-memory"})`
  );
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
