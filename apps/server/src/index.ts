import { loadServerConfig } from "./server-config";
import { startServer } from "./server";

async function main(): Promise<void> {
  await startServer(loadServerConfig(process.env));
}

main().catch((error) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
