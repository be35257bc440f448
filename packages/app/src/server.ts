import { loadHostConfig, resolveConfigPath } from "./config.js";
import { createBridgeHost, listen } from "./host.js";

const configPath = resolveConfigPath(process.argv.slice(2), process.env, process.cwd());
const config = loadHostConfig(configPath);

const host = createBridgeHost(config);
const close = listen(host);

console.log(`🔌 Socket.IO ready for device readers and key injectors`);

let shuttingDown = false;

function shutdown(signal: string): void {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[KeyBridge] ${signal} received, releasing keys and shutting down`);

  close().then(
    () => process.exit(0),
    (error: unknown) => {
      console.error("[KeyBridge] Shutdown failed:", error);
      process.exit(1);
    },
  );
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
