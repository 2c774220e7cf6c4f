import "dotenv/config";
import { buildServer } from "./api/server.js";
import { loadConfig } from "./config.js";
import { createServices } from "./services.js";

async function start(): Promise<void> {
  const config = loadConfig(process.env);
  const services = await createServices(config);
  const app = await buildServer(services);

  await app.listen({ host: "0.0.0.0", port: config.port });
}

start().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
