import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { getSpotRegistry } from "./services/spot-registry.service.js";

const config = loadConfig();

// Open the store before accepting requests
getSpotRegistry();

const app = createApp();

app.listen(config.port, () => {
  console.log(`\n[server] OpenRamp API running at http://localhost:${config.port}`);
  console.log(`[server] OpenAPI spec: http://localhost:${config.port}/api-docs\n`);
});
