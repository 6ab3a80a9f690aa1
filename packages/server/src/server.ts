import { createApp } from "./app.js";
import { loadConfig } from "./config.js";

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`\nroadnet API server running at http://localhost:${config.port}`);
  console.log(`Default CRS: ${config.defaultCrs}, key collisions: ${config.keyCollisionPolicy}\n`);
});
