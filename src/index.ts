import { createApp } from "./app";
import { serverConfig } from "./config/options";
import { connectRedis } from "./config/redis";

const app = createApp();

connectRedis().catch((error: unknown) => console.error("Redis Status: Error", error));

app.listen(serverConfig.port, () => {
  console.log(`POS backend running on port ${serverConfig.port}`);
});
