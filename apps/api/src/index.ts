import "dotenv/config";
import { loadEnv } from "./config.js";
import { createServer } from "./server.js";

const env = loadEnv();
const app = await createServer({ logLevel: env.LOG_LEVEL });

try {
  await app.listen({ port: env.PORT, host: env.HOST });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
