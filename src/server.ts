import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./index";
import { buildConfig, validateEnv } from "./config/env";

const config = buildConfig(validateEnv());

const app = createApp({
  allowedOrigins: config.allowedOrigins,
  publicDir: config.publicDir,
  docxFooter: config.docxFooter,
});

serve(
  {
    fetch: app.fetch,
    port: config.port,
    hostname: config.bindAddress,
  },
  (info) => {
    console.log(`Leeds Harvard referencer listening on http://${config.bindAddress}:${info.port}`);
  }
);
