import http from "http";
import { createApp } from "./app";
import { createAppContext } from "./context";

const ctx = createAppContext();
const server = http.createServer(createApp(ctx));

async function startServer(): Promise<void> {
  await ctx.start();
  await ctx.accounts.bootstrapAdmin(ctx.config.bootstrapAdminEmail, ctx.config.bootstrapAdminPassword);

  server.listen(ctx.config.port, () => {
    ctx.logger.info({ port: ctx.config.port }, `Backend listening on http://localhost:${ctx.config.port}`);
  });
}

async function shutdown(): Promise<void> {
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await ctx.stop();
}

startServer().catch((error: unknown) => {
  ctx.logger.fatal({ err: error }, "Failed to start backend");
  process.exit(1);
});

process.on("SIGINT", () => {
  shutdown()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      ctx.logger.error({ err: error }, "Shutdown failed");
      process.exit(1);
    });
});
