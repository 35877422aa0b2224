import { Hono } from "hono";
import type { BlockArtConfig } from "../../config/types";
import { createFontResolver, type FontResolver } from "../../fonts/resolve";
import { renderMini } from "../../index";
import { requestIdMiddleware } from "./middleware/request-id";
import { createRenderRouter } from "./routes/render/router";
import { createGlobalErrorHandler } from "./utils/global-error-handler";

export type RenderAppOptions = {
  config?: BlockArtConfig;
  resolver?: FontResolver; // defaults to a resolver over `config` that refuses file paths
};

export function createRenderApp(options: RenderAppOptions = {}): Hono {
  const config = options.config ?? {};
  const resolver = options.resolver ?? createFontResolver(config, { allowPaths: false });

  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(createGlobalErrorHandler());
  app.notFound((c) =>
    c.json({ error: { type: "not_found", message: `No route for ${c.req.method} ${c.req.path}` } }, 404)
  );

  // Health
  app.get("/health", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Root
  app.get("/", (c) => {
    return c.text(renderMini("BLOCKART") + "\n");
  });

  app.get("/fonts", async (c) => {
    return c.json({ fonts: await resolver.list() });
  });

  app.route("/render", createRenderRouter(resolver, config.defaults));

  return app;
}
