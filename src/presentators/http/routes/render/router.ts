import { Hono, type Context } from "hono";
import type { RenderDefaults } from "../../../../config/types";
import type { FontResolver } from "../../../../fonts/resolve";
import { renderRequest, type RenderRequest } from "../../../../render/request";
import { logDebug } from "../../../../utils/logging/log-helpers";
import { badRequest } from "../../utils/http-error";
import { parseRenderBody, parseRenderQuery } from "./parse-request";

export function createRenderRouter(resolver: FontResolver, defaults: RenderDefaults = {}): Hono {
  const router = new Hono();

  async function respond(c: Context, req: RenderRequest): Promise<Response> {
    const result = await resolver.resolve(req.font);
    if (!result.ok) throw result.error;
    logDebug(`render font=${req.font ?? "(default)"} chars=${req.text.length}`, undefined, {
      requestId: c.get("requestId"),
    });
    return c.text(renderRequest(result.font, req, defaults) + "\n");
  }

  router.get("/", (c) => respond(c, parseRenderQuery(c.req.query())));

  router.post("/", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw badRequest("Request body must be valid JSON");
    }
    return respond(c, parseRenderBody(body));
  });

  return router;
}
