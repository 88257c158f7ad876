import { Hono } from "hono";
import { z } from "zod";
import { respondWithError } from "../middleware/error-response";
import { authorizeRequest, type Credentials } from "../services/kaiterra-auth";
import { maskUrl } from "../services/kaiterra-client";

const PreviewRequestSchema = z.object({
  path: z.string().startsWith("/", "path must start with '/'"),
  params: z.record(z.union([z.string(), z.number()])).optional(),
  body: z.unknown().optional(),
});

/**
 * Shows the URL and headers an API request would be sent with, without
 * sending it. Handy for checking a client of your own against ours.
 */
export function createAuthRoutes(options: {
  baseUrl: string;
  credentials: Credentials;
  now?: () => Date;
}) {
  const app = new Hono();
  const now = options.now ?? (() => new Date());

  app.post("/preview", async (c) => {
    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch {
      return c.json({ error: "Request body must be JSON" }, 400);
    }

    const parsed = PreviewRequestSchema.safeParse(payload);
    if (!parsed.success) {
      return c.json(
        {
          error: "Invalid preview request",
          details: parsed.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`
          ),
        },
        400
      );
    }

    const { path, params, body } = parsed.data;
    try {
      const authorized = authorizeRequest(
        options.baseUrl,
        {
          relativeUrl: path,
          params,
          body:
            body === undefined
              ? undefined
              : typeof body === "string"
              ? body
              : JSON.stringify(body),
        },
        options.credentials,
        now()
      );
      console.log(`Auth preview for ${path} using ${options.credentials.method}`);
      return c.json({
        method: options.credentials.method,
        url: maskUrl(authorized.url),
        headers: authorized.headers,
      });
    } catch (error) {
      return respondWithError(c, error, "building auth preview");
    }
  });

  return app;
}
