import { cors } from "hono/cors";

/**
 * Origins allowed to call the API from a browser: the configured web app URL
 * and its www / non-www twin.
 */
export function computeAllowedOrigins(webAppUrl: string): Set<string> {
  const allowed = new Set<string>();
  const url = new URL(webAppUrl);
  allowed.add(url.origin);

  const port = url.port ? `:${url.port}` : "";
  if (url.hostname.startsWith("www.")) {
    allowed.add(`${url.protocol}//${url.hostname.replace(/^www\./, "")}${port}`);
  } else if (!url.hostname.includes("localhost")) {
    allowed.add(`${url.protocol}//www.${url.hostname}${port}`);
  }

  return allowed;
}

export function createCorsMiddleware(webAppUrl: string) {
  const allowedOrigins = computeAllowedOrigins(webAppUrl);

  return cors({
    origin: (origin) => {
      if (origin && allowedOrigins.has(origin)) {
        return origin;
      }

      // Allow localhost for development
      if (origin && /^http:\/\/localhost:\d+$/.test(origin)) {
        return origin;
      }

      // Reject all other origins
      return "";
    },
    allowMethods: ["GET", "POST", "OPTIONS"],
    allowHeaders: ["Content-Type", "X-Request-Id"],
    exposeHeaders: ["Content-Disposition", "X-Request-Id"], // CSV filename and log correlation
    maxAge: 86400, // 24 hours - browser caches preflight response
  });
}
