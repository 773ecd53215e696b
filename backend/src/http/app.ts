import express, { type Express, type NextFunction, type Request, type Response } from "express";

import { createChatRouter, type ChatRouterDeps } from "./chatRoutes";

type WildcardOrigin = Readonly<{
  scheme: string;
  // Always starts with "." so only subdomains match, never the apex.
  hostSuffix: string;
}>;

export type AllowedOrigins = Readonly<{
  anyOrigin: boolean;
  exact: ReadonlySet<string>;
  wildcards: ReadonlyArray<WildcardOrigin>;
}>;

// "https://*.example.test": scheme, then "*" directly followed by a dotted host of two or more characters.
const WILDCARD_ORIGIN = /^([a-z][a-z0-9+.-]*):\/\/\*(\.[^/:*]{2,})$/i;

/** Parses a comma-separated allow-list of exact origins, `scheme://*.host` wildcards and `*`. */
export function parseAllowedOrigins(raw: string): AllowedOrigins {
  const entries = raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");
  const exact = new Set<string>();
  const wildcards: WildcardOrigin[] = [];
  for (const entry of entries) {
    if (entry === "*") continue;
    const match = WILDCARD_ORIGIN.exec(entry);
    const scheme = match?.[1];
    const hostSuffix = match?.[2];
    if (scheme !== undefined && hostSuffix !== undefined && hostSuffix.startsWith(".")) {
      wildcards.push({ scheme: scheme.toLowerCase(), hostSuffix: hostSuffix.toLowerCase() });
    } else {
      exact.add(entry);
    }
  }
  return { anyOrigin: entries.includes("*"), exact, wildcards };
}

export function isOriginAllowed(origin: string, allowed: AllowedOrigins): boolean {
  if (allowed.anyOrigin || allowed.exact.has(origin)) return true;
  if (allowed.wildcards.length === 0) return false;
  let url: URL;
  try {
    url = new URL(origin);
  } catch {
    return false;
  }
  const scheme = url.protocol.replace(/:$/, "").toLowerCase();
  const host = url.hostname.toLowerCase();
  return allowed.wildcards.some(
    (wildcard) =>
      wildcard.scheme === scheme && host.length > wildcard.hostSuffix.length && host.endsWith(wildcard.hostSuffix)
  );
}

export type ChatAppDeps = ChatRouterDeps &
  Readonly<{
    corsAllowedOrigins: string;
    logger?: Pick<Console, "error">;
  }>;

export function createChatApp(deps: ChatAppDeps): Express {
  const logger = deps.logger ?? console;
  const allowedOrigins = parseAllowedOrigins(deps.corsAllowedOrigins);

  const app = express();
  app.disable("x-powered-by");
  app.use((req, res, next) => {
    const originHeader = req.headers.origin;
    const origin = typeof originHeader === "string" ? originHeader.trim() : "";
    if (origin !== "" && isOriginAllowed(origin, allowedOrigins)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
      res.setHeader("Vary", "Origin");
      res.setHeader("Access-Control-Allow-Methods", "GET,POST,PUT,PATCH,DELETE,OPTIONS");
      res.setHeader("Access-Control-Allow-Headers", "Content-Type,Authorization");
    }
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });
  app.use(express.json({ limit: "32kb" }));

  app.use(createChatRouter(deps));

  // Final error boundary.
  app.use((e: unknown, req: Request, res: Response, _next: NextFunction) => {
    const message = e instanceof Error ? e.message : String(e);
    const status =
      typeof e === "object" && e !== null && "status" in e && typeof e.status === "number" && e.status < 500
        ? e.status
        : 500;
    if (status >= 500) {
      logger.error(`[GroupChat] ${req.method} ${req.path} failed: ${message}`);
      res.status(500).json({ code: "INTERNAL_ERROR", message: "Internal error." });
      return;
    }
    // Body-parser rejections (malformed JSON, oversized body) carry a 4xx status.
    res.status(status).json({ code: "INVALID_INPUT", message: "Malformed request body." });
  });

  return app;
}
