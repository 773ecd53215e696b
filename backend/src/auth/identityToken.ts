import jwt from "jsonwebtoken";

import { err, isNonEmptyString, ok, userCaller, type Caller, type Result } from "../services/chatTypes";

export type IdentityVerifierDeps = Readonly<{
  jwtSecret: string;
}>;

export type IdentityVerifier = Readonly<{
  /** Turns an identity-service token into a `user` caller. Never yields a service caller. */
  verify(token: string): Result<Caller>;
}>;

export function createIdentityVerifier(deps: IdentityVerifierDeps): IdentityVerifier {
  const jwtSecret = deps.jwtSecret;
  if (typeof jwtSecret !== "string" || jwtSecret.trim() === "") {
    throw new Error("IdentityVerifier requires a non-empty jwtSecret.");
  }

  return {
    verify(token: string): Result<Caller> {
      if (!isNonEmptyString(token)) return err("INVALID_SESSION", "Missing identity token.");
      let decoded: string | jwt.JwtPayload;
      try {
        decoded = jwt.verify(token.trim(), jwtSecret, { algorithms: ["HS256"] });
      } catch (e: unknown) {
        const reason = e instanceof Error ? e.message : String(e);
        return err("INVALID_SESSION", "Invalid identity token.", { reason });
      }
      if (typeof decoded === "string" || !isNonEmptyString(decoded.sub)) {
        return err("INVALID_SESSION", "Invalid identity token.");
      }
      const claimed: unknown = decoded.username;
      const username = isNonEmptyString(claimed) ? claimed.trim() : decoded.sub.trim();
      return ok(userCaller(decoded.sub.trim(), username));
    }
  };
}

/** Issues a token in the identity service's shape; used by local tooling and tests. */
export function signIdentityToken(
  jwtSecret: string,
  user: Readonly<{ userId: string; username: string }>,
  expiresInSeconds = 60 * 60
): string {
  return jwt.sign({ username: user.username }, jwtSecret, {
    algorithm: "HS256",
    subject: user.userId,
    expiresIn: expiresInSeconds
  });
}
