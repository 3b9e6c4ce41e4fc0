import type { Request, Response, NextFunction } from "express";

export type AuthContext = {
  /** Caller's Entra ID token; a sync with it runs on-behalf-of the user. */
  bearerToken?: string;
};

declare global {
  namespace Express {
    interface Request {
      auth?: AuthContext;
    }
  }
}

export function bearerTokenMiddleware(req: Request, _res: Response, next: NextFunction) {
  const header = req.header("authorization") ?? "";
  const token = header.match(/^Bearer\s+(\S+)\s*$/i)?.[1];
  req.auth = token ? { bearerToken: token } : {};
  next();
}
