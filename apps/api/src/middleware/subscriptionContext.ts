import type { Request, Response, NextFunction } from "express";

export type SubscriptionContext = {
  all: readonly string[];
  /** Allow-listed tenant from `?subscriptionId=`, or the default tenant. */
  selected: string;
  /** Set when the query named a subscription outside the allow-list. */
  rejected: string | null;
};

declare global {
  namespace Express {
    interface Request {
      subscriptionContext?: SubscriptionContext;
    }
  }
}

export function subscriptionContextMiddleware(allowList: readonly string[], defaultTenant: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const qSub = typeof req.query.subscriptionId === "string" ? req.query.subscriptionId.trim() : null;
    const selected = qSub && allowList.includes(qSub) ? qSub : null;
    req.subscriptionContext = {
      all: allowList,
      selected: selected ?? defaultTenant,
      rejected: qSub && !selected ? qSub : null,
    };
    next();
  };
}
