import type { Request, Response, NextFunction } from "express";
import type { ZodTypeAny } from "zod";
import { sendError } from "../utils/response";

type Schemas = {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
};

/**
 * Validate and replace the request parts named in `schemas`; the parsed
 * values carry zod's coercions and defaults.
 */
export const validateRequest =
  (schemas: Schemas) => (req: Request, res: Response, next: NextFunction) => {
    for (const part of ["params", "query", "body"] as const) {
      const schema = schemas[part];
      if (!schema) continue;

      const parsed = schema.safeParse(req[part]);
      if (!parsed.success) {
        const message = parsed.error.errors
          .map((e) => (e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message))
          .join(", ");
        return sendError(res, message, 400);
      }
      req[part] = parsed.data;
    }

    return next();
  };
