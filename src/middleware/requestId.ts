import { randomUUID } from "crypto";

import type { RequestHandler } from "express";

export const REQUEST_ID_HEADER = "X-Request-ID";

const VALID_REQUEST_ID = /^[A-Za-z0-9._-]{1,128}$/;

/** Reuses a well-formed incoming X-Request-ID, otherwise generates one, and echoes it back. */
export function requestId(): RequestHandler {
  return (req, res, next) => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const id =
      incoming && VALID_REQUEST_ID.test(incoming) ? incoming : randomUUID();

    res.locals.requestId = id;
    res.setHeader(REQUEST_ID_HEADER, id);
    next();
  };
}
