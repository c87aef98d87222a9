// Request fields added by nlsql's own middleware.
declare global {
  namespace Express {
    interface Request {
      /** Epoch ms stamped by requestTimer; `meta.totalTimeMs` of query responses is measured from it. */
      requestStartTime?: number;
    }
  }
}

export {};
