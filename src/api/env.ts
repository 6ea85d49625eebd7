import type { Logger } from "../logging/logger.js";

/** Variables the middleware stack places on every request context. */
export interface AppEnv {
  Variables: {
    requestId: string;
    logger: Logger;
  };
}
