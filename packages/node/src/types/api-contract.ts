/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { WalletService } from "../services/wallet-service.js";
import type { CallerContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The wallet this node serves */
    service: WalletService;

    /** Resolved caller, if the request carried one */
    caller: CallerContext | undefined;
  };
}
