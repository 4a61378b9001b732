import { initTRPC } from "@trpc/server";
import type { AppContext } from "./context";

const t = initTRPC.context<AppContext>().create();

export const router = t.router;

/**
 * Every procedure is a read; the API never touches the dedup store's rows.
 */
export const publicProcedure = t.procedure;

/**
 * Calls procedures directly without HTTP transport, as the tests do.
 */
export const createCallerFactory = t.createCallerFactory;
