// pattern: Imperative Shell
import { router } from "./trpc";
import { deliveriesRouter } from "./routers/deliveries";
import { systemRouter } from "./routers/system";

/**
 * Root tRPC router: delivered posts and service status.
 */
export const appRouter = router({
  deliveries: deliveriesRouter,
  system: systemRouter,
});

export type AppRouter = typeof appRouter;
