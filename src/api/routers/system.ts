// pattern: Imperative Shell
import { sql, desc } from "drizzle-orm";
import { router, publicProcedure } from "../trpc";
import { processedPosts } from "../../db/schema";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    const deliveredCount =
      ctx.db
        .select({ count: sql<number>`count(*)` })
        .from(processedPosts)
        .get()?.count ?? 0;

    const lastSent = ctx.db
      .select({ sentAt: processedPosts.sentAt })
      .from(processedPosts)
      .orderBy(desc(processedPosts.sentAt))
      .get();

    return {
      source: `@${ctx.config.source.username}@${ctx.config.source.instance}`,
      proxy: ctx.config.source.proxy.kind,
      intervalSeconds: ctx.config.poll.intervalSeconds,
      deliveredCount,
      lastSentAt: lastSent?.sentAt ?? null,
    };
  }),
});
