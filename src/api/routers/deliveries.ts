// pattern: Imperative Shell
import { z } from "zod";
import { desc, eq } from "drizzle-orm";
import { router, publicProcedure } from "../trpc";
import { processedPosts } from "../../db/schema";

export const deliveriesRouter = router({
  list: publicProcedure
    .input(
      z.object({
        limit: z.number().int().positive().max(200).default(50),
        offset: z.number().int().nonnegative().default(0),
      }),
    )
    .query(({ ctx, input }) => {
      return ctx.db
        .select()
        .from(processedPosts)
        .orderBy(desc(processedPosts.sentAt))
        .limit(input.limit)
        .offset(input.offset)
        .all();
    }),

  byId: publicProcedure
    .input(z.object({ id: z.string().min(1) }))
    .query(({ ctx, input }) => {
      return (
        ctx.db
          .select()
          .from(processedPosts)
          .where(eq(processedPosts.id, input.id))
          .get() ?? null
      );
    }),
});
