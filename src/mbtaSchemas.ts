import { z } from "zod";

// Only the JSON:API fields we read; everything else is stripped.

export const MbtaRouteSchema = z.object({
    id: z.string(),
    type: z.literal("route"),
    attributes: z.object({
        long_name: z.string(),
        short_name: z.string(),
        type: z.number().int(),     // 0 light rail, 1 heavy rail, 2 commuter rail, 3 bus, 4 ferry
        sort_order: z.number().optional(),
    }),
});

export const MbtaStopSchema = z.object({
    id: z.string(),
    type: z.literal("stop"),
    attributes: z.object({
        name: z.string(),
    }),
});

export const RoutesResponseSchema = z.object({ data: z.array(MbtaRouteSchema) });
export const StopsResponseSchema = z.object({ data: z.array(MbtaStopSchema) });

export type MbtaRoute = z.infer<typeof MbtaRouteSchema>;
export type MbtaStop = z.infer<typeof MbtaStopSchema>;
