import { z } from 'zod';

export const gatewayRequestBody = z.object({
    source_id: z.string().min(1),
    target_resource: z.object({
        name: z.string().min(1),
    }),
    action_request: z.object({
        intent: z.string().min(1).max(2000),
        context: z.string().max(4000).optional(),
        priority: z.enum(['LOW', 'NORMAL', 'HIGH', 'URGENT']).default('NORMAL'),
    }),
});
