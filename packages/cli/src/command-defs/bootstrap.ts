import { z } from 'zod';

export const bootstrapSchema = z
  .object({
    comfyuiDir: z.string().min(1).optional(),
    only: z.array(z.string().min(1)).min(1).optional(),
    list: z.boolean().default(false),
    inventory: z.boolean().default(false),
    allowPartial: z.boolean().default(false),
  })
  .refine((args) => !(args.list && args.inventory), {
    message: '--list and --inventory cannot be combined',
    path: ['inventory'],
  });

export type BootstrapArgs = z.infer<typeof bootstrapSchema>;
