import { z } from 'zod';
import { registerUserSchema } from './input.validator';

/**
 * Demo seed file schema
 * Each user lists how many accounts to open for them, in file order
 */
export const demoSeedSchema = z.object({
  users: z.array(
    registerUserSchema.extend({
      accounts: z.number().int().min(0).default(0),
    })
  ),
});

export type DemoSeed = z.infer<typeof demoSeedSchema>;
