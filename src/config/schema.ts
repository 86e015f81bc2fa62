import { z } from 'zod';
import { ID_STRATEGIES } from '../storage/ids.js';

const historySchema = z.object({
  enabled: z.boolean().default(true),
  limit: z.number().int().positive().default(100),
});

export const binderConfigSchema = z.object({
  port: z.coerce.number().int().positive().default(3000),
  id_strategy: z.enum(ID_STRATEGIES).default('sequential'),
  db_path: z.string().min(1).default('storage-binder.db'),
  history: historySchema.default({}),
});

export type BinderConfig = z.input<typeof binderConfigSchema>;
export type BinderConfigParsed = z.output<typeof binderConfigSchema>;
