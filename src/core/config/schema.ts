import { z } from "zod";

export const ConfSettingsSchema = z.object({
  path: z.string().min(1).optional(),
}).strict();

export const SetSettingsSchema = z.object({
  allowUnknown: z.boolean().default(false),
}).strict();

export const RmqconfConfigSchema = z.object({
  version: z.literal(1).default(1),
  conf: ConfSettingsSchema.default({}),
  set: SetSettingsSchema.default({ allowUnknown: false }),
}).strict();

export type RmqconfConfig = z.infer<typeof RmqconfConfigSchema>;
