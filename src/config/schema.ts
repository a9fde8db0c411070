import { z } from "zod";

export const ConfigSchema = z.object({
  annotationsFile: z.string().default("~/.annotations"),
  ageColumnWidth: z.number().int().min(0).max(40).default(14),
  logFile: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
