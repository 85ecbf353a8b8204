/**
 * Zod schema for settings read from the environment and CLI flags.
 */

import { z } from "zod";

export const settingsSchema = z.object({
  configDir: z.string().min(1, "configuration directory must not be empty"),
  command: z
    .string()
    .min(1, "assistant command must not be empty")
    .refine(value => !/\s/.test(value), "assistant command must be a single executable, without arguments"),
  configFlag: z
    .string()
    .regex(/^--?[A-Za-z0-9][\w-]*$/, "config flag must look like --config"),
});

export type ValidatedSettings = z.infer<typeof settingsSchema>;

export function validateSettings(data: unknown): ValidatedSettings {
  return settingsSchema.parse(data);
}
