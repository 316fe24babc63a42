import "dotenv/config";
import { z } from "zod";
import { parseOwnerIds } from "./security/ownerGuard.js";

const Env = z.object({
  BOT_TOKEN: z.string().min(10, "BOT_TOKEN is required"),
  OWNER_IDS: z
    .string({ required_error: "OWNER_IDS is required" })
    .transform(parseOwnerIds)
    .refine((ids) => ids.length > 0, "OWNER_IDS must list at least one id"),
  SPECIFIC_DB_FILE: z.string().min(1).default("./data/specific.sqlite"),
  GENERAL_DB_FILE: z.string().min(1).default("./data/general.sqlite"),
  NODE_ENV: z.string().optional(),
});

export type AppConfig = z.infer<typeof Env>;

export function parseConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return Env.parse(env);
}
