import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z.string().default("info"),
  DATABASE_URL: z.string().optional(),
  CORS_ORIGIN: z.string().default("http://localhost:3000"),
  HISTORY_LIMIT: z.coerce.number().int().positive().default(10),
  BATCH_MAX_ITEMS: z.coerce.number().int().positive().default(500)
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
