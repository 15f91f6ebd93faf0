/**
 * Environment Variable Validation
 *
 * Validates and types the server's environment variables with Zod.
 */

import { z } from "zod";

const envSchema = z.object({
  PORT: z.string().regex(/^\d+$/).transform(Number).default("3000"),
  BIND_ADDRESS: z.string().default("127.0.0.1"),
  // Comma separated, "*" allows any origin
  ALLOWED_ORIGINS: z.string().default("*"),
  PUBLIC_DIR: z.string().default("./public"),
  DOCX_FOOTER: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  bindAddress: string;
  allowedOrigins: string[];
  publicDir: string;
  docxFooter?: string;
}

/**
 * Parse process.env, throwing with every invalid variable listed
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment variables:\n${problems}`);
  }
  return result.data;
}

export function buildConfig(env: Env): AppConfig {
  return {
    port: env.PORT,
    bindAddress: env.BIND_ADDRESS,
    allowedOrigins: env.ALLOWED_ORIGINS.split(",")
      .map((o) => o.trim())
      .filter((o) => o.length > 0),
    publicDir: env.PUBLIC_DIR,
    docxFooter: env.DOCX_FOOTER,
  };
}
