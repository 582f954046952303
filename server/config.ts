import { z } from "zod";

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).optional(),
  CHROMIUM_PATH: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(5000),
});

export type Env = z.infer<typeof EnvSchema>;

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function loadLocalEnvFiles(): void {
  if (typeof process.loadEnvFile !== "function") {
    return;
  }

  for (const envPath of [".env.local", ".env"]) {
    try {
      process.loadEnvFile(envPath);
    } catch (error) {
      if (errorCode(error) !== "ENOENT") {
        console.warn(`[config] Failed to load ${envPath}:`, error);
      }
    }
  }
}

/** Blank values count as unset, the way a copied .env template leaves them. */
export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => typeof value === "string" && value.trim() !== "")
  );
  return EnvSchema.parse(present);
}
