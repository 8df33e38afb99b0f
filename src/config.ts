import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const ConfigSchema = z.object({
  limits: z.object({
    maxParallel: z.number().int().min(1),
    maxRuns: z.number().int().min(1),
    defaultTaskEstimateSeconds: z.number().positive(),
  }),
  retry: z.object({
    baseDelayMs: z.number().min(0),
    maxDelayMs: z.number().min(0),
  }),
  server: z.object({
    port: z.number().int().min(0).max(65_535),
    host: z.string().min(1),
  }),
  persistence: z.object({
    dbPath: z.string().min(1),
  }),
});

export type EngineConfig = z.infer<typeof ConfigSchema>;

export type ConfigOverrides = {
  [P in keyof EngineConfig]?: Partial<EngineConfig[P]>;
};

const DEFAULTS: EngineConfig = {
  limits: {
    maxParallel: 5,
    maxRuns: 50,
    defaultTaskEstimateSeconds: 30,
  },
  retry: {
    baseDelayMs: 1_000,
    maxDelayMs: 30_000,
  },
  server: {
    port: 3000,
    host: "127.0.0.1",
  },
  persistence: {
    dbPath: join(homedir(), ".toolgraph", "runs.db"),
  },
};

let current: EngineConfig = structuredClone(DEFAULTS);

/** Override config values. Each section is merged over the defaults. */
export function configure(overrides: ConfigOverrides): void {
  const merged = {
    limits: { ...DEFAULTS.limits, ...overrides.limits },
    retry: { ...DEFAULTS.retry, ...overrides.retry },
    server: { ...DEFAULTS.server, ...overrides.server },
    persistence: { ...DEFAULTS.persistence, ...overrides.persistence },
  };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${msg}`);
  }
  current = parsed.data;
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<EngineConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<EngineConfig> = Object.freeze(structuredClone(DEFAULTS));
