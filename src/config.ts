import { z } from 'zod'
import 'dotenv/config'

// "true"/"1" (any case) switch a flag on, anything else switches it off
const flag = (defaultValue: boolean) =>
  z.string().optional().transform((v) => (v === undefined || v === '' ? defaultValue : /^(true|1)$/i.test(v)))

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  port: z.coerce.number().int().positive().default(8080),
  logRequests: flag(true),

  storage: z.object({
    driver: z.enum(['s3', 'fs', 'memory']).default('s3'),
    endpoint: z.string().url().optional(),
    bucket: z.string().min(1).default('proxy-cache'),
    accessKeyId: z.string().optional(),
    secretAccessKey: z.string().optional(),
    region: z.string().default('us-east-1'),
    forcePathStyle: flag(true),
    fsRoot: z.string().default('.cache'),
  }),

  cache: z.object({
    ttlDefaultSec: z.coerce.number().int().nonnegative().default(3600),
    ttl404Sec: z.coerce.number().int().nonnegative().default(60),
    serveIfPresent: flag(false),
    serveOnPersistFailure: flag(false),
  }),

  upstream: z.object({
    timeoutMs: z.coerce.number().int().positive().default(60_000),
    userAgent: z.string().default('stashproxy/1.0'),
  }),

  requestTimeoutMs: z.coerce.number().int().positive().default(90_000),
})

export type Config = z.infer<typeof configSchema>

/** Reads and validates process configuration. Throws a ZodError on bad input. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    nodeEnv: env['NODE_ENV'] || undefined,
    port: env['PORT'] || undefined,
    logRequests: env['LOG_REQUESTS'],
    storage: {
      driver: env['STORAGE_DRIVER'] || undefined,
      endpoint: env['STORAGE_ENDPOINT'] || undefined,
      bucket: env['STORAGE_BUCKET'] || undefined,
      accessKeyId: env['STORAGE_ACCESS_KEY_ID'] || undefined,
      secretAccessKey: env['STORAGE_SECRET_ACCESS_KEY'] || undefined,
      region: env['STORAGE_REGION'] || undefined,
      forcePathStyle: env['STORAGE_FORCE_PATH_STYLE'],
      fsRoot: env['STORAGE_FS_ROOT'] || undefined,
    },
    cache: {
      ttlDefaultSec: env['TTL_DEFAULT'] || undefined,
      ttl404Sec: env['TTL_404'] || undefined,
      serveIfPresent: env['SERVE_IF_PRESENT'],
      serveOnPersistFailure: env['SERVE_ON_PERSIST_FAILURE'],
    },
    upstream: {
      timeoutMs: env['UPSTREAM_TIMEOUT_MS'] || undefined,
      userAgent: env['UPSTREAM_USER_AGENT'] || undefined,
    },
    requestTimeoutMs: env['REQUEST_TIMEOUT_MS'] || undefined,
  })
}
