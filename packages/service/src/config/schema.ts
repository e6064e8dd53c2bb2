import { z } from 'zod';

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export const configSchema = z
  .object({
    redis: z.object({
      url: z.string().url(),
    }),
    store: z.object({
      driver: z.enum(['redis', 'mongo', 'memory']).default('redis'),
      keyPrefix: z.string().default(''),
      timeoutMs: z.number().int().positive().default(5000),
    }).default({}),
    mongodb: z.object({
      uri: z.string().optional(),
      collectionName: z.string().default('alert_buckets'),
    }).default({}),
    stream: z.object({
      key: z.string().default('alerts:created'),
      consumerGroup: z.string().default('alert-aggregation-group'),
      consumerId: z.string().default(`consumer-${process.pid}`),
      batchSize: z.number().int().positive().default(100),
      blockMs: z.number().int().positive().default(1000),
      pendingRetryMs: z.number().int().positive().default(5000),
    }).default({}),
    geocoder: z.object({
      apiKey: z.string().min(1),
      timeoutMs: z.number().int().positive().default(5000),
      language: z.string().optional(),
    }),
    retention: z.object({
      windowMs: z.number().int().positive().default(86_400_000),
      sweepIntervalMs: z.number().int().positive().default(3_600_000),
    }).default({}),
    display: z.object({
      timeZone: z.string().refine(isTimeZone, 'must be an IANA time zone').default('Europe/Athens'),
    }).default({}),
    logging: z.object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    }).default({}),
    http: z.object({
      enabled: z.boolean().default(true),
      port: z.number().int().nonnegative().default(9090),
    }).default({}),
  })
  .superRefine((config, ctx) => {
    if (config.store.driver === 'mongo' && !config.mongodb.uri) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['mongodb', 'uri'],
        message: 'Required when store.driver is "mongo"',
      });
    }
    // Every member must be looked at at least once per window
    if (config.retention.sweepIntervalMs > config.retention.windowMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retention', 'sweepIntervalMs'],
        message: 'Must not exceed retention.windowMs',
      });
    }
  });

export type ValidatedConfig = z.infer<typeof configSchema>;
