import { z } from 'zod';

// distance_cm falls back to -1 so a reading without a distance is rejected as a sensor fault
export const SensorPayloadSchema = z.object({
  device_id: z.string().min(1).default('unknown'),
  shelf_id: z.string().min(1),
  distance_cm: z.number().default(-1),
});

export const StatusPayloadSchema = z.object({
  device_id: z.string().min(1).default('unknown'),
  wifi: z.string().optional(),
  mqtt: z.string().optional(),
  uptime_ms: z.number().nonnegative().optional(),
  shelf_count: z.number().int().nonnegative().optional(),
});

export const DiscoveryReplySchema = z.object({
  device_id: z.string().min(1),
  device_name: z.string().optional(),
  shelves: z.array(z.string()).default([]),
  wifi_signal: z.union([z.number(), z.string()]).optional(),
  uptime_ms: z.number().nonnegative().default(0),
});

export const HeartbeatReplySchema = z.object({
  device_id: z.string().min(1),
  status: z.string().default('online'),
  timestamp: z.number().default(0),
});

export const ShelfConfigEntrySchema = z.object({
  shelf_id: z.string().min(1),
  index: z.number().int().optional(),
  gpio: z.number().int().optional(),
  enabled: z.boolean().default(false),
  sensor_connected: z.boolean().default(false),
  shelf_length: z.number().optional(),
});

export const ShelfConfigReplySchema = z.object({
  device_id: z.string().min(1),
  shelves: z.array(ShelfConfigEntrySchema).default([]),
  total_count: z.number().int().optional(),
  enabled_count: z.number().int().optional(),
});

export const CalibrationReplySchema = z.object({
  device_id: z.string().min(1).default('unknown'),
  shelf_id: z.string().min(1),
  success: z.boolean().default(false),
  shelf_length: z.number().default(0),
});

export type ParsedShelfConfigReply = z.infer<typeof ShelfConfigReplySchema>;

export type ParseResult<T> = { ok: true; data: T } | { ok: false; error: string };

export function parseMessage<S extends z.ZodTypeAny>(schema: S, message: Buffer | string): ParseResult<z.infer<S>> {
  const text = message.toString();

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return { ok: false, error: `JSON parse failed: ${error instanceof Error ? error.message : String(error)}` };
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    return { ok: false, error: result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ') };
  }
  return { ok: true, data: result.data };
}
