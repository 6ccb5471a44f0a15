/**
 * Wire schemas for the remote sync endpoint.
 *
 * Every payload that leaves the process and every response that enters it
 * goes through one of these zod schemas, so the rest of the engine only
 * ever handles typed values.
 */

import { z } from 'zod';
import type { VitalRecord } from '../types';

/**
 * Records carry no accelerometer data, but the server requires the three
 * axes. They are sent as zero.
 */
export const NO_ACCELEROMETER_READING = 0;

// =============================================================================
// Outgoing
// =============================================================================

export const vectorSchema = z
  .object({
    device_id: z.string().min(1),
    timestamp: z.string().datetime({ offset: true }),
    heart_rate: z.number().int().nullable().optional(),
    hrv: z.number().nullable().optional(),
    accel_x: z.number(),
    accel_y: z.number(),
    accel_z: z.number(),
    temperature: z.number().nullable().optional(),
    stress_level: z.number().finite().nullable().optional(),
    model_weights: z.record(z.unknown()).nullable().optional()
  })
  .strict();

export type VectorPayload = z.infer<typeof vectorSchema>;

/**
 * Serialize a local record into the server's vector shape.
 *
 * The local id never leaves the device: the server identifies a vector by
 * `(device_id, timestamp)`, which is also its deduplication key. The model
 * tag travels inside `model_weights`.
 *
 * @throws {z.ZodError} If the record cannot form a valid vector.
 */
export function toVectorPayload(record: VitalRecord, deviceId: string): VectorPayload {
  return vectorSchema.parse({
    device_id: deviceId,
    timestamp: record.capturedAt,
    heart_rate: record.heartRate,
    accel_x: NO_ACCELEROMETER_READING,
    accel_y: NO_ACCELEROMETER_READING,
    accel_z: NO_ACCELEROMETER_READING,
    stress_level: record.stressLevel,
    model_weights: { model_version: record.modelVersion }
  });
}

/** Deduplication key of a vector, as the server sees it. */
export function vectorKey(deviceId: string, timestamp: string): string {
  return `${deviceId}|${new Date(timestamp).toISOString()}`;
}

// =============================================================================
// Incoming
// =============================================================================

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().min(1)
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

export const userProfileSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  email: z.string(),
  user_type: z.string(),
  subscription_end: z.string().nullable().optional()
});

export type UserProfile = z.infer<typeof userProfileSchema>;

export const rejectedVectorSchema = z.object({
  device_id: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  reason: z.string().optional()
});

export const uploadResponseSchema = z.object({
  status: z.string(),
  count: z.number().int().nonnegative(),
  rejected: z.array(rejectedVectorSchema).optional()
});

export type UploadResponse = z.infer<typeof uploadResponseSchema>;

/** Vectors coming back from the download path; the server may omit or add fields. */
export const remoteVectorSchema = z
  .object({
    device_id: z.string(),
    timestamp: z.string(),
    heart_rate: z.number().nullable().optional(),
    hrv: z.number().nullable().optional(),
    accel_x: z.number().nullable().optional(),
    accel_y: z.number().nullable().optional(),
    accel_z: z.number().nullable().optional(),
    temperature: z.number().nullable().optional(),
    stress_level: z.number().nullable().optional(),
    model_weights: z.record(z.unknown()).nullable().optional()
  })
  .passthrough();

export type RemoteVector = z.infer<typeof remoteVectorSchema>;

export const downloadResponseSchema = z.array(remoteVectorSchema);
