/**
 * @fileoverview Sensor Acquisition Loop
 *
 * Every `intervalMs` the loop reads one heart-rate sample, runs the stress
 * model on it and appends the observation to the local store. It never
 * talks to the network and keeps running whether or not anyone is logged
 * in: local capture is unconditional.
 *
 * Failures degrade instead of stopping the loop:
 *   - sensor read fails or exceeds `timeoutMs` -> {@link FALLBACK_HEART_RATE}
 *   - model throws or returns a non-finite value -> {@link FALLBACK_STRESS_LEVEL}
 *   - the store write fails -> reported through `onError`, next tick proceeds
 */

import { debugError, debugLog, debugWarn } from '../debug';
import type { RecordStore } from '../recordStore';
import type { VitalRecord } from '../types';
import { withTimeout } from '../utils';

/** Heart rate recorded when the sensor is unavailable. */
export const FALLBACK_HEART_RATE = 75;

/** Stress level recorded when inference fails. */
export const FALLBACK_STRESS_LEVEL = 0.0;

/** Wireless heart-rate sensor. */
export interface HeartRateSensor {
  read(): number | Promise<number>;
}

/** On-device stress inference. */
export interface StressModel {
  predict(heartRate: number): number | Promise<number>;
  /** Tag stored with every record; falls back to the loop's `modelVersion`. */
  readonly version?: string;
}

export interface SensorLoopOptions {
  store: RecordStore;
  sensor: HeartRateSensor;
  model: StressModel;
  intervalMs: number;
  timeoutMs: number;
  modelVersion: string;
  onReading?: (record: VitalRecord) => void;
  onError?: (error: unknown) => void;
}

export interface SensorLoop {
  start(): void;
  stop(): void;
  isRunning(): boolean;
  /**
   * Acquire and store one observation now. Resolves with the stored record,
   * or `null` when the write failed (already reported through `onError`).
   */
  tick(): Promise<VitalRecord | null>;
}

export function createSensorLoop(options: SensorLoopOptions): SensorLoop {
  const { store, sensor, model } = options;

  let timer: ReturnType<typeof setInterval> | null = null;
  let ticking = false;

  async function readHeartRate(): Promise<number> {
    try {
      const value = await withTimeout(
        Promise.resolve().then(() => sensor.read()),
        options.timeoutMs,
        'Sensor read'
      );
      if (Number.isFinite(value)) return value;
      debugWarn('[SENSOR] Non-numeric reading, using fallback:', value);
    } catch (e) {
      debugWarn('[SENSOR] Read failed, using fallback:', e instanceof Error ? e.message : e);
    }
    return FALLBACK_HEART_RATE;
  }

  async function inferStress(heartRate: number): Promise<number> {
    try {
      const value = await model.predict(heartRate);
      if (Number.isFinite(value)) return value;
      debugWarn('[SENSOR] Inference returned a non-finite value, using fallback:', value);
    } catch (e) {
      debugWarn('[SENSOR] Inference failed, using fallback:', e instanceof Error ? e.message : e);
    }
    return FALLBACK_STRESS_LEVEL;
  }

  async function acquire(): Promise<VitalRecord | null> {
    const heartRate = await readHeartRate();
    const stressLevel = await inferStress(heartRate);

    let record: VitalRecord | null;
    try {
      const id = await store.append({
        heartRate,
        stressLevel,
        modelVersion: model.version ?? options.modelVersion
      });
      record = await store.get(id);
    } catch (e) {
      debugError('[SENSOR] Failed to store reading:', e);
      options.onError?.(e);
      return null;
    }

    if (record) {
      debugLog(`[SENSOR] HR ${record.heartRate} stress ${record.stressLevel.toFixed(2)}`);
      options.onReading?.(record);
    }
    return record;
  }

  const loop: SensorLoop = {
    start() {
      if (timer) return;
      timer = setInterval(() => {
        // Skip a tick that comes due while the previous one is still running
        if (ticking) {
          debugLog('[SENSOR] Previous tick still running, skipping');
          return;
        }
        loop.tick().catch((e) => debugError('[SENSOR] Tick failed:', e));
      }, options.intervalMs);
      debugLog(`[SENSOR] Started (every ${options.intervalMs}ms)`);
    },

    stop() {
      if (!timer) return;
      clearInterval(timer);
      timer = null;
      debugLog('[SENSOR] Stopped');
    },

    isRunning() {
      return timer !== null;
    },

    async tick() {
      ticking = true;
      try {
        return await acquire();
      } finally {
        ticking = false;
      }
    }
  };

  return loop;
}
