/**
 * Periodic signal analysis and sampling.
 *
 * Sample sequences are iterables that recompute every sample each time they
 * are iterated, so the same sequence can be walked any number of times.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { MathConstants } from "../constants.ts";
import { ComputationError } from "../errors.ts";

// ============================================================================
// Types
// ============================================================================

export type Waveform = "sine" | "square" | "triangle";

export interface SamplingParameters {
  /** Signal frequency f in Hz */
  frequency: number;
  /** Peak amplitude A */
  amplitude: number;
  /** Sampling frequency fs in Hz */
  sampleRate: number;
  /** Number of samples N */
  count: number;
}

export interface Sample {
  /** Sample number n */
  index: number;
  /** Sample time t = n / fs in seconds */
  time: number;
  /** Signal value x[n] */
  value: number;
}

export interface PeriodicProperties {
  /** Period T = 1/f in seconds */
  period: number;
  /** Angular frequency ω = 2πf in rad/s */
  angularFrequency: number;
}

/** Largest sample count a single request may ask for. */
export const MAX_SAMPLE_COUNT = 100;

// ============================================================================
// Analysis
// ============================================================================

/**
 * @throws ComputationError if T or ω is not finite
 */
export function periodAndAngularFrequency(frequency: number): PeriodicProperties {
  const period = 1.0 / frequency;
  const angularFrequency = MathConstants.TWO_PI * frequency;
  if (!Number.isFinite(period) || !Number.isFinite(angularFrequency)) {
    throw new ComputationError(`No finite period for f = ${frequency}`);
  }
  return { period, angularFrequency };
}

// ============================================================================
// Waveform shapes (unit amplitude, phase in cycles)
// ============================================================================

/**
 * Fractional part of the number of cycles elapsed, in [0, 1).
 */
function cyclePhase(frequency: number, time: number): number {
  const cycles = frequency * time;
  return cycles - Math.floor(cycles);
}

function squareShape(phase: number): number {
  return phase < 0.5 ? 1 : -1;
}

/**
 * Triangle rising from 0 at phase 0, peaking at 0.25 and bottoming at 0.75,
 * in step with the sine.
 */
function triangleShape(phase: number): number {
  if (phase < 0.25) {
    return 4 * phase;
  }
  if (phase < 0.75) {
    return 2 - 4 * phase;
  }
  return 4 * phase - 4;
}

function waveformValue(waveform: Waveform, frequency: number, time: number): number {
  switch (waveform) {
    case "sine":
      return Math.sin(MathConstants.TWO_PI * frequency * time);
    case "square":
      return squareShape(cyclePhase(frequency, time));
    case "triangle":
      return triangleShape(cyclePhase(frequency, time));
  }
}

// ============================================================================
// Sampling
// ============================================================================

/**
 * Sampled waveform x[n] = A·shape(f·n/fs) for n = 0..N−1.
 *
 * @throws RangeError if the count is not an integer in [1, MAX_SAMPLE_COUNT]
 * @throws ComputationError if the last sample's time or phase is not finite
 */
export function sampleWaveform(waveform: Waveform, params: SamplingParameters): Iterable<Sample> {
  const { frequency, amplitude, sampleRate, count } = params;
  if (!Number.isInteger(count) || count < 1 || count > MAX_SAMPLE_COUNT) {
    throw new RangeError(`Sample count must be an integer between 1 and ${MAX_SAMPLE_COUNT}, got ${count}`);
  }

  const lastTime = (count - 1) / sampleRate;
  if (!Number.isFinite(MathConstants.TWO_PI * frequency * lastTime)) {
    throw new ComputationError(`Sample phase overflows at t = ${lastTime} s`);
  }

  return {
    *[Symbol.iterator](): Iterator<Sample> {
      for (let n = 0; n < count; n++) {
        const time = n / sampleRate;
        yield {
          index: n,
          time,
          value: amplitude * waveformValue(waveform, frequency, time),
        };
      }
    },
  };
}

/**
 * x[n] = A·sin(2π·f·n/fs)
 *
 * @example
 * const samples = [...sineSamples({ frequency: 1, amplitude: 2, sampleRate: 4, count: 2 })];
 * // [{ index: 0, time: 0, value: 0 }, { index: 1, time: 0.25, value: 2 }]
 */
export function sineSamples(params: SamplingParameters): Iterable<Sample> {
  return sampleWaveform("sine", params);
}

export function squareSamples(params: SamplingParameters): Iterable<Sample> {
  return sampleWaveform("square", params);
}

export function triangleSamples(params: SamplingParameters): Iterable<Sample> {
  return sampleWaveform("triangle", params);
}
