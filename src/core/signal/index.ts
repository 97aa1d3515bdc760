/**
 * Signal module: period/angular frequency and sampled waveforms.
 */

export {
  periodAndAngularFrequency,
  sampleWaveform,
  sineSamples,
  squareSamples,
  triangleSamples,
  MAX_SAMPLE_COUNT,
  type Waveform,
  type SamplingParameters,
  type Sample,
  type PeriodicProperties,
} from "./signal-generator.ts";
