/**
 * One-line summaries written to the result log.
 *
 * Each calculator has a fixed, human-readable template; values use six
 * significant digits.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import type { EncodedResistor, DecodedResistor } from "../core/color-code/index.ts";
import type {
  ConnectionMode,
  ElectricalQuantities,
  RcCircuit,
  RcMode,
} from "../core/circuits/index.ts";
import type {
  PeriodicProperties,
  SamplingParameters,
  Waveform,
} from "../core/signal/index.ts";
import { DisplayPrecision } from "../core/constants.ts";
import { formatSignificant } from "./number-format.ts";

const g = (value: number): string => formatSignificant(value, DisplayPrecision.VALUE);

/** `[Color→Resistance] (3,9,m=2,t=0) = 3900 Ω, tol ±1%` */
export function colorToResistanceSummary(encoded: EncodedResistor): string {
  const { digit1, digit2, multiplier, tolerance } = encoded.selection;
  return `[Color→Resistance] (${digit1},${digit2},m=${multiplier},t=${tolerance}) = ${g(encoded.resistance)} Ω, tol ${encoded.tolerance}`;
}

/** `[Resistance→Color] R=4700 → (4,7,m=2)` */
export function resistanceToColorSummary(decoded: DecodedResistor): string {
  return `[Resistance→Color] R=${g(decoded.resistance)} → (${decoded.digit1.index},${decoded.digit2.index},m=${decoded.multiplier.index})`;
}

/** `Series/Parallel: n=3, mode=series → 60 Ω` */
export function networkSummary(count: number, mode: ConnectionMode, total: number): string {
  return `Series/Parallel: n=${count}, mode=${mode} → ${g(total)} Ω`;
}

/** `RC charge: R=1000, C=1e-06, V=5, t=0.001 → 3.1606 V` */
export function rcSummary(
  mode: RcMode,
  circuit: RcCircuit,
  voltage: number,
  time: number,
  result: number
): string {
  const voltageName = mode === "charge" ? "V" : "V0";
  return `RC ${mode}: R=${g(circuit.resistance)}, C=${g(circuit.capacitance)}, ${voltageName}=${g(voltage)}, t=${g(time)} → ${g(result)} V`;
}

/** `Ohm/Power: V=12, I=3, R=4, P=36` */
export function ohmsLawSummary(q: ElectricalQuantities): string {
  return `Ohm/Power: V=${g(q.voltage)}, I=${g(q.current)}, R=${g(q.resistance)}, P=${g(q.power)}`;
}

/** `Signal: f=50 Hz, T=0.02 s, ω=314.159 rad/s` */
export function periodSummary(frequency: number, props: PeriodicProperties): string {
  return `Signal: f=${g(frequency)} Hz, T=${g(props.period)} s, ω=${g(props.angularFrequency)} rad/s`;
}

const WAVEFORM_TITLES: Record<Waveform, string> = {
  sine: "Sine",
  square: "Square",
  triangle: "Triangle",
};

/** `Sine: f=1 Hz, A=2, fs=8 Hz, N=8` */
export function samplesSummary(waveform: Waveform, params: SamplingParameters): string {
  return `${WAVEFORM_TITLES[waveform]}: f=${g(params.frequency)} Hz, A=${g(params.amplitude)}, fs=${g(params.sampleRate)} Hz, N=${params.count}`;
}
