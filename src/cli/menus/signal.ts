/**
 * Signal generation and analysis menu.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import {
  periodAndAngularFrequency,
  sampleWaveform,
  type SamplingParameters,
  type Waveform,
} from "../../core/signal/index.ts";
import { DisplayPrecision } from "../../core/constants.ts";
import { TOOLBOX_LIMITS } from "../../config.ts";
import { formatSignificant } from "../../utils/number-format.ts";
import { periodSummary, samplesSummary } from "../../utils/summaries.ts";
import { computeOrReport, offerToSave, showMenu, type ToolboxContext } from "../context.ts";

const g = (value: number): string => formatSignificant(value, DisplayPrecision.VALUE);

const WAVEFORM_FORMULAS: Record<Waveform, string> = {
  sine: "x(t) = A sin(2πft)",
  square: "x(t) = A sgn(sin(2πft))",
  triangle: "x(t) = A tri(ft)",
};

export async function periodAndOmega(ctx: ToolboxContext): Promise<void> {
  const { reader, terminal } = ctx;

  const frequency = await reader.readPositiveDouble("Enter f (Hz): ");
  const props = computeOrReport(terminal, () => periodAndAngularFrequency(frequency));
  if (props === undefined) {
    return;
  }

  terminal.line();
  terminal.heading("--- Result ---");
  terminal.line(`Period T = ${g(props.period)} s`);
  terminal.line(`Angular freq ω = ${g(props.angularFrequency)} rad/s`);

  await offerToSave(ctx, periodSummary(frequency, props));
}

export async function generateSamples(ctx: ToolboxContext, waveform: Waveform): Promise<void> {
  const { reader, terminal } = ctx;
  const { MIN_SAMPLES, MAX_SAMPLES } = TOOLBOX_LIMITS;

  terminal.line();
  terminal.line(`Signal: ${WAVEFORM_FORMULAS[waveform]}`);

  const params: SamplingParameters = {
    frequency: await reader.readPositiveDouble("Frequency f (Hz): "),
    amplitude: await reader.readPositiveDouble("Amplitude A: "),
    sampleRate: await reader.readPositiveDouble("Sampling freq fs (Hz): "),
    count: await reader.readInt(
      `Number of samples (${MIN_SAMPLES}–${MAX_SAMPLES}): `,
      MIN_SAMPLES,
      MAX_SAMPLES
    ),
  };

  const samples = computeOrReport(terminal, () => sampleWaveform(waveform, params));
  if (samples === undefined) {
    return;
  }

  terminal.line();
  terminal.line("n\t t(s)\t\t x[n]");
  for (const sample of samples) {
    terminal.line(`${sample.index}\t ${g(sample.time)}\t ${g(sample.value)}`);
  }

  await offerToSave(ctx, samplesSummary(waveform, params));
}

async function chooseNonSineWaveform(ctx: ToolboxContext): Promise<Waveform> {
  showMenu(ctx.terminal, "Waveform:", ["1. Square", "2. Triangle"]);
  return (await ctx.reader.readInt("Select: ", 1, 2)) === 1 ? "square" : "triangle";
}

export async function signalMenu(ctx: ToolboxContext): Promise<void> {
  ctx.terminal.line();
  ctx.terminal.heading("==== Signal Generation / Analysis ====");

  for (;;) {
    ctx.terminal.line();
    ctx.terminal.line("1. Given f → T & ω");
    ctx.terminal.line("2. Generate sine samples");
    ctx.terminal.line("3. Generate square/triangle samples");
    ctx.terminal.line("0. Back");

    const choice = await ctx.reader.readInt("Select: ", 0, 3);
    switch (choice) {
      case 0:
        return;
      case 1:
        await periodAndOmega(ctx);
        break;
      case 2:
        await generateSamples(ctx, "sine");
        break;
      case 3:
        await generateSamples(ctx, await chooseNonSineWaveform(ctx));
        break;
    }
  }
}
