/**
 * Resistor color-code module.
 *
 * Lookup tables for the 4-band code and the codec converting between band
 * selections and resistance values.
 */

export {
  DIGIT_BANDS,
  MULTIPLIER_BANDS,
  TOLERANCE_BANDS,
  MAX_DECODE_MULTIPLIER,
  getDigitBand,
  getMultiplierBand,
  getToleranceBand,
  describeDigitBand,
  describeMultiplierBand,
  describeToleranceBand,
  type DigitBand,
  type MultiplierBand,
  type ToleranceBand,
} from "./color-tables.ts";

export {
  bandsToResistance,
  resistanceToBands,
  decodedResistance,
  type BandSelection,
  type EncodedResistor,
  type DecodedResistor,
} from "./resistor-codec.ts";
