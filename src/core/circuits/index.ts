/**
 * Circuit formula modules: resistor networks, RC transients, Ohm's law.
 */

export {
  seriesResistance,
  parallelResistance,
  combineResistances,
  type ConnectionMode,
} from "./resistor-network.ts";

export {
  timeConstant,
  rcChargeVoltage,
  rcDischargeVoltage,
  rcVoltage,
  type RcCircuit,
  type RcMode,
} from "./rc-transient.ts";

export {
  solveOhmsLaw,
  createKnownPair,
  KNOWN_PAIRS,
  type ElectricalQuantities,
  type KnownPair,
  type KnownPairKind,
  type QuantityName,
} from "./ohms-law.ts";
