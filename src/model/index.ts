/**
 * Model index - everything the CLI (or anything else) needs to build a world
 */

// Constants
export {
  EARTH_RADIUS_KM,
  STAR_ORBIT_HOURS,
  SATELLITE_ORBIT_HOURS,
  EARTH_MASS_IN_SOL,
  WORLD_TYPES,
  WORLD_TYPE_LABELS,
  RESONANCE_LABELS
} from './constants';

// Types
export type {
  WorldType,
  WorldInputs,
  WorldReport,
  BodyOrbit,
  Resonance,
  RotationResult,
  ObliquityResult,
  LocalDay,
  WaterPrevalence,
  WaterResult,
  Lithosphere,
  Tectonics,
  GeophysicsResult,
  GeneratedWorld
} from './types';

// Physics functions
export {
  getWorldMass,
  getRadiusKm,
  getGravity,
  getStarOrbitalPeriod,
  getSatelliteOrbitalPeriod,
  getBlackBodyTemp,
  getMNumber,
  getTidalNumber,
  getTidalAdjustment
} from './physics';

// Calculator
export { computeWorld } from './computeWorld';

// Dice steps
export { Dice } from './dice';
export { adjustForEccentricity, rollRotation, rollObliquity, getLocalDay } from './rotation';
export { rollWater, rollGeophysics, getTidalStress } from './surface';
export { generateWorld } from './generateWorld';
