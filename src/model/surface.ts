import { LITHOSPHERE_RANK, STRESS_PRIMARY, STRESS_STAR } from './constants';
import type { Dice } from './dice';
import { TABLES, lookUp } from './tables';
import type {
  GeophysicsResult,
  Lithosphere,
  RotationResult,
  Tectonics,
  WaterPrevalence,
  WaterResult,
  WorldInputs,
  WorldReport
} from './types';

// Above this the oceans start to boil off
const HOT_WORLD_K = 300;
const BOIL_OFF_ROLL = 318;

const WET: readonly WaterPrevalence[] = ['moderate', 'extensive', 'massive'];
const PLATES: readonly Lithosphere[] = ['earlyPlate', 'maturePlate', 'ancientPlate'];
const RESONANCES: readonly RotationResult['lock'][] = [
  'resonance3:2',
  'resonance2:1',
  'resonance5:2',
  'resonance3:1'
];

/**
 * WATER
 * The M number decides most of it: light, hot, dense worlds can't hold on to
 * their volatiles. Formation history nudges the roll.
 */
export function rollWater(inputs: WorldInputs, report: WorldReport, dice: Dice): WaterResult {
  const { mNumber, blackBodyTempK } = report;
  let prevalence: WaterPrevalence;
  let percent: number;

  if (mNumber <= 2) {
    prevalence = 'massive';
    percent = 100;
  } else if (mNumber >= 29) {
    const dry = blackBodyTempK >= 125 || inputs.rockySatellite;
    prevalence = dry ? 'trace' : 'massive';
    percent = dry ? 0 : 100;
  } else if (inputs.outsideIceLine) {
    prevalence = 'massive';
    percent = 100;
  } else {
    let modifier = -mNumber;
    if (inputs.grandTack) modifier += 6;
    if (inputs.oortCloud) modifier += 3;

    const row = lookUp(TABLES.hydrographics, dice.roll(3) + modifier);
    prevalence = row.prevalence;
    percent = dice.uniform(row.range[0], row.range[1]);
  }

  let runawayGreenhouse = inputs.greenhouse;
  if (mNumber > 2 && blackBodyTempK >= HOT_WORLD_K) {
    if (prevalence === 'minimal' && dice.roll(3) + blackBodyTempK >= BOIL_OFF_ROLL) {
      prevalence = 'trace';
      percent = 0;
    } else if (WET.includes(prevalence) && dice.roll(3) + blackBodyTempK >= BOIL_OFF_ROLL) {
      prevalence = 'trace';
      percent = 0;
      runawayGreenhouse = true;
    }
  }

  return { prevalence, percent, runawayGreenhouse };
}

// Tidal flexing from the star, or from the planet for a satellite. 0 when nothing flexes the world.
export function getTidalStress(
  inputs: WorldInputs,
  report: WorldReport,
  rotation: RotationResult
): number {
  if (inputs.type === 'satellite') {
    return inputs.tidalHeating
      ? (STRESS_PRIMARY * inputs.mass * report.radiusKm) / Math.pow(inputs.satelliteDistance, 3)
      : 0;
  }

  const flexed =
    inputs.eccentricity >= 0.05 || RESONANCES.includes(rotation.lock) || inputs.tidalHeating;
  if (rotation.lock !== 'none' && flexed) {
    return (STRESS_STAR * inputs.starMass * report.radiusKm) / Math.pow(inputs.starDistance, 3);
  }
  return 0;
}

/**
 * GEOPHYSICS
 * Heat from formation and radioactive decay runs down with age; the smaller
 * and poorer in metals the world, the sooner its lithosphere freezes solid.
 */
export function rollGeophysics(
  inputs: WorldInputs,
  report: WorldReport,
  rotation: RotationResult,
  water: WaterResult,
  dice: Dice
): GeophysicsResult {
  const ageMod = Math.round(8 * inputs.age);
  const primordialHeatMod = Math.round(-60 * Math.log10(report.gravity));
  const radiogenicHeatMod = Math.round(-10 * Math.log10(inputs.metallicity));
  const heat = ageMod + primordialHeatMod + radiogenicHeatMod + dice.roll(3);
  let lithosphere = lookUp(TABLES.lithosphere, heat).lithosphere;

  const stress = getTidalStress(inputs, report, rotation);
  if (stress > 0) {
    const stressed = lookUp(TABLES.stressedLithosphere, stress).lithosphere;
    if (LITHOSPHERE_RANK[stressed] < LITHOSPHERE_RANK[lithosphere]) lithosphere = stressed;
  }

  let tectonics: Tectonics = 'none';
  if (PLATES.includes(lithosphere)) {
    let roll = dice.roll(3);
    if (water.prevalence === 'extensive' || water.prevalence === 'massive') roll += 6;
    if (water.prevalence === 'minimal' || water.prevalence === 'trace') roll -= 6;
    if (lithosphere === 'earlyPlate') roll += 2;
    if (lithosphere === 'ancientPlate') roll -= 2;
    tectonics = roll >= 11 ? 'mobile' : 'fixed';
  }

  const episodicResurfacing =
    (lithosphere === 'earlyPlate' || lithosphere === 'maturePlate') && tectonics === 'fixed';

  let { prevalence, percent } = water;
  if (lithosphere === 'molten' && prevalence !== 'massive') {
    prevalence = 'trace';
    percent = 0;
  }

  // Extensive oceans spread further over a smooth crust
  if (prevalence === 'extensive') {
    const roll = dice.roll(3);
    if (lithosphere === 'soft' || lithosphere === 'solid') percent += roll + 10;
    if (lithosphere === 'earlyPlate' || lithosphere === 'ancientPlate') percent += roll;
    percent = Math.min(percent, 100);
  }

  return {
    lithosphere,
    tectonics,
    episodicResurfacing,
    water: { ...water, prevalence, percent }
  };
}
