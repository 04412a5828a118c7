import { RESONANT_ROLL, TIDAL_LOCK_NUMBER } from './constants';
import type { Dice } from './dice';
import { TABLES, lookUp } from './tables';
import type { LocalDay, ObliquityResult, Resonance, RotationResult, WorldReport } from './types';

/**
 * ROTATION
 * Tides slow everything down eventually. The question is whether the world
 * is young enough, far enough, or light enough to still be spinning freely.
 */

// Eccentric orbits lock into spin-orbit resonances instead of 1:1
export function adjustForEccentricity(eccentricity: number, periodHours: number): RotationResult {
  let multiplier: number;
  let lock: Resonance;

  if (eccentricity <= 0.12) {
    multiplier = 1;
    lock = 'lockToStar';
  } else if (eccentricity < 0.25) {
    multiplier = 2 / 3;
    lock = 'resonance3:2';
  } else if (eccentricity < 0.35) {
    multiplier = 0.5;
    lock = 'resonance2:1';
  } else if (eccentricity < 0.45) {
    multiplier = 0.4;
    lock = 'resonance5:2';
  } else {
    multiplier = 1 / 3;
    lock = 'resonance3:1';
  }

  return { periodHours: periodHours * multiplier, lock };
}

export function rollRotation(report: WorldReport, dice: Dice): RotationResult {
  const roll = dice.roll(3);

  // Satellites face their planet
  if (report.type === 'satellite') {
    return { periodHours: report.orbitalPeriodHours, lock: 'lockToPrimary' };
  }

  const adjusted = report.tidalAdjustment + roll;
  if (report.tidalNumber >= TIDAL_LOCK_NUMBER || adjusted >= RESONANT_ROLL) {
    if (report.type === 'lone' || report.satelliteOrbitalPeriodHours === undefined) {
      return adjustForEccentricity(report.eccentricity, report.orbitalPeriodHours);
    }
    return { periodHours: report.satelliteOrbitalPeriodHours, lock: 'lockToSatellite' };
  }

  const [lower, upper] = lookUp(TABLES.rotationRate, adjusted).range;
  const periodHours = dice.uniform(lower, upper);
  if (periodHours >= report.orbitalPeriodHours) {
    return adjustForEccentricity(report.eccentricity, report.orbitalPeriodHours);
  }
  return { periodHours, lock: 'none' };
}

function extremeObliquity(dice: Dice): number {
  const roll = dice.d6();
  if (roll === 6) {
    const more = dice.roll(3);
    return more > 7 ? 90 - more : 90;
  }
  const [lower, upper] = lookUp(TABLES.extremeObliquity, roll).range;
  return dice.integer(lower, upper);
}

export function rollObliquity(
  report: WorldReport,
  rotation: RotationResult,
  dice: Dice
): ObliquityResult {
  const roll = dice.roll(3);
  const settled = Math.max(roll - 8, 0);

  // Tides keep locked worlds nearly upright
  if (report.type === 'satellite' || rotation.lock !== 'none') {
    return { degrees: settled, unstable: false };
  }

  // No large moon to steady the axis
  let modifier = 0;
  let unstable = false;
  if (report.type === 'lone') {
    const steadiness = dice.roll(3);
    if (steadiness < 8 || steadiness > 13) {
      modifier = -7;
      unstable = true;
    }
  }

  const value = report.tidalAdjustment + roll + modifier;
  if (value >= 25) return { degrees: settled, unstable };
  if (value <= 4) return { degrees: extremeObliquity(dice), unstable };

  const [lower, upper] = lookUp(TABLES.obliquity, value).range;
  return { degrees: dice.integer(lower, upper), unstable };
}

// Solar day from the sidereal rotation and the year. Meaningless when locked to the star
// or when the world does not turn at all.
export function getLocalDay(report: WorldReport, rotation: RotationResult): LocalDay | null {
  if (rotation.lock === 'lockToStar') return null;

  const year = report.orbitalPeriodHours;
  const lengthHours = (year * rotation.periodHours) / (rotation.periodHours + year);
  if (lengthHours === 0) return null;
  return { lengthHours, daysPerYear: year / lengthHours };
}
