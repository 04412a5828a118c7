import type { GeneratedWorld, WorldInputs } from './types';
import { computeWorld } from './computeWorld';
import type { Dice } from './dice';
import { getLocalDay, rollObliquity, rollRotation } from './rotation';
import { rollGeophysics, rollWater } from './surface';

/**
 * Run the full generation sequence for one world.
 *
 * The calculator fixes everything that follows from the inputs; the dice then
 * settle rotation, axial tilt, water and the interior, in that order, since
 * each step reads the one before it.
 */
export function generateWorld(inputs: WorldInputs, dice: Dice): GeneratedWorld {
  const report = computeWorld(inputs);

  const rotation = rollRotation(report, dice);
  const obliquity = rollObliquity(report, rotation, dice);
  const day = getLocalDay(report, rotation);

  const water = rollWater(inputs, report, dice);
  const geophysics = rollGeophysics(inputs, report, rotation, water, dice);

  return {
    inputs,
    report,
    rotation,
    obliquity,
    day,
    water: geophysics.water,
    geophysics
  };
}
