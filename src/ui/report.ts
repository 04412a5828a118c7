import {
  LITHOSPHERE_LABELS,
  RESONANCE_LABELS,
  TECTONICS_LABELS,
  WATER_LABELS,
  WORLD_TYPE_LABELS
} from '../model/constants';
import type { GeneratedWorld, WorldReport } from '../model/types';

// Lines are built from optional suffixes; drop the gap they leave behind
function finish(lines: string[]): string {
  return lines.map((line) => line.trimEnd()).join('\n');
}

function headLines(name: string, report: WorldReport): string[] {
  const lines = [
    name,
    `${WORLD_TYPE_LABELS[report.type]} Age: ${report.age.toFixed(3)} GYr`,
    `Mass: ${report.mass.toFixed(3)} M♁ Density: ${report.density.toFixed(3)} K♁ Radius: ${report.radiusKm.toFixed(0)} km`,
    `Star Mass: ${report.starMass.toFixed(3)} M☉ Distance: ${report.starDistance.toFixed(3)} AU Lumin: ${report.luminosity.toFixed(3)} L☉`
  ];

  if (report.satellite) {
    lines.push(
      `Satellite Mass: ${report.satellite.mass.toFixed(3)} M♁ Distance: ${report.satellite.distance.toFixed(0)} km`
    );
  } else if (report.primary) {
    lines.push(
      `Primary Mass: ${report.primary.mass.toFixed(3)} M♁ Distance: ${report.primary.distance.toFixed(0)} km`
    );
  }

  lines.push('---');
  lines.push(`Orbital Period = ${report.orbitalPeriodHours.toFixed(1)} hours`);
  return lines;
}

// Just what the calculator knows - no dice involved
export function describeReport(name: string, report: WorldReport): string {
  return finish(headLines(name, report));
}

export function describeWorld(world: GeneratedWorld): string {
  const { report, rotation, obliquity, day, water, geophysics } = world;
  const lines = headLines(world.inputs.name, report);

  lines.push(
    `Rotation Period = ${rotation.periodHours.toFixed(1)} hours ${RESONANCE_LABELS[rotation.lock]}`
  );
  lines.push(`Obliquity = ${obliquity.degrees}° ${obliquity.unstable ? 'Unstable' : ''}`);
  lines.push(
    day
      ? `Day length = ${day.lengthHours.toFixed(1)} hours ${day.daysPerYear.toFixed(2)} days in year`
      : 'Day length: not applicable'
  );
  lines.push(
    `Black body temperature = ${report.blackBodyTempK} K ${water.runawayGreenhouse ? 'Runaway Greenhouse' : ''}`
  );
  lines.push(`M number = ${report.mNumber}`);
  lines.push(`Water prevalence: ${WATER_LABELS[water.prevalence]} ${water.percent.toFixed(1).padStart(5)}%`);
  lines.push(
    `${LITHOSPHERE_LABELS[geophysics.lithosphere]} ${TECTONICS_LABELS[geophysics.tectonics]} ${geophysics.episodicResurfacing ? 'Episodic Resurfacing' : ''}`
  );

  return finish(lines);
}
