import { describe, it, expect } from 'vitest';
import { computeWorld, generateWorld, getLocalDay, Dice } from '../src/model';
import { describeReport, describeWorld } from '../src/ui/report';
import { makeInputs } from '../src/state/params';
import type { GeneratedWorld, WaterResult } from '../src/model/types';

describe('Report head', () => {
  it('orbited planet lists its satellite', () => {
    const report = computeWorld(makeInputs('New Earth', 'orbited'));
    expect(describeReport('New Earth', report).split('\n')).toEqual([
      'New Earth',
      'Planet with Satellite Age: 4.568 GYr',
      'Mass: 1.000 M♁ Density: 1.000 K♁ Radius: 6378 km',
      'Star Mass: 1.000 M☉ Distance: 1.000 AU Lumin: 1.000 L☉',
      'Satellite Mass: 0.012 M♁ Distance: 384400 km',
      '---',
      'Orbital Period = 8766.0 hours'
    ]);
  });

  it('lone planet has no companion line', () => {
    const report = computeWorld(makeInputs('New Earth', 'lone'));
    expect(describeReport('New Earth', report).split('\n')).toEqual([
      'New Earth',
      'Lone Planet Age: 4.568 GYr',
      'Mass: 1.000 M♁ Density: 1.000 K♁ Radius: 6378 km',
      'Star Mass: 1.000 M☉ Distance: 1.000 AU Lumin: 1.000 L☉',
      '---',
      'Orbital Period = 8766.0 hours'
    ]);
  });

  it('satellite lists its primary', () => {
    const report = computeWorld(makeInputs('Luna', 'satellite'));
    expect(describeReport('Luna', report).split('\n')).toEqual([
      'Luna',
      'Satellite Age: 4.568 GYr',
      'Mass: 0.012 M♁ Density: 1.000 K♁ Radius: 1472 km',
      'Star Mass: 1.000 M☉ Distance: 1.000 AU Lumin: 1.000 L☉',
      'Primary Mass: 1.000 M♁ Distance: 384400 km',
      '---',
      'Orbital Period = 655.7 hours'
    ]);
  });
});

describe('Full report', () => {
  const inputs = makeInputs('New Earth', 'orbited');
  const report = computeWorld(inputs);
  const moderate: WaterResult = { prevalence: 'moderate', percent: 7.4, runawayGreenhouse: false };

  it('describes a free-spinning world', () => {
    const rotation = { periodHours: 23.9, lock: 'none' as const };
    const world: GeneratedWorld = {
      inputs,
      report,
      rotation,
      obliquity: { degrees: 23, unstable: false },
      day: getLocalDay(report, rotation),
      water: moderate,
      geophysics: { lithosphere: 'maturePlate', tectonics: 'mobile', episodicResurfacing: false, water: moderate }
    };

    expect(describeWorld(world).split('\n').slice(6)).toEqual([
      'Orbital Period = 8766.0 hours',
      'Rotation Period = 23.9 hours',
      'Obliquity = 23°',
      'Day length = 23.8 hours 367.78 days in year',
      'Black body temperature = 278 K',
      'M number = 5',
      'Water prevalence: Moderate   7.4%',
      'Mature Plate Lithosphere Mobile plate tectonics'
    ]);
  });

  it('describes a locked, scorched world', () => {
    const scorched: WaterResult = { prevalence: 'trace', percent: 0, runawayGreenhouse: true };
    const world: GeneratedWorld = {
      inputs,
      report,
      rotation: { periodHours: report.orbitalPeriodHours, lock: 'lockToStar' },
      obliquity: { degrees: 0, unstable: true },
      day: null,
      water: scorched,
      geophysics: { lithosphere: 'earlyPlate', tectonics: 'fixed', episodicResurfacing: true, water: scorched }
    };

    expect(describeWorld(world).split('\n').slice(7)).toEqual([
      'Rotation Period = 8766.0 hours 1:1 tidal lock with star',
      'Obliquity = 0° Unstable',
      'Day length: not applicable',
      'Black body temperature = 278 K Runaway Greenhouse',
      'M number = 5',
      'Water prevalence: Trace   0.0%',
      'Early Plate Lithosphere Fixed Plate Tectonics Episodic Resurfacing'
    ]);
  });
});

describe('World generation', () => {
  it('same seed, same world', () => {
    const inputs = makeInputs('Arcadia', 'lone', { mass: 0.93, starMass: 0.94, starDistance: 0.892 });
    const a = describeWorld(generateWorld(inputs, new Dice('Arcadia')));
    const b = describeWorld(generateWorld(inputs, new Dice('Arcadia')));
    expect(a).toBe(b);
  });

  it('keeps the final water from the geophysics step', () => {
    const world = generateWorld(makeInputs('Young', 'orbited', { age: 0 }), new Dice('test', [1]));
    expect(world.geophysics.lithosphere).toBe('molten');
    expect(world.water).toBe(world.geophysics.water);
    expect(world.water.prevalence).toBe('trace');
  });
});
