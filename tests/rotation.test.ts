import { describe, it, expect } from 'vitest';
import { adjustForEccentricity, getLocalDay, rollObliquity, rollRotation } from '../src/model/rotation';
import { computeWorld } from '../src/model/computeWorld';
import { Dice } from '../src/model/dice';
import { makeInputs } from '../src/state/params';
import type { Resonance } from '../src/model/types';

describe('Eccentricity resonance', () => {
  const cases: Array<[number, number, number, Resonance]> = [
    [0.01, 256, 256, 'lockToStar'],
    [0.12, 478, 478, 'lockToStar'],
    [0.18, 330, 220, 'resonance3:2'],
    [0.25, 550, 275, 'resonance2:1'],
    [0.29, 700, 350, 'resonance2:1'],
    [0.35, 500, 200, 'resonance5:2'],
    [0.4, 1000, 400, 'resonance5:2'],
    [0.45, 300, 100, 'resonance3:1'],
    [0.6, 600, 200, 'resonance3:1']
  ];

  it.each(cases)('e=%f on %f hours gives %f hours (%s)', (ecc, period, expected, lock) => {
    const result = adjustForEccentricity(ecc, period);
    expect(result.periodHours).toBeCloseTo(expected, 9);
    expect(result.lock).toBe(lock);
  });
});

describe('Rotation', () => {
  it('young lone planet spins freely inside the table range', () => {
    const report = computeWorld(
      makeInputs('Arcadia', 'lone', { mass: 0.93, starMass: 0.94, starDistance: 0.892, age: 3.225, eccentricity: 0.07 })
    );
    expect(report.tidalAdjustment).toBe(2);

    // 2 + 10 looks up the 24-40 hour row
    const rotation = rollRotation(report, new Dice('test', [3, 6, 1]));
    expect(rotation.lock).toBe('none');
    expect(rotation.periodHours).toBeGreaterThanOrEqual(24);
    expect(rotation.periodHours).toBeLessThanOrEqual(40);
  });

  it('braked lone planet falls into an eccentricity resonance', () => {
    const report = computeWorld(
      makeInputs('Braked', 'lone', { mass: 0.93, starMass: 1.256, starDistance: 0.892, age: 9.225, eccentricity: 0.37 })
    );
    expect(report.tidalAdjustment).toBe(9);

    const rotation = rollRotation(report, new Dice('test', [5, 6, 5]));
    expect(rotation.lock).toBe('resonance5:2');
    expect(rotation.periodHours).toBeCloseTo(report.orbitalPeriodHours * 0.4, 9);
  });

  it('strongly braked planet locks to its satellite', () => {
    const report = computeWorld(
      makeInputs('Clutched', 'orbited', {
        mass: 0.93,
        starMass: 0.14,
        starDistance: 0.087,
        satelliteDistance: 125687,
        satelliteMass: 0.025,
        age: 1.225,
        eccentricity: 0.07
      })
    );
    const rotation = rollRotation(report, new Dice('test', [1, 2, 1]));
    expect(rotation.lock).toBe('lockToSatellite');
    expect(rotation.periodHours).toBeCloseTo(126.2, 1);
  });

  it('satellites always face their planet', () => {
    const report = computeWorld(makeInputs('Luna', 'satellite'));
    const rotation = rollRotation(report, new Dice('test', [6]));
    expect(rotation).toEqual({ periodHours: report.orbitalPeriodHours, lock: 'lockToPrimary' });
  });

  it('Earth with Luna rolls a day from the 16-24 hour row', () => {
    const report = computeWorld(makeInputs('Earth', 'orbited'));
    const rotation = rollRotation(report, new Dice('test', [1]));
    expect(rotation.lock).toBe('none');
    expect(rotation.periodHours).toBeGreaterThanOrEqual(16);
    expect(rotation.periodHours).toBeLessThanOrEqual(24);
  });
});

describe('Obliquity', () => {
  const earth = computeWorld(makeInputs('Earth', 'orbited'));
  const lone = computeWorld(makeInputs('Drifter', 'lone'));
  const free = { periodHours: 24, lock: 'none' as const };

  it('satellites stay nearly upright', () => {
    const report = computeWorld(makeInputs('Luna', 'satellite'));
    const rotation = { periodHours: report.orbitalPeriodHours, lock: 'lockToPrimary' as const };
    expect(rollObliquity(report, rotation, new Dice('test', [6]))).toEqual({ degrees: 10, unstable: false });
  });

  it('locked worlds never tilt below zero', () => {
    const locked = { periodHours: 8766, lock: 'lockToStar' as const };
    expect(rollObliquity(lone, locked, new Dice('test', [2]))).toEqual({ degrees: 0, unstable: false });
  });

  it('a high lookup settles the axis', () => {
    // 7 + 18 = 25
    expect(rollObliquity(earth, free, new Dice('test', [6]))).toEqual({ degrees: 10, unstable: false });
  });

  it('a middling lookup draws from the obliquity table', () => {
    // 7 + 9 = 16 -> 24-28 degrees
    const result = rollObliquity(earth, free, new Dice('test', [3]));
    expect(result.unstable).toBe(false);
    expect(result.degrees).toBeGreaterThanOrEqual(24);
    expect(result.degrees).toBeLessThanOrEqual(28);
  });

  it('a lone planet with a wild steadiness roll is unstable and extreme', () => {
    // 1 + 3 - 7 = -3 -> extreme table, d6 of 1 -> 50-60 degrees
    const result = rollObliquity(lone, free, new Dice('test', [1]));
    expect(result.unstable).toBe(true);
    expect(result.degrees).toBeGreaterThanOrEqual(50);
    expect(result.degrees).toBeLessThanOrEqual(60);
  });

  it('a six on the extreme roll tips the world on its side', () => {
    const dice = new Dice('test', [1, 1, 1, 1, 1, 1, 6, 4, 4, 4]);
    expect(rollObliquity(lone, free, dice)).toEqual({ degrees: 78, unstable: true });
  });
});

describe('Local day', () => {
  it('is not applicable when locked to the star', () => {
    const report = computeWorld(makeInputs('Locked', 'lone'));
    expect(getLocalDay(report, { periodHours: report.orbitalPeriodHours, lock: 'lockToStar' })).toBeNull();
  });

  it('is not applicable for a world that does not turn', () => {
    const report = computeWorld(makeInputs('Still', 'orbited'));
    expect(getLocalDay(report, { periodHours: 0, lock: 'lockToSatellite' })).toBeNull();
  });

  it('combines the sidereal day and the year', () => {
    const report = computeWorld(makeInputs('Earth', 'orbited'));
    const day = getLocalDay(report, { periodHours: 24, lock: 'none' });
    expect(day?.lengthHours).toBeCloseTo(23.9345, 4);
    expect(day?.daysPerYear).toBeCloseTo(366.25, 2);
  });
});
