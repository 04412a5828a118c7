import type { WorldInputs } from '../model/types';

export type WorldDefaults = Omit<WorldInputs, 'name' | 'type'>;

/**
 * Default inputs - every CLI flag maps to one of these.
 * Left alone, they describe Earth (or Luna) around Sol.
 */
export const defaults: Readonly<WorldDefaults> = {
  mass: 1.0,
  density: 1.0,
  satelliteMass: 0.0123, // Luna
  satelliteDistance: 384400, // km

  starMass: 1.0,
  starDistance: 1.0,
  luminosity: 1.0,

  age: 4.568, // GYr, the solar system
  eccentricity: 0.0,
  metallicity: 1.0,

  outsideIceLine: false,
  grandTack: false,
  rockySatellite: false,
  oortCloud: false,
  greenhouse: false,
  tidalHeating: false
};

export function makeInputs(
  name: string,
  type: WorldInputs['type'],
  overrides: Partial<WorldDefaults> = {}
): WorldInputs {
  return { ...defaults, ...overrides, name, type };
}
