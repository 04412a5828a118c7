import type { Lithosphere, Resonance, Tectonics, WaterPrevalence, WorldType } from './types';

/**
 * WORLD CONSTANTS
 *
 * Everything is relative to Earth and Sol. Reference values are tuned so that
 * Earth and Luna come out exact with default inputs.
 */

// Equatorial radius of a 1 M♁, 1 K♁ world
export const EARTH_RADIUS_KM = 6378;

// One Earth year at 1 AU around 1 M☉
export const STAR_ORBIT_HOURS = 8766.0;

// Hours per sqrt(km³ / M♁) - Luna lands on 655.7 hours
export const SATELLITE_ORBIT_HOURS = 2.768e-6;

// M♁ expressed in M☉
export const EARTH_MASS_IN_SOL = 3.003e-6;

// Black body temperature at 1 AU from 1 L☉
export const BLACK_BODY_K = 278;

// Scales black body temperature / density / radius² into the M number
export const M_NUMBER_SCALE = 700000;

// Tidal braking constants
export const TIDAL_STAR = 9.6e-14;     // star on a lone planet (AU)
export const TIDAL_SATELLITE = 1e25;   // satellite on its planet (km)

// Tidal stress constants for the stressed lithosphere
export const STRESS_PRIMARY = 1.59e15;  // planet on a satellite (km)
export const STRESS_STAR = 1.57e-4;     // star on a planet (AU)

// Tidal number at which a world is always locked
export const TIDAL_LOCK_NUMBER = 2;

// Rotation lookups at or above this are resonant
export const RESONANT_ROLL = 24;

export const WORLD_TYPES: readonly WorldType[] = ['lone', 'orbited', 'satellite'];

export const WORLD_TYPE_LABELS: Record<WorldType, string> = {
  lone: 'Lone Planet',
  orbited: 'Planet with Satellite',
  satellite: 'Satellite'
};

export const RESONANCE_LABELS: Record<Resonance, string> = {
  none: '',
  lockToSatellite: '1:1 tidal lock with satellite',
  lockToPrimary: '1:1 tidal lock with planet',
  lockToStar: '1:1 tidal lock with star',
  'resonance3:2': '3:2 resonance with star',
  'resonance2:1': '2:1 resonance with star',
  'resonance5:2': '5:2 resonance with star',
  'resonance3:1': '3:1 resonance with star'
};

export const WATER_LABELS: Record<WaterPrevalence, string> = {
  trace: 'Trace',
  minimal: 'Minimal',
  moderate: 'Moderate',
  extensive: 'Extensive',
  massive: 'Massive'
};

// Ordered from hottest to coldest interior
export const LITHOSPHERE_RANK: Record<Lithosphere, number> = {
  molten: 1,
  soft: 2,
  earlyPlate: 3,
  maturePlate: 4,
  ancientPlate: 5,
  solid: 6
};

export const LITHOSPHERE_LABELS: Record<Lithosphere, string> = {
  molten: 'Molten Lithosphere',
  soft: 'Soft Lithosphere',
  earlyPlate: 'Early Plate Lithosphere',
  maturePlate: 'Mature Plate Lithosphere',
  ancientPlate: 'Ancient Plate Lithosphere',
  solid: 'Solid Plate Lithosphere'
};

export const TECTONICS_LABELS: Record<Tectonics, string> = {
  none: 'No plate tectonics',
  mobile: 'Mobile plate tectonics',
  fixed: 'Fixed Plate Tectonics'
};
