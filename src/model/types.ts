// Core types for the world model

export type WorldType = 'lone' | 'orbited' | 'satellite';

export interface WorldInputs {
  name: string;
  type: WorldType;

  // Bodies
  mass: number;               // Primary mass (M♁) - the planet itself unless type is satellite
  density: number;            // Density of the described world (K♁)
  satelliteMass: number;      // Satellite mass (M♁) - the described world when type is satellite
  satelliteDistance: number;  // Satellite <-> primary separation (km)

  // Star
  starMass: number;           // M☉
  starDistance: number;       // AU
  luminosity: number;         // L☉

  // System
  age: number;                // GYr
  eccentricity: number;       // 0 <= e < 1
  metallicity: number;        // Sol = 1

  // Formation history
  outsideIceLine: boolean;
  grandTack: boolean;
  rockySatellite: boolean;    // Rocky satellite of a gas giant
  oortCloud: boolean;
  greenhouse: boolean;        // Runaway greenhouse already happened
  tidalHeating: boolean;      // Satellite under orbital tidal heating
}

export interface BodyOrbit {
  mass: number;      // M♁
  distance: number;  // km
}

export interface WorldReport {
  type: WorldType;
  mass: number;      // Mass of the described world
  density: number;
  radiusKm: number;
  gravity: number;   // G

  starMass: number;
  starDistance: number;
  luminosity: number;
  age: number;
  eccentricity: number;

  satellite?: BodyOrbit;  // orbited only
  primary?: BodyOrbit;    // satellite only

  orbitalPeriodHours: number;            // The world's own orbit
  starOrbitalPeriodHours: number;        // Orbit of the star-circling body
  satelliteOrbitalPeriodHours?: number;  // Satellite <-> primary

  blackBodyTempK: number;
  mNumber: number;
  tidalNumber: number;
  tidalAdjustment: number;
}

export type Resonance =
  | 'none'
  | 'lockToSatellite'
  | 'lockToPrimary'
  | 'lockToStar'
  | 'resonance3:2'
  | 'resonance2:1'
  | 'resonance5:2'
  | 'resonance3:1';

export interface RotationResult {
  periodHours: number;
  lock: Resonance;
}

export interface ObliquityResult {
  degrees: number;
  unstable: boolean;
}

export interface LocalDay {
  lengthHours: number;
  daysPerYear: number;
}

export type WaterPrevalence = 'trace' | 'minimal' | 'moderate' | 'extensive' | 'massive';

export interface WaterResult {
  prevalence: WaterPrevalence;
  percent: number;
  runawayGreenhouse: boolean;
}

export type Lithosphere =
  | 'molten'
  | 'soft'
  | 'earlyPlate'
  | 'maturePlate'
  | 'ancientPlate'
  | 'solid';

export type Tectonics = 'none' | 'mobile' | 'fixed';

export interface GeophysicsResult {
  lithosphere: Lithosphere;
  tectonics: Tectonics;
  episodicResurfacing: boolean;
  water: WaterResult;  // Water after the lithosphere has had its say
}

export interface GeneratedWorld {
  inputs: WorldInputs;
  report: WorldReport;
  rotation: RotationResult;
  obliquity: ObliquityResult;
  day: LocalDay | null;  // null when tidally locked to the star
  water: WaterResult;
  geophysics: GeophysicsResult;
}
