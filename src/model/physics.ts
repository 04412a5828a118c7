import {
  BLACK_BODY_K,
  EARTH_MASS_IN_SOL,
  EARTH_RADIUS_KM,
  M_NUMBER_SCALE,
  SATELLITE_ORBIT_HOURS,
  STAR_ORBIT_HOURS,
  TIDAL_SATELLITE,
  TIDAL_STAR
} from './constants';
import type { WorldInputs } from './types';

/**
 * THE PHYSICS MODULE
 * Closed-form approximations, all relative to Earth and Sol.
 * No state, no randomness: same inputs, same numbers.
 */

// Mass of whatever the report describes: the satellite itself, or the planet
export function getWorldMass(inputs: WorldInputs): number {
  return inputs.type === 'satellite' ? inputs.satelliteMass : inputs.mass;
}

// Sphere of given mass and density: R ∝ (m/ρ)^(1/3)
export function getRadiusKm(mass: number, density: number): number {
  return EARTH_RADIUS_KM * Math.cbrt(mass / density);
}

// Surface gravity in G: g ∝ m/R² = (m·ρ²)^(1/3)
export function getGravity(mass: number, density: number): number {
  return Math.cbrt(mass * Math.pow(density, 2));
}

// Kepler's third law in AU and M☉. The planet's own mass barely registers.
export function getStarOrbitalPeriod(
  starDistance: number,
  starMass: number,
  planetMass: number
): number {
  const effectiveMass = starMass + planetMass * EARTH_MASS_IN_SOL;
  return STAR_ORBIT_HOURS * Math.sqrt(Math.pow(starDistance, 3) / effectiveMass);
}

// Same law in km and M♁, for a satellite around its planet
export function getSatelliteOrbitalPeriod(
  distanceKm: number,
  primaryMass: number,
  satelliteMass: number
): number {
  return SATELLITE_ORBIT_HOURS * Math.sqrt(Math.pow(distanceKm, 3) / (primaryMass + satelliteMass));
}

export function getBlackBodyTemp(luminosity: number, starDistance: number): number {
  return Math.round((BLACK_BODY_K * Math.pow(luminosity, 0.25)) / Math.sqrt(starDistance));
}

// Small M holds on to water, large M loses it
export function getMNumber(blackBodyTempK: number, density: number, radiusKm: number): number {
  return Math.ceil((M_NUMBER_SCALE * blackBodyTempK) / density / Math.pow(radiusKm, 2));
}

/**
 * Tidal braking number. Satellites are always locked to their planet, so 0.
 * Lone planets are braked by the star, orbited planets by their satellite.
 */
export function getTidalNumber(inputs: WorldInputs, radiusKm: number): number {
  if (inputs.type === 'satellite') return 0;

  const [constant, brakingMass, distance] =
    inputs.type === 'lone'
      ? [TIDAL_STAR, inputs.starMass, inputs.starDistance]
      : [TIDAL_SATELLITE, inputs.satelliteMass, inputs.satelliteDistance];

  return (
    (constant * inputs.age * Math.pow(brakingMass, 2) * Math.pow(radiusKm, 3)) /
    inputs.mass /
    Math.pow(distance, 6)
  );
}

export function getTidalAdjustment(tidalNumber: number): number {
  return Math.round(tidalNumber * 12);
}
